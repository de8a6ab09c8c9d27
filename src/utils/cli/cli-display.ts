import chalk from 'chalk';
import { Command } from 'commander';
import { display } from './display';

export interface PackageInfo {
  version: string;
  description: string;
  license: string;
}

const EXAMPLES: ReadonlyArray<[string, string]> = [
  ['--local', 'Preview merged local branches'],
  ['--local --apply', 'Delete them'],
  ['--remote origin --into origin/main', 'Preview merged branches on origin'],
  ["--local --skip 'main,release' --match '^feature/'", 'Only feature branches'],
  ['config set sweep.protected main,develop', 'Persist the protected list'],
];

/**
 * Custom help formatter with enhanced styling
 */
export const formatHelp = (cmd: Command): string => {
  const commandName = chalk.cyan.bold(cmd.name());
  const description = chalk.gray(cmd.description());

  let help = `${commandName} - ${description}\n\n`;

  help += `${chalk.yellow.bold('📋 Usage:')}\n`;
  help += `  ${chalk.green('$')} ${commandName} ${chalk.gray('[options]')} ${chalk.gray('[command]')}\n\n`;

  const options = cmd.options;
  if (options.length > 0) {
    help += `${chalk.yellow.bold('⚙️  Options:')}\n`;
    const maxLength = Math.max(...options.map((opt) => opt.flags.length));

    options.forEach((option) => {
      help += `  ${chalk.green(option.flags.padEnd(maxLength))}  ${chalk.gray(option.description || '')}\n`;
    });
    help += '\n';
  }

  const commands = cmd.commands;
  if (commands.length > 0) {
    help += `${chalk.yellow.bold('🚀 Commands:')}\n`;
    const maxLength = Math.max(...commands.map((sub) => sub.name().length));

    commands.forEach((command) => {
      help += `  ${chalk.green(command.name().padEnd(maxLength))}  ${chalk.gray(command.description() || '')}\n`;
    });
    help += '\n';
  }

  help += chalk.yellow.bold('💡 Examples:') + '\n';
  EXAMPLES.forEach(([args, comment]) => {
    help += `  ${chalk.green('$')} ${cmd.name()} ${args} ${chalk.gray(`# ${comment}`)}\n`;
  });

  return help;
};

export const displayVersion = (pkg: PackageInfo): void => {
  const info = [
    `${chalk.bold.blue('branch-sweep')} ${chalk.green(`v${pkg.version}`)}`,
    '',
    `${chalk.gray('Runtime Information:')}`,
    `  ${chalk.gray('Node.js:')} ${chalk.cyan(process.version)}`,
    `  ${chalk.gray('Platform:')} ${chalk.cyan(process.platform)} ${chalk.cyan(process.arch)}`,
    '',
    `${chalk.gray('Project Information:')}`,
    `  ${chalk.gray('License:')} ${chalk.yellow(pkg.license)}`,
    `  ${chalk.gray('Description:')} ${chalk.white(pkg.description)}`,
  ].join('\n');

  display.highlight(info, '🎯 Version Information');
};

/**
 * Last-resort error display for anything a command did not handle itself
 */
export const displayError = (error: Error): void => {
  const errorContent = [
    `${chalk.red.bold('❌ An error occurred:')}`,
    '',
    `${chalk.gray('Error Type:')} ${chalk.red(error.name || 'Unknown Error')}`,
    `${chalk.gray('Message:')} ${chalk.red(error.message)}`,
    '',
    chalk.yellow.bold('🔧 Troubleshooting:'),
    `  ${chalk.blue('💡 Tip:')} Use ${chalk.green('--verbose')} flag for detailed logs`,
    `  ${chalk.blue('📚 Help:')} Run ${chalk.green('branch-sweep --help')} for all options`,
  ].join('\n');

  display.error(errorContent, '🚨 Error');
};
