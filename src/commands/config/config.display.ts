import chalk from 'chalk';
import { display } from '@/utils';
import { ConfigEntry, ConfigLevel } from '@/core/config';

const formatLevelColor = (level: ConfigLevel): string => {
  switch (level) {
    case ConfigLevel.COMMAND_LINE:
      return chalk.red.bold('cmdline');
    case ConfigLevel.REPOSITORY:
      return chalk.yellow('repository');
    case ConfigLevel.USER:
      return chalk.cyan('user');
    case ConfigLevel.SYSTEM:
      return chalk.magenta('system');
    case ConfigLevel.BUILTIN:
      return chalk.gray('builtin');
  }
};

const formatOrigin = (entry: ConfigEntry): string =>
  `${chalk.gray('(')}${formatLevelColor(entry.level)}${chalk.gray(': ')}${chalk.gray(entry.source)}${chalk.gray(')')}`;

export const displayConfigEntry = (entry: ConfigEntry, showOrigin: boolean = false): void => {
  const line = `${chalk.blue(entry.key)} = ${chalk.green(entry.value)}`;
  console.log(showOrigin ? `${line} ${formatOrigin(entry)}` : line);
};

export const displayConfigList = (
  entries: ConfigEntry[],
  showOrigin: boolean = false,
  title: string = '🔧 Configuration'
): void => {
  if (entries.length === 0) {
    display.info('No configuration found', title);
    return;
  }

  const lines = entries.map((entry) => {
    const line = `${chalk.blue(entry.key.padEnd(18))} = ${chalk.green(entry.value)}`;
    return showOrigin ? `${line} ${formatOrigin(entry)}` : line;
  });

  display.info(lines.join('\n'), title);
};

export const displayConfigGetResult = (
  key: string,
  entries: ConfigEntry[],
  showOrigin: boolean = false
): void => {
  if (entries.length === 0) {
    const details = [
      `${chalk.gray('Key:')} ${chalk.blue(key)}`,
      `${chalk.gray('Status:')} ${chalk.red('Not found in any configuration level')}`,
      `${chalk.gray('Suggestion:')} Use ${chalk.cyan(`branch-sweep config set ${key} <value>`)} to set it`,
    ].join('\n');

    display.error(details, chalk.bold.red('❌ Configuration Not Found'));
    return;
  }

  entries.forEach((entry) => displayConfigEntry(entry, showOrigin));
};

export const displayConfigSetResult = (key: string, value: string, level: ConfigLevel): void => {
  const details = [
    `${chalk.gray('Key:')} ${chalk.blue(key)}`,
    `${chalk.gray('Value:')} ${chalk.green(value)}`,
    `${chalk.gray('Level:')} ${formatLevelColor(level)}`,
  ].join('\n');

  display.success(details, chalk.bold.green('✅ Configuration Updated'));
};

export const displayConfigUnsetResult = (
  key: string,
  level: ConfigLevel,
  removed: boolean
): void => {
  const details = [
    `${chalk.gray('Key:')} ${chalk.blue(key)}`,
    `${chalk.gray('Level:')} ${formatLevelColor(level)}`,
    `${chalk.gray('Status:')} ${removed ? chalk.green('Removed') : chalk.yellow('Was not set')}`,
  ].join('\n');

  display.success(details, chalk.bold.green('🗑️ Configuration Removed'));
};
