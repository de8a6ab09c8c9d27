#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { logger } from './utils/logger';
import { formatHelp, displayVersion, displayError, PackageInfo } from './utils/cli';
import { registerSweep, configCommand } from './commands';

const pkg: PackageInfo = JSON.parse(
  fs.readFileSync(path.join(__dirname, '../package.json'), 'utf8')
);

type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const program = new Command();

program
  .name('branch-sweep')
  .description('🧹 Delete branches that are already merged')
  .version(pkg.version, '-v, --version', '📋 Display version information')
  .option('-V, --verbose', '🔍 Enable verbose logging')
  .option('-q, --quiet', '🔇 Suppress output')
  .option('-c, --config <key=value>', '⚙️  Override a configuration value', collect, [])
  .configureHelp({
    formatHelp: (cmd) => formatHelp(cmd),
  })
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<GlobalOptions>();

    if (options.quiet) {
      logger.level = 'silent';
    } else if (options.verbose) {
      logger.level = 'debug';
    }
  });

registerSweep(program);
program.addCommand(configCommand);

program.exitOverride();

program.parseAsync().catch((err: unknown) => {
  if (err instanceof CommanderError) {
    if (err.code === 'commander.version') {
      displayVersion(pkg);
      process.exit(0);
    }
    if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed') {
      process.exit(0);
    }
    process.exit(err.exitCode);
  }

  displayError(err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
