import { Command } from 'commander';
import { ConfigError, errorMessage } from '@/core/exceptions';
import { SimpleGitBackend } from '@/core/git';
import { logger } from '@/utils';
import {
  ConfigHandler,
  createConfigManager,
  parseConfigOverrides,
  ConfigGetOptions,
  ConfigSetOptions,
  ConfigListOptions,
  ConfigUnsetOptions,
} from './config.handler';
import {
  displayConfigGetResult,
  displayConfigList,
  displayConfigSetResult,
  displayConfigUnsetResult,
} from './config.display';

type GlobalOptions = {
  config?: string[];
};

const isRepositoryLevel = (level?: string): boolean =>
  level === 'repository' || level === 'local';

/**
 * Git directory of the current repository. Required for repository-level
 * writes; outside a repository the other levels still work.
 */
const findGitDir = async (required: boolean): Promise<string | undefined> => {
  try {
    return (await SimpleGitBackend.open(process.cwd())).gitDir;
  } catch (error) {
    if (required) {
      throw new ConfigError('The repository level needs to run inside a git repository', error);
    }
    logger.debug(`No repository context: ${errorMessage(error)}`);
    return undefined;
  }
};

const openHandler = async (command: Command, requireRepository: boolean) => {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const config = await createConfigManager(
    await findGitDir(requireRepository),
    parseConfigOverrides(globals.config ?? [])
  );
  return new ConfigHandler(config);
};

const fail = (action: string, error: unknown): void => {
  logger.error(`Failed to ${action} configuration: ${errorMessage(error)}`);
  process.exitCode = 1;
};

export const configCommand = new Command('config').description(
  '🔧 Get and set the protected branches and merge target'
);

configCommand
  .command('get')
  .description('Get configuration value')
  .argument('<key>', 'Configuration key to get')
  .option('--all', 'Show the value at every level')
  .option('--show-origin', 'Show the origin of configuration values')
  .action(async (key: string, options: ConfigGetOptions, command: Command) => {
    try {
      const handler = await openHandler(command, false);
      const entries = handler.get(key, options);
      displayConfigGetResult(key, entries, options.showOrigin);

      if (entries.length === 0) process.exitCode = 1;
    } catch (error) {
      fail('get', error);
    }
  });

configCommand
  .command('set')
  .description('Set configuration value')
  .argument('<key>', 'Configuration key to set')
  .argument('<value>', 'Configuration value')
  .option('--level <level>', 'Configuration level (system|user|repository)', 'user')
  .action(async (key: string, value: string, options: ConfigSetOptions, command: Command) => {
    try {
      const handler = await openHandler(command, isRepositoryLevel(options.level));
      const level = await handler.set(key, value, options);
      displayConfigSetResult(key, value, level);
    } catch (error) {
      fail('set', error);
    }
  });

configCommand
  .command('unset')
  .description('Unset configuration key')
  .argument('<key>', 'Configuration key to unset')
  .option('--level <level>', 'Configuration level (system|user|repository)', 'user')
  .action(async (key: string, options: ConfigUnsetOptions, command: Command) => {
    try {
      const handler = await openHandler(command, isRepositoryLevel(options.level));
      const { level, removed } = await handler.unset(key, options);
      displayConfigUnsetResult(key, level, removed);
    } catch (error) {
      fail('unset', error);
    }
  });

configCommand
  .command('list')
  .alias('l')
  .description('List all configuration')
  .option('--show-origin', 'Show the origin of configuration values')
  .option('--level <level>', 'Show only configuration from specific level')
  .action(async (options: ConfigListOptions, command: Command) => {
    try {
      const handler = await openHandler(command, isRepositoryLevel(options.level));
      const entries = handler.list(options);
      const title = options.level
        ? `🔧 Configuration (${options.level} level)`
        : '🔧 Configuration';

      displayConfigList(entries, options.showOrigin, title);
    } catch (error) {
      fail('list', error);
    }
  });
