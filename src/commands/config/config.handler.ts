import {
  SweepConfigManager,
  ConfigLevel,
  ConfigEntry,
  WritableLevel,
  isKnownKey,
  ConfigKeys,
} from '@/core/config';
import { ConfigError } from '@/core/exceptions';

export interface ConfigGetOptions {
  all?: boolean;
  showOrigin?: boolean;
}

export interface ConfigSetOptions {
  level?: string;
}

export interface ConfigListOptions {
  showOrigin?: boolean;
  level?: string;
}

export interface ConfigUnsetOptions {
  level?: string;
}

export class ConfigHandler {
  private config: SweepConfigManager;

  constructor(config: SweepConfigManager) {
    this.config = config;
  }

  /**
   * Effective value, or the value at every level with `--all`
   */
  get(key: string, options: ConfigGetOptions): ConfigEntry[] {
    if (options.all) {
      return this.config.getAll(key);
    }
    const entry = this.config.get(key);
    return entry ? [entry] : [];
  }

  async set(key: string, value: string, options: ConfigSetOptions): Promise<WritableLevel> {
    if (!isKnownKey(key)) {
      throw new ConfigError(
        `Unknown configuration key '${key}'. Known keys: ${Object.values(ConfigKeys).join(', ')}`
      );
    }
    const level = this.parseLevel(options.level);
    await this.config.set(key, value, level);
    return level;
  }

  /**
   * @returns the level written to, and whether the key was present there
   */
  async unset(
    key: string,
    options: ConfigUnsetOptions
  ): Promise<{ level: WritableLevel; removed: boolean }> {
    const level = this.parseLevel(options.level);
    const removed = await this.config.unset(key, level);
    return { level, removed };
  }

  list(options: ConfigListOptions): ConfigEntry[] {
    if (options.level) {
      return this.config.listLevel(this.parseLevel(options.level));
    }
    return this.config.list();
  }

  parseLevel(levelStr?: string): WritableLevel {
    if (!levelStr) return ConfigLevel.USER;

    switch (levelStr.toLowerCase()) {
      case 'system':
        return ConfigLevel.SYSTEM;
      case 'user':
      case 'global':
        return ConfigLevel.USER;
      case 'repository':
      case 'local':
        return ConfigLevel.REPOSITORY;
      default:
        throw new ConfigError(
          `Invalid configuration level: ${levelStr}. Valid levels: system, user, repository`
        );
    }
  }
}

/**
 * Create a loaded configuration manager, with repository context when there is one
 */
export async function createConfigManager(
  gitDir?: string,
  overrides: Map<string, string> = new Map()
): Promise<SweepConfigManager> {
  const config = new SweepConfigManager(gitDir);
  await config.load();
  overrides.forEach((value, key) => config.setCommandLine(key, value));
  return config;
}

/**
 * Parse `-c key=value` overrides. The value may be empty; the key may not.
 */
export function parseConfigOverrides(args: readonly string[]): Map<string, string> {
  const overrides = new Map<string, string>();

  args.forEach((arg) => {
    const equalIndex = arg.indexOf('=');
    const key = equalIndex > 0 ? arg.substring(0, equalIndex).trim() : '';
    if (!key) {
      throw new ConfigError(`Invalid config override '${arg}', expected key=value`);
    }
    const value = arg.substring(equalIndex + 1).replace(/^["']|["']$/g, '');
    overrides.set(key, value);
  });

  return overrides;
}
