import path from 'path';
import os from 'os';
import { ConfigEntry, ConfigLevel, LEVEL_PRECEDENCE } from './config-level';
import { ConfigStore } from './config-store';
import { ConfigError } from '@/core/exceptions';
import { DEFAULT_MERGE_TARGET, DEFAULT_PROTECTED_BRANCHES } from '@/core/retention/defaults';

export const ConfigKeys = {
  PROTECTED: 'sweep.protected',
  TARGET: 'sweep.target',
} as const;

export type ConfigKey = (typeof ConfigKeys)[keyof typeof ConfigKeys];

const KNOWN_KEYS: ReadonlySet<string> = new Set<string>(Object.values(ConfigKeys));

export const isKnownKey = (key: string): key is ConfigKey => KNOWN_KEYS.has(key);

export type WritableLevel = ConfigLevel.REPOSITORY | ConfigLevel.USER | ConfigLevel.SYSTEM;

/**
 * Central configuration manager that handles the hierarchy of JSON config files
 */
export class SweepConfigManager {
  private stores: Map<ConfigLevel, ConfigStore> = new Map();
  private commandLineConfig: Map<string, string> = new Map();
  private builtinDefaults: Map<string, string> = new Map();

  public static readonly USER_CONFIG_PATH = path.join(os.homedir(), '.config', 'branch-sweep');
  public static readonly UNIX_SYSTEM_CONFIG_PATH = path.join('/', 'etc', 'branch-sweep');
  public static readonly WINDOWS_SYSTEM_CONFIG_PATH = path.join(
    'C:\\',
    'ProgramData',
    'branch-sweep'
  );
  public static readonly CONFIG_FILE_NAME = 'config.json';
  public static readonly REPOSITORY_FILE_NAME = 'branch-sweep.json';

  /**
   * @param gitDir - the repository's git directory; without it there is no
   *   repository level
   */
  constructor(gitDir?: string) {
    this.initializeStores(gitDir);
    this.loadBuiltinDefaults();
  }

  public async load(): Promise<void> {
    await Promise.all(Array.from(this.stores.values()).map((store) => store.load()));
  }

  public setCommandLine(key: string, value: string): void {
    this.commandLineConfig.set(key, value);
  }

  /**
   * Get a configuration value, respecting hierarchy
   */
  public get(key: string): ConfigEntry | null {
    const fromCommandLine = this.commandLineConfig.get(key);
    if (fromCommandLine !== undefined) {
      return new ConfigEntry(key, fromCommandLine, ConfigLevel.COMMAND_LINE, 'command-line');
    }

    for (const level of [ConfigLevel.REPOSITORY, ConfigLevel.USER, ConfigLevel.SYSTEM]) {
      const entries = this.stores.get(level)?.getEntries(key) ?? [];
      const last = entries[entries.length - 1]; // Last value wins
      if (last) return last;
    }

    const builtin = this.builtinDefaults.get(key);
    if (builtin !== undefined) {
      return new ConfigEntry(key, builtin, ConfigLevel.BUILTIN, 'builtin');
    }

    return null;
  }

  /**
   * The key as seen at every level, highest precedence first
   */
  public getAll(key: string): ConfigEntry[] {
    return LEVEL_PRECEDENCE.flatMap((level) =>
      this.listLevel(level).filter((entry) => entry.key === key)
    );
  }

  public async set(
    key: string,
    value: string,
    level: WritableLevel = ConfigLevel.USER
  ): Promise<void> {
    const store = this.storeFor(level);
    store.set(key, value);
    await store.save();
  }

  public async unset(key: string, level: WritableLevel = ConfigLevel.USER): Promise<boolean> {
    const store = this.storeFor(level);
    const removed = store.unset(key);
    if (removed) await store.save();
    return removed;
  }

  /**
   * Effective value of every key known at any level, sorted by key
   */
  public list(): ConfigEntry[] {
    const allKeys = new Set<string>([
      ...this.commandLineConfig.keys(),
      ...this.builtinDefaults.keys(),
    ]);
    this.stores.forEach((store) => {
      store.getAllEntries().forEach((_, key) => allKeys.add(key));
    });

    return Array.from(allKeys)
      .map((key) => this.get(key))
      .filter((entry): entry is ConfigEntry => entry !== null)
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  /**
   * Entries stored at a single level, without falling through
   */
  public listLevel(level: ConfigLevel): ConfigEntry[] {
    if (level === ConfigLevel.COMMAND_LINE) {
      return Array.from(
        this.commandLineConfig,
        ([key, value]) => new ConfigEntry(key, value, level, 'command-line')
      );
    }
    if (level === ConfigLevel.BUILTIN) {
      return Array.from(
        this.builtinDefaults,
        ([key, value]) => new ConfigEntry(key, value, level, 'builtin')
      );
    }

    const store = this.stores.get(level);
    if (!store) return [];
    return Array.from(store.getAllEntries().values())
      .map((entries) => entries[entries.length - 1])
      .filter((entry): entry is ConfigEntry => entry !== undefined)
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  private storeFor(level: ConfigLevel): ConfigStore {
    const store = this.stores.get(level);
    if (!store) {
      throw new ConfigError(
        level === ConfigLevel.REPOSITORY
          ? 'Repository configuration needs to run inside a git repository'
          : `Cannot write config at level: ${level}`
      );
    }
    return store;
  }

  private initializeStores(gitDir?: string): void {
    const systemDir =
      process.platform === 'win32'
        ? SweepConfigManager.WINDOWS_SYSTEM_CONFIG_PATH
        : SweepConfigManager.UNIX_SYSTEM_CONFIG_PATH;
    this.stores.set(
      ConfigLevel.SYSTEM,
      new ConfigStore(path.join(systemDir, SweepConfigManager.CONFIG_FILE_NAME), ConfigLevel.SYSTEM)
    );

    this.stores.set(
      ConfigLevel.USER,
      new ConfigStore(
        path.join(SweepConfigManager.USER_CONFIG_PATH, SweepConfigManager.CONFIG_FILE_NAME),
        ConfigLevel.USER
      )
    );

    if (gitDir) {
      this.stores.set(
        ConfigLevel.REPOSITORY,
        new ConfigStore(
          path.join(gitDir, SweepConfigManager.REPOSITORY_FILE_NAME),
          ConfigLevel.REPOSITORY
        )
      );
    }
  }

  private loadBuiltinDefaults(): void {
    this.builtinDefaults.set(ConfigKeys.PROTECTED, DEFAULT_PROTECTED_BRANCHES.join(','));
    this.builtinDefaults.set(ConfigKeys.TARGET, DEFAULT_MERGE_TARGET);
  }
}
