/**
 * Configuration levels in order of precedence (highest to lowest)
 */
export enum ConfigLevel {
  COMMAND_LINE = 'command-line', // -c sweep.target=origin/main
  REPOSITORY = 'repository', // <git-dir>/branch-sweep.json
  USER = 'user', // ~/.config/branch-sweep/config.json
  SYSTEM = 'system', // /etc/branch-sweep/config.json
  BUILTIN = 'builtin',
}

export const LEVEL_PRECEDENCE: readonly ConfigLevel[] = [
  ConfigLevel.COMMAND_LINE,
  ConfigLevel.REPOSITORY,
  ConfigLevel.USER,
  ConfigLevel.SYSTEM,
  ConfigLevel.BUILTIN,
];

/**
 * Represents a single configuration entry with its value and metadata
 */
export class ConfigEntry {
  readonly key: string;
  readonly value: string;
  readonly level: ConfigLevel;
  readonly source: string;

  constructor(key: string, value: string, level: ConfigLevel, source: string) {
    this.key = key;
    this.value = value;
    this.level = level;
    this.source = source;
  }

  asString(): string {
    return this.value;
  }

  get isBuiltin(): boolean {
    return this.level === ConfigLevel.BUILTIN;
  }
}
