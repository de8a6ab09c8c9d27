import fs from 'fs-extra';
import { ConfigEntry, ConfigLevel } from './config-level';
import { ConfigParser } from './config-parser';
import { errorMessage } from '@/core/exceptions';
import { logger } from '@/utils/logger';

/**
 * Handles reading and writing one JSON configuration file
 */
export class ConfigStore {
  readonly path: string;
  readonly level: ConfigLevel;
  private entries: Map<string, ConfigEntry[]> = new Map();

  constructor(path: string, level: ConfigLevel) {
    this.path = path;
    this.level = level;
  }

  /**
   * Load configuration from the JSON file. A missing file is an empty store;
   * an unreadable or invalid one is reported and ignored.
   */
  public async load(): Promise<void> {
    try {
      if (!(await fs.pathExists(this.path))) return;

      const content = await fs.readFile(this.path, 'utf8');
      const validation = ConfigParser.validate(content);

      if (!validation.valid) {
        logger.warn(`Invalid configuration in ${this.path}:`);
        validation.errors.forEach((error) => logger.warn(`  ${error}`));
        return;
      }

      this.entries = ConfigParser.parse(content, this.path, this.level);
    } catch (error) {
      logger.warn(`Could not read config file ${this.path}: ${errorMessage(error)}`);
    }
  }

  public async save(): Promise<void> {
    const content = ConfigParser.serialize(this.entries);
    await fs.outputFile(this.path, content + '\n', 'utf8');
    logger.debug(`Wrote ${this.path}`);
  }

  public getEntries(key: string): ConfigEntry[] {
    return this.entries.get(key) ?? [];
  }

  public getAllEntries(): Map<string, ConfigEntry[]> {
    return new Map(this.entries);
  }

  /**
   * Set a configuration value (replaces existing values)
   */
  public set(key: string, value: string): void {
    this.entries.set(key, [new ConfigEntry(key, value, this.level, this.path)]);
  }

  /**
   * Remove all values for a key. Returns whether anything was removed.
   */
  public unset(key: string): boolean {
    return this.entries.delete(key);
  }
}
