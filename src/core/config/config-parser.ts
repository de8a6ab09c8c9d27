import { errorMessage } from '@/core/exceptions';
import { ConfigEntry, ConfigLevel } from './config-level';

/**
 * Configuration file structure in JSON format
 */
interface ConfigFileStructure {
  [key: string]: string | string[] | ConfigFileStructure;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Parses JSON configuration files into dotted keys.
 *
 * JSON Structure:
 * {
 *   "sweep": {
 *     "protected": "main,develop,release",
 *     "target": "origin/main"
 *   }
 * }
 *
 * An array value produces several entries for the same key; the last one wins
 * on lookup.
 */
export class ConfigParser {
  /**
   * Parse JSON configuration content into a map of entries
   */
  public static parse(
    content: string,
    source: string,
    level: ConfigLevel
  ): Map<string, ConfigEntry[]> {
    const result = new Map<string, ConfigEntry[]>();

    if (!content.trim()) return result;

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new Error(`Invalid JSON in configuration file ${source}: ${errorMessage(error)}`);
    }

    if (this.isNestedObject(data)) {
      this.parseSection(data, result, source, level, '');
    }
    return result;
  }

  /**
   * Serialize configuration entries to JSON format
   */
  public static serialize(entries: Map<string, ConfigEntry[]>): string {
    const configData: ConfigFileStructure = {};

    entries.forEach((entryList, fullKey) => {
      entryList.forEach((entry) => this.setNestedValue(configData, fullKey, entry.value));
    });

    return JSON.stringify(configData, null, 2);
  }

  /**
   * Validate JSON configuration structure
   */
  public static validate(content: string): ValidationResult {
    const errors: string[] = [];
    if (!content.trim()) return { valid: true, errors };

    try {
      const parsed: unknown = JSON.parse(content);

      if (this.isNestedObject(parsed)) {
        this.validateSection(parsed, '', errors);
      } else {
        errors.push('Configuration must be a JSON object');
      }
    } catch (error) {
      errors.push(`Invalid JSON: ${errorMessage(error)}`);
    }
    return { valid: errors.length === 0, errors };
  }

  private static buildFullKey(prefix: string, key: string): string {
    return prefix ? `${prefix}.${key}` : key;
  }

  private static isNestedObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private static parseSection(
    section: Record<string, unknown>,
    result: Map<string, ConfigEntry[]>,
    source: string,
    level: ConfigLevel,
    keyPrefix: string
  ): void {
    Object.entries(section).forEach(([key, value]) => {
      const fullKey = this.buildFullKey(keyPrefix, key);

      if (Array.isArray(value)) {
        value
          .filter((item): item is string => typeof item === 'string')
          .forEach((item) => this.addEntry(result, fullKey, item, source, level));
      } else if (this.isNestedObject(value)) {
        this.parseSection(value, result, source, level, fullKey);
      } else if (typeof value === 'string') {
        this.addEntry(result, fullKey, value, source, level);
      }
    });
  }

  private static addEntry(
    entryMap: Map<string, ConfigEntry[]>,
    key: string,
    value: string,
    source: string,
    level: ConfigLevel
  ): void {
    const entries = entryMap.get(key) ?? [];
    entries.push(new ConfigEntry(key, value, level, source));
    entryMap.set(key, entries);
  }

  private static setNestedValue(root: ConfigFileStructure, keyPath: string, value: string): void {
    const segments = keyPath.split('.');
    const finalKey = segments.pop();
    if (finalKey === undefined) return;

    let target = root;
    for (const segment of segments) {
      const next = target[segment];
      if (typeof next === 'object' && !Array.isArray(next)) {
        target = next;
      } else {
        const created: ConfigFileStructure = {};
        target[segment] = created;
        target = created;
      }
    }

    const existing = target[finalKey];
    if (typeof existing === 'string') {
      target[finalKey] = [existing, value];
    } else if (Array.isArray(existing)) {
      target[finalKey] = [...existing, value];
    } else {
      target[finalKey] = value;
    }
  }

  private static validateSection(
    section: Record<string, unknown>,
    currentPath: string,
    errors: string[]
  ): void {
    Object.entries(section).forEach(([key, value]) => {
      const valuePath = this.buildFullKey(currentPath, key);

      if (Array.isArray(value)) {
        if (value.some((item) => typeof item !== 'string')) {
          errors.push(`Configuration array at '${valuePath}' must contain only strings`);
        }
      } else if (this.isNestedObject(value)) {
        this.validateSection(value, valuePath, errors);
      } else if (typeof value !== 'string') {
        errors.push(`Configuration value at '${valuePath}' must be a string`);
      }
    });
  }
}
