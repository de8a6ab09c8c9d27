import { SweepConfigManager, ConfigKeys } from './config-manager';
import { PersistedSettings } from '@/core/retention';

/**
 * Read-only view of the sweep settings. Built-in defaults are left out so the
 * resolvers can tell "configured" from "not configured".
 */
export class TypedConfig implements PersistedSettings {
  private config: SweepConfigManager;

  constructor(config: SweepConfigManager) {
    this.config = config;
  }

  protectedBranches(): string | null {
    return this.configured(ConfigKeys.PROTECTED);
  }

  mergeTarget(): string | null {
    return this.configured(ConfigKeys.TARGET);
  }

  private configured(key: string): string | null {
    const entry = this.config.get(key);
    if (!entry || entry.isBuiltin) return null;
    return entry.asString();
  }
}
