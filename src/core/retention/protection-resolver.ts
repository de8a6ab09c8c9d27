import { DEFAULT_PROTECTED_BRANCHES } from './defaults';
import { PersistedSettings, ProtectionSet } from './types';

/**
 * Splits a comma-separated branch list, dropping blanks and keeping order.
 */
export const parseBranchList = (value: string): ProtectionSet =>
  value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

/**
 * The protection set in force for this run.
 *
 * An explicit override replaces the configured list outright, even when it is
 * blank. Without one, the configured `sweep.protected` value is used, then the
 * built-in list.
 */
export const resolveProtection = (
  explicitOverride: string | undefined,
  settings: PersistedSettings
): ProtectionSet => {
  if (explicitOverride !== undefined) {
    return parseBranchList(explicitOverride);
  }

  const configured = settings.protectedBranches();
  if (configured !== null) {
    return parseBranchList(configured);
  }

  return [...DEFAULT_PROTECTED_BRANCHES];
};
