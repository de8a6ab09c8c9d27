import { DEFAULT_MERGE_TARGET } from './defaults';
import { MergeTarget, PersistedSettings } from './types';

/**
 * The branch merged-ness is measured against: `--into`, then `sweep.target`,
 * then the built-in default. Blank values fall through. Whether the branch
 * exists is left to git.
 */
export const resolveTarget = (
  explicitInto: string | undefined,
  settings: PersistedSettings
): MergeTarget => {
  const explicit = explicitInto?.trim();
  if (explicit) return explicit;

  const configured = settings.mergeTarget()?.trim();
  if (configured) return configured;

  return DEFAULT_MERGE_TARGET;
};
