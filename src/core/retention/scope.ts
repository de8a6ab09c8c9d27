import { ConfigError } from '@/core/exceptions';
import { Scope } from './types';

export interface ScopeFlags {
  local?: boolean;
  /** `true` when the flag was given without a name */
  remote?: string | boolean;
}

export const LOCAL: Scope = Object.freeze({ kind: 'local' });

export const remoteScope = (remote: string): Scope => Object.freeze({ kind: 'remote', remote });

/**
 * Turns the two command-line switches into a single scope.
 */
export const resolveScope = (flags: ScopeFlags): Scope => {
  const wantsLocal = flags.local === true;
  const wantsRemote = flags.remote !== undefined && flags.remote !== false;

  if (wantsLocal && wantsRemote) {
    throw new ConfigError('Choose either --local or --remote <name>, not both');
  }
  if (!wantsLocal && !wantsRemote) {
    throw new ConfigError('One of --local or --remote <name> is required');
  }
  if (wantsLocal) return LOCAL;

  const name = typeof flags.remote === 'string' ? flags.remote.trim() : '';
  if (!name) {
    throw new ConfigError('--remote needs the name of a remote, e.g. --remote origin');
  }
  return remoteScope(name);
};

export const describeScope = (scope: Scope): string =>
  scope.kind === 'local' ? 'local branches' : `branches on remote '${scope.remote}'`;
