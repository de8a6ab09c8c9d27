export type BranchName = string;

export type MergeTarget = BranchName;

/**
 * Branch names that are never selected, matched exactly
 */
export type ProtectionSet = readonly BranchName[];

export type Scope = { readonly kind: 'local' } | { readonly kind: 'remote'; readonly remote: string };

export type RunMode = 'dry-run' | 'apply';

/**
 * Uncompiled filter settings as they come from the command line
 */
export interface FilterSpec {
  protection: ProtectionSet;
  include?: string;
  exclude?: string;
}

export interface BranchMatcher {
  /** Pattern source, for diagnostics */
  readonly source: string;
  matches(branch: BranchName): boolean;
}

export interface CompiledFilter {
  readonly protection: BranchMatcher;
  readonly include: BranchMatcher;
  readonly exclude: BranchMatcher;
  readonly protectedNames: ProtectionSet;
}

/**
 * Persisted values the resolvers fall back to when nothing explicit is given.
 * `null` means "not configured".
 */
export interface PersistedSettings {
  protectedBranches(): string | null;
  mergeTarget(): string | null;
}

export interface Plan {
  readonly scope: Scope;
  readonly mode: RunMode;
  readonly target: MergeTarget;
  readonly selected: readonly BranchName[];
  readonly skipped: ProtectionSet;
}
