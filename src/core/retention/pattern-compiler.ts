import { ConfigError, errorMessage } from '@/core/exceptions';
import { BranchMatcher, CompiledFilter, FilterSpec, ProtectionSet } from './types';

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g;

export const escapeRegExp = (literal: string): string => literal.replace(REGEX_SPECIAL, '\\$&');

/** Matches every branch, like an empty grep pattern. */
export const MATCH_ALL: BranchMatcher = Object.freeze({
  source: '',
  matches: () => true,
});

/** Matches no branch. Stands in for an unset exclusion and an empty protection set. */
export const MATCH_NONE: BranchMatcher = Object.freeze({
  source: '(?!)',
  matches: () => false,
});

const fromRegExp = (regex: RegExp): BranchMatcher =>
  Object.freeze({
    source: regex.source,
    matches: (branch: string) => regex.test(branch),
  });

const compilePattern = (pattern: string, option: string): BranchMatcher => {
  try {
    return fromRegExp(new RegExp(pattern));
  } catch (error) {
    throw new ConfigError(
      `Invalid ${option} pattern '${pattern}': ${errorMessage(error)}`,
      error
    );
  }
};

/**
 * One anchored alternation over the protected names. Names are escaped, so
 * `release.1` protects exactly `release.1` and not `release-1`.
 */
export const compileProtection = (protection: ProtectionSet): BranchMatcher => {
  if (protection.length === 0) return MATCH_NONE;

  const alternatives = protection.map(escapeRegExp).join('|');
  return fromRegExp(new RegExp(`^(?:${alternatives})$`));
};

/**
 * `--match`: searched anywhere in the branch name. Unset keeps everything.
 */
export const compileInclude = (pattern?: string): BranchMatcher =>
  pattern === undefined ? MATCH_ALL : compilePattern(pattern, '--match');

/**
 * `--ignore`: searched anywhere in the branch name. Unset or blank drops nothing.
 */
export const compileExclude = (pattern?: string): BranchMatcher =>
  pattern === undefined || pattern.trim() === ''
    ? MATCH_NONE
    : compilePattern(pattern, '--ignore');

export const compileFilter = (spec: FilterSpec): CompiledFilter =>
  Object.freeze({
    protection: compileProtection(spec.protection),
    include: compileInclude(spec.include),
    exclude: compileExclude(spec.exclude),
    protectedNames: Object.freeze([...spec.protection]),
  });
