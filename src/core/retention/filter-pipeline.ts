import { BranchMatcher, BranchName, CompiledFilter } from './types';

export type StageName = 'protected' | 'match' | 'ignore';

/**
 * `exclude` drops what the matcher accepts, `require` keeps only what it accepts.
 */
export type FilterStage =
  | { readonly kind: 'exclude'; readonly name: StageName; readonly matcher: BranchMatcher }
  | { readonly kind: 'require'; readonly name: StageName; readonly matcher: BranchMatcher };

export interface Rejection {
  branch: BranchName;
  stage: StageName;
}

export interface FilterResult {
  selected: BranchName[];
  rejected: Rejection[];
}

/**
 * The stages in the order they run. Protection comes first so that a
 * protected branch is dropped even when `--match` accepts it.
 */
export const filterStages = (filter: CompiledFilter): readonly FilterStage[] => [
  { kind: 'exclude', name: 'protected', matcher: filter.protection },
  { kind: 'require', name: 'match', matcher: filter.include },
  { kind: 'exclude', name: 'ignore', matcher: filter.exclude },
];

const passes = (stage: FilterStage, branch: BranchName): boolean =>
  stage.kind === 'require' ? stage.matcher.matches(branch) : !stage.matcher.matches(branch);

/**
 * Runs every stage and records which one dropped each rejected branch.
 */
export const explainFilter = (
  candidates: readonly BranchName[],
  filter: CompiledFilter
): FilterResult => {
  const rejected: Rejection[] = [];

  const selected = filterStages(filter).reduce<BranchName[]>((remaining, stage) => {
    return remaining.filter((branch) => {
      if (passes(stage, branch)) return true;
      rejected.push({ branch, stage: stage.name });
      return false;
    });
  }, [...candidates]);

  return { selected, rejected };
};

export const filterCandidates = (
  candidates: readonly BranchName[],
  filter: CompiledFilter
): BranchName[] => explainFilter(candidates, filter).selected;
