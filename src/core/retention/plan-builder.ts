import { NoCandidatesError } from '@/core/exceptions';
import { filterCandidates } from './filter-pipeline';
import { BranchName, CompiledFilter, MergeTarget, Plan, RunMode, Scope } from './types';

export interface PlanInput {
  candidates: readonly BranchName[];
  filter: CompiledFilter;
  scope: Scope;
  mode: RunMode;
  target: MergeTarget;
}

export const buildPlan = ({ candidates, filter, scope, mode, target }: PlanInput): Plan => {
  const selected = filterCandidates(candidates, filter);

  if (selected.length === 0) {
    throw new NoCandidatesError(
      candidates.length === 0
        ? `No branches are merged into ${target}`
        : `None of the ${candidates.length} branches merged into ${target} may be deleted`
    );
  }

  return Object.freeze({
    scope,
    mode,
    target,
    selected: Object.freeze(selected),
    skipped: filter.protectedNames,
  });
};
