export * from './types';
export { DEFAULT_MERGE_TARGET, DEFAULT_PROTECTED_BRANCHES } from './defaults';
export { resolveScope, describeScope, remoteScope, LOCAL } from './scope';
export type { ScopeFlags } from './scope';
export { resolveProtection, parseBranchList } from './protection-resolver';
export { resolveTarget } from './target-resolver';
export {
  compileFilter,
  compileProtection,
  compileInclude,
  compileExclude,
  escapeRegExp,
  MATCH_ALL,
  MATCH_NONE,
} from './pattern-compiler';
export { filterStages, explainFilter, filterCandidates } from './filter-pipeline';
export type { FilterStage, FilterResult, Rejection, StageName } from './filter-pipeline';
export { buildPlan } from './plan-builder';
export type { PlanInput } from './plan-builder';
