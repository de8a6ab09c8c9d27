import { SweepAbortedError } from '@/core/exceptions';
import { GitBackend } from '@/core/git';
import { PlanExecutor, ExecutionReport } from '@/core/executor';
import {
  buildPlan,
  compileExclude,
  compileFilter,
  compileInclude,
  describeScope,
  explainFilter,
  PersistedSettings,
  resolveProtection,
  resolveScope,
  resolveTarget,
  RunMode,
  Scope,
} from '@/core/retention';
import { InterruptGuard, logger, spinner } from '@/utils';
import { displayExecutionReport, displayPlan } from './sweep.display';

export interface SweepOptions {
  apply?: boolean;
  local?: boolean;
  remote?: string | boolean;
  skip?: string;
  match?: string;
  ignore?: string;
  into?: string;
}

export interface SweepContext {
  backend: GitBackend;
  settings: PersistedSettings;
  executor: PlanExecutor;
  /** Called in apply mode to let Ctrl+C cancel the safety delay */
  interrupts?: () => InterruptGuard;
}

/**
 * Checks the flags that need neither git nor configuration, so that a bad
 * invocation is reported before the repository is opened.
 */
export const validateSweepOptions = (options: SweepOptions): Scope => {
  const scope = resolveScope(options);
  compileInclude(options.match);
  compileExclude(options.ignore);
  return scope;
};

/**
 * Resolve the settings, list merged branches, build the plan and hand it to
 * the executor. Configuration problems surface before git is asked for
 * anything.
 */
export const runSweep = async (
  options: SweepOptions,
  context: SweepContext
): Promise<ExecutionReport> => {
  const scope = resolveScope(options);
  const protection = resolveProtection(options.skip, context.settings);
  const target = resolveTarget(options.into, context.settings);
  const filter = compileFilter({ protection, include: options.match, exclude: options.ignore });
  const mode: RunMode = options.apply ? 'apply' : 'dry-run';

  logger.debug(`Scope: ${describeScope(scope)}, target: ${target}, mode: ${mode}`);
  logger.debug(`Protected: ${protection.join(', ') || '(none)'}`);

  const candidates = await context.backend.listMerged(target, scope);
  logger.debug(`git reports ${candidates.length} merged branch(es)`);
  explainFilter(candidates, filter).rejected.forEach(({ branch, stage }) =>
    logger.debug(`  skip ${branch} (${stage})`)
  );

  const plan = buildPlan({ candidates, filter, scope, mode, target });
  displayPlan(plan);

  if (plan.mode === 'apply') {
    spinner.start({ text: 'Preparing to delete…', color: 'yellow' });
  }

  let report: ExecutionReport;
  try {
    const interrupt = plan.mode === 'apply' ? context.interrupts?.() : undefined;
    report = await context.executor.execute(plan, interrupt);
  } catch (error) {
    if (plan.mode === 'apply') {
      spinner.fail(
        error instanceof SweepAbortedError ? 'Aborted, no branches were deleted' : 'Deletion failed'
      );
    }
    throw error;
  }

  if (plan.mode === 'apply') {
    spinner.stop();
    displayExecutionReport(report);
  }
  return report;
};
