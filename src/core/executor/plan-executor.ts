import { setTimeout as sleep } from 'timers/promises';
import { PlanConsumedError, SweepAbortedError } from '@/core/exceptions';
import { GitBackend, DeletionResult } from '@/core/git';
import { BranchName, Plan } from '@/core/retention';
import { InterruptGuard } from '@/utils/interrupt';

export type WaitFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ExecutorOptions {
  /** Pause before the first deletion in apply mode */
  delayMs?: number;
  wait?: WaitFn;
  /** Called once per second of the safety delay with the seconds left */
  onCountdown?: (secondsLeft: number) => void;
}

export interface ExecutionReport {
  plan: Plan;
  deleted: BranchName[];
  failed: DeletionResult[];
}

const defaultWait: WaitFn = async (ms, signal) => {
  await sleep(ms, undefined, signal ? { signal } : undefined);
};

/**
 * Carries out a plan. Dry-run plans are acknowledged without touching git;
 * apply plans wait out the safety delay and then delete.
 *
 * Each plan is executed at most once. The interrupt guard covers the delay
 * only and is released before the first deletion.
 */
export class PlanExecutor {
  public static readonly SAFETY_DELAY_MS = 5000;
  private static readonly TICK_MS = 1000;

  private readonly consumed = new WeakSet<Plan>();
  private readonly delayMs: number;
  private readonly wait: WaitFn;
  private readonly onCountdown: (secondsLeft: number) => void;

  constructor(
    private readonly backend: GitBackend,
    options: ExecutorOptions = {}
  ) {
    this.delayMs = options.delayMs ?? PlanExecutor.SAFETY_DELAY_MS;
    this.wait = options.wait ?? defaultWait;
    this.onCountdown = options.onCountdown ?? (() => undefined);
  }

  async execute(plan: Plan, interrupt?: InterruptGuard): Promise<ExecutionReport> {
    try {
      if (this.consumed.has(plan)) throw new PlanConsumedError();
      this.consumed.add(plan);

      if (plan.mode === 'dry-run') {
        return { plan, deleted: [], failed: [] };
      }

      await this.countdown(interrupt?.signal);
    } finally {
      interrupt?.release();
    }

    const results = await this.backend.deleteBranches(plan.selected, plan.scope);
    return {
      plan,
      deleted: results.filter((r) => r.success).map((r) => r.branch),
      failed: results.filter((r) => !r.success),
    };
  }

  private async countdown(signal?: AbortSignal): Promise<void> {
    let remaining = this.delayMs;

    while (remaining > 0) {
      if (signal?.aborted) throw new SweepAbortedError();
      this.onCountdown(Math.ceil(remaining / PlanExecutor.TICK_MS));

      const step = Math.min(PlanExecutor.TICK_MS, remaining);
      try {
        await this.wait(step, signal);
      } catch (error) {
        if (signal?.aborted) throw new SweepAbortedError();
        throw error;
      }
      remaining -= step;
    }

    if (signal?.aborted) throw new SweepAbortedError();
  }
}
