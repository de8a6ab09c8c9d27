import { PlanExecutor } from './plan-executor';

export { PlanExecutor };
export type { ExecutorOptions, ExecutionReport, WaitFn } from './plan-executor';
