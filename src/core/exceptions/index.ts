export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class SweepException extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'SweepException';
    if (cause !== undefined) this.cause = cause;
  }
}

/**
 * Invalid or contradictory configuration. Raised before any branch is listed.
 */
export class ConfigError extends SweepException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigError';
  }
}

/**
 * The filter left nothing to delete. An expected outcome, not a crash.
 */
export class NoCandidatesError extends SweepException {
  constructor(message: string = 'No merged branches to delete') {
    super(message);
    this.name = 'NoCandidatesError';
  }
}

/**
 * A failure reported by git, passed through with its original message.
 */
export class ExternalError extends SweepException {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(errorMessage(cause), cause);
    this.name = 'ExternalError';
    this.operation = operation;
  }
}

export class PlanConsumedError extends SweepException {
  constructor() {
    super('This plan has already been executed');
    this.name = 'PlanConsumedError';
  }
}

export class SweepAbortedError extends SweepException {
  constructor() {
    super('Aborted before any branch was deleted');
    this.name = 'SweepAbortedError';
  }
}

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  NOTHING_TO_DELETE: 2,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export const exitCodeFor = (error: unknown): ExitCode => {
  if (error instanceof NoCandidatesError) return ExitCode.NOTHING_TO_DELETE;
  if (error instanceof SweepAbortedError) return ExitCode.INTERRUPTED;
  return ExitCode.FAILURE;
};
