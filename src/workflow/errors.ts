/**
 * Workflow failure taxonomy.
 *
 * Every error names the step it happened in and keeps the underlying
 * error as `cause`.
 */

export class StepTimeoutError extends Error {
  override name = 'StepTimeoutError' as const;

  constructor(
    public readonly stepName: string,
    public readonly attempts: number,
    public readonly timeoutMs: number,
    options?: { cause?: unknown },
  ) {
    super(`Step "${stepName}" timed out after ${timeoutMs}ms (${attempts} attempt(s))`, options);
  }
}

export class StepExecutionError extends Error {
  override name = 'StepExecutionError' as const;

  constructor(
    public readonly stepName: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Step "${stepName}" failed after ${attempts} attempt(s)${causeSuffix(options)}`, options);
  }
}

export type StepFailure = StepTimeoutError | StepExecutionError;

/** A required step used up its attempts. Always aborts the run. */
export class RequiredStepFailure extends Error {
  override name = 'RequiredStepFailure' as const;
  public readonly stepName: string;
  public readonly attempts: number;

  constructor(public readonly failure: StepFailure) {
    super(`Required step "${failure.stepName}" failed: ${failure.message}`, { cause: failure });
    this.stepName = failure.stepName;
    this.attempts = failure.attempts;
  }
}

export class WorkflowTimeBudgetExceeded extends Error {
  override name = 'WorkflowTimeBudgetExceeded' as const;

  constructor(
    public readonly budgetMs: number,
    public readonly elapsedMs: number,
    public readonly stepName: string | null,
  ) {
    super(
      `Workflow exceeded its ${budgetMs}ms budget after ${elapsedMs}ms` +
        (stepName ? ` during "${stepName}"` : ''),
    );
  }
}

/** The caller's AbortSignal fired. */
export class WorkflowCancelledError extends Error {
  override name = 'WorkflowCancelledError' as const;

  constructor(
    public readonly stepName: string | null,
    options?: { cause?: unknown },
  ) {
    super(`Workflow cancelled${stepName ? ` during "${stepName}"` : ''}`, options);
  }
}

/** Finalization found artifacts missing from the context. */
export class WorkflowIncompleteError extends Error {
  override name = 'WorkflowIncompleteError' as const;

  constructor(public readonly missing: string[]) {
    super(`Workflow produced no ${missing.join(', ')}`);
  }
}

function causeSuffix(options?: { cause?: unknown }): string {
  const cause = options?.cause;
  if (cause === undefined) return '';
  return `: ${cause instanceof Error ? cause.message : String(cause)}`;
}
