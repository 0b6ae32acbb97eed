/**
 * Staged workflow executor.
 *
 * Runs registered steps strictly in registration order against one typed
 * context per run. Each attempt races the step against its own timeout and
 * the run's abort signal; the step's output is committed to the context
 * only once that race is won. Failed attempts go through RetryPolicy.
 *
 * A run is bounded by a wall-clock budget and may be cancelled by the
 * caller. Either aborts the in-flight step and is never retried. Nothing
 * about a run outlives `execute()`.
 */

import { randomUUID } from 'node:crypto';
import type { ContentRequest } from '../types/request.js';
import type { GenerationStrategy } from '../types/strategy.js';
import type {
  ProgressCallback,
  StepDefinition,
  StepStat,
  WorkflowContext,
  WorkflowResult,
} from '../types/workflow.js';
import { buildQualityFeedback } from '../quality/quality-feedback.js';
import { buildEnhancementInsights } from '../enhancement/enhancement-insights.js';
import { errorMessage, silentLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { MAX_TIMER_DELAY_MS, RetryPolicy } from './retry-policy.js';
import type { AttemptOutcome, Sleep } from './retry-policy.js';
import { WorkflowRun } from './workflow-run.js';
import {
  RequiredStepFailure,
  StepExecutionError,
  StepTimeoutError,
  WorkflowCancelledError,
  WorkflowIncompleteError,
  WorkflowTimeBudgetExceeded,
} from './errors.js';
import type { StepFailure } from './errors.js';

// ============================================================================
// Options
// ============================================================================

export type OptionalStepFailurePolicy = 'skip' | 'abort';

export interface WorkflowRunnerOptions {
  /** Wall-clock budget for a whole run. */
  maxWorkflowTimeMs: number;
  backoffUnitMs: number;
  maxBackoffUnits: number;
  /** What an exhausted optional step does (default: skip). */
  optionalStepFailure?: OptionalStepFailurePolicy;
  /** Target used when building quality feedback. */
  targetQuality: number;
  logger?: Logger;
  now?: () => number;
  sleep?: Sleep;
  createRunId?: () => string;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Keep the caller's strategy even when a selection step recommends another. */
  pinStrategy?: boolean;
}

/** Rejection used by the per-attempt timer. */
class AttemptTimeout extends Error {
  override name = 'AttemptTimeout' as const;
}

// ============================================================================
// WorkflowRunner
// ============================================================================

export class WorkflowRunner {
  private readonly steps: StepDefinition[] = [];
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly createRunId: () => string;

  constructor(private readonly options: WorkflowRunnerOptions) {
    assertTimerDelay('Run budget', options.maxWorkflowTimeMs);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.createRunId = options.createRunId ?? randomUUID;
  }

  /**
   * Append a step. Names must be unique.
   */
  register(step: StepDefinition): this {
    if (this.steps.some((s) => s.name === step.name)) {
      throw new Error(`Step "${step.name}" is already registered`);
    }
    assertTimerDelay(`Step "${step.name}" timeout`, step.timeoutMs);
    this.steps.push(step);
    return this;
  }

  get stepNames(): string[] {
    return this.steps.map((s) => s.name);
  }

  /**
   * Run every registered step for `request` and assemble the result.
   *
   * @throws {RequiredStepFailure} A required step used up its attempts
   * @throws {StepTimeoutError | StepExecutionError} An optional step failed under the abort policy
   * @throws {WorkflowTimeBudgetExceeded} The run outlasted its budget
   * @throws {WorkflowCancelledError} The caller's signal aborted
   * @throws {WorkflowIncompleteError} No draft reached finalization
   */
  async execute(
    request: ContentRequest,
    strategy: GenerationStrategy,
    onProgress?: ProgressCallback,
    executeOptions: ExecuteOptions = {},
  ): Promise<WorkflowResult> {
    const startedAt = this.now();
    const runId = this.createRunId();
    const ctx: WorkflowContext = { runId, request, strategy };
    // Registration during a run must not change it.
    const steps = [...this.steps];
    const run = new WorkflowRun(runId, steps.map((s) => s.name), strategy, this.now);
    const stats: StepStat[] = [];
    const total = steps.length;
    const log = this.logger.child(runId.slice(0, 8));

    const controller = new AbortController();
    let activeStep: string | null = null;

    const budgetMs = this.options.maxWorkflowTimeMs;
    const budgetTimer = setTimeout(() => {
      controller.abort(new WorkflowTimeBudgetExceeded(budgetMs, this.now() - startedAt, activeStep));
    }, budgetMs);

    const external = executeOptions.signal;
    const onCancel = () => {
      controller.abort(new WorkflowCancelledError(activeStep, { cause: external?.reason }));
    };
    if (external?.aborted) {
      onCancel();
    } else {
      external?.addEventListener('abort', onCancel, { once: true });
    }

    log.info(`run started: ${total} steps, strategy ${strategy}`);

    try {
      for (const [index, step] of steps.entries()) {
        activeStep = step.name;
        run.beginStep(step.name, step.stage, index, total);
        this.notify(onProgress, run);

        const stat = await this.runStep(step, ctx, run, controller.signal, log, executeOptions);
        stats.push(stat);
      }
      activeStep = null;

      run.finalize();
      this.notify(onProgress, run);

      const result = this.assemble(ctx, run, stats, startedAt);
      log.info(`run completed in ${result.totalTimeMs}ms`);
      return result;
    } catch (err) {
      log.error(`run failed: ${errorMessage(err)}`);
      this.notify(onProgress, run);
      throw err;
    } finally {
      clearTimeout(budgetTimer);
      external?.removeEventListener('abort', onCancel);
    }
  }

  // --------------------------------------------------------------------------
  // Steps
  // --------------------------------------------------------------------------

  private async runStep(
    step: StepDefinition,
    ctx: WorkflowContext,
    run: WorkflowRun,
    runSignal: AbortSignal,
    log: Logger,
    executeOptions: ExecuteOptions,
  ): Promise<StepStat> {
    const started = this.now();
    log.debug(`step ${step.name} started`);

    const policy = new RetryPolicy({
      retryCount: step.retryCount,
      backoffUnitMs: this.options.backoffUnitMs,
      maxBackoffUnits: this.options.maxBackoffUnits,
      sleep: this.options.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        run.recordError(errorMessage(error));
        log.warn(`step ${step.name} attempt ${attempt} failed (${errorMessage(error)}); retrying in ${delayMs}ms`);
      },
    });

    const result = await policy.run(() => this.attempt(step, ctx, runSignal), runSignal);
    const base = {
      name: step.name,
      stage: step.stage,
      attempts: result.attempts,
      retries: result.attempts - 1,
      backoffDelaysMs: result.delaysMs,
    };

    if (result.kind === 'ok') {
      result.value(executeOptions);
      run.setStrategy(ctx.strategy);
      run.completeStep(step.name);
      log.debug(`step ${step.name} completed after ${result.attempts} attempt(s)`);
      return { ...base, status: 'completed', durationMs: this.now() - started };
    }

    if (result.kind === 'fatal') {
      const error =
        result.error instanceof Error
          ? result.error
          : new WorkflowCancelledError(step.name, { cause: result.error });
      run.failStep(step.name, error.message);
      throw error;
    }

    const failure: StepFailure = result.timedOut
      ? new StepTimeoutError(step.name, result.attempts, step.timeoutMs, { cause: result.error })
      : new StepExecutionError(step.name, result.attempts, { cause: result.error });
    run.failStep(step.name, failure.message);

    if (step.required) {
      throw new RequiredStepFailure(failure);
    }
    if ((this.options.optionalStepFailure ?? 'skip') === 'abort') {
      throw failure;
    }

    log.warn(`optional step ${step.name} skipped: ${failure.message}`);
    return {
      ...base,
      status: 'failed',
      durationMs: this.now() - started,
      error: failure.message,
    };
  }

  /**
   * One attempt: the step raced against its timeout and the run signal.
   * Resolves to the closure that commits the step's output.
   */
  private async attempt(
    step: StepDefinition,
    ctx: WorkflowContext,
    runSignal: AbortSignal,
  ): Promise<AttemptOutcome<(options: ExecuteOptions) => void>> {
    if (runSignal.aborted) {
      return { kind: 'fatal', error: runSignal.reason };
    }

    const controller = new AbortController();
    const timeout = rejectAfter(
      step.timeoutMs,
      () => new AttemptTimeout(`Step "${step.name}" exceeded ${step.timeoutMs}ms`),
      controller,
    );
    const interrupted = rejectOnAbort(runSignal, controller);

    try {
      const commit = await Promise.race([
        this.invokeStep(step, ctx, controller.signal),
        timeout.promise,
        interrupted.promise,
      ]);
      return { kind: 'ok', value: commit };
    } catch (err) {
      if (runSignal.aborted) {
        return { kind: 'fatal', error: runSignal.reason };
      }
      return { kind: 'retryable', error: err, timedOut: err instanceof AttemptTimeout };
    } finally {
      timeout.clear();
      interrupted.clear();
    }
  }

  /**
   * Run `step` and return a closure that writes its output into the
   * context field its stage owns.
   */
  private async invokeStep(
    step: StepDefinition,
    ctx: WorkflowContext,
    signal: AbortSignal,
  ): Promise<(options: ExecuteOptions) => void> {
    switch (step.stage) {
      case 'analysis': {
        const analysis = await step.run(ctx, signal);
        return () => {
          ctx.analysis = analysis;
        };
      }
      case 'strategy_selection': {
        const recommendation = await step.run(ctx, signal);
        return ({ pinStrategy }) => {
          ctx.recommendation = recommendation;
          if (!pinStrategy) ctx.strategy = recommendation.strategy;
        };
      }
      case 'outline_generation': {
        const outline = await step.run(ctx, signal);
        return () => {
          ctx.outline = outline;
        };
      }
      case 'content_generation': {
        const draft = await step.run(ctx, signal);
        return () => {
          ctx.draft = draft;
        };
      }
      case 'quality_assessment': {
        const quality = await step.run(ctx, signal);
        return () => {
          ctx.quality = quality;
        };
      }
      case 'enhancement': {
        const outcome = await step.run(ctx, signal);
        return () => {
          ctx.enhancement = outcome;
          ctx.draft = { content: outcome.content, title: outcome.title };
          ctx.quality = outcome.finalQuality;
        };
      }
      default: {
        const unreachable: never = step;
        throw new Error(`Unhandled step stage: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Progress and results
  // --------------------------------------------------------------------------

  private notify(onProgress: ProgressCallback | undefined, run: WorkflowRun): void {
    if (!onProgress) return;
    try {
      onProgress(run.snapshot());
    } catch (err) {
      this.logger.warn(`progress observer threw: ${errorMessage(err)}`);
    }
  }

  private assemble(
    ctx: WorkflowContext,
    run: WorkflowRun,
    steps: StepStat[],
    startedAt: number,
  ): WorkflowResult {
    const { draft } = ctx;
    if (!draft) {
      const error = new WorkflowIncompleteError(['draft']);
      run.recordError(error.message);
      throw error;
    }

    return {
      runId: ctx.runId,
      title: draft.title,
      content: draft.content,
      wordCount: countWords(draft.content),
      strategy: ctx.strategy,
      request: ctx.request,
      analysis: ctx.analysis,
      recommendation: ctx.recommendation,
      outline: ctx.outline,
      quality: ctx.quality,
      enhancement: ctx.enhancement,
      feedback: ctx.quality
        ? buildQualityFeedback(ctx.quality, ctx.enhancement?.passes ?? [], this.options.targetQuality)
        : undefined,
      insights: ctx.enhancement ? buildEnhancementInsights(ctx.enhancement) : undefined,
      run: run.snapshot(),
      steps,
      totalTimeMs: this.now() - startedAt,
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

interface Interrupt {
  promise: Promise<never>;
  clear(): void;
}

/** Rejects after `ms`, aborting `controller` with the same reason. */
function assertTimerDelay(label: string, ms: number): void {
  if (!(ms > 0 && ms <= MAX_TIMER_DELAY_MS)) {
    throw new RangeError(`${label} must be positive and at most ${MAX_TIMER_DELAY_MS}ms, got ${ms}`);
  }
}

function rejectAfter(ms: number, reason: () => Error, controller: AbortController): Interrupt {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = reason();
      controller.abort(error);
      reject(error);
    }, ms);
  });
  return { promise, clear: () => clearTimeout(timer) };
}

/** Rejects when `signal` aborts, forwarding the abort to `controller`. */
function rejectOnAbort(signal: AbortSignal, controller: AbortController): Interrupt {
  let onAbort: () => void = () => undefined;
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => {
      controller.abort(signal.reason);
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, clear: () => signal.removeEventListener('abort', onAbort) };
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}
