/**
 * Mutable state of one workflow run.
 *
 * Only the runner mutates it. Observers receive frozen copies from
 * `snapshot()`. Each step name sits in exactly one of remaining, current,
 * completed or failed.
 */

import type { GenerationStrategy } from '../types/strategy.js';
import type { StepStage, WorkflowRunSnapshot, WorkflowStage } from '../types/workflow.js';

export class WorkflowRun {
  private stage: WorkflowStage = 'analysis';
  private stageStartedAt: number;
  private currentStep: string | null = null;
  private progress = 0;
  private readonly completed: string[] = [];
  private readonly failed: string[] = [];
  private remaining: string[];
  private errorCount = 0;
  private lastError: string | null = null;
  private readonly stageTimes: Partial<Record<WorkflowStage, number>> = {};
  private readonly startTime: string;

  constructor(
    public readonly runId: string,
    stepNames: readonly string[],
    private strategy: GenerationStrategy,
    private readonly now: () => number,
  ) {
    this.remaining = [...stepNames];
    this.stageStartedAt = now();
    this.startTime = new Date(this.stageStartedAt).toISOString();
  }

  /** Move `name` out of remaining and make it current. */
  beginStep(name: string, stage: StepStage, index: number, total: number): void {
    this.enterStage(stage);
    this.remaining = this.remaining.filter((n) => n !== name);
    this.currentStep = name;
    this.progress = Math.max(this.progress, index / total);
  }

  completeStep(name: string): void {
    if (this.currentStep === name) this.currentStep = null;
    this.completed.push(name);
  }

  failStep(name: string, message: string): void {
    if (this.currentStep === name) this.currentStep = null;
    this.failed.push(name);
    this.recordError(message);
  }

  /** Count a failed attempt that may still be retried. */
  recordError(message: string): void {
    this.errorCount += 1;
    this.lastError = message;
  }

  setStrategy(strategy: GenerationStrategy): void {
    this.strategy = strategy;
  }

  finalize(): void {
    this.enterStage('finalization');
    this.currentStep = null;
    this.progress = 1;
  }

  get errors(): number {
    return this.errorCount;
  }

  snapshot(): WorkflowRunSnapshot {
    const stageTimes = { ...this.stageTimes };
    stageTimes[this.stage] = (stageTimes[this.stage] ?? 0) + (this.now() - this.stageStartedAt);
    return Object.freeze({
      runId: this.runId,
      stage: this.stage,
      strategy: this.strategy,
      currentStep: this.currentStep,
      progress: this.progress,
      completedSteps: Object.freeze([...this.completed]),
      remainingSteps: Object.freeze([...this.remaining]),
      failedSteps: Object.freeze([...this.failed]),
      errorCount: this.errorCount,
      lastError: this.lastError,
      startTime: this.startTime,
      stageTimes: Object.freeze(stageTimes),
    });
  }

  private enterStage(stage: WorkflowStage): void {
    const at = this.now();
    this.stageTimes[this.stage] = (this.stageTimes[this.stage] ?? 0) + (at - this.stageStartedAt);
    this.stage = stage;
    this.stageStartedAt = at;
  }
}
