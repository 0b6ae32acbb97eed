/**
 * Refinement pipeline facade.
 *
 * Wires the assessor, both selectors, the enhancement loop and the
 * workflow runner from one config and the two services, then records the
 * outcome of every run in the performance history.
 *
 * ```typescript
 * const pipeline = new RefinementPipeline({ generation, scoring }, await readRefineryConfig());
 * const result = await pipeline.run(parseContentRequest({ genre: 'sci-fi', targetWordCount: 1500 }));
 * ```
 */

import type { ContentRequest } from '../types/request.js';
import type { GenerationStrategy } from '../types/strategy.js';
import type { GenerationService, QualityScoringService } from '../types/services.js';
import type { ProgressCallback, WorkflowResult, WorkflowRunSnapshot } from '../types/workflow.js';
import { DEFAULT_REFINERY_CONFIG } from '../config/schema.js';
import type { RefineryConfig } from '../config/schema.js';
import { createLogger, errorMessage } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { QualityAssessor } from '../quality/quality-assessor.js';
import { EnhancementStrategySelector } from '../enhancement/enhancement-strategy-selector.js';
import { EnhancementLoop } from '../enhancement/enhancement-loop.js';
import { StrategySelector } from '../strategy/strategy-selector.js';
import { InMemoryPerformanceStore } from '../strategy/performance-store.js';
import type { PerformanceHistoryStore, PerformanceOutcome } from '../strategy/performance-store.js';
import { WorkflowRunner } from '../workflow/workflow-runner.js';
import type { Sleep } from '../workflow/retry-policy.js';
import { createStandardSteps } from '../workflow/standard-steps.js';

/** Strategy a run starts with until the selection step commits. */
export const INITIAL_STRATEGY: GenerationStrategy = 'adaptive';

export interface RefinementPipelineDeps {
  generation: GenerationService;
  scoring: QualityScoringService;
  /** Shared across pipelines to learn from each other's runs. */
  history?: PerformanceHistoryStore;
  logger?: Logger;
  now?: () => number;
  sleep?: Sleep;
  createRunId?: () => string;
}

export interface PipelineRunOptions {
  /** Use this strategy instead of the recommended one. */
  strategy?: GenerationStrategy;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

export class RefinementPipeline {
  readonly runner: WorkflowRunner;
  readonly history: PerformanceHistoryStore;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: RefinementPipelineDeps, config: RefineryConfig = DEFAULT_REFINERY_CONFIG) {
    const { quality, workflow, strategy } = config;
    this.logger = deps.logger ?? createLogger('refinery', { level: config.logging.level });
    this.now = deps.now ?? Date.now;
    this.history =
      deps.history ??
      new InMemoryPerformanceStore({
        window: strategy.history_window,
        similarityTolerance: strategy.similarity_tolerance,
        learningEnabled: strategy.enable_strategy_learning,
      });

    const assessor = new QualityAssessor(deps.scoring, { weights: quality.dimension_weights });
    const enhancementLoop = new EnhancementLoop(
      {
        generation: deps.generation,
        assessor,
        selector: new EnhancementStrategySelector({
          weights: quality.enhancement_weights,
          weakThreshold: quality.weak_dimension_threshold,
        }),
        logger: this.logger.child('enhancement'),
        now: deps.now,
      },
      {
        targetQuality: quality.target_quality_score,
        maxPasses: quality.max_enhancement_passes,
        convergenceThreshold: quality.quality_convergence_threshold,
      },
    );
    const strategySelector = new StrategySelector({
      simpleStoryMaxWords: strategy.simple_story_max_words,
      complexStoryMinWords: strategy.complex_story_min_words,
      history: this.history,
      logger: this.logger.child('strategy'),
    });

    this.runner = new WorkflowRunner({
      maxWorkflowTimeMs: workflow.max_workflow_time * 1000,
      backoffUnitMs: workflow.backoff_unit_ms,
      maxBackoffUnits: workflow.max_backoff_units,
      optionalStepFailure: workflow.optional_step_failure,
      targetQuality: quality.target_quality_score,
      logger: this.logger.child('workflow'),
      now: deps.now,
      sleep: deps.sleep,
      createRunId: deps.createRunId,
    });
    const steps = createStandardSteps(
      { generation: deps.generation, assessor, strategySelector, enhancementLoop },
      workflow.steps,
    );
    for (const step of steps) {
      this.runner.register(step);
    }
  }

  /**
   * Run the full pipeline for `request`. Success or failure, the outcome
   * is appended to the performance history before this settles.
   */
  async run(request: ContentRequest, options: PipelineRunOptions = {}): Promise<WorkflowResult> {
    const started = this.now();
    const seen: { last?: WorkflowRunSnapshot } = {};
    const observe: ProgressCallback = (snapshot) => {
      seen.last = snapshot;
      options.onProgress?.(snapshot);
    };

    let result: WorkflowResult;
    try {
      result = await this.runner.execute(request, options.strategy ?? INITIAL_STRATEGY, observe, {
        signal: options.signal,
        pinStrategy: options.strategy !== undefined,
      });
    } catch (err) {
      await this.record({
        strategy: seen.last?.strategy ?? options.strategy ?? INITIAL_STRATEGY,
        request,
        success: false,
        qualityScore: 0,
        generationTimeSec: (this.now() - started) / 1000,
        errorCount: seen.last?.errorCount ?? 1,
      });
      throw err;
    }

    await this.record({
      strategy: result.strategy,
      request,
      success: true,
      qualityScore: result.quality?.overall ?? 0,
      generationTimeSec: result.totalTimeMs / 1000,
      errorCount: result.run.errorCount,
    });
    return result;
  }

  /** A failed append is logged and does not fail the run. */
  private async record(outcome: PerformanceOutcome): Promise<void> {
    try {
      await this.history.recordOutcome(outcome);
    } catch (err) {
      this.logger.warn(`could not record ${outcome.strategy} outcome: ${errorMessage(err)}`);
    }
  }
}
