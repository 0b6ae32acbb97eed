/**
 * Workflow runner types.
 *
 * Steps form a closed set of stage-tagged variants. Each stage fixes the
 * type a step produces and the WorkflowContext field that output lands in,
 * so the runner dispatches with an exhaustive switch instead of looking
 * results up by name.
 */

import type { ContentRequest } from './request.js';
import type {
  EnhancementInsights,
  EnhancementOutcome,
  QualityFeedback,
  QualityVector,
} from './quality.js';
import type {
  GenerationStrategy,
  RequirementAnalysis,
  StrategyRecommendation,
} from './strategy.js';

// ============================================================================
// Stages
// ============================================================================

export const WORKFLOW_STAGES = [
  'analysis',
  'strategy_selection',
  'outline_generation',
  'content_generation',
  'quality_assessment',
  'enhancement',
  'finalization',
] as const;

export type WorkflowStage = (typeof WORKFLOW_STAGES)[number];

// ============================================================================
// Intermediate artifacts
// ============================================================================

export interface Outline {
  content: string;
}

export interface Draft {
  content: string;
  title: string;
}

/**
 * Output type produced by a step of each registrable stage.
 * Finalization is performed by the runner itself.
 */
export interface StageOutputs {
  analysis: RequirementAnalysis;
  strategy_selection: StrategyRecommendation;
  outline_generation: Outline | null;
  content_generation: Draft;
  quality_assessment: QualityVector;
  enhancement: EnhancementOutcome;
}

export type StepStage = keyof StageOutputs;

/**
 * Typed intermediate results of one run. Owned by exactly one run.
 */
export interface WorkflowContext {
  readonly runId: string;
  readonly request: ContentRequest;
  strategy: GenerationStrategy;
  analysis?: RequirementAnalysis;
  recommendation?: StrategyRecommendation;
  outline?: Outline | null;
  draft?: Draft;
  quality?: QualityVector;
  enhancement?: EnhancementOutcome;
}

// ============================================================================
// Steps
// ============================================================================

export interface StageStep<S extends StepStage> {
  readonly stage: S;
  readonly name: string;
  readonly timeoutMs: number;
  /** Attempts after the first. */
  readonly retryCount: number;
  readonly required: boolean;
  run(ctx: Readonly<WorkflowContext>, signal: AbortSignal): Promise<StageOutputs[S]>;
}

/** Any registrable step, discriminated on `stage`. */
export type StepDefinition = { [S in StepStage]: StageStep<S> }[StepStage];

// ============================================================================
// Run state
// ============================================================================

/**
 * Read-only view of a run handed to progress observers.
 */
export interface WorkflowRunSnapshot {
  readonly runId: string;
  readonly stage: WorkflowStage;
  /** Strategy in effect; changes once a selection step commits. */
  readonly strategy: GenerationStrategy;
  readonly currentStep: string | null;
  readonly progress: number;
  readonly completedSteps: readonly string[];
  readonly remainingSteps: readonly string[];
  readonly failedSteps: readonly string[];
  readonly errorCount: number;
  readonly lastError: string | null;
  /** ISO 8601 */
  readonly startTime: string;
  /** Elapsed ms per stage. */
  readonly stageTimes: Readonly<Partial<Record<WorkflowStage, number>>>;
}

export type ProgressCallback = (run: WorkflowRunSnapshot) => void;

export interface StepStat {
  name: string;
  stage: StepStage;
  status: 'completed' | 'failed';
  attempts: number;
  retries: number;
  backoffDelaysMs: number[];
  durationMs: number;
  error?: string;
}

/**
 * Assembled output of a successful run.
 */
export interface WorkflowResult {
  runId: string;
  title: string;
  content: string;
  wordCount: number;
  strategy: GenerationStrategy;
  request: ContentRequest;
  analysis?: RequirementAnalysis;
  recommendation?: StrategyRecommendation;
  outline?: Outline | null;
  quality?: QualityVector;
  enhancement?: EnhancementOutcome;
  feedback?: QualityFeedback;
  insights?: EnhancementInsights;
  run: WorkflowRunSnapshot;
  steps: StepStat[];
  totalTimeMs: number;
}
