// Types
export type {
  QualityDimension,
  DimensionMap,
  QualityVector,
  EnhancementStrategy,
  EnhancementPass,
  ConvergenceState,
  EnhancementStopReason,
  EnhancementOutcome,
  QualityTier,
  QualityImprovement,
  QualityFeedback,
  EnhancementInsights,
} from './types/quality.js';
export {
  QUALITY_DIMENSIONS,
  ENHANCEMENT_STRATEGIES,
  MIN_SCORE,
  MAX_SCORE,
} from './types/quality.js';

export type { ContentRequest, Genre } from './types/request.js';
export {
  GENRES,
  MIN_WORD_COUNT,
  MAX_WORD_COUNT,
  ContentRequestSchema,
  parseContentRequest,
  normalizeGenre,
  displayGenre,
} from './types/request.js';

export type {
  GenerationStrategy,
  Difficulty,
  RequirementAnalysis,
  StrategyScore,
  StrategyAlternative,
  StrategyRecommendation,
  PerformanceRecord,
  StrategyStatistics,
} from './types/strategy.js';
export { GENERATION_STRATEGIES } from './types/strategy.js';

export type {
  GenerationResult,
  GenerationService,
  QualityScoringService,
  DimensionScorer,
} from './types/services.js';

export type {
  WorkflowStage,
  Outline,
  Draft,
  StageOutputs,
  StepStage,
  WorkflowContext,
  StageStep,
  StepDefinition,
  WorkflowRunSnapshot,
  ProgressCallback,
  StepStat,
  WorkflowResult,
} from './types/workflow.js';
export { WORKFLOW_STAGES } from './types/workflow.js';

// Configuration
export {
  RefineryConfigSchema,
  DEFAULT_REFINERY_CONFIG,
  DEFAULT_STEP_SETTINGS,
  STANDARD_STEP_NAMES,
  LOG_LEVELS,
  MAX_TIMER_SECONDS,
  readRefineryConfig,
  validateRefineryConfig,
  RefineryConfigError,
  DEFAULT_CONFIG_PATH,
} from './config/index.js';
export type {
  RefineryConfig,
  QualityConfig,
  WorkflowConfig,
  StrategyConfig,
  StepSettings,
  StandardStepName,
  LogLevel,
} from './config/index.js';

// Logging
export { createLogger, silentLogger, errorMessage } from './logging/index.js';
export type { Logger, LoggerOptions } from './logging/index.js';

// Concurrency
export { ReadWriteLock } from './concurrency/index.js';
export type { Release } from './concurrency/index.js';

// Quality
export * from './quality/index.js';

// Enhancement
export * from './enhancement/index.js';

// Generation strategy
export * from './strategy/index.js';

// Workflow
export * from './workflow/index.js';

// Pipeline
export * from './pipeline/index.js';
