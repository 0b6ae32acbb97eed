/**
 * Zod schema for the refinery configuration.
 *
 * Every field has a `.default()` so that `RefineryConfigSchema.parse({})`
 * returns a complete, fully populated config. Callers may supply a
 * partial config (or none at all).
 *
 * Nested object schemas use `.default(() => ({ ... }))` factories that
 * spell out the full section.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { QUALITY_DIMENSIONS } from '../types/quality.js';
import type { DimensionMap, QualityDimension } from '../types/quality.js';
import { DEFAULT_DIMENSION_WEIGHTS } from '../quality/quality-vector.js';
import { DEFAULT_ENHANCEMENT_WEIGHTS } from '../enhancement/enhancement-strategy-selector.js';

// ============================================================================
// Dimension weight maps
// ============================================================================

/** Rounding slack when checking that weights total at most 1. */
const WEIGHT_TOTAL_EPSILON = 1e-9;

function dimensionMapSchema(defaults: DimensionMap) {
  const weight = (dimension: QualityDimension) =>
    z.number().min(0).max(10).default(defaults[dimension]);
  return z
    .object({
      structure: weight('structure'),
      coherence: weight('coherence'),
      character_development: weight('character_development'),
      genre_compliance: weight('genre_compliance'),
      pacing_quality: weight('pacing_quality'),
      theme_integration: weight('theme_integration'),
      dialogue_quality: weight('dialogue_quality'),
      setting_immersion: weight('setting_immersion'),
      emotional_impact: weight('emotional_impact'),
      originality: weight('originality'),
      technical_quality: weight('technical_quality'),
    })
    .strict();
}

const DimensionWeightsSchema = dimensionMapSchema(DEFAULT_DIMENSION_WEIGHTS).superRefine(
  (weights, ctx) => {
    const total = QUALITY_DIMENSIONS.reduce((sum, d) => sum + weights[d], 0);
    if (total <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Dimension weights must not all be zero' });
    } else if (total > 1 + WEIGHT_TOTAL_EPSILON) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Dimension weights must total at most 1 (got ${total.toFixed(3)})`,
      });
    }
  },
);

const EnhancementWeightsSchema = dimensionMapSchema(DEFAULT_ENHANCEMENT_WEIGHTS);

// ============================================================================
// Quality section
// ============================================================================

const QualitySchema = z.object({
  target_quality_score: z.number().min(0).max(10).default(8.0),
  max_enhancement_passes: z.number().int().min(1).max(10).default(3),
  quality_convergence_threshold: z.number().min(0.01).max(1).default(0.1),
  weak_dimension_threshold: z.number().min(0).max(10).default(7.0),
  enhancement_weights: EnhancementWeightsSchema.default(() => ({ ...DEFAULT_ENHANCEMENT_WEIGHTS })),
  dimension_weights: DimensionWeightsSchema.default(() => ({ ...DEFAULT_DIMENSION_WEIGHTS })),
});

// ============================================================================
// Workflow section
// ============================================================================

/** Longest timeout or budget, in seconds, a timer can hold. */
export const MAX_TIMER_SECONDS = 2_147_483;

const StepSettingsSchema = z.object({
  /** Seconds. */
  timeout: z.number().positive().max(MAX_TIMER_SECONDS),
  retry_count: z.number().int().min(0).max(10),
  required: z.boolean(),
});

export type StepSettings = z.infer<typeof StepSettingsSchema>;

/** Names of the standard pipeline steps, in execution order. */
export const STANDARD_STEP_NAMES = [
  'requirement_analysis',
  'strategy_selection',
  'outline_generation',
  'content_generation',
  'quality_assessment',
  'quality_enhancement',
] as const;

export type StandardStepName = (typeof STANDARD_STEP_NAMES)[number];

export const DEFAULT_STEP_SETTINGS: Record<StandardStepName, StepSettings> = {
  requirement_analysis: { timeout: 10, retry_count: 0, required: true },
  strategy_selection: { timeout: 10, retry_count: 1, required: true },
  outline_generation: { timeout: 60, retry_count: 2, required: false },
  content_generation: { timeout: 120, retry_count: 2, required: true },
  quality_assessment: { timeout: 60, retry_count: 2, required: true },
  quality_enhancement: { timeout: 240, retry_count: 1, required: true },
};

function stepSettings(name: StandardStepName) {
  const defaults = DEFAULT_STEP_SETTINGS[name];
  return z
    .object({
      timeout: StepSettingsSchema.shape.timeout.default(defaults.timeout),
      retry_count: StepSettingsSchema.shape.retry_count.default(defaults.retry_count),
      required: StepSettingsSchema.shape.required.default(defaults.required),
    })
    .default(() => ({ ...defaults }));
}

const StepsSchema = z.object({
  requirement_analysis: stepSettings('requirement_analysis'),
  strategy_selection: stepSettings('strategy_selection'),
  outline_generation: stepSettings('outline_generation'),
  content_generation: stepSettings('content_generation'),
  quality_assessment: stepSettings('quality_assessment'),
  quality_enhancement: stepSettings('quality_enhancement'),
});

const WorkflowSchema = z.object({
  /** Seconds for the whole run. */
  max_workflow_time: z.number().positive().max(MAX_TIMER_SECONDS).default(300),
  backoff_unit_ms: z.number().min(0).default(1000),
  max_backoff_units: z.number().min(0).default(10),
  optional_step_failure: z.enum(['skip', 'abort']).default('skip'),
  steps: StepsSchema.default(() => ({
    requirement_analysis: { ...DEFAULT_STEP_SETTINGS.requirement_analysis },
    strategy_selection: { ...DEFAULT_STEP_SETTINGS.strategy_selection },
    outline_generation: { ...DEFAULT_STEP_SETTINGS.outline_generation },
    content_generation: { ...DEFAULT_STEP_SETTINGS.content_generation },
    quality_assessment: { ...DEFAULT_STEP_SETTINGS.quality_assessment },
    quality_enhancement: { ...DEFAULT_STEP_SETTINGS.quality_enhancement },
  })),
});

// ============================================================================
// Strategy section
// ============================================================================

const StrategySchema = z.object({
  simple_story_max_words: z.number().int().min(1).default(1000),
  complex_story_min_words: z.number().int().min(1).default(1500),
  enable_strategy_learning: z.boolean().default(true),
  history_window: z.number().int().min(1).max(10000).default(100),
  similarity_tolerance: z.number().min(0).max(1).default(0.3),
});

// ============================================================================
// Logging section
// ============================================================================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
});

// ============================================================================
// Composite schema
// ============================================================================

/**
 * Complete refinery config schema with defaults on every field.
 *
 * ```typescript
 * const config = RefineryConfigSchema.parse({
 *   quality: { target_quality_score: 8.5 },
 *   workflow: { optional_step_failure: 'abort' },
 * });
 * ```
 */
export const RefineryConfigSchema = z.object({
  quality: QualitySchema.default(() => ({
    target_quality_score: 8.0,
    max_enhancement_passes: 3,
    quality_convergence_threshold: 0.1,
    weak_dimension_threshold: 7.0,
    enhancement_weights: { ...DEFAULT_ENHANCEMENT_WEIGHTS },
    dimension_weights: { ...DEFAULT_DIMENSION_WEIGHTS },
  })),
  workflow: WorkflowSchema.default(() => ({
    max_workflow_time: 300,
    backoff_unit_ms: 1000,
    max_backoff_units: 10,
    optional_step_failure: 'skip' as const,
    steps: {
      requirement_analysis: { ...DEFAULT_STEP_SETTINGS.requirement_analysis },
      strategy_selection: { ...DEFAULT_STEP_SETTINGS.strategy_selection },
      outline_generation: { ...DEFAULT_STEP_SETTINGS.outline_generation },
      content_generation: { ...DEFAULT_STEP_SETTINGS.content_generation },
      quality_assessment: { ...DEFAULT_STEP_SETTINGS.quality_assessment },
      quality_enhancement: { ...DEFAULT_STEP_SETTINGS.quality_enhancement },
    },
  })),
  strategy: StrategySchema.default(() => ({
    simple_story_max_words: 1000,
    complex_story_min_words: 1500,
    enable_strategy_learning: true,
    history_window: 100,
    similarity_tolerance: 0.3,
  })),
  logging: LoggingSchema.default(() => ({ level: 'info' as const })),
});

export type RefineryConfig = z.infer<typeof RefineryConfigSchema>;
export type QualityConfig = RefineryConfig['quality'];
export type WorkflowConfig = RefineryConfig['workflow'];
export type StrategyConfig = RefineryConfig['strategy'];
export type LogLevel = RefineryConfig['logging']['level'];

/** Config produced by parsing an empty object. */
export const DEFAULT_REFINERY_CONFIG: RefineryConfig = RefineryConfigSchema.parse({});
