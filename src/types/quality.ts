/**
 * Quality assessment and enhancement types.
 *
 * A QualityVector is an immutable snapshot of one piece of content scored
 * across every quality dimension at one point in time. Enhancement passes
 * and convergence state describe how the refinement loop moved between
 * such snapshots.
 */

// ============================================================================
// Dimensions
// ============================================================================

/**
 * Every quality dimension the scoring service reports, in canonical order.
 */
export const QUALITY_DIMENSIONS = [
  'structure',
  'coherence',
  'character_development',
  'genre_compliance',
  'pacing_quality',
  'theme_integration',
  'dialogue_quality',
  'setting_immersion',
  'emotional_impact',
  'originality',
  'technical_quality',
] as const;

export type QualityDimension = (typeof QUALITY_DIMENSIONS)[number];

/** One number per quality dimension. */
export type DimensionMap<T = number> = Record<QualityDimension, T>;

/** Lower and upper bound of every score. */
export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

// ============================================================================
// QualityVector
// ============================================================================

export interface QualityVector {
  /** Weighted overall score (0-10). */
  readonly overall: number;
  /** Per-dimension scores (0-10). */
  readonly dimensions: Readonly<DimensionMap>;
  /** ISO 8601 timestamp of the assessment. */
  readonly assessedAt: string;
  /** Time spent in the scoring service. */
  readonly assessmentMs: number;
}

// ============================================================================
// Enhancement strategies
// ============================================================================

export const ENHANCEMENT_STRATEGIES = [
  'structure_focus',
  'coherence_focus',
  'character_focus',
  'genre_focus',
  'pacing_focus',
  'theme_focus',
  'dialogue_focus',
  'setting_focus',
  'emotional_focus',
  'originality_focus',
  'technical_focus',
  'comprehensive',
] as const;

export type EnhancementStrategy = (typeof ENHANCEMENT_STRATEGIES)[number];

/**
 * One executed refinement iteration.
 */
export interface EnhancementPass {
  /** 1-based pass number. */
  passNumber: number;
  strategy: EnhancementStrategy;
  focusDimensions: QualityDimension[];
  before: QualityVector;
  after: QualityVector;
  /** after.overall - before.overall */
  delta: number;
  dimensionDeltas: DimensionMap;
  elapsedMs: number;
  /** Tokens reported by the generation service, or an estimate. */
  tokenCost: number;
  instruction: string;
}

// ============================================================================
// Convergence
// ============================================================================

export interface ConvergenceState {
  /** Per-pass deltas, oldest first. */
  deltas: number[];
  plateauDetected: boolean;
  diminishingReturnsDetected: boolean;
  /** Pass at which the first convergence signal was raised. */
  convergencePass: number | null;
  /** Extrapolated pass where the delta falls under the threshold. */
  predictedConvergencePass: number | null;
}

export type EnhancementStopReason = 'target-achieved' | 'budget-exhausted' | 'converged';

/**
 * Result of one enhancement loop.
 */
export interface EnhancementOutcome {
  content: string;
  title: string;
  passes: EnhancementPass[];
  initialQuality: QualityVector;
  finalQuality: QualityVector;
  convergence: ConvergenceState;
  stopReason: EnhancementStopReason;
  targetAchieved: boolean;
}

// ============================================================================
// Feedback
// ============================================================================

export type QualityTier = 'excellent' | 'good' | 'acceptable' | 'needs_work';

export interface QualityImprovement {
  dimension: QualityDimension;
  currentScore: number;
  targetScore: number;
  improvementPotential: number;
  suggestion: string;
  /** 1 = highest, 5 = lowest */
  priority: 1 | 2 | 3 | 4 | 5;
  estimatedEffort: 'medium' | 'high';
}

export interface QualityFeedback {
  overallAssessment: string;
  overallScore: number;
  tier: QualityTier;
  strengths: string[];
  areasForImprovement: string[];
  suggestions: QualityImprovement[];
  trendAnalysis: string;
  mostEffectiveStrategy: EnhancementStrategy | null;
  targetAchieved: boolean;
}

export interface EnhancementInsights {
  strategyEffectiveness: Partial<Record<EnhancementStrategy, number>>;
  strategySequence: EnhancementStrategy[];
  convergencePass: number | null;
  diminishingReturnsPass: number | null;
  totalTokens: number;
  totalElapsedMs: number;
  /** Overall points gained per second of enhancement. */
  timeEfficiency: number;
  /** Overall points gained per thousand tokens. */
  tokenEfficiency: number;
  optimizationOpportunities: string[];
}
