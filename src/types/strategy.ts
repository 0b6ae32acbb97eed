/**
 * Generation strategy types.
 *
 * The strategy selector analyses a request's complexity, scores each
 * candidate generation strategy, and recommends one with two ranked
 * alternatives. Past outcomes feed back into scoring through the
 * performance history store.
 */

import type { Genre } from './request.js';

/** Candidate generation strategies, in tie-break order. */
export const GENERATION_STRATEGIES = ['direct', 'outline', 'iterative', 'adaptive'] as const;

export type GenerationStrategy = (typeof GENERATION_STRATEGIES)[number];

export type Difficulty = 'easy' | 'medium' | 'hard';

/**
 * Complexity and feasibility assessment of a content request.
 */
export interface RequirementAnalysis {
  /** Mean of the four complexity factors (0-1). */
  complexity: number;
  feasibility: number;
  difficulty: Difficulty;
  wordCountComplexity: number;
  genreComplexity: number;
  themeComplexity: number;
  settingComplexity: number;
  potentialChallenges: string[];
  successPredictors: string[];
}

/**
 * Score breakdown for one candidate strategy.
 */
export interface StrategyScore {
  strategy: GenerationStrategy;
  score: number;
  confidence: number;
  reasoning: string;
  /** Seconds. */
  estimatedTimeSec: number;
  estimatedQuality: number;
  historicalBonus: number;
}

export interface StrategyAlternative {
  strategy: GenerationStrategy;
  confidence: number;
  reasoning: string;
  estimatedTimeSec: number;
  estimatedQuality: number;
}

/**
 * Produced once per run by the strategy selector; never mutated.
 */
export interface StrategyRecommendation {
  readonly strategy: GenerationStrategy;
  readonly confidence: number;
  readonly reasoning: string;
  readonly estimatedTimeSec: number;
  readonly estimatedQuality: number;
  readonly complexity: number;
  readonly alternatives: readonly StrategyAlternative[];
}

// ============================================================================
// Performance history
// ============================================================================

/**
 * Outcome of one completed run, appended to the history store.
 */
export interface PerformanceRecord {
  timestamp: string;
  strategy: GenerationStrategy;
  genre: Genre;
  wordCount: number;
  themeProvided: boolean;
  settingProvided: boolean;
  success: boolean;
  qualityScore: number;
  generationTimeSec: number;
  errorCount: number;
}

export interface StrategyStatistics {
  totalUses: number;
  successRate: number;
  /** Mean quality of successful runs. */
  avgQuality: number;
  avgTimeSec: number;
  avgErrors: number;
}
