/**
 * Picks the next enhancement strategy from a quality vector.
 *
 * Dimensions below the weak threshold are ranked by
 * `(10 - score) * weight[dimension]`; the top one decides the strategy.
 * Equal priorities fall back to TIE_BREAK_ORDER. With nothing weak the
 * selector returns `comprehensive`.
 *
 * @module enhancement/enhancement-strategy-selector
 */

import { MAX_SCORE } from '../types/quality.js';
import type {
  DimensionMap,
  EnhancementStrategy,
  QualityDimension,
  QualityVector,
} from '../types/quality.js';

export const DEFAULT_ENHANCEMENT_WEIGHTS: Readonly<DimensionMap> = {
  structure: 1.0,
  coherence: 1.0,
  character_development: 1.2,
  genre_compliance: 1.0,
  pacing_quality: 1.1,
  theme_integration: 1.0,
  dialogue_quality: 0.9,
  setting_immersion: 0.8,
  emotional_impact: 1.3,
  originality: 0.7,
  technical_quality: 1.0,
};

export const DEFAULT_WEAK_THRESHOLD = 7.0;

/** Earlier entries win equal priorities. */
export const TIE_BREAK_ORDER: readonly QualityDimension[] = [
  'structure',
  'coherence',
  'character_development',
  'pacing_quality',
  'genre_compliance',
  'dialogue_quality',
  'setting_immersion',
  'emotional_impact',
  'theme_integration',
  'originality',
  'technical_quality',
];

export const DIMENSION_STRATEGY: Readonly<Record<QualityDimension, EnhancementStrategy>> = {
  structure: 'structure_focus',
  coherence: 'coherence_focus',
  character_development: 'character_focus',
  genre_compliance: 'genre_focus',
  pacing_quality: 'pacing_focus',
  theme_integration: 'theme_focus',
  dialogue_quality: 'dialogue_focus',
  setting_immersion: 'setting_focus',
  emotional_impact: 'emotional_focus',
  originality: 'originality_focus',
  technical_quality: 'technical_focus',
};

const STRATEGY_FOCUS: Readonly<Record<EnhancementStrategy, readonly QualityDimension[]>> = {
  structure_focus: ['structure'],
  coherence_focus: ['coherence'],
  character_focus: ['character_development'],
  genre_focus: ['genre_compliance'],
  pacing_focus: ['pacing_quality'],
  theme_focus: ['theme_integration'],
  dialogue_focus: ['dialogue_quality'],
  setting_focus: ['setting_immersion'],
  emotional_focus: ['emotional_impact'],
  originality_focus: ['originality'],
  technical_focus: ['technical_quality'],
  comprehensive: ['structure', 'character_development', 'coherence', 'pacing_quality'],
};

/** Dimensions a strategy works on. */
export function focusDimensions(strategy: EnhancementStrategy): QualityDimension[] {
  return [...STRATEGY_FOCUS[strategy]];
}

export interface DimensionPriority {
  dimension: QualityDimension;
  score: number;
  weight: number;
  priority: number;
}

export interface EnhancementStrategySelectorOptions {
  weights?: Readonly<DimensionMap>;
  weakThreshold?: number;
}

export class EnhancementStrategySelector {
  private readonly weights: Readonly<DimensionMap>;
  private readonly weakThreshold: number;

  constructor(options: EnhancementStrategySelectorOptions = {}) {
    this.weights = options.weights ?? DEFAULT_ENHANCEMENT_WEIGHTS;
    this.weakThreshold = options.weakThreshold ?? DEFAULT_WEAK_THRESHOLD;
  }

  /**
   * Weak dimensions, highest priority first.
   */
  rank(quality: QualityVector): DimensionPriority[] {
    return TIE_BREAK_ORDER.filter((d) => quality.dimensions[d] < this.weakThreshold)
      .map((dimension) => {
        const score = quality.dimensions[dimension];
        const weight = this.weights[dimension];
        return { dimension, score, weight, priority: (MAX_SCORE - score) * weight };
      })
      .sort(
        (a, b) =>
          b.priority - a.priority ||
          TIE_BREAK_ORDER.indexOf(a.dimension) - TIE_BREAK_ORDER.indexOf(b.dimension),
      );
  }

  selectEnhancementStrategy(quality: QualityVector): EnhancementStrategy {
    const top = this.rank(quality)[0];
    return top ? DIMENSION_STRATEGY[top.dimension] : 'comprehensive';
  }
}
