/**
 * QualityVector construction and derived queries.
 *
 * The overall score is a weighted mean of the dimension scores. The
 * default weights total exactly 1.0; custom weights totalling less are
 * divided by their total so no score mass is dropped.
 *
 * @module quality/quality-vector
 */

import { QUALITY_DIMENSIONS, MIN_SCORE, MAX_SCORE } from '../types/quality.js';
import type { DimensionMap, QualityDimension, QualityVector } from '../types/quality.js';

/** Overall-score weight per dimension. Sums to 1.0. */
export const DEFAULT_DIMENSION_WEIGHTS: Readonly<DimensionMap> = {
  structure: 0.12,
  coherence: 0.1,
  character_development: 0.12,
  genre_compliance: 0.08,
  pacing_quality: 0.1,
  theme_integration: 0.08,
  dialogue_quality: 0.1,
  setting_immersion: 0.08,
  emotional_impact: 0.12,
  originality: 0.06,
  technical_quality: 0.04,
};

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Throw a RangeError unless `score` is a finite number in [0, 10].
 */
export function assertScore(dimension: string, score: number): void {
  if (!Number.isFinite(score) || score < MIN_SCORE || score > MAX_SCORE) {
    throw new RangeError(
      `Score for ${dimension} must be within [${MIN_SCORE}, ${MAX_SCORE}], got ${score}`,
    );
  }
}

/**
 * Weighted overall score, rounded to two decimals.
 */
export function computeOverall(
  scores: Readonly<DimensionMap>,
  weights: Readonly<DimensionMap> = DEFAULT_DIMENSION_WEIGHTS,
): number {
  let weighted = 0;
  let total = 0;
  for (const dimension of QUALITY_DIMENSIONS) {
    weighted += scores[dimension] * weights[dimension];
    total += weights[dimension];
  }
  if (total <= 0) {
    throw new RangeError('Dimension weights must total more than zero');
  }
  // Clamp absorbs floating-point drift only; inputs are already in range.
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, round2(weighted / total)));
}

export interface QualityVectorInit {
  assessedAt?: string;
  assessmentMs?: number;
  weights?: Readonly<DimensionMap>;
}

/**
 * Build an immutable QualityVector from per-dimension scores.
 *
 * @throws {RangeError} When a score is outside [0, 10] or not finite
 */
export function createQualityVector(
  scores: Readonly<DimensionMap>,
  init: QualityVectorInit = {},
): QualityVector {
  for (const dimension of QUALITY_DIMENSIONS) {
    assertScore(dimension, scores[dimension]);
  }

  const dimensions: DimensionMap = { ...scores };
  return Object.freeze({
    overall: computeOverall(dimensions, init.weights),
    dimensions: Object.freeze(dimensions),
    assessedAt: init.assessedAt ?? new Date().toISOString(),
    assessmentMs: init.assessmentMs ?? 0,
  });
}

/**
 * Dimensions scoring strictly below `threshold`, in canonical order.
 */
export function weakestDimensions(quality: QualityVector, threshold: number): QualityDimension[] {
  return QUALITY_DIMENSIONS.filter((d) => quality.dimensions[d] < threshold);
}

/**
 * Points each dimension needs to reach `target`, clamped at 0.
 */
export function improvementPotential(quality: QualityVector, target: number): DimensionMap {
  return mapDimensions((d) => Math.max(0, target - quality.dimensions[d]));
}

/**
 * Per-dimension change from `before` to `after`.
 */
export function dimensionDeltas(before: QualityVector, after: QualityVector): DimensionMap {
  return mapDimensions((d) => round2(after.dimensions[d] - before.dimensions[d]));
}

export function mapDimensions<T>(fn: (dimension: QualityDimension) => T): DimensionMap<T> {
  return {
    structure: fn('structure'),
    coherence: fn('coherence'),
    character_development: fn('character_development'),
    genre_compliance: fn('genre_compliance'),
    pacing_quality: fn('pacing_quality'),
    theme_integration: fn('theme_integration'),
    dialogue_quality: fn('dialogue_quality'),
    setting_immersion: fn('setting_immersion'),
    emotional_impact: fn('emotional_impact'),
    originality: fn('originality'),
    technical_quality: fn('technical_quality'),
  };
}
