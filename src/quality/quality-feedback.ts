/**
 * Human-readable feedback on a finished piece of content.
 *
 * @module quality/quality-feedback
 */

import { QUALITY_DIMENSIONS } from '../types/quality.js';
import type {
  EnhancementPass,
  EnhancementStrategy,
  QualityDimension,
  QualityFeedback,
  QualityImprovement,
  QualityTier,
  QualityVector,
} from '../types/quality.js';
import { round2 } from './quality-vector.js';

export const DIMENSION_LABELS: Readonly<Record<QualityDimension, string>> = {
  structure: 'Structure',
  coherence: 'Coherence',
  character_development: 'Character Development',
  genre_compliance: 'Genre Compliance',
  pacing_quality: 'Pacing',
  theme_integration: 'Theme Integration',
  dialogue_quality: 'Dialogue',
  setting_immersion: 'Setting',
  emotional_impact: 'Emotional Impact',
  originality: 'Originality',
  technical_quality: 'Technical Quality',
};

const IMPROVEMENT_SUGGESTIONS: Readonly<Record<QualityDimension, string>> = {
  structure: 'Strengthen the story arc with a clearer beginning, middle and end',
  coherence: 'Tighten the logical flow and remove plot inconsistencies',
  character_development: 'Develop character motivations and growth arcs more deeply',
  genre_compliance: 'Lean further into the conventions readers expect from the genre',
  pacing_quality: 'Rework rhythm and tension building',
  theme_integration: 'Weave the theme more naturally into the narrative',
  dialogue_quality: 'Make dialogue more natural and character-specific',
  setting_immersion: 'Add sensory detail and atmosphere to the setting',
  emotional_impact: 'Raise the emotional stakes and reader connection to characters',
  originality: 'Add more distinctive and unexpected elements',
  technical_quality: 'Improve prose style, word choice and sentence variety',
};

/** Scores below this are reported as areas for improvement. */
const IMPROVEMENT_THRESHOLD = 7.0;

export function qualityTier(score: number): QualityTier {
  if (score >= 9.0) return 'excellent';
  if (score >= 8.0) return 'good';
  if (score >= 7.0) return 'acceptable';
  return 'needs_work';
}

function overallAssessment(score: number): string {
  if (score >= 9.0) return 'Exceptional quality with outstanding execution across all dimensions.';
  if (score >= 8.0) return 'High quality with strong execution and an engaging narrative.';
  if (score >= 7.0) return 'Good quality with solid fundamentals and room for minor improvements.';
  if (score >= 6.0) return 'Acceptable quality with decent execution but noticeable areas for improvement.';
  return 'Shows potential but needs significant improvement in multiple areas.';
}

function improvementPriority(score: number): QualityImprovement['priority'] {
  if (score < 5.0) return 1;
  if (score < 6.5) return 2;
  if (score < 7.5) return 3;
  if (score < 8.5) return 4;
  return 5;
}

/**
 * Largest overall gain achieved by each strategy across `passes`.
 */
export function strategyEffectiveness(
  passes: readonly EnhancementPass[],
): Partial<Record<EnhancementStrategy, number>> {
  const best: Partial<Record<EnhancementStrategy, number>> = {};
  for (const pass of passes) {
    const current = best[pass.strategy];
    best[pass.strategy] = current === undefined ? pass.delta : Math.max(current, pass.delta);
  }
  return best;
}

/**
 * Strategy with the largest single-pass gain; earliest used wins ties.
 */
export function mostEffectiveStrategy(
  passes: readonly EnhancementPass[],
): EnhancementStrategy | null {
  let winner: EnhancementStrategy | null = null;
  let winnerDelta = -Infinity;
  for (const [strategy, delta] of effectivenessEntries(passes)) {
    if (delta > winnerDelta) {
      winner = strategy;
      winnerDelta = delta;
    }
  }
  return winner;
}

function effectivenessEntries(
  passes: readonly EnhancementPass[],
): Array<[EnhancementStrategy, number]> {
  const effectiveness = strategyEffectiveness(passes);
  const seen = new Set<EnhancementStrategy>();
  const entries: Array<[EnhancementStrategy, number]> = [];
  for (const pass of passes) {
    const delta = effectiveness[pass.strategy];
    if (seen.has(pass.strategy) || delta === undefined) continue;
    seen.add(pass.strategy);
    entries.push([pass.strategy, delta]);
  }
  return entries;
}

function trendAnalysis(quality: QualityVector, passes: readonly EnhancementPass[]): string {
  const first = passes[0];
  if (!first) {
    return 'No enhancement passes performed; initial quality kept.';
  }
  const gain = quality.overall - first.before.overall;
  if (gain > 1.0) {
    return `Strong improvement of ${gain.toFixed(1)} points across ${passes.length} passes.`;
  }
  if (gain > 0.5) return `Good improvement of ${gain.toFixed(1)} points through enhancement.`;
  if (gain > 0) return `Modest improvement of ${gain.toFixed(1)} points through enhancement.`;
  return 'Quality remained stable through enhancement.';
}

/**
 * Summarize `quality` for a reader, with per-dimension suggestions and a
 * trend over the enhancement history.
 */
export function buildQualityFeedback(
  quality: QualityVector,
  passes: readonly EnhancementPass[],
  targetQuality: number,
): QualityFeedback {
  const strengths: string[] = [];
  const areasForImprovement: string[] = [];
  const suggestions: QualityImprovement[] = [];

  for (const dimension of QUALITY_DIMENSIONS) {
    const score = quality.dimensions[dimension];
    const label = DIMENSION_LABELS[dimension];
    const shown = `${score.toFixed(1)}/10`;

    if (score >= 8.5) {
      strengths.push(`Excellent ${label.toLowerCase()} (${shown})`);
    } else if (score >= 8.0) {
      strengths.push(`Strong ${label.toLowerCase()} (${shown})`);
    } else if (score < IMPROVEMENT_THRESHOLD) {
      areasForImprovement.push(`${label} needs enhancement (${shown})`);
      suggestions.push({
        dimension,
        currentScore: score,
        targetScore: targetQuality,
        improvementPotential: round2(Math.max(0, targetQuality - score)),
        suggestion: IMPROVEMENT_SUGGESTIONS[dimension],
        priority: improvementPriority(score),
        estimatedEffort: score > 5.0 ? 'medium' : 'high',
      });
    }
  }

  return {
    overallAssessment: overallAssessment(quality.overall),
    overallScore: quality.overall,
    tier: qualityTier(quality.overall),
    strengths,
    areasForImprovement,
    suggestions,
    trendAnalysis: trendAnalysis(quality, passes),
    mostEffectiveStrategy: mostEffectiveStrategy(passes),
    targetAchieved: quality.overall >= targetQuality,
  };
}
