/**
 * Complexity and feasibility estimate for a content request.
 *
 * Complexity is the mean of four factors in [0, 1]: target length,
 * genre, theme specificity and setting specificity.
 *
 * @module strategy/requirement-analysis
 */

import type { ContentRequest, Genre } from '../types/request.js';
import type { Difficulty, RequirementAnalysis } from '../types/strategy.js';

export const GENRE_COMPLEXITY: Readonly<Record<Genre, number>> = {
  literary: 0.8,
  mystery: 0.7,
  science_fiction: 0.9,
  fantasy: 0.9,
  romance: 0.6,
};

/** Upper word-count bound (inclusive) and complexity of each bucket. */
const WORD_COUNT_BUCKETS: ReadonlyArray<readonly [number, number]> = [
  [500, 0.2],
  [1000, 0.4],
  [1500, 0.6],
  [3000, 0.8],
  [5000, 0.9],
];

export function wordCountComplexity(wordCount: number): number {
  for (const [limit, complexity] of WORD_COUNT_BUCKETS) {
    if (wordCount <= limit) return complexity;
  }
  return 1.0;
}

function countWords(text: string | undefined): number {
  if (!text) return 0;
  return text.trim().split(/\s+/).filter(Boolean).length;
}

export function themeComplexity(theme: string | undefined): number {
  const words = countWords(theme);
  if (words === 0) return 0.1;
  if (words === 1) return 0.3;
  if (words <= 3) return 0.5;
  return 0.7;
}

export function settingComplexity(setting: string | undefined): number {
  const words = countWords(setting);
  if (words === 0) return 0.1;
  if (words <= 2) return 0.3;
  if (words <= 5) return 0.5;
  return 0.7;
}

function difficultyOf(complexity: number): Difficulty {
  if (complexity < 0.4) return 'easy';
  if (complexity < 0.7) return 'medium';
  return 'hard';
}

function feasibilityOf(request: ContentRequest, complexity: number): number {
  const lengthPenalty = request.targetWordCount > 7000 ? 0.1 : 0;
  const feasibility = 0.9 - complexity * 0.2 - lengthPenalty;
  return Math.min(1, Math.max(0.3, feasibility));
}

export function analyzeRequirements(request: ContentRequest): RequirementAnalysis {
  const factors = {
    wordCountComplexity: wordCountComplexity(request.targetWordCount),
    genreComplexity: GENRE_COMPLEXITY[request.genre],
    themeComplexity: themeComplexity(request.theme),
    settingComplexity: settingComplexity(request.setting),
  };
  const complexity =
    (factors.wordCountComplexity +
      factors.genreComplexity +
      factors.themeComplexity +
      factors.settingComplexity) /
    4;
  const feasibility = feasibilityOf(request, complexity);

  const potentialChallenges: string[] = [];
  if (complexity > 0.8) {
    potentialChallenges.push('High complexity may need several refinement passes');
  }
  if (request.targetWordCount > 5000) {
    potentialChallenges.push('Long target length may strain coherence and pacing');
  }
  if (request.genre === 'science_fiction' || request.genre === 'fantasy') {
    potentialChallenges.push('World-building adds generation complexity');
  }
  if (factors.themeComplexity > 0.6) {
    potentialChallenges.push('A detailed theme needs careful integration');
  }

  const successPredictors: string[] = [];
  if (feasibility > 0.8) {
    successPredictors.push('High feasibility');
  }
  if (request.targetWordCount >= 1000 && request.targetWordCount < 3000) {
    successPredictors.push('Target length is in the most reliable range');
  }
  if (request.theme && factors.themeComplexity < 0.5) {
    successPredictors.push('A short, clear theme gives good guidance');
  }
  if (request.genre === 'literary' || request.genre === 'romance') {
    successPredictors.push('Genre has well-established conventions');
  }

  return {
    complexity,
    feasibility,
    difficulty: difficultyOf(complexity),
    ...factors,
    potentialChallenges,
    successPredictors,
  };
}
