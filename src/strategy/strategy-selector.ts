/**
 * Generation strategy selection.
 *
 * Each candidate strategy gets a score from a base affinity, a
 * complexity-dependent adjustment and a bounded historical bonus. The
 * highest score wins; the next two are offered as alternatives.
 *
 * @module strategy/strategy-selector
 */

import { GENERATION_STRATEGIES } from '../types/strategy.js';
import type {
  GenerationStrategy,
  RequirementAnalysis,
  StrategyRecommendation,
  StrategyScore,
} from '../types/strategy.js';
import type { ContentRequest } from '../types/request.js';
import { silentLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { analyzeRequirements } from './requirement-analysis.js';
import type { PerformanceHistoryStore } from './performance-store.js';

/** Word count at which iterative gets an extra length bonus. */
const LONG_FORM_WORDS = 1800;

export interface StrategySelectorOptions {
  simpleStoryMaxWords?: number;
  complexStoryMinWords?: number;
  history?: PerformanceHistoryStore;
  logger?: Logger;
}

type BaseScore = Omit<StrategyScore, 'strategy' | 'historicalBonus' | 'confidence'> & {
  confidenceRange: readonly [number, number];
};

function clamp(value: number, [min, max]: readonly [number, number]): number {
  return Math.min(max, Math.max(min, value));
}

export class StrategySelector {
  private readonly simpleStoryMaxWords: number;
  private readonly complexStoryMinWords: number;
  private readonly history?: PerformanceHistoryStore;
  private readonly logger: Logger;

  constructor(options: StrategySelectorOptions = {}) {
    this.simpleStoryMaxWords = options.simpleStoryMaxWords ?? 1000;
    this.complexStoryMinWords = options.complexStoryMinWords ?? 1500;
    this.history = options.history;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Recommend a strategy for `request`. History lookups that fail are
   * not papered over: the error propagates.
   */
  async selectStrategy(
    request: ContentRequest,
    analysis: RequirementAnalysis = analyzeRequirements(request),
  ): Promise<StrategyRecommendation> {
    const ranked = (await this.scoreStrategies(request, analysis)).sort(
      (a, b) => b.score - a.score,
    );
    const [best, ...rest] = ranked;
    if (!best) {
      throw new Error('No generation strategies to score');
    }

    this.logger.info(
      `selected ${best.strategy} (score ${best.score.toFixed(3)}, confidence ${best.confidence.toFixed(2)})`,
    );

    return {
      strategy: best.strategy,
      confidence: best.confidence,
      reasoning: best.reasoning,
      estimatedTimeSec: best.estimatedTimeSec,
      estimatedQuality: best.estimatedQuality,
      complexity: analysis.complexity,
      alternatives: rest.slice(0, 2).map((alt) => ({
        strategy: alt.strategy,
        confidence: alt.confidence,
        reasoning: alt.reasoning,
        estimatedTimeSec: alt.estimatedTimeSec,
        estimatedQuality: alt.estimatedQuality,
      })),
    };
  }

  /**
   * Score every candidate, in GENERATION_STRATEGIES order.
   */
  async scoreStrategies(
    request: ContentRequest,
    analysis: RequirementAnalysis,
  ): Promise<StrategyScore[]> {
    return Promise.all(
      GENERATION_STRATEGIES.map(async (strategy) => {
        const base = this.baseScore(strategy, request, analysis);
        const historicalBonus = this.history
          ? await this.history.queryBonus(strategy, request)
          : 0;
        const score = base.score + historicalBonus;
        return {
          strategy,
          score,
          confidence: clamp(score, base.confidenceRange),
          reasoning: base.reasoning,
          estimatedTimeSec: base.estimatedTimeSec,
          estimatedQuality: base.estimatedQuality,
          historicalBonus,
        };
      }),
    );
  }

  private baseScore(
    strategy: GenerationStrategy,
    request: ContentRequest,
    analysis: RequirementAnalysis,
  ): BaseScore {
    const c = analysis.complexity;
    const words = request.targetWordCount;

    switch (strategy) {
      case 'direct':
        return {
          score: 0.7 - c * 0.3 + (words <= this.simpleStoryMaxWords ? 0.2 : 0),
          confidenceRange: [0.3, 0.9],
          reasoning: `Direct generation suits ${c < 0.5 ? 'simple' : 'moderately complex'} requests`,
          estimatedTimeSec: 60 + words * 0.02,
          estimatedQuality: 7.0 - c * 2.0,
        };
      case 'outline': {
        const structureBonus =
          request.genre === 'mystery' || request.genre === 'literary' ? 0.2 : 0.1;
        return {
          score: 0.8 + Math.min(c * 0.4, 0.3) + structureBonus,
          confidenceRange: [0.4, 0.95],
          reasoning: 'Outlining first gives a planned structure to build on',
          estimatedTimeSec: 120 + words * 0.03,
          estimatedQuality: 7.5 + c,
        };
      }
      case 'iterative':
        return {
          score:
            0.7 +
            c * 0.7 +
            (words >= this.complexStoryMinWords ? 0.5 : 0.1) +
            (words >= LONG_FORM_WORDS ? 0.3 : 0) -
            0.05,
          confidenceRange: [0.3, 0.95],
          reasoning: 'Iterative refinement gives the highest quality, especially for longer pieces',
          estimatedTimeSec: 240 + words * 0.05,
          estimatedQuality: 8.0 + c * 0.5,
        };
      case 'adaptive':
        return {
          score: 0.75 + (c >= 0.4 && c <= 0.7 ? 0.1 : 0),
          confidenceRange: [0.5, 0.85],
          reasoning: 'Adaptive generation adjusts its approach as the content develops',
          estimatedTimeSec: 150 + words * 0.035,
          estimatedQuality: 7.2 + c * 0.8,
        };
    }
  }
}
