/**
 * Post-run analysis of an enhancement history: which strategies paid
 * off, where gains flattened, and what the run cost.
 *
 * @module enhancement/enhancement-insights
 */

import type { EnhancementInsights, EnhancementOutcome } from '../types/quality.js';
import { strategyEffectiveness } from '../quality/quality-feedback.js';
import { round2 } from '../quality/quality-vector.js';

const MANY_PASSES = 3;
const HIGH_TOKEN_USAGE = 10_000;
const LONG_RUN_MS = 300_000;

/**
 * First pass (1-based) whose delta fell under half of the one before it.
 */
function diminishingReturnsPass(deltas: readonly number[]): number | null {
  for (let i = 1; i < deltas.length; i++) {
    const latest = deltas[i];
    const previous = deltas[i - 1];
    if (latest !== undefined && previous !== undefined && latest < previous * 0.5) {
      return i + 1;
    }
  }
  return null;
}

export function buildEnhancementInsights(outcome: EnhancementOutcome): EnhancementInsights {
  const { passes } = outcome;
  const totalTokens = passes.reduce((sum, p) => sum + p.tokenCost, 0);
  const totalElapsedMs = passes.reduce((sum, p) => sum + p.elapsedMs, 0);
  const gain = outcome.finalQuality.overall - outcome.initialQuality.overall;

  const opportunities: string[] = [];
  if (passes.length > MANY_PASSES) {
    opportunities.push('Consider fewer passes; later passes added little');
  }
  if (totalTokens > HIGH_TOKEN_USAGE) {
    opportunities.push('High token usage; consider more targeted strategies');
  }
  if (totalElapsedMs > LONG_RUN_MS) {
    opportunities.push('Long enhancement time; consider a lower target or pass budget');
  }

  return {
    strategyEffectiveness: strategyEffectiveness(passes),
    strategySequence: passes.map((p) => p.strategy),
    convergencePass: outcome.convergence.convergencePass,
    diminishingReturnsPass: diminishingReturnsPass(outcome.convergence.deltas),
    totalTokens,
    totalElapsedMs,
    timeEfficiency: totalElapsedMs > 0 ? round2(gain / (totalElapsedMs / 1000)) : 0,
    tokenEfficiency: totalTokens > 0 ? round2(gain / (totalTokens / 1000)) : 0,
    optimizationOpportunities: opportunities,
  };
}
