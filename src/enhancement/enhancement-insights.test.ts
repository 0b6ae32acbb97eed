import { describe, it, expect } from 'vitest';
import { buildEnhancementInsights } from './enhancement-insights.js';
import { dimensionDeltas } from '../quality/quality-vector.js';
import { uniformVector } from '../__fixtures__/services.js';
import type {
  EnhancementOutcome,
  EnhancementPass,
  EnhancementStrategy,
} from '../types/quality.js';

function pass(
  passNumber: number,
  strategy: EnhancementStrategy,
  from: number,
  to: number,
  tokenCost: number,
  elapsedMs: number,
): EnhancementPass {
  const before = uniformVector(from);
  const after = uniformVector(to);
  return {
    passNumber,
    strategy,
    focusDimensions: [],
    before,
    after,
    delta: Math.round((to - from) * 100) / 100,
    dimensionDeltas: dimensionDeltas(before, after),
    elapsedMs,
    tokenCost,
    instruction: '',
  };
}

function outcome(passes: EnhancementPass[], convergencePass: number | null = null): EnhancementOutcome {
  const first = passes[0];
  const last = passes[passes.length - 1];
  return {
    content: 'text',
    title: 'Title',
    passes,
    initialQuality: first ? first.before : uniformVector(8),
    finalQuality: last ? last.after : uniformVector(8),
    convergence: {
      deltas: passes.map((p) => p.delta),
      plateauDetected: false,
      diminishingReturnsDetected: convergencePass !== null,
      convergencePass,
      predictedConvergencePass: null,
    },
    stopReason: convergencePass === null ? 'budget-exhausted' : 'converged',
    targetAchieved: false,
  };
}

describe('buildEnhancementInsights', () => {
  it('summarises a converged history', () => {
    const insights = buildEnhancementInsights(
      outcome(
        [
          pass(1, 'structure_focus', 6, 7, 2500, 1500),
          pass(2, 'pacing_focus', 7, 7.3, 2500, 500),
        ],
        2,
      ),
    );

    expect(insights.strategySequence).toEqual(['structure_focus', 'pacing_focus']);
    expect(insights.strategyEffectiveness).toEqual({ structure_focus: 1, pacing_focus: 0.3 });
    expect(insights.convergencePass).toBe(2);
    expect(insights.diminishingReturnsPass).toBe(2);
    expect(insights.totalTokens).toBe(5000);
    expect(insights.totalElapsedMs).toBe(2000);
    // 1.3 points over 2 s and over 5k tokens
    expect(insights.timeEfficiency).toBe(0.65);
    expect(insights.tokenEfficiency).toBe(0.26);
    expect(insights.optimizationOpportunities).toEqual([]);
  });

  it('reports zero efficiency without passes', () => {
    const insights = buildEnhancementInsights(outcome([]));

    expect(insights.strategySequence).toEqual([]);
    expect(insights.timeEfficiency).toBe(0);
    expect(insights.tokenEfficiency).toBe(0);
    expect(insights.diminishingReturnsPass).toBeNull();
  });

  it('flags long and expensive runs', () => {
    const passes = [
      pass(1, 'comprehensive', 5, 5.5, 3000, 100_000),
      pass(2, 'comprehensive', 5.5, 6, 3000, 100_000),
      pass(3, 'comprehensive', 6, 6.5, 3000, 100_000),
      pass(4, 'comprehensive', 6.5, 7, 3000, 100_000),
    ];

    expect(buildEnhancementInsights(outcome(passes)).optimizationOpportunities).toEqual([
      'Consider fewer passes; later passes added little',
      'High token usage; consider more targeted strategies',
      'Long enhancement time; consider a lower target or pass budget',
    ]);
  });
});
