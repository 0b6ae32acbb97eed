/**
 * Historical performance of generation strategies.
 *
 * Completed runs append an outcome; the strategy selector reads a small,
 * bounded bonus back for requests similar to ones seen before. Stores are
 * shared across concurrent runs, so reads and appends go through a
 * reader/writer lock.
 *
 * @module strategy/performance-store
 */

import { z } from 'zod';
import { GENERATION_STRATEGIES } from '../types/strategy.js';
import type {
  GenerationStrategy,
  PerformanceRecord,
  StrategyStatistics,
} from '../types/strategy.js';
import { GENRES } from '../types/request.js';
import type { ContentRequest } from '../types/request.js';
import { ReadWriteLock } from '../concurrency/read-write-lock.js';

// ============================================================================
// Schema
// ============================================================================

export const PerformanceRecordSchema = z.object({
  timestamp: z.string(),
  strategy: z.enum(GENERATION_STRATEGIES),
  genre: z.enum(GENRES),
  wordCount: z.number().int().positive(),
  themeProvided: z.boolean(),
  settingProvided: z.boolean(),
  success: z.boolean(),
  qualityScore: z.number().min(0).max(10),
  generationTimeSec: z.number().min(0),
  errorCount: z.number().int().min(0),
});

// ============================================================================
// Interface
// ============================================================================

export interface PerformanceOutcome {
  strategy: GenerationStrategy;
  request: ContentRequest;
  success: boolean;
  /** Final overall quality; 0 when the run produced nothing scorable. */
  qualityScore: number;
  generationTimeSec: number;
  errorCount: number;
}

export interface PerformanceHistoryStore {
  recordOutcome(outcome: PerformanceOutcome): Promise<void>;
  /** Score adjustment in [-0.1, 0.2] for `strategy` on requests like `request`. */
  queryBonus(strategy: GenerationStrategy, request: ContentRequest): Promise<number>;
  getStatistics(): Promise<Record<GenerationStrategy, StrategyStatistics>>;
}

export interface PerformanceStoreOptions {
  /** Records kept per strategy (default: 100). */
  window?: number;
  /** Relative word-count distance that still counts as similar (default: 0.3). */
  similarityTolerance?: number;
  /** When false, outcomes are not recorded and every bonus is 0. */
  learningEnabled?: boolean;
  now?: () => Date;
}

export const MIN_HISTORICAL_BONUS = -0.1;
export const MAX_HISTORICAL_BONUS = 0.2;

// ============================================================================
// Pure helpers
// ============================================================================

export function toPerformanceRecord(outcome: PerformanceOutcome, at: Date): PerformanceRecord {
  return {
    timestamp: at.toISOString(),
    strategy: outcome.strategy,
    genre: outcome.request.genre,
    wordCount: outcome.request.targetWordCount,
    themeProvided: Boolean(outcome.request.theme),
    settingProvided: Boolean(outcome.request.setting),
    success: outcome.success,
    qualityScore: outcome.qualityScore,
    generationTimeSec: outcome.generationTimeSec,
    errorCount: outcome.errorCount,
  };
}

/**
 * Bonus from records of one strategy that share the request's genre and
 * lie within `tolerance` of its target length.
 */
export function computeHistoricalBonus(
  records: readonly PerformanceRecord[],
  request: ContentRequest,
  tolerance: number,
): number {
  const target = request.targetWordCount;
  const similar = records.filter(
    (r) => r.genre === request.genre && Math.abs(r.wordCount - target) < target * tolerance,
  );
  if (similar.length === 0) return 0;

  const successes = similar.filter((r) => r.success);
  const successRate = successes.length / similar.length;
  const avgQuality =
    successes.reduce((sum, r) => sum + r.qualityScore, 0) / Math.max(1, successes.length);

  const bonus = (successRate - 0.8) * 0.2 + (avgQuality - 7.0) * 0.05;
  return Math.min(MAX_HISTORICAL_BONUS, Math.max(MIN_HISTORICAL_BONUS, bonus));
}

export function computeStatistics(records: readonly PerformanceRecord[]): StrategyStatistics {
  if (records.length === 0) {
    return { totalUses: 0, successRate: 0, avgQuality: 0, avgTimeSec: 0, avgErrors: 0 };
  }
  const successes = records.filter((r) => r.success);
  return {
    totalUses: records.length,
    successRate: successes.length / records.length,
    avgQuality:
      successes.reduce((sum, r) => sum + r.qualityScore, 0) / Math.max(1, successes.length),
    avgTimeSec: records.reduce((sum, r) => sum + r.generationTimeSec, 0) / records.length,
    avgErrors: records.reduce((sum, r) => sum + r.errorCount, 0) / records.length,
  };
}

/** Group by strategy, keeping the most recent `window` records of each. */
export function groupByStrategy(
  records: readonly PerformanceRecord[],
  window: number,
): Record<GenerationStrategy, PerformanceRecord[]> {
  const grouped: Record<GenerationStrategy, PerformanceRecord[]> = {
    direct: [],
    outline: [],
    iterative: [],
    adaptive: [],
  };
  for (const record of records) {
    grouped[record.strategy].push(record);
  }
  for (const strategy of GENERATION_STRATEGIES) {
    grouped[strategy] = grouped[strategy].slice(-window);
  }
  return grouped;
}

export function statisticsByStrategy(
  grouped: Record<GenerationStrategy, PerformanceRecord[]>,
): Record<GenerationStrategy, StrategyStatistics> {
  return {
    direct: computeStatistics(grouped.direct),
    outline: computeStatistics(grouped.outline),
    iterative: computeStatistics(grouped.iterative),
    adaptive: computeStatistics(grouped.adaptive),
  };
}

// ============================================================================
// In-memory store
// ============================================================================

export class InMemoryPerformanceStore implements PerformanceHistoryStore {
  private readonly lock = new ReadWriteLock();
  private grouped: Record<GenerationStrategy, PerformanceRecord[]>;
  private readonly window: number;
  private readonly tolerance: number;
  private readonly learningEnabled: boolean;
  private readonly now: () => Date;

  constructor(options: PerformanceStoreOptions = {}) {
    this.window = options.window ?? 100;
    this.tolerance = options.similarityTolerance ?? 0.3;
    this.learningEnabled = options.learningEnabled ?? true;
    this.now = options.now ?? (() => new Date());
    this.grouped = groupByStrategy([], this.window);
  }

  async recordOutcome(outcome: PerformanceOutcome): Promise<void> {
    if (!this.learningEnabled) return;
    const record = toPerformanceRecord(outcome, this.now());
    await this.lock.withWrite(() => {
      const next = [...this.grouped[record.strategy], record].slice(-this.window);
      this.grouped = { ...this.grouped, [record.strategy]: next };
    });
  }

  async queryBonus(strategy: GenerationStrategy, request: ContentRequest): Promise<number> {
    if (!this.learningEnabled) return 0;
    return this.lock.withRead(() =>
      computeHistoricalBonus(this.grouped[strategy], request, this.tolerance),
    );
  }

  async getStatistics(): Promise<Record<GenerationStrategy, StrategyStatistics>> {
    return this.lock.withRead(() => statisticsByStrategy(this.grouped));
  }
}
