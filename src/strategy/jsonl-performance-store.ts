/**
 * JSONL append-log performance history.
 *
 * One record per line. Reads skip lines that are corrupt or fail schema
 * validation, then keep the most recent `window` records per strategy.
 * Appends and reads share a reader/writer lock so a read never sees a
 * half-written line from this process.
 */

import { appendFile, readFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { ContentRequest } from '../types/request.js';
import type {
  GenerationStrategy,
  PerformanceRecord,
  StrategyStatistics,
} from '../types/strategy.js';
import { ReadWriteLock } from '../concurrency/read-write-lock.js';
import {
  PerformanceRecordSchema,
  computeHistoricalBonus,
  groupByStrategy,
  statisticsByStrategy,
  toPerformanceRecord,
} from './performance-store.js';
import type {
  PerformanceHistoryStore,
  PerformanceOutcome,
  PerformanceStoreOptions,
} from './performance-store.js';

export class JsonlPerformanceStore implements PerformanceHistoryStore {
  private readonly lock = new ReadWriteLock();
  private readonly window: number;
  private readonly tolerance: number;
  private readonly learningEnabled: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly filePath: string,
    options: PerformanceStoreOptions = {},
  ) {
    this.window = options.window ?? 100;
    this.tolerance = options.similarityTolerance ?? 0.3;
    this.learningEnabled = options.learningEnabled ?? true;
    this.now = options.now ?? (() => new Date());
  }

  async recordOutcome(outcome: PerformanceOutcome): Promise<void> {
    if (!this.learningEnabled) return;
    const line = JSON.stringify(toPerformanceRecord(outcome, this.now())) + '\n';
    await this.lock.withWrite(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, line, 'utf-8');
    });
  }

  async queryBonus(strategy: GenerationStrategy, request: ContentRequest): Promise<number> {
    if (!this.learningEnabled) return 0;
    const grouped = await this.readGrouped();
    return computeHistoricalBonus(grouped[strategy], request, this.tolerance);
  }

  async getStatistics(): Promise<Record<GenerationStrategy, StrategyStatistics>> {
    return statisticsByStrategy(await this.readGrouped());
  }

  /**
   * All valid records in append order. Missing file = no history.
   */
  async readAll(): Promise<PerformanceRecord[]> {
    return this.lock.withRead(async () => {
      let content: string;
      try {
        content = await readFile(this.filePath, 'utf-8');
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          return [];
        }
        throw error;
      }

      const records: PerformanceRecord[] = [];
      for (const line of content.split(/\r?\n/)) {
        if (line.trim() === '') continue;
        const result = PerformanceRecordSchema.safeParse(parseLine(line));
        if (result.success) {
          records.push(result.data);
        }
      }
      return records;
    });
  }

  private async readGrouped(): Promise<Record<GenerationStrategy, PerformanceRecord[]>> {
    return groupByStrategy(await this.readAll(), this.window);
  }
}

/** Parsed JSON, or undefined for a corrupt line. */
function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
