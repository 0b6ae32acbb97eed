/**
 * In-process stand-ins for the generation and scoring services, plus
 * small builders for quality vectors and requests. Used by tests only.
 */

import { vi } from 'vitest';
import type { DimensionMap, QualityVector } from '../types/quality.js';
import type { ContentRequest } from '../types/request.js';
import type {
  GenerationResult,
  GenerationService,
  QualityScoringService,
} from '../types/services.js';
import { createQualityVector, mapDimensions } from '../quality/quality-vector.js';

export const REQUEST: ContentRequest = {
  genre: 'mystery',
  targetWordCount: 1200,
  theme: 'trust',
  setting: 'a lighthouse',
};

/** Every dimension at `value`, with overrides. */
export function scores(value: number, overrides: Partial<DimensionMap> = {}): DimensionMap {
  return mapDimensions((d) => overrides[d] ?? value);
}

/** Vector whose overall equals `value` (all dimensions equal). */
export function uniformVector(value: number): QualityVector {
  return createQualityVector(scores(value), { assessedAt: '2026-01-01T00:00:00.000Z' });
}

/**
 * Scoring service that replays a fixed sequence of results. Numbers are
 * expanded to uniform dimension maps. The last entry repeats.
 */
export function scriptedScoring(
  sequence: ReadonlyArray<number | Partial<DimensionMap>>,
): QualityScoringService & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async score(content) {
      const entry = sequence[Math.min(calls.length, sequence.length - 1)] ?? 0;
      calls.push(content);
      return typeof entry === 'number' ? scores(entry) : entry;
    },
  };
}

/**
 * Generation service that appends `+N` to the content, N counting calls
 * from 1. Titles are omitted unless `titles` supplies one for the call.
 */
export function countingGeneration(
  titles: ReadonlyArray<string | undefined> = [],
  tokensUsed?: number,
) {
  let count = 0;
  const generate = vi.fn(
    async (content: string, _instruction: string): Promise<GenerationResult> => {
      count += 1;
      const title = titles[count - 1];
      return {
        content: `${content}+${count}`,
        ...(title === undefined ? {} : { title }),
        ...(tokensUsed === undefined ? {} : { tokensUsed }),
      };
    },
  );
  const service: GenerationService = { generate };
  return { service, generate };
}

/**
 * Deterministic LCG yielding numbers in [0, 1).
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}
