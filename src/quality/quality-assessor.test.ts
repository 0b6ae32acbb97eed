import { describe, it, expect, vi } from 'vitest';
import { QualityAssessor, fanOutScoringService } from './quality-assessor.js';
import { QualityAssessmentFailure } from './errors.js';
import { REQUEST, scores, scriptedScoring } from '../__fixtures__/services.js';
import type { DimensionScorer } from '../types/services.js';
import type { QualityDimension } from '../types/quality.js';

describe('QualityAssessor', () => {
  it('builds a vector from a complete result', async () => {
    let clock = 1000;
    const assessor = new QualityAssessor(scriptedScoring([7.5]), {
      now: () => (clock += 25),
    });

    const quality = await assessor.assess('text', REQUEST);

    expect(quality.overall).toBe(7.5);
    expect(quality.assessmentMs).toBe(25);
  });

  it('wraps service errors', async () => {
    const assessor = new QualityAssessor({
      score: vi.fn().mockRejectedValue(new Error('scoring offline')),
    });

    const error = await assessor.assess('text', REQUEST).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(QualityAssessmentFailure);
    if (error instanceof QualityAssessmentFailure) {
      expect(error.reason).toBe('service-error');
      expect(error.message).toBe('Quality scoring failed: scoring offline');
      expect(error.cause).toBeInstanceOf(Error);
    }
  });

  it('rejects a result missing a dimension', async () => {
    const { theme_integration: _dropped, ...partial } = scores(7);
    const assessor = new QualityAssessor(scriptedScoring([partial]));

    const error = await assessor.assess('text', REQUEST).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(QualityAssessmentFailure);
    if (error instanceof QualityAssessmentFailure) {
      expect(error.reason).toBe('missing-dimension');
      expect(error.dimension).toBe('theme_integration');
    }
  });

  it('rejects an out-of-range value without clamping', async () => {
    const assessor = new QualityAssessor(scriptedScoring([scores(7, { originality: 11 })]));

    const error = await assessor.assess('text', REQUEST).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(QualityAssessmentFailure);
    if (error instanceof QualityAssessmentFailure) {
      expect(error.reason).toBe('out-of-range');
      expect(error.dimension).toBe('originality');
    }
  });

  it('applies custom weights', async () => {
    const assessor = new QualityAssessor(scriptedScoring([scores(4, { structure: 9 })]), {
      weights: scores(0, { structure: 1 }),
    });

    const quality = await assessor.assess('text', REQUEST);

    expect(quality.overall).toBe(9);
  });
});

describe('fanOutScoringService', () => {
  it('scores every dimension and assembles the map', async () => {
    const scorer: DimensionScorer = {
      scoreDimension: vi.fn(async (dimension: QualityDimension) =>
        dimension === 'pacing_quality' ? 6 : 8,
      ),
    };

    const result = await fanOutScoringService(scorer).score('text', REQUEST);

    expect(scorer.scoreDimension).toHaveBeenCalledTimes(11);
    expect(result).toEqual(scores(8, { pacing_quality: 6 }));
  });

  it('fails fast and aborts the other requests', async () => {
    const signals: AbortSignal[] = [];
    const scorer: DimensionScorer = {
      scoreDimension: (dimension, _content, _request, signal) => {
        if (signal) signals.push(signal);
        if (dimension === 'coherence') return Promise.reject(new Error('coherence scorer down'));
        return new Promise<number>(() => {});
      },
    };

    await expect(fanOutScoringService(scorer).score('text', REQUEST)).rejects.toThrow(
      'coherence scorer down',
    );
    expect(signals.length).toBeGreaterThan(0);
    expect(signals.every((s) => s.aborted)).toBe(true);
  });

  it('forwards an outer abort to every request', async () => {
    const outer = new AbortController();
    const seen: AbortSignal[] = [];
    const scorer: DimensionScorer = {
      scoreDimension: async (_d, _c, _r, signal) => {
        if (signal) seen.push(signal);
        return 7;
      },
    };

    const pending = fanOutScoringService(scorer).score('text', REQUEST, outer.signal);
    outer.abort(new Error('stop'));
    await pending;

    expect(seen).toHaveLength(11);
    expect(seen.every((s) => s.aborted)).toBe(true);
  });
});
