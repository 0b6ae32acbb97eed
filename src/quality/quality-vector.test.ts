import { describe, it, expect } from 'vitest';
import {
  DEFAULT_DIMENSION_WEIGHTS,
  computeOverall,
  createQualityVector,
  dimensionDeltas,
  improvementPotential,
  weakestDimensions,
} from './quality-vector.js';
import { QUALITY_DIMENSIONS } from '../types/quality.js';
import { scores, seededRandom } from '../__fixtures__/services.js';

describe('DEFAULT_DIMENSION_WEIGHTS', () => {
  it('totals exactly 1.0', () => {
    const total = QUALITY_DIMENSIONS.reduce((sum, d) => sum + DEFAULT_DIMENSION_WEIGHTS[d], 0);
    expect(total).toBeCloseTo(1.0, 10);
  });
});

describe('createQualityVector', () => {
  it('computes the weighted overall score', () => {
    // 8 everywhere except structure (.12) at 5: 8 - 3 * 0.12 = 7.64
    const quality = createQualityVector(scores(8, { structure: 5 }));

    expect(quality.overall).toBe(7.64);
  });

  it('rounds the overall score to two decimals', () => {
    // 7 + 0.04 * 0.333 = 7.01332
    const quality = createQualityVector(scores(7, { technical_quality: 7.333 }));

    expect(quality.overall).toBe(7.01);
  });

  it('rejects a score above 10', () => {
    expect(() => createQualityVector(scores(7, { pacing_quality: 10.5 }))).toThrow(RangeError);
  });

  it('rejects a negative score', () => {
    expect(() => createQualityVector(scores(7, { originality: -0.1 }))).toThrow(RangeError);
  });

  it('rejects NaN', () => {
    expect(() => createQualityVector(scores(7, { coherence: Number.NaN }))).toThrow(
      /coherence/,
    );
  });

  it('returns a frozen snapshot independent of the input', () => {
    const input = scores(6);
    const quality = createQualityVector(input);
    input.structure = 1;

    expect(quality.dimensions.structure).toBe(6);
    expect(Object.isFrozen(quality)).toBe(true);
    expect(Object.isFrozen(quality.dimensions)).toBe(true);
  });

  it('keeps the supplied timing metadata', () => {
    const quality = createQualityVector(scores(7), {
      assessedAt: '2026-03-01T10:00:00.000Z',
      assessmentMs: 42,
    });

    expect(quality.assessedAt).toBe('2026-03-01T10:00:00.000Z');
    expect(quality.assessmentMs).toBe(42);
  });

  it('keeps every score in [0, 10] under fuzzed input', () => {
    const random = seededRandom(20260101);

    for (let i = 0; i < 500; i++) {
      const raw = scores(0);
      for (const d of QUALITY_DIMENSIONS) raw[d] = random() * 10;
      const quality = createQualityVector(raw);

      expect(quality.overall).toBeGreaterThanOrEqual(0);
      expect(quality.overall).toBeLessThanOrEqual(10);
      for (const d of QUALITY_DIMENSIONS) {
        expect(quality.dimensions[d]).toBeGreaterThanOrEqual(0);
        expect(quality.dimensions[d]).toBeLessThanOrEqual(10);
      }
    }
  });

  it('rejects out-of-range fuzzed input instead of clamping', () => {
    const random = seededRandom(7);

    for (let i = 0; i < 200; i++) {
      const value = random() * 40 - 20;
      const inRange = value >= 0 && value <= 10;
      const build = () => createQualityVector(scores(5, { dialogue_quality: value }));

      if (inRange) {
        expect(build).not.toThrow();
      } else {
        expect(build).toThrow(RangeError);
      }
    }
  });
});

describe('computeOverall', () => {
  it('normalises custom weights that total less than 1', () => {
    const weights = scores(0, { structure: 0.25, dialogue_quality: 0.25 });
    const overall = computeOverall(scores(0, { structure: 6, dialogue_quality: 8 }), weights);

    expect(overall).toBe(7);
  });

  it('rejects all-zero weights', () => {
    expect(() => computeOverall(scores(5), scores(0))).toThrow(RangeError);
  });
});

describe('weakestDimensions', () => {
  it('lists dimensions strictly below the threshold in canonical order', () => {
    const quality = createQualityVector(
      scores(8, { dialogue_quality: 6.5, structure: 5, pacing_quality: 7 }),
    );

    expect(weakestDimensions(quality, 7)).toEqual(['structure', 'dialogue_quality']);
  });

  it('is empty when nothing is weak', () => {
    expect(weakestDimensions(createQualityVector(scores(9)), 7)).toEqual([]);
  });
});

describe('improvementPotential', () => {
  it('clamps dimensions already at or above the target to 0', () => {
    const quality = createQualityVector(scores(8, { setting_immersion: 6.5, originality: 9 }));
    const potential = improvementPotential(quality, 8);

    expect(potential.setting_immersion).toBe(1.5);
    expect(potential.originality).toBe(0);
    expect(potential.structure).toBe(0);
  });
});

describe('dimensionDeltas', () => {
  it('subtracts before from after per dimension', () => {
    const before = createQualityVector(scores(6));
    const after = createQualityVector(scores(6, { emotional_impact: 7.2, coherence: 5.9 }));
    const deltas = dimensionDeltas(before, after);

    expect(deltas.emotional_impact).toBe(1.2);
    expect(deltas.coherence).toBe(-0.1);
    expect(deltas.structure).toBe(0);
  });
});
