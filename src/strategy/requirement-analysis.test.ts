import { describe, it, expect } from 'vitest';
import {
  analyzeRequirements,
  settingComplexity,
  themeComplexity,
  wordCountComplexity,
} from './requirement-analysis.js';

describe('wordCountComplexity', () => {
  it.each([
    [100, 0.2],
    [500, 0.2],
    [501, 0.4],
    [1000, 0.4],
    [1500, 0.6],
    [3000, 0.8],
    [5000, 0.9],
    [5001, 1.0],
  ])('maps %i words to %f', (words, expected) => {
    expect(wordCountComplexity(words)).toBe(expected);
  });
});

describe('theme and setting specificity', () => {
  it('scores themes by word count', () => {
    expect(themeComplexity(undefined)).toBe(0.1);
    expect(themeComplexity('loss')).toBe(0.3);
    expect(themeComplexity('loss and hope')).toBe(0.5);
    expect(themeComplexity('the price of keeping promises')).toBe(0.7);
  });

  it('scores settings by word count', () => {
    expect(settingComplexity(undefined)).toBe(0.1);
    expect(settingComplexity('old harbour')).toBe(0.3);
    expect(settingComplexity('a town under the sea')).toBe(0.5);
    expect(settingComplexity('a floating market on a river in winter')).toBe(0.7);
  });
});

describe('analyzeRequirements', () => {
  it('averages the four factors for a short romance', () => {
    const analysis = analyzeRequirements({ genre: 'romance', targetWordCount: 400 });

    // (0.2 + 0.6 + 0.1 + 0.1) / 4
    expect(analysis.complexity).toBeCloseTo(0.25, 10);
    expect(analysis.difficulty).toBe('easy');
    expect(analysis.feasibility).toBeCloseTo(0.85, 10);
    expect(analysis.potentialChallenges).toEqual([]);
    expect(analysis.successPredictors).toEqual([
      'High feasibility',
      'Genre has well-established conventions',
    ]);
  });

  it('flags a long, detailed fantasy as hard', () => {
    const analysis = analyzeRequirements({
      genre: 'fantasy',
      targetWordCount: 6000,
      theme: 'the cost of power over others',
      setting: 'a city built on the back of a sleeping giant',
    });

    // (1.0 + 0.9 + 0.7 + 0.7) / 4 = 0.825
    expect(analysis.complexity).toBeCloseTo(0.825, 10);
    expect(analysis.difficulty).toBe('hard');
    expect(analysis.feasibility).toBeCloseTo(0.735, 10);
    expect(analysis.potentialChallenges).toEqual([
      'High complexity may need several refinement passes',
      'Long target length may strain coherence and pacing',
      'World-building adds generation complexity',
      'A detailed theme needs careful integration',
    ]);
    expect(analysis.successPredictors).toEqual([]);
  });

  it('applies the length penalty above 7000 words', () => {
    const analysis = analyzeRequirements({ genre: 'mystery', targetWordCount: 7500 });

    // complexity (1.0 + 0.7 + 0.1 + 0.1) / 4 = 0.475; 0.9 - 0.095 - 0.1
    expect(analysis.feasibility).toBeCloseTo(0.705, 10);
    expect(analysis.difficulty).toBe('medium');
  });
});
