import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { displayGenre, normalizeGenre, parseContentRequest } from './request.js';

describe('normalizeGenre', () => {
  it.each([
    ['Mystery', 'mystery'],
    ['Science Fiction', 'science_fiction'],
    ['sci-fi', 'science_fiction'],
    ['detective', 'mystery'],
    ['romantic comedy', 'romance'],
    ['myst', 'mystery'],
    ['space opera', 'literary'],
  ])('maps %s to %s', (input, expected) => {
    expect(normalizeGenre(input)).toBe(expected);
  });
});

describe('parseContentRequest', () => {
  it('normalizes genre and hints and keeps the original wording', () => {
    expect(
      parseContentRequest({
        genre: 'Sci-Fi',
        targetWordCount: 1500,
        theme: '  first contact ',
        setting: '   ',
      }),
    ).toEqual({
      genre: 'science_fiction',
      targetWordCount: 1500,
      theme: 'first contact',
      setting: undefined,
      originalGenre: 'Sci-Fi',
    });
  });

  it('drops the original wording when it is the genre itself', () => {
    const request = parseContentRequest({ genre: ' Mystery ', targetWordCount: 800 });

    expect(request.originalGenre).toBeUndefined();
    expect(displayGenre(request)).toBe('mystery');
  });

  it('shows the original wording for display', () => {
    const request = parseContentRequest({ genre: 'whodunit', targetWordCount: 800 });

    expect(request.genre).toBe('mystery');
    expect(displayGenre(request)).toBe('whodunit');
  });

  it.each([
    [{ genre: '   ', targetWordCount: 800 }],
    [{ genre: 'mystery', targetWordCount: 99 }],
    [{ genre: 'mystery', targetWordCount: 7501 }],
    [{ genre: 'mystery', targetWordCount: 1200.5 }],
    [{ targetWordCount: 1200 }],
  ])('rejects %j', (raw) => {
    expect(() => parseContentRequest(raw)).toThrow(ZodError);
  });
});
