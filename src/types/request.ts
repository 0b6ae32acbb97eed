/**
 * Content request schema.
 *
 * A request names a genre, a target length and optional theme/setting
 * hints. Free-text genres are mapped onto the supported set; the user's
 * wording is kept in `originalGenre` for display.
 */

import { z } from 'zod';

export const GENRES = ['literary', 'mystery', 'science_fiction', 'fantasy', 'romance'] as const;

export type Genre = (typeof GENRES)[number];

/** Common aliases for the supported genres. */
const GENRE_ALIASES: Record<string, Genre> = {
  sci_fi: 'science_fiction',
  scifi: 'science_fiction',
  sf: 'science_fiction',
  science: 'science_fiction',
  detective: 'mystery',
  crime: 'mystery',
  thriller: 'mystery',
  whodunit: 'mystery',
  love: 'romance',
  romantic: 'romance',
  drama: 'literary',
  fiction: 'literary',
  contemporary: 'literary',
  magical: 'fantasy',
  epic: 'fantasy',
  urban_fantasy: 'fantasy',
};

function isGenre(value: string): value is Genre {
  return (GENRES as readonly string[]).includes(value);
}

/**
 * Map free-text genre input onto a supported genre.
 *
 * Exact names and aliases win, then partial alias matches, then partial
 * genre-name matches. Anything unrecognized is treated as literary.
 */
export function normalizeGenre(input: string): Genre {
  const normalized = input.trim().toLowerCase().replace(/[-\s]+/g, '_');

  if (isGenre(normalized)) return normalized;

  const direct = GENRE_ALIASES[normalized];
  if (direct) return direct;

  for (const [alias, genre] of Object.entries(GENRE_ALIASES)) {
    if (alias.includes(normalized) || normalized.includes(alias)) {
      return genre;
    }
  }

  for (const genre of GENRES) {
    if (genre.includes(normalized)) return genre;
  }

  return 'literary';
}

export const MIN_WORD_COUNT = 100;
export const MAX_WORD_COUNT = 7500;

const optionalHint = z
  .string()
  .transform((s) => s.trim())
  .optional()
  .transform((s) => (s ? s : undefined));

/**
 * Raw request as accepted from callers (genre may be any string).
 */
export const ContentRequestSchema = z
  .object({
    genre: z.string().trim().min(1),
    targetWordCount: z.number().int().min(MIN_WORD_COUNT).max(MAX_WORD_COUNT),
    theme: optionalHint,
    setting: optionalHint,
  })
  .transform((raw) => {
    const genre = normalizeGenre(raw.genre);
    const original = raw.genre.trim();
    return {
      genre,
      targetWordCount: raw.targetWordCount,
      theme: raw.theme,
      setting: raw.setting,
      originalGenre: original.toLowerCase() === genre ? undefined : original,
    };
  });

export interface ContentRequest {
  genre: Genre;
  targetWordCount: number;
  theme?: string;
  setting?: string;
  /** User-supplied genre wording when it differs from `genre`. */
  originalGenre?: string;
}

/**
 * Validate and normalize a raw request.
 *
 * @throws {z.ZodError} When the request is malformed
 */
export function parseContentRequest(raw: unknown): ContentRequest {
  return ContentRequestSchema.parse(raw);
}

/** Genre name for display and instructions. */
export function displayGenre(request: ContentRequest): string {
  return request.originalGenre ?? request.genre;
}
