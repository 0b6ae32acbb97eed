/**
 * Loads the refinery config from a JSON file.
 *
 * Every key is optional and the schema fills in the rest, so a missing
 * file yields the defaults. Each load returns its own object; adjusting
 * it never touches DEFAULT_REFINERY_CONFIG.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import type { ZodError } from 'zod';
import { RefineryConfigSchema } from './schema.js';
import type { RefineryConfig } from './schema.js';
import { errorMessage } from '../logging/logger.js';

/** Looked up relative to the working directory. */
export const DEFAULT_CONFIG_PATH = 'draft-refinery.json';

interface IssueDetails {
  /** Dotted path of the first rejected key; absent for a bad root value. */
  field?: string;
  /** One `path: message` line per rejected key. */
  issues: readonly string[];
}

export class RefineryConfigError extends Error {
  override name = 'RefineryConfigError' as const;
  readonly field?: string;
  readonly issues: readonly string[];

  constructor(message: string, details: Partial<IssueDetails> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.field = details.field;
    this.issues = details.issues ?? [];
  }
}

function describeIssues(error: ZodError): IssueDetails {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  const first = error.issues[0]?.path.join('.');
  return { field: first ? first : undefined, issues };
}

/** File contents, or null when there is no file. */
async function readConfigText(configPath: string): Promise<string | null> {
  try {
    return await readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Read `configPath` and resolve it against the defaults.
 *
 * @throws {RefineryConfigError} The file is not JSON or a value is out of range
 */
export async function readRefineryConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<RefineryConfig> {
  const text = await readConfigText(configPath);
  if (text === null) {
    return RefineryConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new RefineryConfigError(`Invalid JSON in ${configPath}: ${errorMessage(err)}`, {}, { cause: err });
  }

  const result = RefineryConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = describeIssues(result.error);
    const listing = details.issues.map((line) => `  ${line}`).join('\n');
    throw new RefineryConfigError(`Invalid refinery config in ${configPath}:\n${listing}`, details, {
      cause: result.error,
    });
  }
  return result.data;
}

/** Check an already-parsed value without touching the filesystem. */
export function validateRefineryConfig(
  raw: unknown,
): { valid: true; config: RefineryConfig } | { valid: false; errors: string[] } {
  const result = RefineryConfigSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, config: result.data };
  }
  return { valid: false, errors: [...describeIssues(result.error).issues] };
}
