/**
 * Scoped, level-filtered line logger.
 *
 * Lines go to stderr as `[scope] LEVEL message`. Child loggers share the
 * parent's sink and level under a `parent:child` scope.
 *
 * @module logging/logger
 */

import pc from 'picocolors';
import type { LogLevel } from '../config/schema.js';

export type { LogLevel };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Same sink and level under a nested scope (`parent:child`). */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level written (default: info). */
  level?: LogLevel;
  /** Line sink (default: process.stderr). Receives a trailing newline. */
  write?: (line: string) => void;
  /** Color the level tag (default: picocolors' own TTY detection). */
  color?: boolean;
}

type EmitLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function writeStderr(line: string): void {
  process.stderr.write(line);
}

/**
 * Create a logger for one component.
 *
 * @example
 * ```ts
 * const log = createLogger('workflow-runner', { level: 'debug' });
 * log.info('step content_generation completed');
 * // [workflow-runner] INFO step content_generation completed
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const write = options.write ?? writeStderr;
  const colors = options.color === undefined ? pc : pc.createColors(options.color);

  const tag: Record<EmitLevel, string> = {
    debug: colors.dim('DEBUG'),
    info: colors.cyan('INFO'),
    warn: colors.yellow('WARN'),
    error: colors.red('ERROR'),
  };

  const emit = (at: EmitLevel, message: string): void => {
    if (LEVEL_RANK[at] < LEVEL_RANK[level]) return;
    write(`[${scope}] ${tag[at]} ${message}\n`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    child: (name) => createLogger(`${scope}:${name}`, options),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' });

/** Message text of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
