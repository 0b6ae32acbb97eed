/**
 * Bounded retry with exponential backoff.
 *
 * Attempts report their own outcome instead of throwing: `ok` ends the
 * loop, `retryable` waits and tries again while attempts remain, `fatal`
 * ends the loop at once. The wait before retry n (counting from 0) is
 * `min(2^n, maxBackoffUnits) * backoffUnitMs`, never past the timer limit.
 *
 * @module workflow/retry-policy
 */

// ============================================================================
// Types
// ============================================================================

export type AttemptOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'retryable'; error: unknown; timedOut: boolean }
  | { kind: 'fatal'; error: unknown };

interface RetryAccounting {
  attempts: number;
  /** Waits actually scheduled, in order. */
  delaysMs: number[];
}

export type RetryResult<T> =
  | ({ kind: 'ok'; value: T } & RetryAccounting)
  | ({ kind: 'exhausted'; error: unknown; timedOut: boolean } & RetryAccounting)
  | ({ kind: 'fatal'; error: unknown } & RetryAccounting);

/** Resolves after `ms`; rejects with the signal's reason if it aborts first. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicyOptions {
  /** Attempts after the first. */
  retryCount: number;
  backoffUnitMs: number;
  maxBackoffUnits: number;
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

// ============================================================================
// Helpers
// ============================================================================

/** Longest delay `setTimeout` honours; larger values fire almost at once. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function backoffDelay(attempt: number, unitMs: number, maxUnits: number): number {
  return Math.min(Math.min(2 ** attempt, maxUnits) * unitMs, MAX_TIMER_DELAY_MS);
}

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

// ============================================================================
// RetryPolicy
// ============================================================================

export class RetryPolicy {
  private readonly sleep: Sleep;

  constructor(private readonly options: RetryPolicyOptions) {
    this.sleep = options.sleep ?? abortableSleep;
  }

  /**
   * Run `attempt` until it succeeds, fails fatally, or retries run out.
   * An abort of `signal` during a backoff wait ends the loop as fatal
   * with the signal's reason.
   */
  async run<T>(
    attempt: (attemptIndex: number) => Promise<AttemptOutcome<T>>,
    signal?: AbortSignal,
  ): Promise<RetryResult<T>> {
    const { retryCount, backoffUnitMs, maxBackoffUnits } = this.options;
    const delaysMs: number[] = [];

    for (let index = 0; ; index++) {
      const outcome = await attempt(index);
      const attempts = index + 1;

      if (outcome.kind === 'ok') {
        return { kind: 'ok', value: outcome.value, attempts, delaysMs };
      }
      if (outcome.kind === 'fatal') {
        return { kind: 'fatal', error: outcome.error, attempts, delaysMs };
      }
      if (index >= retryCount) {
        return {
          kind: 'exhausted',
          error: outcome.error,
          timedOut: outcome.timedOut,
          attempts,
          delaysMs,
        };
      }

      const delayMs = backoffDelay(index, backoffUnitMs, maxBackoffUnits);
      delaysMs.push(delayMs);
      this.options.onRetry?.({ attempt: attempts, delayMs, error: outcome.error });
      try {
        await this.sleep(delayMs, signal);
      } catch (err) {
        return { kind: 'fatal', error: err, attempts, delaysMs };
      }
    }
  }
}
