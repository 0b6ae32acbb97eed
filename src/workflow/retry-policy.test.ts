import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy, abortableSleep, backoffDelay } from './retry-policy.js';
import type { AttemptOutcome } from './retry-policy.js';

function scripted<T>(outcomes: AttemptOutcome<T>[]) {
  return vi.fn(async (index: number): Promise<AttemptOutcome<T>> => {
    const outcome = outcomes[Math.min(index, outcomes.length - 1)];
    if (!outcome) throw new Error('no scripted outcome');
    return outcome;
  });
}

const retryable = (message: string, timedOut = false): AttemptOutcome<string> => ({
  kind: 'retryable',
  error: new Error(message),
  timedOut,
});

describe('backoffDelay', () => {
  it('doubles per attempt up to the unit cap', () => {
    expect([0, 1, 2, 3, 4, 5].map((n) => backoffDelay(n, 1000, 10))).toEqual([
      1000, 2000, 4000, 8000, 10000, 10000,
    ]);
  });

  it('never exceeds the longest delay a timer can hold', () => {
    expect(backoffDelay(40, 1000, 2 ** 40)).toBe(2_147_483_647);
  });
});

describe('RetryPolicy', () => {
  it('returns the first success without waiting', async () => {
    const sleep = vi.fn(async () => undefined);
    const policy = new RetryPolicy({ retryCount: 2, backoffUnitMs: 1000, maxBackoffUnits: 10, sleep });

    const result = await policy.run(scripted([{ kind: 'ok', value: 'done' }]));

    expect(result).toEqual({ kind: 'ok', value: 'done', attempts: 1, delaysMs: [] });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('backs off 1 then 2 units before a third attempt succeeds', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const onRetry = vi.fn();
    const policy = new RetryPolicy({
      retryCount: 2,
      backoffUnitMs: 1000,
      maxBackoffUnits: 10,
      sleep,
      onRetry,
    });

    const result = await policy.run(
      scripted([retryable('first'), retryable('second'), { kind: 'ok', value: 'third' }]),
    );

    expect(result).toEqual({ kind: 'ok', value: 'third', attempts: 3, delaysMs: [1000, 2000] });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(onRetry.mock.calls.map(([info]) => [info.attempt, info.delayMs])).toEqual([
      [1, 1000],
      [2, 2000],
    ]);
  });

  it('reports exhaustion with the last error', async () => {
    const policy = new RetryPolicy({
      retryCount: 1,
      backoffUnitMs: 5,
      maxBackoffUnits: 10,
      sleep: async () => undefined,
    });

    const result = await policy.run(scripted([retryable('slow', true), retryable('slower', true)]));

    expect(result.kind).toBe('exhausted');
    expect(result.attempts).toBe(2);
    expect(result.delaysMs).toEqual([5]);
    if (result.kind !== 'exhausted') return;
    expect(result.timedOut).toBe(true);
    expect(result.error).toEqual(new Error('slower'));
  });

  it('stops at a fatal outcome', async () => {
    const attempt = scripted<string>([{ kind: 'fatal', error: new Error('budget') }]);
    const policy = new RetryPolicy({ retryCount: 5, backoffUnitMs: 1, maxBackoffUnits: 10 });

    const result = await policy.run(attempt);

    expect(result.kind).toBe('fatal');
    expect(result.attempts).toBe(1);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('turns an interrupted wait into a fatal result', async () => {
    const stop = new Error('stopped');
    const policy = new RetryPolicy({
      retryCount: 3,
      backoffUnitMs: 1000,
      maxBackoffUnits: 10,
      sleep: async () => {
        throw stop;
      },
    });
    const attempt = scripted([retryable('flaky')]);

    const result = await policy.run(attempt);

    expect(result).toEqual({ kind: 'fatal', error: stop, attempts: 1, delaysMs: [1000] });
    expect(attempt).toHaveBeenCalledTimes(1);
  });
});

describe('abortableSleep', () => {
  it('resolves after the delay', async () => {
    await expect(abortableSleep(1)).resolves.toBeUndefined();
  });

  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = abortableSleep(60_000, controller.signal);

    controller.abort(new Error('budget spent'));

    await expect(pending).rejects.toThrow('budget spent');
  });

  it('rejects at once for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already'));

    await expect(abortableSleep(60_000, controller.signal)).rejects.toThrow('already');
  });
});
