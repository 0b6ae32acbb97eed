import { describe, it, expect } from 'vitest';
import { WorkflowRun } from './workflow-run.js';

function clock(start: number) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe('WorkflowRun', () => {
  it('starts with every step remaining', () => {
    const run = new WorkflowRun('run-1', ['a', 'b'], 'direct', () => Date.UTC(2026, 0, 1));

    expect(run.snapshot()).toMatchObject({
      runId: 'run-1',
      stage: 'analysis',
      strategy: 'direct',
      currentStep: null,
      progress: 0,
      completedSteps: [],
      remainingSteps: ['a', 'b'],
      failedSteps: [],
      errorCount: 0,
      lastError: null,
      startTime: '2026-01-01T00:00:00.000Z',
    });
  });

  it('moves steps through current into completed or failed', () => {
    const run = new WorkflowRun('run-1', ['a', 'b', 'c'], 'direct', () => 0);

    run.beginStep('a', 'analysis', 0, 3);
    expect(run.snapshot()).toMatchObject({ currentStep: 'a', remainingSteps: ['b', 'c'] });

    run.completeStep('a');
    run.beginStep('b', 'outline_generation', 1, 3);
    run.failStep('b', 'no outline');

    expect(run.snapshot()).toMatchObject({
      currentStep: null,
      completedSteps: ['a'],
      failedSteps: ['b'],
      remainingSteps: ['c'],
      errorCount: 1,
      lastError: 'no outline',
      progress: 1 / 3,
    });
  });

  it('accumulates elapsed time per stage', () => {
    const time = clock(1000);
    const run = new WorkflowRun('run-1', ['a', 'b'], 'direct', time.now);

    run.beginStep('a', 'analysis', 0, 2);
    time.advance(40);
    run.completeStep('a');
    run.beginStep('b', 'content_generation', 1, 2);
    time.advance(25);
    run.completeStep('b');
    run.finalize();
    time.advance(5);

    expect(run.snapshot().stageTimes).toEqual({
      analysis: 40,
      content_generation: 25,
      finalization: 5,
    });
    expect(run.snapshot().progress).toBe(1);
  });

  it('tracks the strategy in effect', () => {
    const run = new WorkflowRun('run-1', [], 'adaptive', () => 0);

    run.setStrategy('iterative');

    expect(run.snapshot().strategy).toBe('iterative');
  });

  it('hands out frozen copies', () => {
    const run = new WorkflowRun('run-1', ['a'], 'direct', () => 0);
    const before = run.snapshot();

    run.beginStep('a', 'analysis', 0, 1);

    expect(before.remainingSteps).toEqual(['a']);
    expect(Object.isFrozen(before)).toBe(true);
  });
});
