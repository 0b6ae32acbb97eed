import { describe, it, expect } from 'vitest';
import {
  createStandardSteps,
  draftInstruction,
  outlineInstruction,
  DEFAULT_TITLE,
} from './standard-steps.js';
import type { StandardStepDeps } from './standard-steps.js';
import type { StepDefinition, WorkflowContext } from '../types/workflow.js';
import { DEFAULT_REFINERY_CONFIG } from '../config/schema.js';
import { QualityAssessor } from '../quality/quality-assessor.js';
import { EnhancementLoop } from '../enhancement/enhancement-loop.js';
import { StrategySelector } from '../strategy/strategy-selector.js';
import { REQUEST, countingGeneration, scriptedScoring, uniformVector } from '../__fixtures__/services.js';

function setup(titles: ReadonlyArray<string | undefined> = [], sequence: number[] = [7]) {
  const { service, generate } = countingGeneration(titles);
  const scoring = scriptedScoring(sequence);
  const assessor = new QualityAssessor(scoring);
  const deps: StandardStepDeps = {
    generation: service,
    assessor,
    strategySelector: new StrategySelector(),
    enhancementLoop: new EnhancementLoop(
      { generation: service, assessor },
      { targetQuality: 8, maxPasses: 3, convergenceThreshold: 0.1 },
    ),
  };
  const steps = createStandardSteps(deps, DEFAULT_REFINERY_CONFIG.workflow.steps);
  return { steps, generate, scoring };
}

function named(steps: StepDefinition[], name: string): StepDefinition {
  const step = steps.find((s) => s.name === name);
  if (!step) throw new Error(`missing step ${name}`);
  return step;
}

function context(overrides: Partial<WorkflowContext> = {}): WorkflowContext {
  return { runId: 'run-1', request: REQUEST, strategy: 'outline', ...overrides };
}

const signal = new AbortController().signal;

describe('createStandardSteps', () => {
  it('builds the six steps in order with millisecond timeouts', () => {
    const { steps } = setup();

    expect(steps.map((s) => [s.name, s.stage, s.timeoutMs, s.retryCount, s.required])).toEqual([
      ['requirement_analysis', 'analysis', 10000, 0, true],
      ['strategy_selection', 'strategy_selection', 10000, 1, true],
      ['outline_generation', 'outline_generation', 60000, 2, false],
      ['content_generation', 'content_generation', 120000, 2, true],
      ['quality_assessment', 'quality_assessment', 60000, 2, true],
      ['quality_enhancement', 'enhancement', 240000, 1, true],
    ]);
  });

  it('skips the outline for the direct strategy', async () => {
    const { steps, generate } = setup();

    const outline = await named(steps, 'outline_generation').run(context({ strategy: 'direct' }), signal);

    expect(outline).toBeNull();
    expect(generate).not.toHaveBeenCalled();
  });

  it('generates an outline from empty content', async () => {
    const { steps, generate } = setup();

    const outline = await named(steps, 'outline_generation').run(context(), signal);

    expect(outline).toEqual({ content: '+1' });
    expect(generate).toHaveBeenCalledWith('', outlineInstruction(REQUEST), REQUEST, signal);
  });

  it('drafts from the outline and falls back to the default title', async () => {
    const { steps, generate } = setup();

    const draft = await named(steps, 'content_generation').run(
      context({ outline: { content: 'beats' } }),
      signal,
    );

    expect(draft).toEqual({ content: 'beats+1', title: DEFAULT_TITLE });
    expect(generate).toHaveBeenCalledWith('beats', draftInstruction(REQUEST, true), REQUEST, signal);
  });

  it('keeps a generated title', async () => {
    const { steps } = setup(['The Keeper']);

    const draft = await named(steps, 'content_generation').run(context({ outline: null }), signal);

    expect(draft).toEqual({ content: '+1', title: 'The Keeper' });
  });

  it('assesses the current draft', async () => {
    const { steps, scoring } = setup();

    const quality = await named(steps, 'quality_assessment').run(
      context({ draft: { content: 'story', title: 'Story' } }),
      signal,
    );

    expect(quality).toMatchObject({ overall: 7 });
    expect(scoring.calls).toEqual(['story']);
  });

  it('refuses to assess before a draft exists', async () => {
    const { steps } = setup();

    await expect(named(steps, 'quality_assessment').run(context(), signal)).rejects.toThrow(
      'Workflow produced no draft',
    );
  });

  it('refuses to enhance before a draft exists', async () => {
    const { steps } = setup();

    await expect(named(steps, 'quality_enhancement').run(context(), signal)).rejects.toThrow(
      'Workflow produced no draft',
    );
  });

  it('enhances from the assessed quality without rescoring the draft', async () => {
    const { steps, scoring } = setup([], [8.5]);
    const draft = { content: 'story', title: 'Story' };

    const outcome = await named(steps, 'quality_enhancement').run(
      context({ draft, quality: uniformVector(7) }),
      signal,
    );

    expect(scoring.calls).toEqual(['story+1']);
    expect(outcome).toMatchObject({ content: 'story+1', title: 'Story', stopReason: 'target-achieved' });
  });
});

describe('instructions', () => {
  it('lists the request in an outline instruction', () => {
    expect(outlineInstruction(REQUEST)).toBe(
      [
        'Create a story outline for a mystery story.',
        'Genre: mystery',
        'Target word count: 1200',
        'Theme: trust',
        'Setting: a lighthouse',
        'Sections: opening, rising action, climax, resolution.',
      ].join('\n'),
    );
  });

  it('mentions the outline only when there is one', () => {
    const request = { genre: 'fantasy' as const, targetWordCount: 800, originalGenre: 'epic' };

    expect(draftInstruction(request, false)).toBe(
      [
        'Write a complete epic short story.',
        'Genre: epic',
        'Target word count: 800',
        'Theme: Not specified',
        'Setting: Not specified',
        'Include a title.',
      ].join('\n'),
    );
    expect(draftInstruction(request, true)).toContain('Follow the outline given as the current content.');
  });
});
