/**
 * The six steps of the refinement pipeline, built from config.
 *
 * Timeouts in config are seconds; steps carry milliseconds.
 *
 * @module workflow/standard-steps
 */

import type { ContentRequest } from '../types/request.js';
import { displayGenre } from '../types/request.js';
import type { GenerationService } from '../types/services.js';
import type { Draft, StageStep, StepDefinition, StepStage, WorkflowContext } from '../types/workflow.js';
import type { StandardStepName, StepSettings, WorkflowConfig } from '../config/schema.js';
import type { QualityAssessor } from '../quality/quality-assessor.js';
import type { EnhancementLoop } from '../enhancement/enhancement-loop.js';
import type { StrategySelector } from '../strategy/strategy-selector.js';
import { analyzeRequirements } from '../strategy/requirement-analysis.js';
import { WorkflowIncompleteError } from './errors.js';

/** Title used when generation returns none. */
export const DEFAULT_TITLE = 'Untitled Story';

export interface StandardStepDeps {
  generation: GenerationService;
  assessor: QualityAssessor;
  strategySelector: StrategySelector;
  enhancementLoop: EnhancementLoop;
}

// ============================================================================
// Instructions
// ============================================================================

function requirementLines(request: ContentRequest): string[] {
  return [
    `Genre: ${displayGenre(request)}`,
    `Target word count: ${request.targetWordCount}`,
    `Theme: ${request.theme ?? 'Not specified'}`,
    `Setting: ${request.setting ?? 'Not specified'}`,
  ];
}

export function outlineInstruction(request: ContentRequest): string {
  return [
    `Create a story outline for a ${displayGenre(request)} story.`,
    ...requirementLines(request),
    'Sections: opening, rising action, climax, resolution.',
  ].join('\n');
}

export function draftInstruction(request: ContentRequest, hasOutline: boolean): string {
  const lines = [`Write a complete ${displayGenre(request)} short story.`, ...requirementLines(request)];
  if (hasOutline) {
    lines.push('Follow the outline given as the current content.');
  }
  lines.push('Include a title.');
  return lines.join('\n');
}

function requireDraft(ctx: Readonly<WorkflowContext>): Draft {
  if (!ctx.draft) {
    throw new WorkflowIncompleteError(['draft']);
  }
  return ctx.draft;
}

// ============================================================================
// Factory
// ============================================================================

function step<S extends StepStage>(
  stage: S,
  name: StandardStepName,
  settings: StepSettings,
  run: StageStep<S>['run'],
): StageStep<S> {
  return {
    stage,
    name,
    timeoutMs: settings.timeout * 1000,
    retryCount: settings.retry_count,
    required: settings.required,
    run,
  };
}

/**
 * Build the standard steps in execution order.
 *
 * The outline step yields null under the direct strategy. The enhancement
 * step reuses the assessed quality instead of scoring the draft again.
 */
export function createStandardSteps(
  deps: StandardStepDeps,
  settings: WorkflowConfig['steps'],
): StepDefinition[] {
  return [
    step('analysis', 'requirement_analysis', settings.requirement_analysis, async (ctx) =>
      analyzeRequirements(ctx.request),
    ),
    step('strategy_selection', 'strategy_selection', settings.strategy_selection, (ctx) =>
      deps.strategySelector.selectStrategy(ctx.request, ctx.analysis),
    ),
    step('outline_generation', 'outline_generation', settings.outline_generation, async (ctx, signal) => {
      if (ctx.strategy === 'direct') return null;
      const result = await deps.generation.generate(
        '',
        outlineInstruction(ctx.request),
        ctx.request,
        signal,
      );
      return { content: result.content };
    }),
    step('content_generation', 'content_generation', settings.content_generation, async (ctx, signal) => {
      const outline = ctx.outline?.content ?? '';
      const result = await deps.generation.generate(
        outline,
        draftInstruction(ctx.request, outline !== ''),
        ctx.request,
        signal,
      );
      return { content: result.content, title: result.title ?? DEFAULT_TITLE };
    }),
    step('quality_assessment', 'quality_assessment', settings.quality_assessment, async (ctx, signal) =>
      deps.assessor.assess(requireDraft(ctx).content, ctx.request, signal),
    ),
    step('enhancement', 'quality_enhancement', settings.quality_enhancement, async (ctx, signal) => {
      const draft = requireDraft(ctx);
      return deps.enhancementLoop.enhance(draft.content, draft.title, ctx.request, undefined, undefined, {
        initialQuality: ctx.quality,
        signal,
      });
    }),
  ];
}
