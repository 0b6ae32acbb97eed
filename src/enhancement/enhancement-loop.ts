/**
 * Multi-pass enhancement loop.
 *
 * Each iteration checks, in order: target reached, pass budget used,
 * then runs one pass (select strategy, generate, re-assess) and consults
 * the convergence tracker. Service failures are not retried here; they
 * surface as EnhancementPassFailure with the best prior content attached.
 *
 * @module enhancement/enhancement-loop
 */

import type {
  EnhancementOutcome,
  EnhancementPass,
  EnhancementStopReason,
  QualityVector,
} from '../types/quality.js';
import type { ContentRequest } from '../types/request.js';
import type { GenerationResult, GenerationService } from '../types/services.js';
import type { QualityAssessor } from '../quality/quality-assessor.js';
import { dimensionDeltas, round2 } from '../quality/quality-vector.js';
import { errorMessage, silentLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { ConvergenceTracker } from './convergence-tracker.js';
import { EnhancementStrategySelector, focusDimensions } from './enhancement-strategy-selector.js';
import { buildRefinementInstruction } from './refinement-instructions.js';
import { EnhancementPassFailure } from './errors.js';

/** Fixed per-call overhead in the token estimate. */
const TOKEN_OVERHEAD = 500;
const CHARS_PER_TOKEN = 4;

export function estimateTokenCost(before: string, after: string): number {
  return (
    Math.floor(before.length / CHARS_PER_TOKEN) +
    Math.floor(after.length / CHARS_PER_TOKEN) +
    TOKEN_OVERHEAD
  );
}

export interface EnhancementLoopDeps {
  generation: GenerationService;
  assessor: QualityAssessor;
  selector?: EnhancementStrategySelector;
  logger?: Logger;
  now?: () => number;
}

export interface EnhancementLoopSettings {
  targetQuality: number;
  maxPasses: number;
  convergenceThreshold: number;
}

export interface EnhanceOptions {
  /** Quality of `content`, when the caller already assessed it. */
  initialQuality?: QualityVector;
  signal?: AbortSignal;
}

export class EnhancementLoop {
  private readonly selector: EnhancementStrategySelector;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly deps: EnhancementLoopDeps,
    private readonly settings: EnhancementLoopSettings,
  ) {
    this.selector = deps.selector ?? new EnhancementStrategySelector();
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Refine `content` until the target is reached, the pass budget is used
   * or the quality gain converges.
   *
   * @throws {EnhancementPassFailure} When a service call fails mid-pass
   */
  async enhance(
    content: string,
    title: string,
    request: ContentRequest,
    targetQuality: number = this.settings.targetQuality,
    maxPasses: number = this.settings.maxPasses,
    options: EnhanceOptions = {},
  ): Promise<EnhancementOutcome> {
    const { signal } = options;
    const tracker = new ConvergenceTracker(this.settings.convergenceThreshold);
    const passes: EnhancementPass[] = [];

    let currentContent = content;
    let currentTitle = title;
    let current = options.initialQuality ?? (await this.deps.assessor.assess(content, request, signal));
    const initialQuality = current;

    let stopReason: EnhancementStopReason;
    for (;;) {
      if (current.overall >= targetQuality) {
        stopReason = 'target-achieved';
        break;
      }
      if (passes.length >= maxPasses) {
        stopReason = 'budget-exhausted';
        break;
      }
      signal?.throwIfAborted();

      const passNumber = passes.length + 1;
      const strategy = this.selector.selectEnhancementStrategy(current);
      const instruction = buildRefinementInstruction(strategy, current, request);
      const started = this.now();

      let result: GenerationResult;
      let after: QualityVector;
      try {
        result = await this.deps.generation.generate(currentContent, instruction, request, signal);
        after = await this.deps.assessor.assess(result.content, request, signal);
      } catch (err) {
        this.logger.warn(`pass ${passNumber} (${strategy}) failed: ${errorMessage(err)}`);
        throw new EnhancementPassFailure(
          `Enhancement pass ${passNumber} (${strategy}) failed: ${errorMessage(err)}`,
          {
            passNumber,
            strategy,
            bestContent: currentContent,
            bestTitle: currentTitle,
            bestQuality: current,
            passHistory: [...passes],
          },
          { cause: err },
        );
      }

      const delta = round2(after.overall - current.overall);
      passes.push({
        passNumber,
        strategy,
        focusDimensions: focusDimensions(strategy),
        before: current,
        after,
        delta,
        dimensionDeltas: dimensionDeltas(current, after),
        elapsedMs: this.now() - started,
        tokenCost: result.tokensUsed ?? estimateTokenCost(currentContent, result.content),
        instruction,
      });
      tracker.record(delta);
      this.logger.info(
        `pass ${passNumber}/${maxPasses} ${strategy}: ${current.overall.toFixed(2)} -> ${after.overall.toFixed(2)}`,
      );

      // The converging pass stays in the history but its content is not adopted.
      if (tracker.shouldStop()) {
        stopReason = 'converged';
        break;
      }
      currentContent = result.content;
      currentTitle = result.title ?? currentTitle;
      current = after;
    }

    this.logger.debug(`stopped: ${stopReason} after ${passes.length} passes`);
    return {
      content: currentContent,
      title: currentTitle,
      passes,
      initialQuality,
      finalQuality: current,
      convergence: tracker.state(),
      stopReason,
      targetAchieved: current.overall >= targetQuality,
    };
  }
}
