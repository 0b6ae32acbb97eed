/**
 * External collaborators the pipeline depends on.
 *
 * Both services are opaque: the pipeline never inspects how text is
 * produced or scored. Implementations should honour the abort signal so
 * that step timeouts and the run budget can cancel in-flight calls.
 */

import type { ContentRequest } from './request.js';
import type { DimensionMap, QualityDimension } from './quality.js';

export interface GenerationResult {
  content: string;
  /** Omitted when the service keeps the current title. */
  title?: string;
  /** Tokens consumed, when the service reports them. */
  tokensUsed?: number;
}

/**
 * Produces new content from current content and an instruction.
 * Calls are not idempotent: identical input may yield different output.
 */
export interface GenerationService {
  generate(
    content: string,
    instruction: string,
    request: ContentRequest,
    signal?: AbortSignal,
  ): Promise<GenerationResult>;
}

/**
 * Scores content on every quality dimension (0-10 each). The assessor
 * rejects results that leave a dimension out.
 */
export interface QualityScoringService {
  score(
    content: string,
    request: ContentRequest,
    signal?: AbortSignal,
  ): Promise<Partial<DimensionMap>>;
}

/**
 * Scores a single dimension. Dimensions are independent, so an assessment
 * can fan out one call per dimension.
 */
export interface DimensionScorer {
  scoreDimension(
    dimension: QualityDimension,
    content: string,
    request: ContentRequest,
    signal?: AbortSignal,
  ): Promise<number>;
}
