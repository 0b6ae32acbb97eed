/**
 * Quality assessment against the scoring service.
 *
 * The assessor validates every result before building a vector: each of
 * the eleven dimensions must be present and within [0, 10]. Values are
 * never clamped.
 *
 * @module quality/quality-assessor
 */

import { QUALITY_DIMENSIONS } from '../types/quality.js';
import type { DimensionMap, QualityVector } from '../types/quality.js';
import type { ContentRequest } from '../types/request.js';
import type { DimensionScorer, QualityScoringService } from '../types/services.js';
import { errorMessage } from '../logging/logger.js';
import { createQualityVector, mapDimensions } from './quality-vector.js';
import { QualityAssessmentFailure } from './errors.js';

export interface QualityAssessorOptions {
  /** Overall-score weights (default: DEFAULT_DIMENSION_WEIGHTS). */
  weights?: Readonly<DimensionMap>;
  now?: () => number;
}

export class QualityAssessor {
  private readonly weights?: Readonly<DimensionMap>;
  private readonly now: () => number;

  constructor(
    private readonly service: QualityScoringService,
    options: QualityAssessorOptions = {},
  ) {
    this.weights = options.weights;
    this.now = options.now ?? Date.now;
  }

  /**
   * Score `content` on every dimension.
   *
   * @throws {QualityAssessmentFailure} On service error, a missing
   *   dimension, or an out-of-range value
   */
  async assess(
    content: string,
    request: ContentRequest,
    signal?: AbortSignal,
  ): Promise<QualityVector> {
    const started = this.now();

    let raw: Partial<DimensionMap>;
    try {
      raw = await this.service.score(content, request, signal);
    } catch (err) {
      throw new QualityAssessmentFailure(
        `Quality scoring failed: ${errorMessage(err)}`,
        'service-error',
        undefined,
        { cause: err },
      );
    }

    const scores = validateScores(raw);
    return createQualityVector(scores, {
      weights: this.weights,
      assessmentMs: this.now() - started,
    });
  }
}

function validateScores(raw: Partial<DimensionMap>): DimensionMap {
  for (const dimension of QUALITY_DIMENSIONS) {
    const score = raw[dimension];
    if (score === undefined) {
      throw new QualityAssessmentFailure(
        `Scoring service returned no score for ${dimension}`,
        'missing-dimension',
        dimension,
      );
    }
    if (typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 10) {
      throw new QualityAssessmentFailure(
        `Scoring service returned ${String(score)} for ${dimension}, outside [0, 10]`,
        'out-of-range',
        dimension,
      );
    }
  }
  return mapDimensions((d) => raw[d] ?? 0);
}

/**
 * Adapt a per-dimension scorer into a scoring service.
 *
 * All dimensions are scored concurrently. The first rejection fails the
 * whole call and aborts the remaining requests.
 */
export function fanOutScoringService(scorer: DimensionScorer): QualityScoringService {
  return {
    async score(content, request, signal) {
      const controller = new AbortController();
      const forward = () => controller.abort(signal?.reason);
      if (signal?.aborted) forward();
      signal?.addEventListener('abort', forward, { once: true });

      try {
        const scores = await Promise.all(
          QUALITY_DIMENSIONS.map(async (dimension) => {
            try {
              return await scorer.scoreDimension(dimension, content, request, controller.signal);
            } catch (err) {
              controller.abort(err);
              throw err;
            }
          }),
        );
        return mapDimensions((d) => scores[QUALITY_DIMENSIONS.indexOf(d)] ?? Number.NaN);
      } finally {
        signal?.removeEventListener('abort', forward);
      }
    },
  };
}
