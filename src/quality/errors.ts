import type { QualityDimension } from '../types/quality.js';

export type QualityAssessmentFailureReason = 'service-error' | 'out-of-range' | 'missing-dimension';

/**
 * The scoring service failed, or returned a vector that is incomplete or
 * out of range. Assessment never degrades to a partial vector.
 */
export class QualityAssessmentFailure extends Error {
  override name = 'QualityAssessmentFailure' as const;

  constructor(
    message: string,
    public readonly reason: QualityAssessmentFailureReason,
    public readonly dimension?: QualityDimension,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
