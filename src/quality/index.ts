export {
  DEFAULT_DIMENSION_WEIGHTS,
  createQualityVector,
  computeOverall,
  assertScore,
  weakestDimensions,
  improvementPotential,
  dimensionDeltas,
  mapDimensions,
  round2,
} from './quality-vector.js';
export type { QualityVectorInit } from './quality-vector.js';
export { QualityAssessor, fanOutScoringService } from './quality-assessor.js';
export type { QualityAssessorOptions } from './quality-assessor.js';
export { QualityAssessmentFailure } from './errors.js';
export type { QualityAssessmentFailureReason } from './errors.js';
export {
  DIMENSION_LABELS,
  qualityTier,
  buildQualityFeedback,
  strategyEffectiveness,
  mostEffectiveStrategy,
} from './quality-feedback.js';
