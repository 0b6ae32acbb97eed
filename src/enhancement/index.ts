export { ConvergenceTracker, DIMINISHING_RATIO } from './convergence-tracker.js';
export {
  EnhancementStrategySelector,
  DEFAULT_ENHANCEMENT_WEIGHTS,
  DEFAULT_WEAK_THRESHOLD,
  TIE_BREAK_ORDER,
  DIMENSION_STRATEGY,
  focusDimensions,
} from './enhancement-strategy-selector.js';
export type {
  DimensionPriority,
  EnhancementStrategySelectorOptions,
} from './enhancement-strategy-selector.js';
export { buildRefinementInstruction } from './refinement-instructions.js';
export { EnhancementLoop, estimateTokenCost } from './enhancement-loop.js';
export type {
  EnhancementLoopDeps,
  EnhancementLoopSettings,
  EnhanceOptions,
} from './enhancement-loop.js';
export { EnhancementPassFailure } from './errors.js';
export type { EnhancementPassFailureContext } from './errors.js';
export { buildEnhancementInsights } from './enhancement-insights.js';
