/**
 * Refinery config module barrel exports.
 *
 * @module config
 */

export {
  RefineryConfigSchema,
  DEFAULT_REFINERY_CONFIG,
  DEFAULT_STEP_SETTINGS,
  STANDARD_STEP_NAMES,
  LOG_LEVELS,
  MAX_TIMER_SECONDS,
} from './schema.js';
export type {
  RefineryConfig,
  QualityConfig,
  WorkflowConfig,
  StrategyConfig,
  StepSettings,
  StandardStepName,
  LogLevel,
} from './schema.js';

export {
  readRefineryConfig,
  validateRefineryConfig,
  RefineryConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
