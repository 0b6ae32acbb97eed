export {
  analyzeRequirements,
  wordCountComplexity,
  themeComplexity,
  settingComplexity,
  GENRE_COMPLEXITY,
} from './requirement-analysis.js';
export { StrategySelector } from './strategy-selector.js';
export type { StrategySelectorOptions } from './strategy-selector.js';
export {
  InMemoryPerformanceStore,
  PerformanceRecordSchema,
  computeHistoricalBonus,
  computeStatistics,
  MIN_HISTORICAL_BONUS,
  MAX_HISTORICAL_BONUS,
} from './performance-store.js';
export type {
  PerformanceHistoryStore,
  PerformanceOutcome,
  PerformanceStoreOptions,
} from './performance-store.js';
export { JsonlPerformanceStore } from './jsonl-performance-store.js';
