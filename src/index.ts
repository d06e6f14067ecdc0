// Load environment variables first
import 'dotenv/config';

import { config as defaultConfig, type Config } from './config/index.js';
import { DailyEmotionClassifier } from './core/emotion/DailyEmotionClassifier.js';
import type { ReadingSourcePort } from './ports/ReadingSourcePort.js';

export { loadConfig, config, type Config } from './config/index.js';
export * from './core/emotion/types.js';
export {
  VALENCE_THRESHOLDS,
  DEFAULT_VALENCE_RANGE,
  CLUSTER_BANDS,
  CLUSTER_CATEGORY,
  clusterOf,
  categoryOf,
  classifyValence,
  assertReadings,
} from './core/emotion/valenceDiscretizer.js';
export {
  TIE_BREAK_PRIORITY,
  CLUSTER_WEIGHTS,
  WEIGHTED_CLUSTER_MARGIN,
  STRATEGIES,
  classifyAverage,
  classifyLatest,
  classifyMostFrequent,
  classifyPeak,
  classifyWeightedAverage,
  classifyWeightedCluster,
  classifyReadings,
  classifyWithAllStrategies,
  isStrategyName,
  resolveStrategy,
} from './core/emotion/strategies.js';
export { NEUTRAL_CENTER, tallyClusters, tallyCategories, summarizeDay } from './core/emotion/daySummary.js';
export { parseReadings, readingSchema, type RawReading } from './core/emotion/readingSchema.js';
export { toDayKey, groupReadingsByDay } from './core/emotion/dayGrouping.js';
export {
  DailyEmotionClassifier,
  type DailyEmotionClassifierOptions,
} from './core/emotion/DailyEmotionClassifier.js';
export type { ReadingSourcePort } from './ports/ReadingSourcePort.js';
export {
  EmotionClassifierError,
  EmptyInputError,
  InvalidValenceError,
  InvalidReadingError,
  UnknownStrategyError,
  ConfigError,
} from './utils/errors.js';

/** Wire a classifier from environment configuration. */
export function createDailyEmotionClassifier(
  readingSource: ReadingSourcePort,
  config: Config = defaultConfig
): DailyEmotionClassifier {
  return new DailyEmotionClassifier(readingSource, {
    strategy: config.strategy,
    timezone: config.timezone,
    valenceRange: { min: config.valenceMin, max: config.valenceMax },
    logLevel: config.logLevel,
  });
}
