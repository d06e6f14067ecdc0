import {
  EMOTION_CATEGORIES,
  STRATEGY_NAMES,
  type ClassifyOptions,
  type Cluster,
  type EmotionCategory,
  type Reading,
  type StrategyFn,
  type StrategyName,
} from './types.js';
import { assertReadings, classifyValence, clusterOf } from './valenceDiscretizer.js';
import {
  NEUTRAL_CENTER,
  meanValence,
  tallyCategories,
  timeWeightedMean,
} from './daySummary.js';
import { timeOrdinal } from './dayGrouping.js';
import { UnknownStrategyError } from '../../utils/errors.js';

/** Tie-break order for Most Frequent: earlier entries win. */
export const TIE_BREAK_PRIORITY = ['Positive', 'Negative', 'Neutral'] as const satisfies readonly EmotionCategory[];

export const CLUSTER_WEIGHTS: Readonly<Record<Cluster, number>> = {
  'strong-negative': -2.0,
  'weak-negative': -1.0,
  'negative-leaning-neutral': -0.3,
  'positive-leaning-neutral': 0.3,
  'weak-positive': 1.0,
  'strong-positive': 2.0,
};

/** Mean cluster weight must exceed this (in either direction) to leave Neutral. */
export const WEIGHTED_CLUSTER_MARGIN = 0.3;

export function classifyAverage(readings: readonly Reading[], options: ClassifyOptions = {}): EmotionCategory {
  assertReadings(readings, options.valenceRange);
  return classifyValence(meanValence(readings));
}

/**
 * Classify the chronologically last reading. When several readings share the
 * latest time, the one appearing last in the input wins.
 */
export function classifyLatest(readings: readonly Reading[], options: ClassifyOptions = {}): EmotionCategory {
  assertReadings(readings, options.valenceRange);

  let latest = readings[0];
  for (const reading of readings) {
    if (timeOrdinal(reading.time) >= timeOrdinal(latest.time)) {
      latest = reading;
    }
  }
  return classifyValence(latest.valence);
}

export function classifyMostFrequent(
  readings: readonly Reading[],
  options: ClassifyOptions = {}
): EmotionCategory {
  assertReadings(readings, options.valenceRange);

  const tally = tallyCategories(readings);
  const maxCount = Math.max(...EMOTION_CATEGORIES.map((category) => tally[category]));
  for (const category of TIE_BREAK_PRIORITY) {
    if (tally[category] === maxCount) {
      return category;
    }
  }
  throw new Error(`No category reached the maximum count ${maxCount}`);
}

/** Classify the reading furthest from the neutral centre; first one wins ties. */
export function classifyPeak(readings: readonly Reading[], options: ClassifyOptions = {}): EmotionCategory {
  assertReadings(readings, options.valenceRange);

  let peak = readings[0];
  for (const reading of readings) {
    if (Math.abs(reading.valence - NEUTRAL_CENTER) > Math.abs(peak.valence - NEUTRAL_CENTER)) {
      peak = reading;
    }
  }
  return classifyValence(peak.valence);
}

export function classifyWeightedAverage(
  readings: readonly Reading[],
  options: ClassifyOptions = {}
): EmotionCategory {
  assertReadings(readings, options.valenceRange);
  return classifyValence(timeWeightedMean(readings));
}

export function classifyWeightedCluster(
  readings: readonly Reading[],
  options: ClassifyOptions = {}
): EmotionCategory {
  assertReadings(readings, options.valenceRange);

  let score = 0;
  for (const reading of readings) {
    score += CLUSTER_WEIGHTS[clusterOf(reading.valence)];
  }
  const meanScore = score / readings.length;

  if (meanScore > WEIGHTED_CLUSTER_MARGIN) {
    return 'Positive';
  }
  if (meanScore < -WEIGHTED_CLUSTER_MARGIN) {
    return 'Negative';
  }
  return 'Neutral';
}

export const STRATEGIES: Readonly<Record<StrategyName, StrategyFn>> = {
  average: classifyAverage,
  latest: classifyLatest,
  most_frequent: classifyMostFrequent,
  peak: classifyPeak,
  weighted_average: classifyWeightedAverage,
  weighted_cluster: classifyWeightedCluster,
};

export function isStrategyName(value: string): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value);
}

/** Map a configured identifier (case and hyphens tolerated) to a strategy. */
export function resolveStrategy(name: string): StrategyName {
  const normalized = name.trim().toLowerCase().replace(/-/g, '_');
  if (!isStrategyName(normalized)) {
    throw new UnknownStrategyError(name);
  }
  return normalized;
}

export function classifyReadings(
  strategy: StrategyName,
  readings: readonly Reading[],
  options: ClassifyOptions = {}
): EmotionCategory {
  return STRATEGIES[strategy](readings, options);
}

/** Every strategy's verdict for the same day, for side-by-side comparison. */
export function classifyWithAllStrategies(
  readings: readonly Reading[],
  options: ClassifyOptions = {}
): Record<StrategyName, EmotionCategory> {
  return {
    average: classifyAverage(readings, options),
    latest: classifyLatest(readings, options),
    most_frequent: classifyMostFrequent(readings, options),
    peak: classifyPeak(readings, options),
    weighted_average: classifyWeightedAverage(readings, options),
    weighted_cluster: classifyWeightedCluster(readings, options),
  };
}
