export const EMOTION_CATEGORIES = ['Negative', 'Neutral', 'Positive'] as const;

export type EmotionCategory = (typeof EMOTION_CATEGORIES)[number];

/** Ordered from most negative to most positive. */
export const CLUSTERS = [
  'strong-negative',
  'weak-negative',
  'negative-leaning-neutral',
  'positive-leaning-neutral',
  'weak-positive',
  'strong-positive',
] as const;

export type Cluster = (typeof CLUSTERS)[number];

export const STRATEGY_NAMES = [
  'average',
  'latest',
  'most_frequent',
  'peak',
  'weighted_average',
  'weighted_cluster',
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

/**
 * Anything totally ordered. Numbers are compared as-is, so seconds since
 * midnight and epoch milliseconds both work; day grouping reads a number as
 * epoch milliseconds.
 */
export type ReadingTime = Date | number;

export interface Reading {
  readonly time: ReadingTime;
  readonly valence: number;
}

export interface ValenceRange {
  min: number;
  max: number;
}

export interface ClassifyOptions {
  /** Inclusive sane range; readings outside it are rejected. */
  valenceRange?: ValenceRange;
}

export type StrategyFn = (readings: readonly Reading[], options?: ClassifyOptions) => EmotionCategory;

export type ClusterTally = Record<Cluster, number>;

export type CategoryTally = Record<EmotionCategory, number>;

export interface DaySummary {
  readingCount: number;
  mean: number;
  median: number;
  /** Sample standard deviation; 0 for a single reading. */
  std: number;
  min: number;
  max: number;
  range: number;
  first: number;
  last: number;
  change: number;
  peakDeviation: number;
  weightedMean: number;
  ratios: {
    negative: number;
    neutral: number;
    positive: number;
  };
}

export interface DailyClassification {
  userId: string;
  date: string; // YYYY-MM-DD
  strategy: StrategyName;
  category: EmotionCategory;
  readingCount: number;
  clusterCounts: ClusterTally;
}
