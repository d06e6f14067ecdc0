import type { Cluster, EmotionCategory, Reading, ValenceRange } from './types.js';
import { EmptyInputError, InvalidReadingError, InvalidValenceError } from '../../utils/errors.js';
import { timeOrdinal } from './dayGrouping.js';

/** Upper bounds (inclusive) of the Negative and Neutral categories. */
export const VALENCE_THRESHOLDS = {
  negativeMax: 4.5,
  neutralMax: 6.0,
} as const;

export const DEFAULT_VALENCE_RANGE: Readonly<ValenceRange> = { min: 0, max: 10 };

interface ClusterBand {
  cluster: Cluster;
  upperBound: number; // inclusive
}

export const CLUSTER_BANDS: readonly ClusterBand[] = [
  { cluster: 'strong-negative', upperBound: 3.5 },
  { cluster: 'weak-negative', upperBound: VALENCE_THRESHOLDS.negativeMax },
  { cluster: 'negative-leaning-neutral', upperBound: 5.2 },
  { cluster: 'positive-leaning-neutral', upperBound: VALENCE_THRESHOLDS.neutralMax },
  { cluster: 'weak-positive', upperBound: 7.6 },
  { cluster: 'strong-positive', upperBound: Infinity },
];

export const CLUSTER_CATEGORY: Readonly<Record<Cluster, EmotionCategory>> = {
  'strong-negative': 'Negative',
  'weak-negative': 'Negative',
  'negative-leaning-neutral': 'Neutral',
  'positive-leaning-neutral': 'Neutral',
  'weak-positive': 'Positive',
  'strong-positive': 'Positive',
};

export function clusterOf(valence: number): Cluster {
  if (Number.isNaN(valence)) {
    throw new InvalidValenceError(valence, 'Valence must be a number, got NaN');
  }
  for (const band of CLUSTER_BANDS) {
    if (valence <= band.upperBound) {
      return band.cluster;
    }
  }
  // Unreachable: the last band is unbounded
  return 'strong-positive';
}

export function categoryOf(cluster: Cluster): EmotionCategory {
  return CLUSTER_CATEGORY[cluster];
}

/** Two-threshold classifier shared by the value-based strategies. */
export function classifyValence(valence: number): EmotionCategory {
  if (Number.isNaN(valence)) {
    throw new InvalidValenceError(valence, 'Valence must be a number, got NaN');
  }
  if (valence <= VALENCE_THRESHOLDS.negativeMax) {
    return 'Negative';
  }
  if (valence <= VALENCE_THRESHOLDS.neutralMax) {
    return 'Neutral';
  }
  return 'Positive';
}

/**
 * Reject an empty day, any reading whose time is not a finite ordinal, and any
 * reading whose valence is not a finite number inside `range`.
 */
export function assertReadings(
  readings: readonly Reading[],
  range: ValenceRange = DEFAULT_VALENCE_RANGE
): void {
  if (readings.length === 0) {
    throw new EmptyInputError();
  }
  for (const reading of readings) {
    if (!Number.isFinite(timeOrdinal(reading.time))) {
      throw new InvalidReadingError(`Reading time must be a valid date or finite number, got ${String(reading.time)}`);
    }
    const { valence } = reading;
    if (typeof valence !== 'number' || !Number.isFinite(valence)) {
      throw new InvalidValenceError(valence, `Valence must be a finite number, got ${String(valence)}`);
    }
    if (valence < range.min || valence > range.max) {
      throw new InvalidValenceError(
        valence,
        `Valence ${valence} is outside the accepted range [${range.min}, ${range.max}]`
      );
    }
  }
}
