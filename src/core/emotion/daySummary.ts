import {
  CLUSTERS,
  type CategoryTally,
  type ClusterTally,
  type DaySummary,
  type Reading,
} from './types.js';
import { timeOrdinal } from './dayGrouping.js';
import { categoryOf, clusterOf, VALENCE_THRESHOLDS } from './valenceDiscretizer.js';
import { EmptyInputError } from '../../utils/errors.js';

/** Centre of the valence scale that peak deviation is measured from. */
export const NEUTRAL_CENTER = 5.6;

export function meanValence(readings: readonly Reading[]): number {
  let total = 0;
  for (const reading of readings) {
    total += reading.valence;
  }
  return total / readings.length;
}

/**
 * Mean where later readings weigh more: weights run linearly from 0.5 at the
 * earliest time to 1.5 at the latest. Falls back to the plain mean when every
 * reading shares one time.
 */
export function timeWeightedMean(readings: readonly Reading[]): number {
  let earliest = Infinity;
  let latest = -Infinity;
  for (const reading of readings) {
    const time = timeOrdinal(reading.time);
    if (time < earliest) earliest = time;
    if (time > latest) latest = time;
  }
  const span = latest - earliest;
  if (span === 0) {
    return meanValence(readings);
  }

  let weightedTotal = 0;
  let weightTotal = 0;
  for (const reading of readings) {
    const weight = (timeOrdinal(reading.time) - earliest) / span + 0.5;
    weightedTotal += weight * reading.valence;
    weightTotal += weight;
  }
  return weightedTotal / weightTotal;
}

export function emptyClusterTally(): ClusterTally {
  return {
    'strong-negative': 0,
    'weak-negative': 0,
    'negative-leaning-neutral': 0,
    'positive-leaning-neutral': 0,
    'weak-positive': 0,
    'strong-positive': 0,
  };
}

export function tallyClusters(readings: readonly Reading[]): ClusterTally {
  const tally = emptyClusterTally();
  for (const reading of readings) {
    tally[clusterOf(reading.valence)] += 1;
  }
  return tally;
}

export function tallyCategories(readings: readonly Reading[]): CategoryTally {
  const clusters = tallyClusters(readings);
  const tally: CategoryTally = { Negative: 0, Neutral: 0, Positive: 0 };
  for (const cluster of CLUSTERS) {
    tally[categoryOf(cluster)] += clusters[cluster];
  }
  return tally;
}

function median(sorted: readonly number[]): number {
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

/** Descriptive statistics of one day's valences. */
export function summarizeDay(readings: readonly Reading[]): DaySummary {
  if (readings.length === 0) {
    throw new EmptyInputError();
  }

  const count = readings.length;
  const valences = readings.map((reading) => reading.valence);
  const sortedValences = [...valences].sort((a, b) => a - b);
  const chronological = [...readings].sort((a, b) => timeOrdinal(a.time) - timeOrdinal(b.time));
  const mean = meanValence(readings);

  const std =
    count > 1
      ? Math.sqrt(valences.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (count - 1))
      : 0;

  const min = sortedValences[0];
  const max = sortedValences[count - 1];
  const first = chronological[0].valence;
  const last = chronological[count - 1].valence;

  const negative = valences.filter((v) => v <= VALENCE_THRESHOLDS.negativeMax).length;
  const positive = valences.filter((v) => v > VALENCE_THRESHOLDS.neutralMax).length;

  let peakDeviation = 0;
  for (const v of valences) {
    peakDeviation = Math.max(peakDeviation, Math.abs(v - NEUTRAL_CENTER));
  }

  return {
    readingCount: count,
    mean,
    median: median(sortedValences),
    std,
    min,
    max,
    range: max - min,
    first,
    last,
    change: last - first,
    peakDeviation,
    weightedMean: timeWeightedMean(chronological),
    ratios: {
      negative: negative / count,
      neutral: (count - negative - positive) / count,
      positive: positive / count,
    },
  };
}
