import type { Reading, ReadingTime } from './types.js';

export function timeOrdinal(time: ReadingTime): number {
  return time instanceof Date ? time.getTime() : time;
}

/** Calendar date (YYYY-MM-DD) of `time` in `timezone`. Numbers are epoch milliseconds. */
export function toDayKey(time: ReadingTime, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(time instanceof Date ? time : new Date(time));

  const year = parts.find((part) => part.type === 'year')?.value;
  const month = parts.find((part) => part.type === 'month')?.value;
  const day = parts.find((part) => part.type === 'day')?.value;
  return `${year}-${month}-${day}`;
}

/**
 * Split one user's readings into calendar days. Keys come out in ascending
 * date order; each day keeps input order.
 */
export function groupReadingsByDay(readings: readonly Reading[], timezone: string): Map<string, Reading[]> {
  const groups = new Map<string, Reading[]>();
  for (const reading of readings) {
    const key = toDayKey(reading.time, timezone);
    const group = groups.get(key);
    if (group) {
      group.push(reading);
    } else {
      groups.set(key, [reading]);
    }
  }

  return new Map([...groups.entries()].sort(([a], [b]) => a.localeCompare(b)));
}
