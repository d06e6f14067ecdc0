import { describe, it, expect } from 'vitest';
import { parseReadings } from '../../core/emotion/readingSchema.js';
import { InvalidReadingError, InvalidValenceError } from '../../utils/errors.js';

describe('parseReadings', () => {
  it('turns ISO strings into Dates and numeric strings into numbers', () => {
    const [reading] = parseReadings([{ time: '2024-10-01T09:00:00Z', valence: '6.5' }]);

    expect(reading.time).toBeInstanceOf(Date);
    expect(reading.time).toEqual(new Date(Date.UTC(2024, 9, 1, 9)));
    expect(reading.valence).toBe(6.5);
  });

  it('keeps numeric times as numbers', () => {
    expect(parseReadings([{ time: 32400, valence: 8 }])).toEqual([{ time: 32400, valence: 8 }]);
  });

  it('accepts an empty list', () => {
    expect(parseReadings([])).toEqual([]);
  });

  it('rejects a non-numeric valence', () => {
    expect(() => parseReadings([{ time: 1, valence: 'happy' }])).toThrow(InvalidValenceError);
  });

  it('keeps the offending valence on the error', () => {
    let caught: unknown;
    try {
      parseReadings([
        { time: 1, valence: 5 },
        { time: 2, valence: 'happy' },
      ]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidValenceError);
    expect(caught).toMatchObject({ valence: 'happy', code: 'INVALID_VALENCE' });
  });

  it('rejects NaN, blank and missing valence', () => {
    expect(() => parseReadings([{ time: 1, valence: NaN }])).toThrow(InvalidValenceError);
    expect(() => parseReadings([{ time: 1, valence: '  ' }])).toThrow(InvalidValenceError);
    expect(() => parseReadings([{ time: 1 }])).toThrow(InvalidValenceError);
  });

  it('rejects an unparseable time', () => {
    expect(() => parseReadings([{ time: 'not a date', valence: 5 }])).toThrow(InvalidReadingError);
  });

  it('rejects input that is not a list', () => {
    expect(() => parseReadings({ time: 1, valence: 5 })).toThrow(InvalidReadingError);
  });
});
