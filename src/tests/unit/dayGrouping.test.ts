import { describe, it, expect } from 'vitest';
import { groupReadingsByDay, toDayKey } from '../../core/emotion/dayGrouping.js';
import type { Reading } from '../../core/emotion/types.js';

describe('dayGrouping', () => {
  describe('toDayKey', () => {
    it('uses the calendar date in the given timezone', () => {
      const lateEvening = new Date('2024-10-01T16:00:00Z');

      expect(toDayKey(lateEvening, 'UTC')).toBe('2024-10-01');
      expect(toDayKey(lateEvening, 'Asia/Tokyo')).toBe('2024-10-02');
    });

    it('reads numbers as epoch milliseconds', () => {
      expect(toDayKey(Date.UTC(2024, 0, 15, 12), 'UTC')).toBe('2024-01-15');
    });
  });

  describe('groupReadingsByDay', () => {
    it('groups by date in ascending order and keeps input order within a day', () => {
      const second: Reading = { time: new Date('2024-10-02T10:00:00Z'), valence: 7 };
      const first: Reading = { time: new Date('2024-10-01T08:00:00Z'), valence: 3 };
      const secondEarly: Reading = { time: new Date('2024-10-02T01:00:00Z'), valence: 5 };

      const groups = groupReadingsByDay([second, first, secondEarly], 'UTC');

      expect([...groups.keys()]).toEqual(['2024-10-01', '2024-10-02']);
      expect(groups.get('2024-10-01')).toEqual([first]);
      expect(groups.get('2024-10-02')).toEqual([second, secondEarly]);
    });

    it('returns no groups for no readings', () => {
      expect(groupReadingsByDay([], 'UTC').size).toBe(0);
    });
  });
});
