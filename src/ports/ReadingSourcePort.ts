import type { Reading } from '../core/emotion/types.js';

export interface ReadingSourcePort {
  /**
   * All readings recorded by `userId` between the two ISO dates (inclusive).
   * Order is not guaranteed.
   */
  getReadings(userId: string, startDate: string, endDate: string): Promise<Reading[]>;
}
