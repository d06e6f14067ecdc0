import type { Logger } from 'pino';
import type { ReadingSourcePort } from '../../ports/ReadingSourcePort.js';
import type {
  DailyClassification,
  EmotionCategory,
  Reading,
  StrategyName,
  ValenceRange,
} from './types.js';
import { classifyReadings, classifyWithAllStrategies } from './strategies.js';
import { tallyClusters } from './daySummary.js';
import { groupReadingsByDay, toDayKey } from './dayGrouping.js';
import { DEFAULT_VALENCE_RANGE } from './valenceDiscretizer.js';
import { EmptyInputError } from '../../utils/errors.js';
import { createLogger, generateCorrelationId, type LogLevel } from '../../utils/logger.js';

export interface DailyEmotionClassifierOptions {
  strategy: StrategyName;
  timezone: string;
  valenceRange?: ValenceRange;
  logLevel?: LogLevel;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class DailyEmotionClassifier {
  private readonly logger: Logger;
  private readonly valenceRange: ValenceRange;

  constructor(
    private readonly readingSource: ReadingSourcePort,
    private readonly options: DailyEmotionClassifierOptions
  ) {
    this.logger = createLogger({ component: 'DailyEmotionClassifier' }, options.logLevel);
    this.valenceRange = options.valenceRange ?? DEFAULT_VALENCE_RANGE;
  }

  get strategy(): StrategyName {
    return this.options.strategy;
  }

  async classifyDay(userId: string, date: string): Promise<DailyClassification> {
    const logger = this.logger.child({ method: 'classifyDay', userId, date });
    const readings = await this.readingsForDay(userId, date);

    if (readings.length === 0) {
      logger.warn('No readings for day');
      throw new EmptyInputError(`No readings for user ${userId} on ${date}`);
    }

    const result = this.classify(userId, date, readings);
    logger.debug({ category: result.category, readingCount: result.readingCount }, 'Day classified');
    return result;
  }

  /** One result per day that has readings, ascending by date. */
  async classifyRange(userId: string, startDate: string, endDate: string): Promise<DailyClassification[]> {
    assertIsoDate(startDate);
    assertIsoDate(endDate);
    const logger = this.logger.child({
      method: 'classifyRange',
      userId,
      runId: generateCorrelationId(),
    });

    const readings = await this.readingSource.getReadings(userId, startDate, endDate);
    const days = groupReadingsByDay(readings, this.options.timezone);

    const results: DailyClassification[] = [];
    for (const [date, dayReadings] of days) {
      // Sources may return readings that fall outside the range once shifted into our timezone
      if (date < startDate || date > endDate) {
        continue;
      }
      const result = this.classify(userId, date, dayReadings);
      logger.debug({ date, category: result.category }, 'Day classified');
      results.push(result);
    }

    logger.info(
      { strategy: this.options.strategy, readings: readings.length, days: results.length },
      'Range classified'
    );
    return results;
  }

  async compareStrategies(userId: string, date: string): Promise<Record<StrategyName, EmotionCategory>> {
    const readings = await this.readingsForDay(userId, date);
    if (readings.length === 0) {
      this.logger.warn({ method: 'compareStrategies', userId, date }, 'No readings for day');
      throw new EmptyInputError(`No readings for user ${userId} on ${date}`);
    }
    return classifyWithAllStrategies(readings, { valenceRange: this.valenceRange });
  }

  private async readingsForDay(userId: string, date: string): Promise<Reading[]> {
    assertIsoDate(date);
    const readings = await this.readingSource.getReadings(userId, date, date);
    return readings.filter((reading) => toDayKey(reading.time, this.options.timezone) === date);
  }

  private classify(userId: string, date: string, readings: readonly Reading[]): DailyClassification {
    const category = classifyReadings(this.options.strategy, readings, {
      valenceRange: this.valenceRange,
    });
    return {
      userId,
      date,
      strategy: this.options.strategy,
      category,
      readingCount: readings.length,
      clusterCounts: tallyClusters(readings),
    };
  }
}

function assertIsoDate(date: string): void {
  if (!ISO_DATE.test(date)) {
    throw new RangeError(`Expected a YYYY-MM-DD date, got "${date}"`);
  }
}
