import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      strategy: 'most_frequent',
      timezone: 'UTC',
      logLevel: 'info',
      valenceMin: 0,
      valenceMax: 10,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      EMOTION_STRATEGY: 'latest',
      TIMEZONE: 'Asia/Tokyo',
      LOG_LEVEL: 'debug',
      VALENCE_MIN: '1',
      VALENCE_MAX: '9',
    });

    expect(config).toEqual({
      strategy: 'latest',
      timezone: 'Asia/Tokyo',
      logLevel: 'debug',
      valenceMin: 1,
      valenceMax: 9,
    });
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ EMOTION_STRATEGY: '', TIMEZONE: '' }).strategy).toBe('most_frequent');
  });

  it('accepts strategy identifiers in any case or with hyphens', () => {
    expect(loadConfig({ EMOTION_STRATEGY: 'most-frequent' }).strategy).toBe('most_frequent');
    expect(loadConfig({ EMOTION_STRATEGY: 'Weighted-Average' }).strategy).toBe('weighted_average');
  });

  it('rejects an unknown strategy', () => {
    expect(() => loadConfig({ EMOTION_STRATEGY: 'median' })).toThrow(ConfigError);
    expect(() => loadConfig({ EMOTION_STRATEGY: 'median' })).toThrow(
      'strategy: Unknown classification strategy: median'
    );
  });

  it('rejects an unknown timezone', () => {
    expect(() => loadConfig({ TIMEZONE: 'Mars/Olympus_Mons' })).toThrow('timezone: Unknown IANA timezone');
  });

  it('rejects an inverted valence range', () => {
    expect(() => loadConfig({ VALENCE_MIN: '5', VALENCE_MAX: '1' })).toThrow(
      'valenceMin: VALENCE_MIN must not exceed VALENCE_MAX'
    );
  });
});
