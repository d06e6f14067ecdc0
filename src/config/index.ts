import { z } from 'zod';
import { resolveStrategy } from '../core/emotion/strategies.js';
import { LOG_LEVELS } from '../utils/logger.js';
import { ConfigError, UnknownStrategyError } from '../utils/errors.js';

const configSchema = z
  .object({
    strategy: z
      .string()
      .default('most_frequent')
      .transform((value, ctx) => {
        try {
          return resolveStrategy(value);
        } catch (error) {
          if (error instanceof UnknownStrategyError) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
            return z.NEVER;
          }
          throw error;
        }
      }),
    timezone: z
      .string()
      .default('UTC')
      .refine(isValidTimezone, { message: 'Unknown IANA timezone' }),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    // Sane valence range; readings outside it are treated as corrupt
    valenceMin: z.coerce.number().finite().default(0),
    valenceMax: z.coerce.number().finite().default(10),
  })
  .refine((value) => value.valenceMin <= value.valenceMax, {
    message: 'VALENCE_MIN must not exceed VALENCE_MAX',
    path: ['valenceMin'],
  });

export type Config = z.infer<typeof configSchema>;

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    strategy: env('EMOTION_STRATEGY'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
    valenceMin: env('VALENCE_MIN'),
    valenceMax: env('VALENCE_MAX'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export const config = loadConfig();
