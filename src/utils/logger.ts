import pino from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Build a pino child logger bound to `context`.
 * An explicit `level` wins over LOG_LEVEL.
 */
export function createLogger(context?: Record<string, unknown>, level?: LogLevel): pino.Logger {
  const resolvedLevel = level ?? (process.env.LOG_LEVEL || 'info');
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level: resolvedLevel,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {
          level: resolvedLevel,
        };

  return pino(loggerOptions).child({
    correlationId: generateCorrelationId(),
    ...context,
  });
}
