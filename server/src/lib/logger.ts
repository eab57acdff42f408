import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  base: { service: 'answer-pipeline' },
  redact: {
    paths: ['apiKey', '*.apiKey', 'headers.authorization', 'headers["x-goog-api-key"]', 'headers["x-api-key"]'],
    censor: '[REDACTED]',
  },
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to a specific session.
 */
export function createSessionLogger(
  sessionId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ sessionId, ...extra });
}

export default logger;
