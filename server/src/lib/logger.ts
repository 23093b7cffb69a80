import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

/**
 * Creates a child logger scoped to a browser session.
 */
export function createSessionLogger(
  sessionId: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ sessionId, ...extra });
}

/** Never log a full credential — keep the last six characters only. */
export function maskCredential(credential: string): string {
  return `...${credential.slice(-6)}`;
}

export default logger;
