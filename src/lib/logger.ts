import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

function resolveLevel() {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest) return 'silent';
  return isProduction ? 'info' : 'debug';
}

const logger = pino({
  level: resolveLevel(),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true }
        }
      })
});

/**
 * Creates a child logger scoped to one pipeline run.
 */
export function createRunLogger(runId: string, extra?: Record<string, unknown>) {
  return logger.child({ runId, ...extra });
}

export type Logger = pino.Logger;

export default logger;
