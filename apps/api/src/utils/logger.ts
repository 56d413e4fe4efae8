import pino from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

export const logger = pino({
  level: resolveLevel(),
  // Only pretty-print in development
  ...(nodeEnv === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'HH:MM:ss UTC',
      },
    },
  }),
});

/**
 * Create a logger with a specific namespace
 */
export function createLogger(namespace: string) {
  return logger.child({ namespace });
}
