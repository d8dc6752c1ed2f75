import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  ...(process.stdout.isTTY
    ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
    : {})
});

export type Logger = typeof logger;

/** Config-driven level; an explicit LOG_LEVEL in the environment wins. */
export function applyLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return;
  logger.level = level;
}
