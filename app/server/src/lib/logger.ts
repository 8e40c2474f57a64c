import pino from 'pino';
import type { Logger } from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger: Logger = pino({
  level,
  transport:
    level !== 'silent' && process.stdout.isTTY
      ? {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
