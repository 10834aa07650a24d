import { pino } from 'pino';
import type { Logger } from 'pino';
import { config, isDevelopment } from '../config/app.js';

export type { Logger };

export const loggerOptions = {
  level: config.LOG_LEVEL,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      }
    : undefined
};

export const logger: Logger = pino({ name: config.PROJECT_NAME, ...loggerOptions });

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
