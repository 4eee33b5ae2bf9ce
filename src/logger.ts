import { createLogger, format, transports } from 'winston';
import type { Logger } from 'winston';

export type { Logger } from 'winston';

export const LOG_LEVEL_ENV = 'XSD_MODEL_LOG_LEVEL';

/**
 * Creates a console logger writing every level to stderr.
 */
export function createModelLogger(level: string = process.env[LOG_LEVEL_ENV] ?? 'warn'): Logger {
  return createLogger({
    level,
    format: format.combine(
      format.timestamp(),
      format.printf(({ timestamp, level: lvl, message }) => `${String(timestamp)} [${lvl}] ${String(message)}`),
    ),
    transports: [
      new transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      }),
    ],
  });
}

/**
 * Default logger shared by components that are not handed one.
 */
export const logger = createModelLogger();
