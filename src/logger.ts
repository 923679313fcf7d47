/**
 * Library logging
 *
 * @packageDocumentation
 */

import { createLogger, format, transports, type Logger } from 'winston';
import { loadConfigFromEnv } from './config.js';
import type { LogLevel } from './types/config.js';

export type { Logger } from 'winston';

/**
 * Creates a logger writing single timestamped lines to stderr
 *
 * @param level - Minimum level written
 * @param silent - Drop every entry (useful in tests)
 */
export function createMailLogger(level: LogLevel = 'warn', silent: boolean = false): Logger {
  return createLogger({
    level,
    silent,
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} [${level}] gmail-imap-message: ${String(message)}${metaStr}`;
      })
    ),
    transports: [
      new transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] }),
    ],
  });
}

let defaultLogger: Logger | undefined;

/**
 * Logger used when none is passed in; its level comes from GMAIL_LOG_LEVEL
 */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createMailLogger(loadConfigFromEnv().logLevel);
  return defaultLogger;
}

/**
 * Replaces the logger used when none is passed in
 */
export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}
