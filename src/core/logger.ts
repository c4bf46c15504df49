/**
 * Process-wide pino logger.
 *
 * Stdout belongs to the interactive prompt, so diagnostics go to a file
 * under .todo/ through a pino-roll transport. pino-roll appends the date and
 * a sequence number, so `logs/todo.log` is written as
 * `logs/todo.log.<yyyy-MM-dd>.<n>`. Until initLogger runs, getLogger hands
 * out children of a warn-level stderr logger.
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

const formatters: LoggerOptions['formatters'] = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

let rootLogger: Logger | null = null;
let fallbackLogger: Logger | null = null;

/**
 * Convert bytes to the size string pino-roll accepts ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  const units: Array<[suffix: string, size: number]> = [
    ['g', 1024 ** 3],
    ['m', 1024 ** 2],
    ['k', 1024],
  ];
  for (const [suffix, size] of units) {
    if (bytes >= size) return `${Math.floor(bytes / size)}${suffix}`;
  }
  return `${bytes}`;
}

/**
 * Start file logging. Call once at startup, after config is loaded.
 *
 * @param logFile - Absolute base path of the log file (see getLogFilePath)
 */
export function initLogger(logFile: string, config: LoggingConfig): Logger {
  // The transport runs in a worker; create the directory here so a bad
  // path throws to the caller.
  mkdirSync(dirname(logFile), { recursive: true });

  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: logFile,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      limit: { count: config.maxFiles, removeOtherLogFiles: true },
    },
  });

  rootLogger = pino(
    { level: config.level, formatters, timestamp: pino.stdTimeFunctions.isoTime },
    transport,
  );
  return rootLogger;
}

/** Child logger bound to a subsystem name. */
export function getLogger(subsystem: string): Logger {
  if (rootLogger) return rootLogger.child({ subsystem });
  fallbackLogger ??= pino({ level: 'warn', formatters }, pino.destination(2));
  return fallbackLogger.child({ subsystem });
}

/**
 * Flush pending records to the log file and detach the file logger.
 * Later getLogger calls use the stderr fallback again.
 */
export async function closeLogger(): Promise<void> {
  const logger = rootLogger;
  rootLogger = null;
  if (!logger) return;
  await new Promise<void>((resolve, reject) => {
    logger.flush((err) => (err ? reject(err) : resolve()));
  });
}
