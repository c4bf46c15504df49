/**
 * Configuration type definitions.
 * Covers project and global config with cascade resolution.
 */

/** pino log levels accepted in config. */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** Logging configuration (pino + pino-roll). */
export interface LoggingConfig {
  level: LogLevel;
  /** Log file path, relative to the .todo directory. */
  filePath: string;
  /** Rotate once the file grows past this many bytes. */
  maxFileSize: number;
  /** Rotated files to keep. */
  maxFiles: number;
}

/** Resolved configuration. */
export interface TodoConfig {
  /** Backing file for the task list, relative to the working directory. */
  dataFile: string;
  /** Prompt written before each line is read. */
  prompt: string;
  logging: LoggingConfig;
}
