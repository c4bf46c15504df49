export type { Task, TaskRecord, TaskFile } from './task.js';
export type { TodoConfig, LoggingConfig, LogLevel } from './config.js';
export { ExitCode, getExitCodeName } from './exit-codes.js';
