/**
 * Path resolution for project and global todo-repl files.
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/** Name of the per-project and per-user data directory. */
export const TODO_DIR_NAME = '.todo';

/** Name of the config file inside a .todo directory. */
export const CONFIG_FILE_NAME = 'config.json';

/**
 * Absolute path to the project .todo directory.
 */
export function getTodoDir(cwd: string = process.cwd()): string {
  return join(resolve(cwd), TODO_DIR_NAME);
}

/**
 * Absolute path to the global .todo directory (~/.todo).
 */
export function getGlobalTodoDir(home: string = homedir()): string {
  return join(home, TODO_DIR_NAME);
}

/** Project config file path. */
export function getConfigPath(cwd?: string): string {
  return join(getTodoDir(cwd), CONFIG_FILE_NAME);
}

/**
 * Base path of the log file. Relative paths are taken from the project
 * .todo directory.
 */
export function getLogFilePath(filePath: string, cwd?: string): string {
  return resolve(getTodoDir(cwd), filePath);
}

/** Global config file path. */
export function getGlobalConfigPath(home?: string): string {
  return join(getGlobalTodoDir(home), CONFIG_FILE_NAME);
}

/**
 * Resolve the backing file for the task list.
 * Relative paths are taken from the working directory.
 */
export function getDataFilePath(dataFile: string, cwd: string = process.cwd()): string {
  return resolve(cwd, dataFile);
}
