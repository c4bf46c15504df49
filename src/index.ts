/**
 * todo-repl library entry point.
 * Re-exports the store, the pure operations and the interpreter for embedding and tests.
 */

export * from './types/index.js';
export * from './core/tasks/index.js';
export { TodoError, isTodoError } from './core/errors.js';
export { formatError } from './core/output.js';
export { loadConfig, DEFAULTS as CONFIG_DEFAULTS } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';
export { getLogFilePath, getDataFilePath } from './core/paths.js';
export {
  TaskStore,
  type LoadResult,
  type SaveResult,
  type MutationResult,
  type RenameMutationResult,
} from './store/task-store.js';
export { parseCommand, type Command } from './cli/parser.js';
export { Interpreter, type CommandOutcome, type SessionState } from './cli/interpreter.js';
export { runRepl, type ReplOptions } from './cli/repl.js';
