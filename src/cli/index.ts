#!/usr/bin/env node
/**
 * todo CLI entry point.
 *
 * Loads config, starts the file logger, opens the task file in the working
 * directory and runs the interactive loop on stdin/stdout.
 */

import { loadConfig } from '../core/config.js';
import { TodoError, describeError } from '../core/errors.js';
import { closeLogger, getLogger, initLogger } from '../core/logger.js';
import { formatError } from '../core/output.js';
import { getDataFilePath, getLogFilePath } from '../core/paths.js';
import { TaskStore } from '../store/task-store.js';
import { ExitCode } from '../types/exit-codes.js';
import type { TodoConfig } from '../types/config.js';
import { runRepl } from './repl.js';

async function main(): Promise<ExitCode> {
  const cwd = process.cwd();

  let config: TodoConfig;
  try {
    config = await loadConfig(cwd);
  } catch (err) {
    if (err instanceof TodoError) {
      process.stderr.write(`${formatError(err)}\n`);
      return err.code;
    }
    throw err;
  }

  try {
    initLogger(getLogFilePath(config.logging.filePath, cwd), config.logging);
  } catch (err) {
    // Commands still work; getLogger falls back to stderr.
    process.stderr.write(`Warning: file logging disabled: ${describeError(err)}\n`);
  }

  const { store, load } = await TaskStore.open(getDataFilePath(config.dataFile, cwd));
  getLogger('cli').info({ file: store.filePath, load: load.status }, 'Session started');

  return runRepl({
    store,
    load,
    input: process.stdin,
    output: process.stdout,
    prompt: config.prompt,
  });
}

main()
  .then(async (code) => {
    await closeLogger();
    process.exit(code);
  })
  .catch(async (err: unknown) => {
    process.stderr.write(`Fatal: ${describeError(err)}\n`);
    await closeLogger();
    process.exit(ExitCode.GENERAL_ERROR);
  });
