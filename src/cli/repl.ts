/**
 * Read-eval-print loop over a pair of streams.
 *
 * Writes the prompt, reads one line, hands it to the interpreter and prints
 * what comes back. A line is fully handled (file write included) before the
 * next one is read. Ends on the quit command or end of input.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import { getLogger } from '../core/logger.js';
import { DEFAULTS } from '../core/config.js';
import { ExitCode } from '../types/exit-codes.js';
import type { LoadResult, TaskStore } from '../store/task-store.js';
import { Interpreter, type CommandOutcome } from './interpreter.js';

export interface ReplOptions {
  store: TaskStore;
  /** Result of the startup load, reported before the first prompt. */
  load: LoadResult;
  input: Readable;
  output: Writable;
  /** Default: DEFAULTS.prompt. */
  prompt?: string;
  logger?: Logger;
}

/**
 * Run the loop until quit or end of input.
 * Resolves with the process exit code.
 */
export async function runRepl(options: ReplOptions): Promise<ExitCode> {
  const { store, load, input, output } = options;
  const prompt = options.prompt ?? DEFAULTS.prompt;
  const log = options.logger ?? getLogger('repl');
  const interpreter = new Interpreter(store, { logger: log });

  const print = (outcome: CommandOutcome): void => {
    for (const block of outcome.output) {
      output.write(`${block}\n`);
    }
  };

  print(interpreter.start(load));

  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
  try {
    output.write(prompt);
    for await (const line of rl) {
      const outcome = await interpreter.handleLine(line);
      print(outcome);
      if (outcome.state === 'terminated') break;
      output.write(prompt);
    }
  } finally {
    rl.close();
  }

  if (interpreter.getState() === 'running') {
    log.info('End of input');
    interpreter.terminate();
  }
  return ExitCode.SUCCESS;
}
