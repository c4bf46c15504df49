/**
 * Command interpreter.
 *
 * Turns one input line into store calls and rendered output. It never
 * prints: every call returns the text to show and whether the session is
 * still running, and the REPL driver does the I/O.
 */

import type { Logger } from 'pino';
import { TodoError } from '../core/errors.js';
import { formatError } from '../core/output.js';
import { getLogger } from '../core/logger.js';
import type { LoadResult, MutationResult, TaskStore } from '../store/task-store.js';
import { parseCommand, type Command } from './parser.js';
import { renderHelp, renderRename, renderTaskList } from './renderers/index.js';

/** The interpreter's two states. */
export type SessionState = 'running' | 'terminated';

/** What one line produced. */
export interface CommandOutcome {
  /** Text blocks to print, each followed by a newline. */
  output: string[];
  state: SessionState;
}

export class Interpreter {
  private readonly store: TaskStore;
  private readonly log: Logger;
  private state: SessionState = 'running';

  constructor(store: TaskStore, options?: { logger?: Logger }) {
    this.store = store;
    this.log = options?.logger ?? getLogger('cli');
  }

  /** Current state. Once terminated, further lines are ignored. */
  getState(): SessionState {
    return this.state;
  }

  /**
   * Output shown before the first prompt: the load error, if any,
   * then the current list.
   */
  start(load: LoadResult): CommandOutcome {
    const output: string[] = [];
    if (load.status === 'failed') {
      output.push(formatError(load.error));
    }
    output.push(renderTaskList(this.store.list()));
    return { output, state: this.state };
  }

  /**
   * Handle one line of input.
   */
  async handleLine(line: string): Promise<CommandOutcome> {
    if (this.state === 'terminated') {
      return { output: [], state: this.state };
    }

    try {
      const command = parseCommand(line);
      if (command === null) {
        return { output: [], state: this.state };
      }
      return await this.execute(command);
    } catch (err) {
      if (err instanceof TodoError) {
        this.log.debug({ line, code: err.code }, err.message);
        return { output: [formatError(err)], state: this.state };
      }
      throw err;
    }
  }

  /** End the session, as on end of input. */
  terminate(): CommandOutcome {
    this.state = 'terminated';
    return { output: [], state: this.state };
  }

  /**
   * Run a parsed command. Store bounds errors propagate as TodoError.
   */
  async execute(command: Command): Promise<CommandOutcome> {
    switch (command.action) {
      case 'add':
        return this.mutated(await this.store.add(command.description));
      case 'list':
        return { output: [renderTaskList(this.store.list())], state: this.state };
      case 'toggle':
        return this.mutated(await this.store.toggle(command.index));
      case 'remove':
        return this.mutated(await this.store.remove(command.index));
      case 'moveUp':
        return this.mutated(await this.store.moveUp(command.index));
      case 'moveDown':
        return this.mutated(await this.store.moveDown(command.index));
      case 'rename': {
        const result = await this.store.rename(command.index, command.description);
        return this.mutated(result, [renderRename(result.from, result.to)]);
      }
      case 'help':
        return { output: [renderHelp()], state: this.state };
      case 'quit':
        this.log.info('Quit requested');
        return this.terminate();
    }
  }

  private mutated(result: MutationResult, before: string[] = []): CommandOutcome {
    const output: string[] = [];
    if (!result.save.saved) {
      output.push(formatError(result.save.error));
    }
    output.push(...before, renderTaskList(result.tasks));
    return { output, state: this.state };
  }
}
