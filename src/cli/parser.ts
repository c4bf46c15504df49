/**
 * Line parser for the interactive prompt.
 *
 * A line is a command token plus a raw remainder, split once at the first
 * run of whitespace. Tokens are case-insensitive. Task numbers are 1-based
 * on input and converted to 0-based indices here.
 */

import { TodoError } from '../core/errors.js';
import { INVALID_TASK_NUMBER } from '../core/tasks/operations.js';
import { ExitCode } from '../types/exit-codes.js';

/** A parsed command, ready to dispatch. Indices are 0-based. */
export type Command =
  | { action: 'add'; description: string }
  | { action: 'list' }
  | { action: 'toggle'; index: number }
  | { action: 'remove'; index: number }
  | { action: 'moveUp'; index: number }
  | { action: 'moveDown'; index: number }
  | { action: 'rename'; index: number; description: string }
  | { action: 'help' }
  | { action: 'quit' };

/** Commands that take a single task number. */
type IndexedAction = 'toggle' | 'remove' | 'moveUp' | 'moveDown';

type IndexedToken = 'x' | 'd' | 'h' | 'l';

const INDEXED_TOKENS: Readonly<Record<IndexedToken, IndexedAction>> = {
  x: 'toggle',
  d: 'remove',
  h: 'moveUp',
  l: 'moveDown',
};

export const UNKNOWN_COMMAND = 'Unknown command. Type "?" for help.';

export const USAGE = {
  a: 'Usage: a <task description>',
  x: 'Usage: x <task number>',
  d: 'Usage: d <task number>',
  h: 'Usage: h <task number>',
  l: 'Usage: l <task number>',
  r: 'Usage: r <task number> <new task description>',
} as const;

/**
 * Split at the first run of whitespace.
 * The remainder is trimmed and empty when absent.
 */
export function splitOnce(text: string): [head: string, rest: string] {
  const match = /\s+/.exec(text);
  if (!match) return [text, ''];
  return [text.slice(0, match.index), text.slice(match.index + match[0].length).trim()];
}

/**
 * Convert a 1-based task number to a 0-based index.
 * Only a plain run of digits that fits a safe integer is accepted.
 */
export function parseTaskNumber(text: string): number {
  const value = /^\d+$/.test(text) ? Number.parseInt(text, 10) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw new TodoError(ExitCode.INVALID_INPUT, INVALID_TASK_NUMBER);
  }
  return value - 1;
}

function isIndexedToken(token: string): token is IndexedToken {
  return Object.hasOwn(INDEXED_TOKENS, token);
}

function usageError(token: keyof typeof USAGE): TodoError {
  return new TodoError(ExitCode.INVALID_INPUT, USAGE[token]);
}

/**
 * Parse one input line.
 *
 * Returns null for a blank line. Throws TodoError(INVALID_INPUT) for an
 * unknown token, a missing argument or a non-numeric task number.
 */
export function parseCommand(line: string): Command | null {
  const trimmed = line.trim();
  if (trimmed === '') return null;

  const [rawToken, rest] = splitOnce(trimmed);
  const token = rawToken.toLowerCase();

  if (isIndexedToken(token)) {
    if (!rest) throw usageError(token);
    return { action: INDEXED_TOKENS[token], index: parseTaskNumber(rest) };
  }

  switch (token) {
    case 'a':
      if (!rest) throw usageError('a');
      return { action: 'add', description: rest };

    case 't':
      return { action: 'list' };

    case 'r': {
      const [number, description] = splitOnce(rest);
      if (!number || !description) throw usageError('r');
      return { action: 'rename', index: parseTaskNumber(number), description };
    }

    case '?':
      return { action: 'help' };

    case 'q':
      return { action: 'quit' };

    default:
      throw new TodoError(ExitCode.INVALID_INPUT, UNKNOWN_COMMAND);
  }
}
