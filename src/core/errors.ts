/**
 * Error type for todo-repl operations, with exit code integration.
 */

import type { ExitCode } from '../types/exit-codes.js';

/**
 * Structured error class for task operations.
 * Carries an exit code, a message fit to show the user, and an optional fix hint.
 */
export class TodoError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TodoError';
    this.code = code;
    this.fix = options?.fix;
  }
}

/** Narrow an unknown thrown value to a TodoError. */
export function isTodoError(err: unknown): err is TodoError {
  return err instanceof TodoError;
}

/** Best-effort message of an unknown thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
