/**
 * Terminal formatting for errors.
 */

import { TodoError } from './errors.js';

/**
 * Render an error for the interactive surface.
 * The message comes first; a fix hint, when present, goes on its own line.
 */
export function formatError(err: TodoError): string {
  if (!err.fix) return err.message;
  return `${err.message}\n  Fix: ${err.fix}`;
}
