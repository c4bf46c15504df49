/**
 * JSON read helpers on top of the atomic file layer.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { safeReadFile } from './atomic.js';
import { TodoError, describeError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Outcome of parsing and validating a JSON document. */
export type JsonParseResult<T> =
  | { ok: true; data: T }
  | { ok: false; reason: string; cause: unknown };

/**
 * Parse JSON text and validate it against a zod schema.
 * The failure reason names the first offending path, if any.
 */
export function parseJson<T>(
  content: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): JsonParseResult<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return { ok: false, reason: describeError(err), cause: err };
  }

  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return { ok: false, reason: `${where}${issue?.message ?? 'invalid value'}`, cause: parsed.error };
}

/** Options for readValidatedJson. */
export interface ReadValidatedJsonOptions {
  /** Leading text of the error message, e.g. 'Invalid config'. */
  label: string;
  /** Error code for a parse or schema failure. Default: VALIDATION_ERROR. */
  code?: ExitCode;
  /** Fix hint attached to a parse or schema failure. */
  fix?: string;
}

/**
 * Read a JSON file and validate it against a zod schema.
 * Returns null if the file does not exist. A read failure throws FILE_ERROR;
 * invalid JSON or a schema mismatch throws `options.code`.
 */
export async function readValidatedJson<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: ReadValidatedJsonOptions,
): Promise<T | null> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  const result = parseJson(content, schema);
  if (!result.ok) {
    throw new TodoError(
      options.code ?? ExitCode.VALIDATION_ERROR,
      `${options.label}: ${filePath}: ${result.reason}`,
      { cause: result.cause, fix: options.fix },
    );
  }
  return result.data;
}
