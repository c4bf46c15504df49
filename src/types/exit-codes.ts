/**
 * Process exit codes and the error codes carried by TodoError.
 * 0 = success, 1-99 = errors.
 */

export enum ExitCode {
  SUCCESS = 0,

  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  CONFIG_ERROR = 8,
  INVALID_POSITION = 9,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
