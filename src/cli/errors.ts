/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isLangsenseError } from '../core/errors.js';
import { getErrorCode, getErrorMessage } from '../utils/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'SNAPSHOT_NOT_FOUND'
  | 'SNAPSHOT_CORRUPT'
  | 'MEMBER_NOT_FOUND'
  | 'CONFIG_INVALID';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `langsense help <command>` for usage information.',
  SNAPSHOT_NOT_FOUND: 'Check the snapshot path; it is resolved against --workspace.',
  SNAPSHOT_CORRUPT: 'Regenerate the snapshot; the file could not be decoded as a dictionary.',
  MEMBER_NOT_FOUND: 'Run `langsense inspect <snapshot>` to list the available members.',
  CONFIG_INVALID: 'Fix .langsense/config.yaml or the LANGSENSE_* environment variables.',
};

/** Process exit code per error code; anything unexpected exits with 1. */
export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  SNAPSHOT_NOT_FOUND: 3,
  SNAPSHOT_CORRUPT: 4,
  MEMBER_NOT_FOUND: 5,
  CONFIG_INVALID: 6,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    const suggestion = error.suggestion ? `\n\nSuggestion: ${error.suggestion}` : '';
    return `Error [${error.code}]: ${error.message}${suggestion}`;
  }
  if (isLangsenseError(error)) {
    return `Error [${error.code}]: ${error.message}`;
  }
  if (getErrorCode(error) === 'ENOENT') {
    return `Error: File or directory not found: ${getErrorMessage(error)}`;
  }
  return `Error: ${getErrorMessage(error)}`;
}

/**
 * JSON error shape printed in `--json` mode.
 */
export function formatErrorJson(error: unknown): string {
  if (error instanceof CliError) {
    return JSON.stringify({
      error: { code: error.code, message: error.message, suggestion: error.suggestion, details: error.details },
    });
  }
  if (isLangsenseError(error)) {
    return JSON.stringify({ error: error.toJSON() });
  }
  return JSON.stringify({ error: { code: 'UNEXPECTED', message: getErrorMessage(error) } });
}

export function getExitCode(error: unknown): number {
  return error instanceof CliError ? EXIT_CODES[error.code] : 1;
}
