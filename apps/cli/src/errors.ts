import { QueryFailureError, type QueryFailure } from '@rds-query/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'DB_NOT_FOUND'
  | 'DB_NO_MATCH'
  | 'DB_AMBIGUOUS'
  | 'REMOTE_FAILED'
  | 'INTERNAL_ERROR';

/** usage and resolution failures need the user to change their input */
export type CliErrorKind = 'usage' | 'resolution' | 'runtime';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, details?: unknown): CliError {
  return new CliError('usage', 'INVALID_ARGS', message, details);
}

const FAILURE_CODES: Record<QueryFailure['kind'], CliErrorCode> = {
  not_found: 'DB_NOT_FOUND',
  no_match: 'DB_NO_MATCH',
  ambiguous: 'DB_AMBIGUOUS',
  remote_failure: 'REMOTE_FAILED',
};

export function fromQueryFailure(error: QueryFailureError): CliError {
  const { failure } = error;
  const kind: CliErrorKind = failure.kind === 'remote_failure' ? 'runtime' : 'resolution';
  return new CliError(kind, FAILURE_CODES[failure.kind], error.message, failure);
}

/** Normalize anything thrown by a command into a CliError. */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof QueryFailureError) return fromQueryFailure(error);
  const message = error instanceof Error ? error.message : String(error);
  return new CliError(
    'runtime',
    'INTERNAL_ERROR',
    message,
    error instanceof Error ? { stack: error.stack } : { raw: String(error) },
  );
}

export function toExitCode(error: unknown): number {
  const kind = toCliError(error).kind;
  if (kind === 'usage' || kind === 'resolution') return EXIT_CODE_USAGE;
  return EXIT_CODE_RUNTIME;
}
