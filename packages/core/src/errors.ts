/**
 * Failure taxonomy for a single rds-query invocation.
 *
 * Resolution failures need a human to pick a target; remote failures carry
 * the collaborator's message verbatim. None of them are retried.
 */

import type { ResolutionError } from './resolve/types.js';

export type RemoteOperation = 'describe_clusters' | 'list_secrets' | 'execute_statement';

export interface RemoteFailure {
  kind: 'remote_failure';
  operation: RemoteOperation;
  message: string;
}

export type QueryFailure = ResolutionError | RemoteFailure;

const REMOTE_PREFIX: Record<RemoteOperation, string> = {
  describe_clusters: 'Failed to lookup clusters',
  list_secrets: 'Failed to lookup secrets',
  execute_statement: 'Failed to execute statement',
};

function quotedList(ids: readonly string[]): string {
  return `[${ids.map((id) => JSON.stringify(id)).join(', ')}]`;
}

/** Render the user-facing message for a failure. */
export function describeFailure(failure: QueryFailure): string {
  switch (failure.kind) {
    case 'not_found':
      return `No ${failure.label}s found`;
    case 'no_match':
      return `No ${failure.label} matched ${JSON.stringify(failure.hint)}, available ids are ${quotedList(failure.available)}`;
    case 'ambiguous':
      return `Multiple ${failure.label}s found, please specify one of ${quotedList(failure.available)}`;
    case 'remote_failure':
      return `${REMOTE_PREFIX[failure.operation]}: ${failure.message}`;
  }
}

export class QueryFailureError extends Error {
  readonly failure: QueryFailure;

  constructor(failure: QueryFailure, options?: { cause?: unknown }) {
    super(describeFailure(failure), options);
    this.name = 'QueryFailureError';
    this.failure = failure;
  }
}

export function remoteFailure(operation: RemoteOperation, error: unknown): QueryFailureError {
  const message = error instanceof Error ? error.message : String(error);
  return new QueryFailureError({ kind: 'remote_failure', operation, message }, { cause: error });
}
