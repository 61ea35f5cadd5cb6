/**
 * @rds-query/core — barrel export
 *
 * Target resolution, AWS collaborators and output formatting shared by the CLI.
 */

// Resolution types
export type {
  KindLabel,
  NotFoundError,
  NoMatchError,
  AmbiguousError,
  ResolutionError,
  Resolution,
  QueryTarget,
  ClusterCandidate,
  CredentialCandidate,
} from './resolve/types.js';

// Resolver + assembler
export { resolve, resolveCandidate } from './resolve/resolver.js';
export { assemble } from './resolve/assemble.js';

// Failures
export { QueryFailureError, describeFailure, remoteFailure } from './errors.js';
export type { QueryFailure, RemoteFailure, RemoteOperation } from './errors.js';

// Defaults
export { DEFAULTS, ENV_VARS } from './defaults.js';

// Logging
export type { Logger } from './logger.js';
export { silentLogger } from './logger.js';

// AWS collaborators
export { createAwsClients } from './aws/clients.js';
export type { AwsClientConfig, AwsClients } from './aws/clients.js';
export { AwsCandidateProvider, secretsForCluster } from './aws/candidates.js';
export type { CandidateProvider, SecretCandidate } from './aws/candidates.js';
export { RdsDataQueryExecutor } from './aws/executor.js';
export type { QueryExecutor, StatementResponse } from './aws/executor.js';

// Output formatting
export {
  OUTPUT_FORMATS,
  parseOutputFormat,
  formatCsv,
  formatJson,
  formatRaw,
  formatResponse,
  toResultSet,
  fieldValue,
} from './format/index.js';
export type { OutputFormat, CellValue, ResultSet } from './format/index.js';

// Orchestration
export { resolveTarget, runQuery } from './query.js';
export type { QueryRequest, QueryDeps, QueryOutcome } from './query.js';
