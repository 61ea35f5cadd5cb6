/**
 * High-level query orchestration.
 * Fetches candidates, resolves the target, and executes one statement.
 */

import { secretsForCluster, type CandidateProvider } from './aws/candidates.js';
import type { QueryExecutor, StatementResponse } from './aws/executor.js';
import { QueryFailureError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { assemble } from './resolve/assemble.js';
import { resolveCandidate } from './resolve/resolver.js';
import type { QueryTarget } from './resolve/types.js';

export interface QueryRequest {
  /** Cluster identifier hint; undefined lets the resolver decide */
  cluster?: string;
  /** DB user hint, matched against the user part of the secret name */
  user?: string;
  database?: string;
  region: string;
  sql: string;
}

export interface QueryDeps {
  provider: CandidateProvider;
  executor: QueryExecutor;
  logger?: Logger;
}

export interface QueryOutcome {
  target: QueryTarget;
  response: StatementResponse;
}

/**
 * Resolve the cluster, then its credential secret. Both candidate lists are
 * fetched concurrently; the cluster failure is reported first.
 */
export async function resolveTarget(
  request: QueryRequest,
  provider: CandidateProvider,
  logger: Logger = silentLogger,
): Promise<QueryTarget> {
  logger.info(`Listing DB clusters and secrets in ${request.region}`);
  const [clusterList, secretList] = await Promise.allSettled([
    provider.listClusters(),
    provider.listSecrets(),
  ]);

  // Check in call order so the outcome never depends on which fetch settled first
  if (clusterList.status === 'rejected') throw clusterList.reason;
  const clusters = clusterList.value;
  logger.debug(`DB clusters: ${JSON.stringify(clusters.map((c) => c.id))}`);

  const cluster = resolveCandidate(request.cluster, clusters, (c) => c.id, 'DB');
  if (!cluster.ok) throw new QueryFailureError(cluster.error);

  if (secretList.status === 'rejected') throw secretList.reason;
  const secrets = secretList.value;
  logger.debug(`Secrets: ${JSON.stringify(secrets.map((s) => s.name))}`);

  // Credential secrets are named after the cluster's resource id
  const users = secretsForCluster(secrets, cluster.value.resourceId);
  const credential = resolveCandidate(request.user, users, (u) => u.id, 'DB user');

  const target = assemble(cluster, credential, request.database, request.region, request.sql);
  if (!target.ok) {
    throw new QueryFailureError(target.error);
  }
  logger.debug(`Resolved target: cluster=${target.value.clusterId} user=${target.value.credentialId}`);
  return target.value;
}

export async function runQuery(request: QueryRequest, deps: QueryDeps): Promise<QueryOutcome> {
  const logger = deps.logger ?? silentLogger;
  const target = await resolveTarget(request, deps.provider, logger);

  logger.info(`Executing statement on ${target.clusterArn}`);
  const response = await deps.executor.execute(target);
  logger.trace(`ExecuteStatement response: ${JSON.stringify(response)}`);

  return { target, response };
}
