/**
 * Target assembler: combines the cluster and credential resolutions into a
 * QueryTarget. The cluster failure is reported first, whatever happened to
 * the credential.
 */

import type {
  ClusterCandidate,
  CredentialCandidate,
  QueryTarget,
  Resolution,
} from './types.js';

export function assemble(
  cluster: Resolution<ClusterCandidate>,
  credential: Resolution<CredentialCandidate>,
  database: string | undefined,
  region: string,
  sql: string,
): Resolution<QueryTarget> {
  if (!cluster.ok) return cluster;
  if (!credential.ok) return credential;

  const target: QueryTarget = {
    clusterId: cluster.value.id,
    clusterArn: cluster.value.arn,
    credentialId: credential.value.id,
    secretArn: credential.value.arn,
    ...(database !== undefined ? { database } : {}),
    region,
    sql,
  };
  return { ok: true, value: Object.freeze(target) };
}
