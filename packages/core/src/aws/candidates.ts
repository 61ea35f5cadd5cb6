/**
 * Candidate provider: lists the DB clusters and credential secrets visible
 * to the caller. Every page is collected; provider order is kept.
 */

import { DescribeDBClustersCommand, type DBCluster, type RDSClient } from '@aws-sdk/client-rds';
import {
  ListSecretsCommand,
  type SecretListEntry,
  type SecretsManagerClient,
} from '@aws-sdk/client-secrets-manager';
import { DEFAULTS } from '../defaults.js';
import { remoteFailure } from '../errors.js';
import type { ClusterCandidate, CredentialCandidate } from '../resolve/types.js';

/** A secret as listed by ListSecrets, before it is scoped to a cluster */
export interface SecretCandidate {
  name: string;
  arn: string;
}

export interface CandidateProvider {
  listClusters(): Promise<ClusterCandidate[]>;
  listSecrets(): Promise<SecretCandidate[]>;
}

function toClusterCandidate(cluster: DBCluster): ClusterCandidate {
  return {
    id: cluster.DBClusterIdentifier ?? '',
    arn: cluster.DBClusterArn ?? '',
    resourceId: cluster.DbClusterResourceId ?? '',
  };
}

function toSecretCandidate(entry: SecretListEntry): SecretCandidate | null {
  if (!entry.Name) return null;
  return { name: entry.Name, arn: entry.ARN ?? '' };
}

export class AwsCandidateProvider implements CandidateProvider {
  constructor(
    private readonly rds: RDSClient,
    private readonly secrets: SecretsManagerClient,
  ) {}

  async listClusters(): Promise<ClusterCandidate[]> {
    const clusters: ClusterCandidate[] = [];
    let marker: string | undefined;
    try {
      do {
        const page = await this.rds.send(new DescribeDBClustersCommand({ Marker: marker }));
        for (const cluster of page.DBClusters ?? []) {
          clusters.push(toClusterCandidate(cluster));
        }
        marker = page.Marker;
      } while (marker);
    } catch (err: unknown) {
      throw remoteFailure('describe_clusters', err);
    }
    return clusters;
  }

  async listSecrets(): Promise<SecretCandidate[]> {
    const secrets: SecretCandidate[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const page = await this.secrets.send(new ListSecretsCommand({ NextToken: nextToken }));
        for (const entry of page.SecretList ?? []) {
          const secret = toSecretCandidate(entry);
          if (secret) secrets.push(secret);
        }
        nextToken = page.NextToken;
      } while (nextToken);
    } catch (err: unknown) {
      throw remoteFailure('list_secrets', err);
    }
    return secrets;
  }
}

/**
 * Keep the secrets RDS created for one cluster, named by user id.
 * `rds-db-credentials/cluster-ABC/admin` becomes `admin`.
 */
export function secretsForCluster(
  secrets: readonly SecretCandidate[],
  clusterResourceId: string,
): CredentialCandidate[] {
  const prefix = `${DEFAULTS.secretPrefix}${clusterResourceId}/`;
  return secrets
    .filter((secret) => secret.name.startsWith(prefix))
    .map((secret) => ({ id: secret.name.slice(prefix.length), name: secret.name, arn: secret.arn }));
}
