/**
 * Resolution types for rds-query.
 *
 * A resolution narrows a candidate set, optionally guided by a hint, down to
 * exactly one identifier. Failures are a closed tagged union so callers can
 * switch on `kind` instead of parsing messages.
 */

/** Which kind of target is being resolved. Drives the wording of failures. */
export type KindLabel = 'DB' | 'DB user';

export interface NotFoundError {
  kind: 'not_found';
  label: KindLabel;
}

export interface NoMatchError {
  kind: 'no_match';
  label: KindLabel;
  hint: string;
  /** Every candidate, in provider order */
  available: string[];
}

export interface AmbiguousError {
  kind: 'ambiguous';
  label: KindLabel;
  /** Every candidate, in provider order */
  available: string[];
}

export type ResolutionError = NotFoundError | NoMatchError | AmbiguousError;

export type Resolution<T> = { ok: true; value: T } | { ok: false; error: ResolutionError };

/** Fully resolved target for a single ExecuteStatement call */
export interface QueryTarget {
  readonly clusterId: string;
  readonly clusterArn: string;
  readonly credentialId: string;
  readonly secretArn: string;
  readonly database?: string;
  readonly region: string;
  readonly sql: string;
}

/** A DB cluster as listed by DescribeDBClusters */
export interface ClusterCandidate {
  /** DBClusterIdentifier, or "" when the API omitted it */
  id: string;
  arn: string;
  /** DbClusterResourceId, used to find the cluster's credential secrets */
  resourceId: string;
}

/** A credential secret scoped to one cluster */
export interface CredentialCandidate {
  /** User id: the part of the secret name after the cluster resource id */
  id: string;
  /** Full secret name, e.g. rds-db-credentials/cluster-ABC/admin */
  name: string;
  arn: string;
}
