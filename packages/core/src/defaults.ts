/**
 * Defaults and environment variable names for rds-query.
 */

export const DEFAULTS = {
  /** Region used when neither --aws-region nor AWS_DEFAULT_REGION is set */
  region: 'us-east-1',
  /** Output format when --format is not given */
  format: 'csv',
  /** Secrets Manager name prefix for RDS-managed credentials */
  secretPrefix: 'rds-db-credentials/',
} as const;

export const ENV_VARS = {
  region: 'AWS_DEFAULT_REGION',
  cluster: 'AWS_RDS_CLUSTER',
  user: 'AWS_RDS_USER',
  database: 'AWS_RDS_DATABASE',
} as const;
