/**
 * Merges command-line flags with their environment fallbacks, once, into a
 * plain RunConfig. Nothing downstream reads process.env.
 */

import { DEFAULTS, ENV_VARS, OUTPUT_FORMATS, parseOutputFormat, type OutputFormat } from '@rds-query/core';
import { usageError } from './errors.js';

/** Option values as commander hands them over */
export interface CliFlags {
  awsProfile?: string;
  awsRegion?: string;
  dbClusterIdentifier?: string;
  dbUserIdentifier?: string;
  database?: string;
  format: string;
  verbose: number;
}

export interface RunConfig {
  profile?: string;
  region: string;
  cluster?: string;
  user?: string;
  database?: string;
  format: OutputFormat;
  verbosity: number;
  sql: string;
}

export type Env = Record<string, string | undefined>;

function present(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function flagOrEnv(flag: string | undefined, env: Env, name: string): string | undefined {
  return present(flag) ?? present(env[name]);
}

export function resolveRunConfig(flags: CliFlags, sql: string, env: Env): RunConfig {
  if (!sql.trim()) {
    throw usageError('Empty SQL statement.');
  }

  const format = parseOutputFormat(flags.format);
  if (!format) {
    throw usageError(`Invalid --format "${flags.format}". Expected one of: ${OUTPUT_FORMATS.join(', ')}.`);
  }

  const config: RunConfig = {
    region: flagOrEnv(flags.awsRegion, env, ENV_VARS.region) ?? DEFAULTS.region,
    format,
    verbosity: flags.verbose,
    sql,
  };

  const profile = present(flags.awsProfile);
  const cluster = flagOrEnv(flags.dbClusterIdentifier, env, ENV_VARS.cluster);
  const user = flagOrEnv(flags.dbUserIdentifier, env, ENV_VARS.user);
  const database = flagOrEnv(flags.database, env, ENV_VARS.database);
  if (profile !== undefined) config.profile = profile;
  if (cluster !== undefined) config.cluster = cluster;
  if (user !== undefined) config.user = user;
  if (database !== undefined) config.database = database;

  return config;
}
