/**
 * AWS SDK client construction. One set of clients per invocation.
 */

import { RDSClient } from '@aws-sdk/client-rds';
import { RDSDataClient } from '@aws-sdk/client-rds-data';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';

export interface AwsClientConfig {
  region: string;
  /** Named profile from ~/.aws/config; the SDK default chain applies when unset */
  profile?: string;
}

export interface AwsClients {
  rds: RDSClient;
  secrets: SecretsManagerClient;
  rdsData: RDSDataClient;
}

export function createAwsClients(config: AwsClientConfig): AwsClients {
  const clientConfig = {
    region: config.region,
    ...(config.profile ? { profile: config.profile } : {}),
  };
  return {
    rds: new RDSClient(clientConfig),
    secrets: new SecretsManagerClient(clientConfig),
    rdsData: new RDSDataClient(clientConfig),
  };
}
