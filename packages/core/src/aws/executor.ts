/**
 * Query executor backed by the RDS Data API.
 */

import {
  ExecuteStatementCommand,
  type ExecuteStatementCommandOutput,
  type RDSDataClient,
} from '@aws-sdk/client-rds-data';
import { remoteFailure } from '../errors.js';
import type { QueryTarget } from '../resolve/types.js';

/** ExecuteStatement response without the SDK's request metadata */
export type StatementResponse = Omit<ExecuteStatementCommandOutput, '$metadata'>;

export interface QueryExecutor {
  execute(target: QueryTarget): Promise<StatementResponse>;
}

export class RdsDataQueryExecutor implements QueryExecutor {
  constructor(private readonly client: RDSDataClient) {}

  async execute(target: QueryTarget): Promise<StatementResponse> {
    const command = new ExecuteStatementCommand({
      resourceArn: target.clusterArn,
      secretArn: target.secretArn,
      sql: target.sql,
      database: target.database,
      includeResultMetadata: true,
      // Decimals come back as strings so no precision is lost in JSON
      resultSetOptions: { decimalReturnType: 'STRING' },
    });

    try {
      const { $metadata: _metadata, ...response } = await this.client.send(command);
      return response;
    } catch (err: unknown) {
      throw remoteFailure('execute_statement', err);
    }
  }
}
