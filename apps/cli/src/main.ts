/**
 * rds-query CLI entrypoint.
 */

import { AwsCandidateProvider, RdsDataQueryExecutor, createAwsClients } from '@rds-query/core';
import { runCli, type CliDeps } from './program.js';
import { processStreams } from './output.js';

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => (data += chunk));
    process.stdin.on('end', () => resolve(data.trim()));
    process.stdin.on('error', reject);
  });
}

const deps: CliDeps = {
  createServices: (config) => {
    const clients = createAwsClients(config);
    return {
      provider: new AwsCandidateProvider(clients.rds, clients.secrets),
      executor: new RdsDataQueryExecutor(clients.rdsData),
    };
  },
  streams: processStreams,
  env: process.env,
  readStdin,
};

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), deps);
}

void main();
