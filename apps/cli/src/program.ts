/**
 * rds-query command definition. main.ts wires in the real AWS services and
 * process streams; tests pass fakes.
 */

import { Command, CommanderError } from 'commander';
import {
  DEFAULTS,
  ENV_VARS,
  formatResponse,
  runQuery,
  type AwsClientConfig,
  type CandidateProvider,
  type QueryExecutor,
} from '@rds-query/core';
import { resolveRunConfig, type CliFlags, type Env } from './config.js';
import { EXIT_CODE_SUCCESS, toExitCode, usageError } from './errors.js';
import { createConsoleLogger, printError, printResult, type OutputOptions, type OutputStreams } from './output.js';

export const VERSION = '1.2.0';

export interface CliServices {
  provider: CandidateProvider;
  executor: QueryExecutor;
}

export interface CliDeps {
  createServices(config: AwsClientConfig): CliServices;
  streams: OutputStreams;
  env: Env;
  /** Used when the query argument is "-" */
  readStdin(): Promise<string>;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

export function buildProgram(deps: CliDeps, output: OutputOptions): Command {
  const program = new Command();

  program
    .name('rds-query')
    .description('Query an Amazon RDS database through the RDS Data API')
    .argument('<query>', 'SQL query; "-" reads it from stdin')
    .option('-p, --aws-profile <profile>', 'AWS source profile to use (an entry in ~/.aws/config)')
    .option('-r, --aws-region <region>', `AWS region to target [env: ${ENV_VARS.region}] (default: "${DEFAULTS.region}")`)
    .option('-c, --db-cluster-identifier <id>', `RDS database identifier [env: ${ENV_VARS.cluster}]`)
    .option('-u, --db-user-identifier <id>', `RDS user identifier (the secret's user part) [env: ${ENV_VARS.user}]`)
    .option('-d, --database <name>', `Database name [env: ${ENV_VARS.database}]`)
    .option('-f, --format <format>', 'Output format: csv, json, raw', DEFAULTS.format)
    .option('-v, --verbose', 'Increase diagnostic logging on stderr (-v, -vv, -vvv; -vv adds failure details)', increaseVerbosity, 0)
    .version(VERSION, '-V, --version', 'Show version number')
    .helpOption('-h, --help', 'display help')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.streams.stdout(text),
      writeErr: (text) => output.streams.stderr(text),
      // Parse errors are reported once, by runCli
      outputError: () => {},
    })
    .action(async (query: string, flags: CliFlags) => {
      output.verbosity = flags.verbose;
      const sql = query === '-' ? await deps.readStdin() : query;
      const config = resolveRunConfig(flags, sql, deps.env);
      const logger = createConsoleLogger(output);
      logger.debug(`Config: ${JSON.stringify({ ...config, sql: undefined })}`);

      const services = deps.createServices({
        region: config.region,
        ...(config.profile !== undefined ? { profile: config.profile } : {}),
      });
      const { response } = await runQuery(
        {
          cluster: config.cluster,
          user: config.user,
          database: config.database,
          region: config.region,
          sql: config.sql,
        },
        { ...services, logger },
      );

      printResult(formatResponse(config.format, response), output);
    });

  return withExamples(program, [
    'rds-query "SELECT 1"',
    'rds-query -c demo -u read_only -d app "SELECT * FROM users" -f json',
    'echo "SELECT now()" | rds-query -',
  ]);
}

/** Parse, run, and report. Resolves to the process exit code. */
export async function runCli(args: string[], deps: CliDeps): Promise<number> {
  const output: OutputOptions = { verbosity: 0, streams: deps.streams };
  const program = buildProgram(deps, output);
  try {
    await program.parseAsync(args, { from: 'user' });
    return EXIT_CODE_SUCCESS;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // --help and --version exit through here with code 0
      if (error.exitCode === 0) return EXIT_CODE_SUCCESS;
      const usage = usageError(error.message.replace(/^error: /, ''));
      printError(usage, output);
      return toExitCode(usage);
    }
    printError(error, output);
    return toExitCode(error);
  }
}
