import type { Logger } from '@rds-query/core';
import { toCliError } from './errors.js';

/** Where results and diagnostics go. Results only ever reach stdout. */
export interface OutputStreams {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface OutputOptions {
  /** Number of -v flags */
  verbosity: number;
  streams: OutputStreams;
}

export const processStreams: OutputStreams = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export function printResult(text: string, output: OutputOptions): void {
  output.streams.stdout(text);
}

/** -v info, -vv debug, -vvv trace; everything on stderr. */
export function createConsoleLogger(output: OutputOptions): Logger {
  const at = (level: number, prefix: string) => (message: string) => {
    if (output.verbosity >= level) {
      output.streams.stderr(`${prefix}: ${message}\n`);
    }
  };
  return {
    info: at(1, 'Info'),
    debug: at(2, 'Debug'),
    trace: at(3, 'Trace'),
  };
}

/**
 * One `Error:` line. Failure details go through the logger as a single
 * debug line, so they only appear with -vv.
 */
export function printError(error: unknown, output: OutputOptions): void {
  const cliError = toCliError(error);
  output.streams.stderr(`Error: ${cliError.message}\n`);
  if (cliError.details !== undefined) {
    createConsoleLogger(output).debug(`Failure details: ${JSON.stringify(cliError.details)}`);
  }
}
