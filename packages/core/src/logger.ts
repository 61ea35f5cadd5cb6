/**
 * Diagnostic logger passed into core orchestration.
 * The CLI supplies a console-backed implementation gated by -v/-vv/-vvv.
 */

export interface Logger {
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
}

export const silentLogger: Logger = {
  info: () => {},
  debug: () => {},
  trace: () => {},
};
