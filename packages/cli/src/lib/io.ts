/**
 * Output streams for the CLI
 */

/**
 * Where command output goes; swapped out in tests
 */
export interface CliIO {
  /** Write to standard output */
  out(content: string): void;
  /** Write to standard error */
  err(content: string): void;
  /** Whether standard error is an interactive terminal */
  isErrTTY(): boolean;
}

/**
 * Process-backed streams
 */
export const processIO: CliIO = {
  out(content) {
    process.stdout.write(content);
  },
  err(content) {
    process.stderr.write(content);
  },
  isErrTTY() {
    return process.stderr.isTTY ?? false;
  },
};
