/**
 * Operator-facing output of a transfer.
 *
 * Reports go to `info`, failures to `error`. The core never touches the
 * console itself.
 */
export interface TransferLogger {
  info(message: string): void;
  error(message: string): void;
}

/**
 * Logger writing reports to stdout and failures to stderr.
 */
export function createConsoleLogger(): TransferLogger {
  return {
    info: (message) => console.log(message),
    error: (message) => console.error(message),
  };
}
