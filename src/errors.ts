/**
 * Error classes.
 */

/**
 * Base error for all netmeter failures.
 */
export class NetmeterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NetmeterError";
  }
}

/**
 * Failure before a session started: bad arguments, resolution,
 * listen, accept or connect. Always fatal for the process.
 */
export class SetupError extends NetmeterError {
  constructor(message: string, cause?: Error) {
    super(cause ? `${message}: ${cause.message}` : message, cause ? { cause } : undefined);
    this.name = "SetupError";
  }
}

/**
 * Missing or malformed command line argument.
 */
export class InvalidArgumentError extends SetupError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Host name could not be resolved to an IPv4 address.
 */
export class ResolveError extends SetupError {
  readonly host: string;

  constructor(host: string, cause?: Error) {
    super(`resolve failed for host: ${host}`, cause);
    this.name = "ResolveError";
    this.host = host;
  }
}

/**
 * Misuse of a rate sampler (negative counts, finalizing twice).
 */
export class SamplerError extends NetmeterError {
  constructor(message: string) {
    super(message);
    this.name = "SamplerError";
  }
}
