/**
 * Default values for both roles.
 */
export const DEFAULTS = {
  /** Sender run time in seconds */
  seconds: 10,
  /** Sender buffer size in KiB */
  bufferKb: 16,
  /** Receiver read buffer in bytes */
  receiveBufferSize: 64 * 1024,
  /** Scratch buffer used while the sender drains the connection */
  drainBufferSize: 1024,
  /** Delay before retrying an operation that would block */
  wouldBlockDelayMs: 1,
  /** Address the server listens on */
  listenHost: "0.0.0.0",
  /** Byte the sender buffer is filled with ('A') */
  fillByte: 0x41,
} as const;
