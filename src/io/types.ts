/**
 * Connection abstraction used by the transfer loops.
 *
 * Operations never throw: every call resolves to an IoOutcome that the
 * caller maps to continue, retry or terminate.
 */

/**
 * Classified result of a single read or write.
 *
 * - `ok`: `bytes` (> 0) were transferred
 * - `closed`: zero-length result; for reads the peer closed its write side
 * - `would-block`: non-blocking handle has nothing to offer yet
 * - `interrupted`: the call was interrupted before transferring anything
 * - `fatal`: any other failure
 */
export type IoOutcome =
  | { kind: "ok"; bytes: number }
  | { kind: "closed" }
  | { kind: "would-block" }
  | { kind: "interrupted" }
  | { kind: "fatal"; error: Error };

/**
 * Established byte-stream connection.
 */
export interface StreamConnection {
  /** Read up to `buffer.length` bytes into `buffer` */
  read(buffer: Uint8Array): Promise<IoOutcome>;
  /** Write `buffer`; `ok.bytes` may be smaller than its length */
  write(buffer: Uint8Array): Promise<IoOutcome>;
  /** Half-close: signal end of data while keeping the read side open */
  shutdownWrite(): Promise<IoOutcome>;
  /** Release the connection */
  close(): Promise<void>;
}

export const IoOutcomes = {
  ok: (bytes: number): IoOutcome => (bytes > 0 ? { kind: "ok", bytes } : { kind: "closed" }),
  closed: (): IoOutcome => ({ kind: "closed" }),
  wouldBlock: (): IoOutcome => ({ kind: "would-block" }),
  interrupted: (): IoOutcome => ({ kind: "interrupted" }),
  fatal: (error: Error): IoOutcome => ({ kind: "fatal", error }),
} as const;
