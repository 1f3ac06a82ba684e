import type { TotalReport } from "../sampler/types.js";
import type { Clock, Sleep } from "../utils/clock.js";
import type { TransferLogger } from "../utils/logger.js";

/**
 * Options shared by both transfer loops.
 */
export interface TransferOptions {
  /** Monotonic time source in seconds */
  clock: Clock;
  /** Destination of report lines and error messages */
  logger: TransferLogger;
  /** Role tag printed in every line */
  label?: string;
  /** Delay function used for would-block retries */
  sleep?: Sleep;
  /** Delay before retrying a would-block outcome (default: 1ms) */
  wouldBlockDelayMs?: number;
}

/**
 * Why a transfer loop stopped.
 */
export type TransferEndReason = "peer-closed" | "deadline" | "write-returned-zero" | "error";

/**
 * Result of a finished transfer loop.
 */
export interface TransferSummary {
  report: TotalReport;
  endReason: TransferEndReason;
  /** I/O failure that ended the loop, when `endReason` is "error" */
  error?: Error;
}
