/**
 * Rate sampler: turns "n bytes transferred" events into one-second
 * interval reports and a final aggregate report.
 */

import { SamplerError } from "../errors.js";
import type { TransferLogger } from "../utils/logger.js";
import { formatIntervalReport, formatTotalReport } from "./format.js";
import type { IntervalReport, TotalReport } from "./types.js";

/** Minimum elapsed time between two interval reports, in seconds */
export const REPORT_INTERVAL_SECONDS = 1.0;

/** Duration used for the aggregate rate when a session took no measurable time */
export const MIN_SESSION_SECONDS = 1e-6;

export interface RateSamplerOptions {
  /** Role tag printed in every line */
  label: string;
  /** Session start, in clock seconds */
  startTime: number;
  /** Receives rendered report lines */
  logger: TransferLogger;
}

/**
 * Byte accumulator with threshold-based interval reporting.
 *
 * Intervals are not phase-locked: a report is emitted on the first
 * `maybeReport` call at least one second after the previous one, and its
 * rate uses the actual elapsed time.
 */
export class RateSampler {
  readonly label: string;
  readonly startTime: number;
  private readonly logger: TransferLogger;
  private lastReportTime: number;
  private total = 0;
  private interval = 0;
  private finalized = false;

  constructor(options: RateSamplerOptions) {
    this.label = options.label;
    this.startTime = options.startTime;
    this.lastReportTime = options.startTime;
    this.logger = options.logger;
  }

  /** Bytes recorded since the session started */
  get totalBytes(): number {
    return this.total;
  }

  /** Bytes recorded since the last interval report */
  get intervalBytes(): number {
    return this.interval;
  }

  get isFinalized(): boolean {
    return this.finalized;
  }

  record(bytes: number): void {
    if (!Number.isInteger(bytes) || bytes < 0) {
      throw new SamplerError(`Invalid byte count: ${bytes}`);
    }
    this.total += bytes;
    this.interval += bytes;
  }

  /**
   * Emit an interval report if at least one second passed since the last one.
   *
   * @returns the emitted report, or undefined when it is too early
   */
  maybeReport(now: number): IntervalReport | undefined {
    const elapsed = now - this.lastReportTime;
    if (elapsed < REPORT_INTERVAL_SECONDS) {
      return undefined;
    }

    const report: IntervalReport = {
      label: this.label,
      startOffset: this.lastReportTime - this.startTime,
      endOffset: now - this.startTime,
      bytes: this.interval,
      seconds: elapsed,
      bytesPerSecond: this.interval / elapsed,
    };
    this.logger.info(formatIntervalReport(report));

    this.interval = 0;
    this.lastReportTime = now;
    return report;
  }

  /**
   * Emit the aggregate report. Allowed once per session.
   */
  finalize(now: number): TotalReport {
    if (this.finalized) {
      throw new SamplerError(`Session "${this.label}" already finalized`);
    }
    this.finalized = true;

    const elapsed = now - this.startTime;
    const seconds = elapsed > 0 ? elapsed : MIN_SESSION_SECONDS;
    const report: TotalReport = {
      label: this.label,
      bytes: this.total,
      seconds,
      bytesPerSecond: this.total / seconds,
    };
    this.logger.info(formatTotalReport(report));
    return report;
  }
}
