/**
 * Throughput over one reporting interval.
 */
export interface IntervalReport {
  /** Role tag printed in brackets ("server", "client") */
  label: string;
  /** Interval start, seconds since session start */
  startOffset: number;
  /** Interval end, seconds since session start */
  endOffset: number;
  /** Bytes transferred during the interval */
  bytes: number;
  /** Actual interval length in seconds */
  seconds: number;
  bytesPerSecond: number;
}

/**
 * Aggregate throughput of a whole session.
 */
export interface TotalReport {
  label: string;
  bytes: number;
  /** Session length in seconds (never zero) */
  seconds: number;
  bytesPerSecond: number;
}
