/**
 * Text rendering of throughput reports.
 */

import type { IntervalReport, TotalReport } from "./types.js";

/**
 * Format a byte rate as megabits and megabytes per second (decimal mega).
 *
 * @example
 * ```ts
 * formatRate(1_000_000); // "8.00 Mb/s (1.00 MB/s)"
 * ```
 */
export function formatRate(bytesPerSecond: number): string {
  const mbps = (bytesPerSecond * 8) / 1e6;
  const megabytes = bytesPerSecond / 1e6;
  return `${mbps.toFixed(2)} Mb/s (${megabytes.toFixed(2)} MB/s)`;
}

export function formatIntervalReport(report: IntervalReport): string {
  const start = report.startOffset.toFixed(0);
  const end = report.endOffset.toFixed(0);
  return `[${report.label}] ${start}-${end}s: ${report.bytes} bytes  ${formatRate(report.bytesPerSecond)}`;
}

export function formatTotalReport(report: TotalReport): string {
  return `[${report.label}] TOTAL: ${report.bytes} bytes in ${report.seconds.toFixed(2)}s  ${formatRate(report.bytesPerSecond)}`;
}
