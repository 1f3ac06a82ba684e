/**
 * Receiver transfer loop: read and discard until the peer closes.
 */

import { DEFAULTS } from "../config.js";
import type { StreamConnection } from "../io/types.js";
import { RateSampler } from "../sampler/rate-sampler.js";
import { type Clock, type Sleep, sleep as defaultSleep } from "../utils/clock.js";
import type { TransferEndReason, TransferOptions, TransferSummary } from "./types.js";

export interface ReceiverOptions extends TransferOptions {
  /** Read buffer size in bytes (default: 64 KiB) */
  bufferSize?: number;
}

interface ReceiveResult {
  endReason: TransferEndReason;
  error?: Error;
}

/**
 * Receive from `connection` until it is closed by the peer or fails,
 * then print the aggregate report and close the connection.
 *
 * I/O failures do not reject: they are logged, and the bytes received so
 * far are still reported.
 */
export async function runReceiver(
  connection: StreamConnection,
  options: ReceiverOptions,
): Promise<TransferSummary> {
  const { clock, logger, label = "server" } = options;
  const buffer = new Uint8Array(options.bufferSize ?? DEFAULTS.receiveBufferSize);
  const sampler = new RateSampler({ label, startTime: clock(), logger });

  const result = await receiveLoop(
    connection,
    buffer,
    sampler,
    clock,
    options.sleep ?? defaultSleep,
    options.wouldBlockDelayMs ?? DEFAULTS.wouldBlockDelayMs,
  );
  if (result.error) {
    logger.error(`[${label}] recv failed: ${result.error.message}`);
  }

  const report = sampler.finalize(clock());
  await connection.close();
  return { report, ...result };
}

async function receiveLoop(
  connection: StreamConnection,
  buffer: Uint8Array,
  sampler: RateSampler,
  clock: Clock,
  sleep: Sleep,
  wouldBlockDelayMs: number,
): Promise<ReceiveResult> {
  while (true) {
    const outcome = await connection.read(buffer);
    switch (outcome.kind) {
      case "ok":
        sampler.record(outcome.bytes);
        sampler.maybeReport(clock());
        break;
      case "interrupted":
        break;
      case "would-block":
        await sleep(wouldBlockDelayMs);
        break;
      case "closed":
        return { endReason: "peer-closed" };
      case "fatal":
        return { endReason: "error", error: outcome.error };
    }
  }
}
