/**
 * Sender transfer loop.
 *
 * States:
 * - RUNNING: one full-buffer write per step until the deadline passes,
 *   the connection stops accepting data or a write fails
 * - DRAINING: half-close, then read and discard until the peer closes
 * - DONE: aggregate report, connection release
 */

import { DEFAULTS } from "../config.js";
import { InvalidArgumentError, NetmeterError, SetupError } from "../errors.js";
import { Fsm } from "../fsm/fsm.js";
import type { FsmStateHandler, FsmTransition } from "../fsm/types.js";
import { toError } from "../io/classify.js";
import type { StreamConnection } from "../io/types.js";
import { RateSampler } from "../sampler/rate-sampler.js";
import type { TotalReport } from "../sampler/types.js";
import { type Clock, type Sleep, sleep as defaultSleep } from "../utils/clock.js";
import type { TransferLogger } from "../utils/logger.js";
import type { TransferEndReason, TransferOptions, TransferSummary } from "./types.js";

export interface SenderOptions extends TransferOptions {
  /** Run time in whole seconds (default: 10) */
  seconds?: number;
  /** Buffer size in whole KiB (default: 16) */
  bufferKb?: number;
  /** Payload allocated ahead of time; takes precedence over `bufferKb` */
  buffer?: Uint8Array;
}

export interface SenderContext {
  connection: StreamConnection;
  sampler: RateSampler;
  clock: Clock;
  logger: TransferLogger;
  sleep: Sleep;
  wouldBlockDelayMs: number;
  /** Clock time after which no new write is issued */
  deadline: number;
  /** Fixed-content payload written on every step */
  buffer: Uint8Array;
  /** Discard area used while draining */
  scratch: Uint8Array;
  endReason: TransferEndReason;
  error?: Error;
  report?: TotalReport;
}

export const senderTransitions: FsmTransition[] = [
  ["", "START", "RUNNING"],
  ["RUNNING", "WRITTEN", "RUNNING"],
  ["RUNNING", "RETRY", "RUNNING"],
  ["RUNNING", "DEADLINE", "DRAINING"],
  ["RUNNING", "WRITE_RETURNED_ZERO", "DRAINING"],
  ["RUNNING", "WRITE_FAILED", "DRAINING"],
  ["DRAINING", "DRAINED", "DONE"],
  ["DONE", "FINALIZED", ""],
];

export const senderHandlers = new Map<string, FsmStateHandler<SenderContext>>([
  ["", () => "START"],

  [
    "RUNNING",
    async (ctx) => {
      // The deadline is only checked between writes; a blocked write completes.
      if (ctx.clock() >= ctx.deadline) {
        ctx.endReason = "deadline";
        return "DEADLINE";
      }

      const outcome = await ctx.connection.write(ctx.buffer);
      switch (outcome.kind) {
        case "ok":
          // Short writes count as-is; the remainder is not resent.
          ctx.sampler.record(outcome.bytes);
          ctx.sampler.maybeReport(ctx.clock());
          return "WRITTEN";
        case "interrupted":
          return "RETRY";
        case "would-block":
          await ctx.sleep(ctx.wouldBlockDelayMs);
          return "RETRY";
        case "closed":
          ctx.endReason = "write-returned-zero";
          return "WRITE_RETURNED_ZERO";
        case "fatal":
          ctx.endReason = "error";
          ctx.error = outcome.error;
          ctx.logger.error(`[${ctx.sampler.label}] send failed: ${outcome.error.message}`);
          return "WRITE_FAILED";
      }
    },
  ],

  [
    "DRAINING",
    async (ctx) => {
      // Best effort: failures here only end the drain.
      await ctx.connection.shutdownWrite();
      while (true) {
        const outcome = await ctx.connection.read(ctx.scratch);
        if (outcome.kind === "ok" || outcome.kind === "interrupted") {
          continue;
        }
        if (outcome.kind === "would-block") {
          await ctx.sleep(ctx.wouldBlockDelayMs);
          continue;
        }
        return "DRAINED";
      }
    },
  ],

  [
    "DONE",
    async (ctx) => {
      ctx.report = ctx.sampler.finalize(ctx.clock());
      await ctx.connection.close();
      return "FINALIZED";
    },
  ],
]);

/**
 * Fill a sender payload of `bufferKb` KiB.
 *
 * @throws SetupError when the payload cannot be allocated
 */
export function createSendBuffer(bufferKb: number, fill: number = DEFAULTS.fillByte): Uint8Array {
  if (!Number.isInteger(bufferKb) || bufferKb <= 0) {
    throw new InvalidArgumentError(`buffer size must be a positive number of KiB, got ${bufferKb}`);
  }
  try {
    return new Uint8Array(bufferKb * 1024).fill(fill);
  } catch (error) {
    throw new SetupError("oom", toError(error));
  }
}

/**
 * Send a fixed buffer over `connection` for the requested number of
 * seconds, then drain the connection and print the aggregate report.
 *
 * I/O failures do not reject: they are logged, and the bytes sent so far
 * are still reported.
 */
export async function runSender(
  connection: StreamConnection,
  options: SenderOptions,
): Promise<TransferSummary> {
  const { clock, logger, label = "client" } = options;
  const seconds = options.seconds ?? DEFAULTS.seconds;
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new InvalidArgumentError(`seconds must be a positive integer, got ${seconds}`);
  }
  const buffer = options.buffer ?? createSendBuffer(options.bufferKb ?? DEFAULTS.bufferKb);

  const sampler = new RateSampler({ label, startTime: clock(), logger });
  const context: SenderContext = {
    connection,
    sampler,
    clock,
    logger,
    sleep: options.sleep ?? defaultSleep,
    wouldBlockDelayMs: options.wouldBlockDelayMs ?? DEFAULTS.wouldBlockDelayMs,
    deadline: sampler.startTime + seconds,
    buffer,
    scratch: new Uint8Array(DEFAULTS.drainBufferSize),
    endReason: "deadline",
  };

  const fsm = new Fsm(senderTransitions, senderHandlers);
  await fsm.run(context);

  if (!context.report) {
    throw new NetmeterError("Sender stopped without a final report");
  }
  return { report: context.report, endReason: context.endReason, error: context.error };
}
