/**
 * StreamConnection over a Node.js duplex stream (a `net.Socket` in practice).
 *
 * Reads are pull-based: the stream stays paused and bytes are taken from
 * its internal buffer on demand, so TCP flow control applies while the
 * loop is busy elsewhere.
 */

import type { Duplex } from "node:stream";
import { classifyIoError, toError } from "./classify.js";
import { IoOutcomes, type IoOutcome, type StreamConnection } from "./types.js";

export class NodeStreamConnection implements StreamConnection {
  private readonly stream: Duplex;
  private pending: Uint8Array | null = null;
  private ended = false;
  private closed = false;
  private failure: Error | undefined;
  private waiter: (() => void) | null = null;

  constructor(stream: Duplex) {
    this.stream = stream;
    const wake = () => this.wake();
    stream.on("readable", wake);
    stream.on("drain", wake);
    stream.on("finish", wake);
    stream.on("end", () => {
      this.ended = true;
      this.wake();
    });
    stream.on("error", (error: Error) => {
      this.failure ??= error;
      this.wake();
    });
    stream.on("close", () => {
      this.closed = true;
      this.wake();
    });
  }

  async read(buffer: Uint8Array): Promise<IoOutcome> {
    while (true) {
      if (this.pending) {
        return this.takePending(buffer);
      }

      const chunk = this.readChunk();
      if (chunk) {
        this.pending = chunk;
        continue;
      }

      if (this.failure) {
        return classifyIoError(this.failure);
      }
      if (this.ended || this.closed) {
        return IoOutcomes.closed();
      }
      await this.waitForEvent();
    }
  }

  async write(buffer: Uint8Array): Promise<IoOutcome> {
    if (this.failure) {
      return classifyIoError(this.failure);
    }
    if (this.closed || this.stream.destroyed || this.stream.writableEnded) {
      return IoOutcomes.fatal(new Error("write after end"));
    }

    const accepted = this.stream.write(buffer, (error?: Error | null) => {
      if (error) {
        this.failure ??= error;
        this.wake();
      }
    });
    if (!accepted) {
      while (this.stream.writableNeedDrain && !this.failure && !this.closed) {
        await this.waitForEvent();
      }
    }

    if (this.failure) {
      return classifyIoError(this.failure);
    }
    if (this.closed) {
      return IoOutcomes.fatal(new Error("connection closed during write"));
    }
    return IoOutcomes.ok(buffer.length);
  }

  /**
   * End the writable side and wait until queued data is flushed.
   *
   * @returns `closed` once the write side is shut down, `fatal` otherwise
   */
  async shutdownWrite(): Promise<IoOutcome> {
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
    while (!this.stream.writableFinished && !this.failure && !this.closed) {
      await this.waitForEvent();
    }
    if (this.failure) {
      return IoOutcomes.fatal(toError(this.failure));
    }
    return this.stream.writableFinished
      ? IoOutcomes.closed()
      : IoOutcomes.fatal(new Error("connection closed before shutdown completed"));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    const closed = new Promise<void>((resolve) => {
      this.stream.once("close", () => resolve());
    });
    this.stream.destroy();
    await closed;
  }

  private takePending(buffer: Uint8Array): IoOutcome {
    const pending = this.pending;
    if (!pending) {
      return IoOutcomes.closed();
    }
    const count = Math.min(pending.length, buffer.length);
    buffer.set(pending.subarray(0, count));
    this.pending = count < pending.length ? pending.subarray(count) : null;
    return IoOutcomes.ok(count);
  }

  private readChunk(): Uint8Array | null {
    const chunk: unknown = this.stream.read();
    if (chunk === null || chunk === undefined) {
      return null;
    }
    if (typeof chunk === "string") {
      return Buffer.from(chunk);
    }
    if (chunk instanceof Uint8Array) {
      return chunk.length > 0 ? chunk : null;
    }
    return null;
  }

  private waitForEvent(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiter = resolve;
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
