import { Duplex } from "node:stream";
import { describe, expect, it } from "vitest";
import { NodeStreamConnection } from "../src/io/node-stream-connection.js";

interface FakeSocketOptions {
  writableHighWaterMark?: number;
  /** Acknowledge writes on a later turn of the event loop */
  deferWrites?: boolean;
}

/**
 * In-process duplex standing in for a TCP socket: tests push inbound bytes,
 * outbound bytes are collected in `written`.
 */
function createFakeSocket(options: FakeSocketOptions = {}) {
  const written: Buffer[] = [];
  let finished = false;
  const stream = new Duplex({
    writableHighWaterMark: options.writableHighWaterMark,
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk);
      if (options.deferWrites) {
        setImmediate(callback);
      } else {
        callback();
      }
    },
    final(callback) {
      finished = true;
      callback();
    },
  });
  return { stream, written, isFinished: () => finished };
}

function text(buffer: Uint8Array, length: number): string {
  return Buffer.from(buffer.subarray(0, length)).toString("utf8");
}

describe("NodeStreamConnection", () => {
  describe("read", () => {
    it("should split buffered data across reads and report end of stream", async () => {
      const { stream } = createFakeSocket();
      const connection = new NodeStreamConnection(stream);
      stream.push(Buffer.from("hello world"));
      const buffer = new Uint8Array(5);

      expect(await connection.read(buffer)).toEqual({ kind: "ok", bytes: 5 });
      expect(text(buffer, 5)).toBe("hello");
      expect(await connection.read(buffer)).toEqual({ kind: "ok", bytes: 5 });
      expect(text(buffer, 5)).toBe(" worl");
      expect(await connection.read(buffer)).toEqual({ kind: "ok", bytes: 1 });
      expect(text(buffer, 1)).toBe("d");

      stream.push(null);
      expect(await connection.read(buffer)).toEqual({ kind: "closed" });
    });

    it("should wait for data that arrives later", async () => {
      const { stream } = createFakeSocket();
      const connection = new NodeStreamConnection(stream);
      const buffer = new Uint8Array(16);

      const pending = connection.read(buffer);
      setImmediate(() => stream.push(Buffer.from("abc")));

      expect(await pending).toEqual({ kind: "ok", bytes: 3 });
      expect(text(buffer, 3)).toBe("abc");
    });

    it("should report a stream error as fatal", async () => {
      const { stream } = createFakeSocket();
      const connection = new NodeStreamConnection(stream);
      const failure = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });

      const pending = connection.read(new Uint8Array(8));
      stream.destroy(failure);

      expect(await pending).toEqual({ kind: "fatal", error: failure });
    });
  });

  describe("write", () => {
    it("should hand the whole buffer to the stream", async () => {
      const { stream, written } = createFakeSocket();
      const connection = new NodeStreamConnection(stream);

      expect(await connection.write(Buffer.from("payload"))).toEqual({ kind: "ok", bytes: 7 });
      expect(Buffer.concat(written).toString("utf8")).toBe("payload");
    });

    it("should wait for drain under backpressure", async () => {
      const { stream, written } = createFakeSocket({ writableHighWaterMark: 4, deferWrites: true });
      const connection = new NodeStreamConnection(stream);

      const outcome = await connection.write(new Uint8Array(16).fill(0x41));

      expect(outcome).toEqual({ kind: "ok", bytes: 16 });
      expect(stream.writableNeedDrain).toBe(false);
      expect(written).toHaveLength(1);
    });

    it("should fail once the stream is destroyed", async () => {
      const { stream } = createFakeSocket();
      const connection = new NodeStreamConnection(stream);
      stream.destroy();

      const outcome = await connection.write(new Uint8Array(4));

      expect(outcome.kind).toBe("fatal");
    });
  });

  describe("shutdownWrite", () => {
    it("should end the writable side and keep reading", async () => {
      const { stream, isFinished } = createFakeSocket();
      const connection = new NodeStreamConnection(stream);

      expect(await connection.shutdownWrite()).toEqual({ kind: "closed" });
      expect(isFinished()).toBe(true);
      expect(stream.writableFinished).toBe(true);

      stream.push(Buffer.from("x"));
      expect(await connection.read(new Uint8Array(4))).toEqual({ kind: "ok", bytes: 1 });
    });
  });

  describe("close", () => {
    it("should destroy the stream", async () => {
      const { stream } = createFakeSocket();
      const connection = new NodeStreamConnection(stream);

      await connection.close();
      expect(stream.destroyed).toBe(true);

      await connection.close();
      expect(await connection.read(new Uint8Array(4))).toEqual({ kind: "closed" });
    });
  });
});
