import { describe, expect, it } from "vitest";
import { SamplerError } from "../src/errors.js";
import { RateSampler } from "../src/sampler/rate-sampler.js";
import { createRecordingLogger } from "./helpers/index.js";

function createSampler(label = "server", startTime = 0) {
  const logger = createRecordingLogger();
  const sampler = new RateSampler({ label, startTime, logger });
  return { sampler, logger };
}

describe("RateSampler", () => {
  describe("record", () => {
    it("should accumulate a non-decreasing total equal to the sum of recorded counts", () => {
      const { sampler } = createSampler();
      const totals: number[] = [];
      for (const bytes of [10, 20, 0, 5]) {
        sampler.record(bytes);
        totals.push(sampler.totalBytes);
      }
      expect(totals).toEqual([10, 30, 30, 35]);
      expect(sampler.intervalBytes).toBe(35);
    });

    it("should reject negative and fractional counts", () => {
      const { sampler } = createSampler();
      expect(() => sampler.record(-1)).toThrow(SamplerError);
      expect(() => sampler.record(1.5)).toThrow("Invalid byte count: 1.5");
      expect(sampler.totalBytes).toBe(0);
    });
  });

  describe("maybeReport", () => {
    it("should not report before one second has elapsed", () => {
      const { sampler, logger } = createSampler();
      sampler.record(100);

      expect(sampler.maybeReport(0.999)).toBeUndefined();
      expect(logger.lines).toEqual([]);
      expect(sampler.intervalBytes).toBe(100);
    });

    it("should report 1,000,000 bytes over one second as 8.00 Mb/s", () => {
      const { sampler, logger } = createSampler();
      sampler.record(1_000_000);

      const report = sampler.maybeReport(1.0);

      expect(report).toEqual({
        label: "server",
        startOffset: 0,
        endOffset: 1,
        bytes: 1_000_000,
        seconds: 1,
        bytesPerSecond: 1_000_000,
      });
      expect(logger.lines).toEqual(["[server] 0-1s: 1000000 bytes  8.00 Mb/s (1.00 MB/s)"]);
    });

    it("should reset interval bytes after a report and keep the total", () => {
      const { sampler } = createSampler();
      sampler.record(400);
      sampler.maybeReport(1.0);

      expect(sampler.intervalBytes).toBe(0);
      expect(sampler.totalBytes).toBe(400);

      sampler.record(50);
      sampler.record(25);
      expect(sampler.intervalBytes).toBe(75);
    });

    it("should use the actual elapsed time and let intervals drift", () => {
      const { sampler, logger } = createSampler("client", 10);
      sampler.record(2_500_000);

      const first = sampler.maybeReport(11.25);
      expect(first?.seconds).toBe(1.25);
      expect(first?.bytesPerSecond).toBe(2_000_000);

      sampler.record(500_000);
      expect(sampler.maybeReport(12.0)).toBeUndefined();
      const second = sampler.maybeReport(12.25);
      expect(second?.startOffset).toBe(1.25);
      expect(second?.endOffset).toBe(2.25);

      expect(logger.lines).toEqual([
        "[client] 0-1s: 2500000 bytes  16.00 Mb/s (2.00 MB/s)",
        "[client] 1-2s: 500000 bytes  4.00 Mb/s (0.50 MB/s)",
      ]);
    });
  });

  describe("finalize", () => {
    it("should report the whole session", () => {
      const { sampler, logger } = createSampler();
      sampler.record(5_000_000);

      const report = sampler.finalize(2.5);

      expect(report).toEqual({
        label: "server",
        bytes: 5_000_000,
        seconds: 2.5,
        bytesPerSecond: 2_000_000,
      });
      expect(logger.lines).toEqual(["[server] TOTAL: 5000000 bytes in 2.50s  16.00 Mb/s (2.00 MB/s)"]);
    });

    it("should not divide by zero for an instantaneous session", () => {
      const { sampler, logger } = createSampler();

      const report = sampler.finalize(0);

      expect(report.seconds).toBe(1e-6);
      expect(report.bytesPerSecond).toBe(0);
      expect(logger.lines).toEqual(["[server] TOTAL: 0 bytes in 0.00s  0.00 Mb/s (0.00 MB/s)"]);
    });

    it("should fold a short final interval into the total only", () => {
      const { sampler, logger } = createSampler();
      sampler.record(100);
      sampler.maybeReport(1.0);
      sampler.record(50);
      expect(sampler.maybeReport(1.5)).toBeUndefined();

      const report = sampler.finalize(1.5);

      expect(report.bytes).toBe(150);
      expect(report.seconds).toBe(1.5);
      expect(logger.lines).toHaveLength(2);
      expect(logger.lines[1]).toBe("[server] TOTAL: 150 bytes in 1.50s  0.00 Mb/s (0.00 MB/s)");
    });

    it("should refuse to finalize twice", () => {
      const { sampler, logger } = createSampler("client");
      sampler.finalize(1);

      expect(sampler.isFinalized).toBe(true);
      expect(() => sampler.finalize(2)).toThrow('Session "client" already finalized');
      expect(logger.lines).toHaveLength(1);
    });
  });
});
