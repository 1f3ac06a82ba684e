/**
 * Mapping from native error codes to I/O outcomes.
 */

import { IoOutcomes, type IoOutcome } from "./types.js";

const INTERRUPTED_CODES = new Set(["EINTR"]);
const WOULD_BLOCK_CODES = new Set(["EAGAIN", "EWOULDBLOCK"]);

/**
 * Extract the errno-style code of an error, if it carries one.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}

/**
 * Classify a failed I/O call.
 */
export function classifyIoError(error: unknown): IoOutcome {
  const code = getErrorCode(error);
  if (code !== undefined && INTERRUPTED_CODES.has(code)) {
    return IoOutcomes.interrupted();
  }
  if (code !== undefined && WOULD_BLOCK_CODES.has(code)) {
    return IoOutcomes.wouldBlock();
  }
  return IoOutcomes.fatal(toError(error));
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
