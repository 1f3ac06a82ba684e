/**
 * netmeter: single-connection TCP throughput measurement.
 *
 * @example
 * ```ts
 * import { createConsoleLogger, createMonotonicClock, NodeStreamConnection, runSender } from "netmeter";
 *
 * const summary = await runSender(new NodeStreamConnection(socket), {
 *   clock: createMonotonicClock(),
 *   logger: createConsoleLogger(),
 *   seconds: 5,
 * });
 * ```
 *
 * @packageDocumentation
 */

export * from "./config.js";
export * from "./errors.js";
export * from "./fsm/fsm.js";
export type * from "./fsm/types.js";
export * from "./io/classify.js";
export * from "./io/node-stream-connection.js";
export * from "./io/types.js";
export * from "./sampler/format.js";
export * from "./sampler/rate-sampler.js";
export type * from "./sampler/types.js";
export * from "./transfer/receiver.js";
export * from "./transfer/sender.js";
export type * from "./transfer/types.js";
export * from "./utils/clock.js";
export * from "./utils/logger.js";
