/**
 * `client` command: resolve, connect and run the sender.
 */

import { lookup } from "node:dns/promises";
import { connect, isIPv4, type Socket } from "node:net";
import { ResolveError, SetupError } from "../errors.js";
import { toError } from "../io/classify.js";
import { NodeStreamConnection } from "../io/node-stream-connection.js";
import { createSendBuffer, runSender } from "../transfer/sender.js";
import type { TransferSummary } from "../transfer/types.js";
import type { Clock } from "../utils/clock.js";
import type { TransferLogger } from "../utils/logger.js";

/**
 * Resolve a host name to one IPv4 address.
 */
export type HostLookup = (host: string) => Promise<string>;

export interface ClientCommandOptions {
  host: string;
  port: number;
  seconds: number;
  bufferKb: number;
  clock: Clock;
  logger: TransferLogger;
  lookup?: HostLookup;
}

const LABEL = "client";

const dnsLookup: HostLookup = async (host) => {
  const { address } = await lookup(host, { family: 4 });
  return address;
};

export async function runClientCommand(options: ClientCommandOptions): Promise<TransferSummary> {
  const { host, port, seconds, bufferKb, clock, logger } = options;

  // Allocated before connecting so that a failure leaves no socket behind.
  const buffer = createSendBuffer(bufferKb);
  const address = await resolveHost(host, options.lookup);
  logger.info(`[${LABEL}] connect ${host}:${port} ...`);
  const connection = new NodeStreamConnection(await openConnection(address, port));

  logger.info(`[${LABEL}] seconds=${seconds}  buf=${bufferKb}KB  (single TCP stream)`);
  try {
    return await runSender(connection, { clock, logger, label: LABEL, seconds, buffer });
  } catch (error) {
    await connection.close();
    throw error;
  }
}

/**
 * Numeric IPv4 literals are used as-is; anything else goes through DNS.
 *
 * @throws ResolveError when the lookup fails
 */
export async function resolveHost(host: string, hostLookup: HostLookup = dnsLookup): Promise<string> {
  if (isIPv4(host)) {
    return host;
  }
  try {
    return await hostLookup(host);
  } catch (error) {
    throw new ResolveError(host, toError(error));
  }
}

function openConnection(address: string, port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host: address, port, allowHalfOpen: true });
    const onError = (error: Error) => {
      socket.destroy();
      reject(new SetupError("connect failed", error));
    };
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      resolve(socket);
    });
  });
}
