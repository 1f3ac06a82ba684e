/**
 * `server` command: accept one connection and run the receiver on it.
 */

import { createServer, type Server, type Socket } from "node:net";
import { DEFAULTS } from "../config.js";
import { SetupError } from "../errors.js";
import { NodeStreamConnection } from "../io/node-stream-connection.js";
import { runReceiver } from "../transfer/receiver.js";
import type { TransferSummary } from "../transfer/types.js";
import type { Clock } from "../utils/clock.js";
import type { TransferLogger } from "../utils/logger.js";

export interface ServerCommandOptions {
  port: number;
  /** Listen address (default: all IPv4 interfaces) */
  host?: string;
  clock: Clock;
  logger: TransferLogger;
  /** Called with the bound port once listening (useful with port 0) */
  onListening?: (port: number) => void;
}

const LABEL = "server";

export async function runServerCommand(options: ServerCommandOptions): Promise<TransferSummary> {
  const { port, clock, logger } = options;
  // Half-open: the peer's FIN must not end our side before the loop sees it.
  const server = createServer({ allowHalfOpen: true });

  const boundPort = await listen(server, port, options.host ?? DEFAULTS.listenHost);
  logger.info(`[${LABEL}] listening on port ${boundPort} ...`);
  options.onListening?.(boundPort);

  let socket: Socket;
  try {
    socket = await acceptOne(server);
  } finally {
    // Exactly one connection is served; established sockets survive close().
    server.close();
  }

  logger.info(describePeers(socket));
  return runReceiver(new NodeStreamConnection(socket), { clock, logger, label: LABEL });
}

/**
 * Render the address line printed once a connection is accepted.
 */
export function describePeers(
  socket: Pick<Socket, "localAddress" | "localPort" | "remoteAddress" | "remotePort">,
): string {
  const remote = `${socket.remoteAddress ?? "?"}:${socket.remotePort ?? 0}`;
  if (socket.localAddress === undefined || socket.localPort === undefined) {
    return `[${LABEL}] remote=${remote}`;
  }
  return `[${LABEL}] local=${socket.localAddress}:${socket.localPort}  remote=${remote}`;
}

function listen(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(new SetupError("listen failed", error));
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const address = server.address();
      resolve(typeof address === "object" && address !== null ? address.port : port);
    });
  });
}

function acceptOne(server: Server): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("connection", onConnection);
      reject(new SetupError("accept failed", error));
    };
    const onConnection = (socket: Socket) => {
      server.off("error", onError);
      resolve(socket);
    };
    server.once("error", onError);
    server.once("connection", onConnection);
  });
}
