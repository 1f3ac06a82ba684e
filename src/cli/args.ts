import { DEFAULTS } from "../config.js";
import { InvalidArgumentError } from "../errors.js";

export const HELP_TEXT = `
netmeter - single-connection TCP throughput tester

Usage:
  netmeter server <port>
  netmeter client <host> <port> [seconds=${DEFAULTS.seconds}] [buffer_kb=${DEFAULTS.bufferKb}]

Commands:
  server, s    Accept one connection on <port>, receive and discard,
               print per-second and total rates
  client, c    Connect to <host>:<port>, send for [seconds],
               print per-second and total rates

Examples:
  netmeter server 5201
  netmeter client 192.168.1.10 5201
  netmeter client bench-host 5201 30 64
`;

/**
 * Parsed command line.
 */
export type CliOptions =
  | { command: "help" }
  | { command: "server"; port: number }
  | { command: "client"; host: string; port: number; seconds: number; bufferKb: number };

/**
 * Parse command line arguments (without the node and script entries).
 *
 * @throws InvalidArgumentError on a missing or malformed argument
 */
export function parseArgs(args: string[]): CliOptions {
  const [command, ...rest] = args;

  switch (command) {
    case undefined:
      throw new InvalidArgumentError("missing command");

    case "-h":
    case "--help":
    case "help":
      return { command: "help" };

    case "s":
    case "server":
      return { command: "server", port: parsePort(rest[0]) };

    case "c":
    case "client": {
      const [host, port, seconds, bufferKb] = rest;
      if (!host) {
        throw new InvalidArgumentError("missing host");
      }
      return {
        command: "client",
        host,
        port: parsePort(port),
        seconds: positiveOrDefault(parseLenientInt(seconds), DEFAULTS.seconds),
        bufferKb: positiveOrDefault(parseLenientInt(bufferKb), DEFAULTS.bufferKb),
      };
    }

    default:
      throw new InvalidArgumentError(`unknown command: ${command} (use 'server' or 'client')`);
  }
}

/**
 * Parse a TCP port: decimal digits only, 1 to 65535.
 */
export function parsePort(value: string | undefined): number {
  if (value === undefined) {
    throw new InvalidArgumentError("missing port");
  }
  const port = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`bad port: ${value}`);
  }
  return port;
}

/**
 * Parse a leading integer the way `atoi` does: junk yields 0.
 */
export function parseLenientInt(value: string | undefined): number {
  if (value === undefined) return 0;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function positiveOrDefault(value: number, fallback: number): number {
  return value > 0 ? value : fallback;
}
