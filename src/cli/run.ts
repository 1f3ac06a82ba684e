import { InvalidArgumentError, SetupError } from "../errors.js";
import { createMonotonicClock } from "../utils/clock.js";
import { createConsoleLogger, type TransferLogger } from "../utils/logger.js";
import { HELP_TEXT, parseArgs } from "./args.js";
import { type ClientCommandOptions, runClientCommand } from "./client.js";
import { runServerCommand, type ServerCommandOptions } from "./server.js";

/**
 * Collaborators of the command line, replaceable in tests.
 */
export interface CliDependencies {
  logger: TransferLogger;
  runServer: typeof runServerCommand;
  runClient: typeof runClientCommand;
}

/** Session finished, whatever the I/O outcome */
export const EXIT_OK = 0;
/** Bad arguments or failed setup */
export const EXIT_SETUP_FAILED = 1;

/**
 * Run one command and return the process exit code.
 */
export async function runCli(
  args: string[],
  deps: CliDependencies = {
    logger: createConsoleLogger(),
    runServer: runServerCommand,
    runClient: runClientCommand,
  },
): Promise<number> {
  const { logger } = deps;

  try {
    const options = parseArgs(args);
    if (options.command === "help") {
      logger.info(HELP_TEXT);
      return EXIT_OK;
    }

    const clock = createMonotonicClock();
    if (options.command === "server") {
      const serverOptions: ServerCommandOptions = { port: options.port, clock, logger };
      await deps.runServer(serverOptions);
    } else {
      const clientOptions: ClientCommandOptions = {
        host: options.host,
        port: options.port,
        seconds: options.seconds,
        bufferKb: options.bufferKb,
        clock,
        logger,
      };
      await deps.runClient(clientOptions);
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      logger.error(`Error: ${error.message}`);
      logger.error(HELP_TEXT);
      return EXIT_SETUP_FAILED;
    }
    if (error instanceof SetupError) {
      logger.error(`Error: ${error.message}`);
      return EXIT_SETUP_FAILED;
    }
    throw error;
  }
}

/**
 * One-line rendering of an error that escaped every command.
 */
export function formatFatalError(error: unknown): string {
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}
