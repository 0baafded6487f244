import type { Logger } from "./logging";
import { toExitCode, isChuckError } from "./errors";

export interface CommandOptions {
  verbose?: boolean;
  quiet?: boolean;
  debug?: boolean;
  json?: boolean;
}

/**
 * Runs a command handler and turns anything it throws into a logged line
 * and an exit code. Handlers report expected failures themselves and
 * return their own exit code.
 */
export async function executeCommand(
  fn: () => Promise<number>,
  logger: Logger,
  options: CommandOptions,
): Promise<number> {
  try {
    return await fn();
  } catch (error) {
    handleError(error, logger, options);
    return toExitCode(error);
  }
}

export function handleError(
  error: unknown,
  logger: Logger,
  options: CommandOptions,
): void {
  if (isChuckError(error)) {
    logger.error(`[${error.code}] ${error.message}`);
  } else if (error instanceof Error) {
    logger.error(error.message);
    if (options.verbose) {
      logger.debug(error.stack || "");
    }
  } else {
    logger.error(String(error));
  }
}
