import {
  Command,
  CommanderError,
  InvalidArgumentError,
  type OutputConfiguration,
} from "commander";
import { initLogger, logger, type Logger } from "./logging";
import { loadConfig } from "./config";
import {
  createJokeClient,
  DEFAULT_SEARCH_LIMIT,
  type FetchLike,
  type JokeClient,
} from "./api/client";
import { executeCommand, handleError } from "./cli-utils";
import { ConfigError, ExitCodes, toExitCode } from "./errors";
import { randomCommand, categoriesCommand, searchCommand } from "./commands";

export const VERSION = "0.1.0";

export type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
  debug?: boolean;
  json?: boolean;
  color?: boolean;
};

export interface RunDependencies {
  /** Environment the API configuration is read from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  /** When set, used as-is instead of a logger built from the global flags. */
  logger?: Logger;
  output?: OutputConfiguration;
}

export interface CliSession {
  logger: Logger;
  client?: JokeClient;
  exitCode: number;
}

export function createSession(deps: RunDependencies = {}): CliSession {
  return {
    logger: deps.logger ?? logger,
    exitCode: ExitCodes.NO_COMMAND,
  };
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (value.trim() === "" || !Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError("Limit must be a non-negative integer.");
  }
  return limit;
}

function requireClient(session: CliSession): JokeClient {
  if (!session.client) {
    throw new ConfigError("API client used before configuration was loaded");
  }
  return session.client;
}

export function createProgram(
  deps: RunDependencies = {},
  session: CliSession = createSession(deps),
): Command {
  const program = new Command();

  // Parse failures surface as CommanderError instead of exiting the process.
  program.exitOverride();
  if (deps.output) {
    program.configureOutput(deps.output);
  }

  program
    .name("chuck")
    .description("Chuck Norris jokes CLI")
    .version(VERSION)
    .option("-v, --verbose", "Verbose output")
    .option("--json", "Output JSON")
    .option("--quiet", "Only log errors")
    .option("--debug", "Output structured JSON logs (ndjson format)")
    .option("--no-color", "Disable colored log output");

  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    if (!deps.logger) {
      session.logger = initLogger({
        verbose: opts.verbose,
        quiet: opts.quiet,
        debug: opts.debug,
        noColor: opts.color === false,
      });
    }
    const config = loadConfig(deps.env ?? process.env);
    session.logger.debug(
      `Using ${config.baseUrl} with a ${config.timeoutMs}ms timeout`,
    );
    session.client = createJokeClient({
      ...config,
      fetch: deps.fetch,
      logger: session.logger,
    });
  });

  program
    .command("random")
    .description("Get a single random joke")
    .option("-c, --category <name>", "Category to fetch a random joke from")
    .action(async (options: { category?: string }, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      session.exitCode = await executeCommand(
        () =>
          randomCommand(
            {
              category: options.category,
              json: globalOpts.json,
              verbose: globalOpts.verbose,
            },
            requireClient(session),
            session.logger,
          ),
        session.logger,
        globalOpts,
      );
    });

  program
    .command("categories")
    .description("List available joke categories")
    .action(async (_options: unknown, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      session.exitCode = await executeCommand(
        () =>
          categoriesCommand(
            { json: globalOpts.json, verbose: globalOpts.verbose },
            requireClient(session),
            session.logger,
          ),
        session.logger,
        globalOpts,
      );
    });

  program
    .command("search <query>")
    .description("Search jokes by query")
    .option(
      "-n, --limit <n>",
      "Limit number of results",
      parseLimit,
      DEFAULT_SEARCH_LIMIT,
    )
    .action(async (query: string, options: { limit: number }, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
      session.exitCode = await executeCommand(
        () =>
          searchCommand(
            query,
            {
              limit: options.limit,
              json: globalOpts.json,
              verbose: globalOpts.verbose,
            },
            requireClient(session),
            session.logger,
          ),
        session.logger,
        globalOpts,
      );
    });

  return program;
}

export const program = createProgram();

/**
 * Parses `argv` (user arguments only, without the node and script paths),
 * runs at most one command and resolves to the process exit code.
 */
export async function run(
  argv: string[],
  deps: RunDependencies = {},
): Promise<number> {
  const session = createSession(deps);
  const cli = createProgram(deps, session);

  try {
    await cli.parseAsync(argv, { from: "user" });
    return session.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    handleError(error, session.logger, {});
    return toExitCode(error);
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  process.on("unhandledRejection", (reason) => {
    const msg = reason instanceof Error ? reason.message : String(reason);
    logger.error(`[FATAL] Unhandled Rejection: ${msg}`);
    process.exitCode = ExitCodes.UNEXPECTED;
  });

  process.on("uncaughtException", (error) => {
    logger.error(`[FATAL] Uncaught Exception: ${error.message}`);
    if (error.stack) logger.error(error.stack);
    process.exit(ExitCodes.UNEXPECTED);
  });

  return run(argv);
}
