import pino from "pino";
import pretty from "pino-pretty";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  json(data: unknown): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  debug?: boolean;
}

const STDERR = 2;

export function resolveLevel(options?: LoggerOptions): LogLevel {
  const { verbose = false, quiet = false, debug = false } = options ?? {};
  if (debug || verbose) {
    return "debug";
  }
  if (quiet) {
    return "error";
  }
  return "info";
}

/**
 * Pretty output is colored only when stderr is a terminal and color was not
 * turned off with `--no-color`.
 */
export function shouldColorize(
  options?: LoggerOptions,
  isTTY: boolean = process.stderr.isTTY === true,
): boolean {
  return isTTY && !(options?.noColor ?? false);
}

/** Info lines print bare; other levels get a `LEVEL: ` prefix. */
export function formatLogLine(level: number, message: string): string {
  if (level === 30) return message;
  const levelLabel = level === 40 ? "WARN" : level === 50 ? "ERROR" : "DEBUG";
  return `${levelLabel}: ${message}`;
}

function createPinoLogger(options?: LoggerOptions): pino.Logger {
  const level = resolveLevel(options);

  // Raw ndjson for --debug, pretty lines otherwise. Both go to stderr so that
  // stdout only ever carries command output.
  if (options?.debug) {
    return pino(
      {
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(STDERR),
    );
  }

  const stream = pretty({
    colorize: shouldColorize(options),
    destination: STDERR,
    ignore: "pid,hostname,time,level",
    messageFormat: (log, messageKey) =>
      formatLogLine(Number(log.level), String(log[messageKey])),
    singleLine: true,
  });

  return pino({ level }, stream);
}

export function createLogger(options?: LoggerOptions): Logger {
  const pinoLogger = createPinoLogger(options);

  const forward =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (args.length > 0) {
        pinoLogger[level]({ args }, message);
      } else {
        pinoLogger[level](message);
      }
    };

  return {
    debug: forward("debug"),
    info: forward("info"),
    warn: forward("warn"),
    error: forward("error"),
    json(data: unknown): void {
      console.log(JSON.stringify(data, null, 2));
    },
  };
}

export let logger: Logger = createLogger();

export function setLogger(l: Logger): void {
  logger = l;
}

export function initLogger(options?: LoggerOptions): Logger {
  const l = createLogger(options);
  setLogger(l);
  return l;
}
