export class ChuckError extends Error {
  constructor(
    message: string,
    public code: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ChuckError";
  }
}

/**
 * Error codes for programmatic error handling.
 * All error codes are uppercase snake_case.
 */
export const ErrorCodes = {
  NETWORK_ERROR: "NETWORK_ERROR",
  TIMEOUT: "TIMEOUT",
  HTTP_STATUS: "HTTP_STATUS",
  INVALID_JSON: "INVALID_JSON",
  UNEXPECTED_SHAPE: "UNEXPECTED_SHAPE",
  EMPTY_QUERY: "EMPTY_QUERY",
  CONFIG_ERROR: "CONFIG_ERROR",
  WRAPPED_ERROR: "WRAPPED_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Process exit codes. Every failure that surfaces as a ChuckError is a
 * handled failure.
 */
export const ExitCodes = {
  SUCCESS: 0,
  NO_COMMAND: 1,
  UNEXPECTED: 1,
  HANDLED_FAILURE: 2,
} as const;

// ============================================================================
// Request Errors
// ============================================================================

/**
 * Thrown when a request cannot complete (DNS, refused connection, reset).
 */
export class NetworkError extends ChuckError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Network error during GET ${path}: ${reason}`, ErrorCodes.NETWORK_ERROR, {
      cause,
    });
    this.name = "NetworkError";
  }
}

/**
 * Thrown when a request does not complete within its timeout.
 */
export class RequestTimeoutError extends ChuckError {
  constructor(
    public readonly path: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `Request timed out after ${timeoutMs}ms during GET ${path}`,
      ErrorCodes.TIMEOUT,
    );
    this.name = "RequestTimeoutError";
  }
}

export class HttpStatusError extends ChuckError {
  constructor(
    public readonly path: string,
    public readonly status: number,
    statusText: string,
  ) {
    const label = statusText ? `${status} ${statusText}` : String(status);
    super(`HTTP ${label} from GET ${path}`, ErrorCodes.HTTP_STATUS);
    this.name = "HttpStatusError";
  }
}

export class InvalidJsonError extends ChuckError {
  constructor(
    public readonly path: string,
    cause?: unknown,
  ) {
    super(`Invalid JSON received from GET ${path}`, ErrorCodes.INVALID_JSON, {
      cause,
    });
    this.name = "InvalidJsonError";
  }
}

/**
 * Thrown when a decoded body lacks a field the caller requires.
 */
export class ResponseShapeError extends ChuckError {
  constructor(
    public readonly path: string,
    public readonly missingField: string,
  ) {
    super(
      `API returned unexpected response shape from GET ${path} (missing '${missingField}')`,
      ErrorCodes.UNEXPECTED_SHAPE,
    );
    this.name = "ResponseShapeError";
  }
}

/** Failure kinds a client call can return. */
export type ApiError =
  | NetworkError
  | RequestTimeoutError
  | HttpStatusError
  | InvalidJsonError
  | ResponseShapeError;

// ============================================================================
// Input and Configuration Errors
// ============================================================================

export class EmptyQueryError extends ChuckError {
  constructor() {
    super("search query cannot be empty", ErrorCodes.EMPTY_QUERY);
    this.name = "EmptyQueryError";
  }
}

export class ConfigError extends ChuckError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIG_ERROR);
    this.name = "ConfigError";
  }
}

export function isChuckError(error: unknown): error is ChuckError {
  return error instanceof ChuckError;
}

export function toExitCode(error: unknown): number {
  if (error === null || error === undefined) {
    return ExitCodes.SUCCESS;
  }

  if (isChuckError(error)) {
    return ExitCodes.HANDLED_FAILURE;
  }

  return ExitCodes.UNEXPECTED;
}

export function wrapError(error: unknown, context: string): ChuckError {
  if (error instanceof ChuckError) {
    return new ChuckError(`${context}: ${error.message}`, error.code, {
      cause: error,
    });
  }

  if (error instanceof Error) {
    return new ChuckError(
      `${context}: ${error.message}`,
      ErrorCodes.WRAPPED_ERROR,
      { cause: error },
    );
  }

  return new ChuckError(
    `${context}: ${String(error)}`,
    ErrorCodes.WRAPPED_ERROR,
  );
}
