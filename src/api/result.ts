import type { ApiError } from "../errors";

/**
 * Outcome of a client call. Client methods never throw for request,
 * decode or shape failures; they return them here instead.
 */
export type ApiResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ApiError };

export function success<T>(value: T): ApiResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: ApiError): ApiResult<T> {
  return { ok: false, error };
}
