import { ResponseShapeError } from "../errors";
import { failure, success, type ApiResult } from "./result";

/** A decoded random-joke body: any object that carries a `value` key. */
export type RandomJokePayload = Record<string, unknown> & { value: unknown };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function hasJokeValue(data: unknown): data is RandomJokePayload {
  return isRecord(data) && "value" in data;
}

/**
 * Accepts a decoded body only when it is an object with a `value` key.
 * The object is returned as decoded; no fields are stripped.
 */
export function requireJokeShape(
  data: unknown,
  path: string,
): ApiResult<RandomJokePayload> {
  if (!hasJokeValue(data)) {
    return failure(new ResponseShapeError(path, "value"));
  }
  return success(data);
}

/**
 * Keeps the first `limit` entries of a search body's `result` list.
 * Bodies without a `result` list are returned untouched.
 */
export function trimSearchResults(data: unknown, limit: number): unknown {
  if (!isRecord(data) || !Array.isArray(data.result)) {
    return data;
  }
  const keep = Math.max(0, Math.floor(limit));
  return { ...data, result: data.result.slice(0, keep) };
}
