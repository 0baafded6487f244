import type { ApiConfig } from "../config";
import type { Logger } from "../logging";
import {
  HttpStatusError,
  InvalidJsonError,
  NetworkError,
  RequestTimeoutError,
} from "../errors";
import { failure, success, type ApiResult } from "./result";
import {
  requireJokeShape,
  trimSearchResults,
  type RandomJokePayload,
} from "./validation";

export type FetchLike = (input: URL, init: RequestInit) => Promise<Response>;

export const DEFAULT_SEARCH_LIMIT = 10;

// Node fires longer timer delays after 1ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface JokeClientOptions extends ApiConfig {
  fetch?: FetchLike;
  logger?: Logger;
}

export interface RequestOptions {
  /** Overrides the configured timeout for this call only. */
  timeoutMs?: number;
}

export interface RandomJokeOptions extends RequestOptions {
  category?: string;
}

export interface SearchOptions extends RequestOptions {
  limit?: number;
}

export interface JokeClient {
  fetchRandom(options?: RandomJokeOptions): Promise<ApiResult<RandomJokePayload>>;
  fetchCategories(options?: RequestOptions): Promise<ApiResult<unknown>>;
  search(query: string, options?: SearchOptions): Promise<ApiResult<unknown>>;
}

export function createJokeClient(options: JokeClientOptions): JokeClient {
  const { baseUrl, timeoutMs: defaultTimeoutMs, logger } = options;
  const doFetch: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  function buildUrl(path: string, params: Record<string, string | undefined>): URL {
    const url = new URL(`${baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }
    return url;
  }

  /**
   * Single GET with a timeout covering the request and the body read.
   * Resolves to the decoded JSON body.
   */
  async function getJson(
    path: string,
    params: Record<string, string | undefined>,
    timeoutMs: number,
  ): Promise<ApiResult<unknown>> {
    const url = buildUrl(path, params);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));

    logger?.debug(`GET ${url.toString()}`);

    try {
      let response: Response;
      try {
        response = await doFetch(url, {
          method: "GET",
          headers: { Accept: "application/json" },
          signal: controller.signal,
        });
      } catch (err) {
        return failure(
          timedOut ? new RequestTimeoutError(path, timeoutMs) : new NetworkError(path, err),
        );
      }

      if (!response.ok) {
        // Release the connection; the error body is not used.
        await response.body?.cancel().catch((err: unknown) => {
          logger?.debug(`Discarding body of GET ${path} failed: ${String(err)}`);
        });
        return failure(new HttpStatusError(path, response.status, response.statusText));
      }

      let body: string;
      try {
        body = await response.text();
      } catch (err) {
        return failure(
          timedOut ? new RequestTimeoutError(path, timeoutMs) : new NetworkError(path, err),
        );
      }

      logger?.debug(`GET ${path} -> ${response.status} (${Buffer.byteLength(body)} bytes)`);

      try {
        const data: unknown = JSON.parse(body);
        return success(data);
      } catch (err) {
        return failure(new InvalidJsonError(path, err));
      }
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    async fetchRandom(opts = {}) {
      const path = "/jokes/random";
      const result = await getJson(
        path,
        { category: opts.category || undefined },
        opts.timeoutMs ?? defaultTimeoutMs,
      );
      if (!result.ok) {
        return result;
      }
      return requireJokeShape(result.value, path);
    },

    async fetchCategories(opts = {}) {
      return getJson("/jokes/categories", {}, opts.timeoutMs ?? defaultTimeoutMs);
    },

    async search(query, opts = {}) {
      const result = await getJson(
        "/jokes/search",
        { query },
        opts.timeoutMs ?? defaultTimeoutMs,
      );
      if (!result.ok) {
        return result;
      }
      return success(trimSearchResults(result.value, opts.limit ?? DEFAULT_SEARCH_LIMIT));
    },
  };
}
