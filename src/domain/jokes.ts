import { JokeSchema, SearchResultsSchema } from "../schemas";
import { isRecord } from "../api/validation";

export interface Joke {
  readonly id: string;
  readonly value: string;
  readonly url?: string;
  readonly icon_url?: string;
  readonly categories: readonly string[];
}

export interface SearchResults {
  readonly total: number;
  readonly result: readonly Joke[];
}

/**
 * Builds a Joke from a decoded body. Missing or mistyped fields take their
 * defaults: "" for id and value, absent for the URLs, [] for categories.
 */
export function toJoke(raw: unknown): Joke {
  const parsed = JokeSchema.parse(isRecord(raw) ? raw : {});
  const joke: Joke = {
    id: parsed.id,
    value: parsed.value,
    categories: Object.freeze([...parsed.categories]),
    ...(parsed.url !== undefined ? { url: parsed.url } : {}),
    ...(parsed.icon_url !== undefined ? { icon_url: parsed.icon_url } : {}),
  };
  return Object.freeze(joke);
}

/** `total` falls back to the number of parsed items when absent. */
export function toSearchResults(raw: unknown): SearchResults {
  const parsed = SearchResultsSchema.parse(isRecord(raw) ? raw : {});
  const result = Object.freeze(parsed.result.map(toJoke));
  return Object.freeze({ total: parsed.total ?? result.length, result });
}
