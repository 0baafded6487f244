import { z } from "zod";

export const DEFAULT_BASE_URL = "https://api.chucknorris.io";
export const DEFAULT_TIMEOUT_SECONDS = 10;
/** Longest delay a Node timer accepts (2^31 - 1 ms), in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

// ============================================================
// Response records
// Every field falls back to a default instead of failing, so a
// record can always be built from whatever the server sent.
// ============================================================

export const JokeSchema = z.object({
  id: z.string().catch(""),
  value: z.string().catch(""),
  url: z.string().optional().catch(undefined),
  icon_url: z.string().optional().catch(undefined),
  categories: z.array(z.string()).catch([]),
});

export const SearchResultsSchema = z.object({
  total: z.number().int().optional().catch(undefined),
  result: z.array(z.unknown()).catch([]),
});

// ============================================================
// Environment configuration
// ============================================================

function blankAsUnset(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

export const EnvConfigSchema = z.object({
  baseUrl: z.preprocess(
    blankAsUnset,
    z.string().url().default(DEFAULT_BASE_URL),
  ),
  timeoutSeconds: z.preprocess(
    blankAsUnset,
    z.coerce
      .number()
      .positive()
      .max(MAX_TIMEOUT_SECONDS)
      .default(DEFAULT_TIMEOUT_SECONDS),
  ),
});
