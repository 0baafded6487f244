import type { Logger } from "../logging";
import type { JokeClient } from "../api/client";
import { toJoke } from "../domain/jokes";
import { isRecord } from "../api/validation";
import { EmptyQueryError, ExitCodes, toExitCode, wrapError } from "../errors";
import { handleError } from "../cli-utils";

export interface SearchCommandOptions {
  limit?: number;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Numbered text listing of search results. A missing or malformed
 * `result` list counts as no results.
 */
export function formatSearchResults(data: unknown, verbose: boolean): string[] {
  const items: unknown[] = isRecord(data) && Array.isArray(data.result) ? data.result : [];
  if (items.length === 0) {
    return ["No jokes found."];
  }

  const lines: string[] = [];
  items.forEach((item, index) => {
    const joke = toJoke(item);
    lines.push(`${index + 1}. ${joke.value}`);
    if (verbose) {
      lines.push(`   id: ${joke.id}`);
      if (joke.categories.length > 0) {
        lines.push(`   categories: ${joke.categories.join(", ")}`);
      }
    }
  });
  return lines;
}

export async function searchCommand(
  query: string,
  options: SearchCommandOptions,
  client: JokeClient,
  logger: Logger,
): Promise<number> {
  if (!query.trim()) {
    const error = new EmptyQueryError();
    handleError(error, logger, options);
    return toExitCode(error);
  }

  const result = await client.search(query, { limit: options.limit });
  if (!result.ok) {
    handleError(wrapError(result.error, "failed to search jokes"), logger, options);
    return toExitCode(result.error);
  }

  if (options.json) {
    logger.json(result.value);
    return ExitCodes.SUCCESS;
  }

  for (const line of formatSearchResults(result.value, options.verbose ?? false)) {
    console.log(line);
  }
  return ExitCodes.SUCCESS;
}
