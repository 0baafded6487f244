import type { Logger } from "../logging";
import type { JokeClient } from "../api/client";
import { toJoke, type Joke } from "../domain/jokes";
import { ExitCodes, toExitCode, wrapError } from "../errors";
import { handleError } from "../cli-utils";

export interface RandomOptions {
  category?: string;
  json?: boolean;
  verbose?: boolean;
}

export function formatJoke(joke: Joke, verbose: boolean): string[] {
  const lines: string[] = [];
  if (verbose) {
    lines.push(`ID: ${joke.id}`);
    if (joke.url) {
      lines.push(`URL: ${joke.url}`);
    }
    if (joke.categories.length > 0) {
      lines.push(`Categories: ${joke.categories.join(", ")}`);
    }
    lines.push("");
  }
  lines.push(joke.value);
  return lines;
}

/** The joke text as received; non-string values print as their JSON. */
export function jokeText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

export async function randomCommand(
  options: RandomOptions,
  client: JokeClient,
  logger: Logger,
): Promise<number> {
  const result = await client.fetchRandom({ category: options.category });
  if (!result.ok) {
    handleError(wrapError(result.error, "failed to fetch random joke"), logger, options);
    return toExitCode(result.error);
  }

  if (options.json) {
    logger.json(result.value);
    return ExitCodes.SUCCESS;
  }

  const joke = { ...toJoke(result.value), value: jokeText(result.value.value) };
  for (const line of formatJoke(joke, options.verbose ?? false)) {
    console.log(line);
  }
  return ExitCodes.SUCCESS;
}
