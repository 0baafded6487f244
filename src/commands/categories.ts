import type { Logger } from "../logging";
import type { JokeClient } from "../api/client";
import { ExitCodes, toExitCode, wrapError } from "../errors";
import { handleError } from "../cli-utils";

export interface CategoriesOptions {
  json?: boolean;
  verbose?: boolean;
}

export async function categoriesCommand(
  options: CategoriesOptions,
  client: JokeClient,
  logger: Logger,
): Promise<number> {
  const result = await client.fetchCategories();
  if (!result.ok) {
    handleError(wrapError(result.error, "failed to fetch categories"), logger, options);
    return toExitCode(result.error);
  }

  const categories = result.value;

  // The endpoint is not shape-checked; anything but a list is shown as JSON.
  if (options.json || !Array.isArray(categories)) {
    logger.json(categories);
    return ExitCodes.SUCCESS;
  }

  for (const category of categories) {
    console.log(String(category));
  }
  return ExitCodes.SUCCESS;
}
