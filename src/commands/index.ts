export { randomCommand, formatJoke, type RandomOptions } from "./random";
export { categoriesCommand, type CategoriesOptions } from "./categories";
export {
  searchCommand,
  formatSearchResults,
  type SearchCommandOptions,
} from "./search";
