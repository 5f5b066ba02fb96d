/**
 * Value Suggestions - Barrel Export
 *
 * Building A–Z knowledge sets from a category (via the LLM) or from a plain
 * list of items (grouped by first letter).
 */

export { groupByInitial, emptyLetterSuggestions, type LetterSuggestions } from './group-by-initial';
export {
  SuggestionService,
  DEFAULT_SUGGESTIONS_PER_KEY,
  type SuggestOptions,
} from './suggestion-service';
export { importSuggestions, type SuggestionImportStores } from './import-suggestions';
