import { CardRepo } from './cards/repo.js';
import { CardSearch } from './cards/search.js';
import { loadConfig } from './config.js';
import type { CardsConfig } from './config.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

export interface CardWorkspace {
  config: CardsConfig;
  logger: Logger;
  repo: CardRepo;
  search: CardSearch;
}

/**
 * Builds the store and the search engine over one root. Front ends create
 * a workspace once and pass it along instead of sharing module state.
 */
export function createWorkspace(config: CardsConfig = loadConfig(), logger: Logger = createLogger({ level: config.logLevel })): CardWorkspace {
  return {
    config,
    logger,
    repo: new CardRepo({ root: config.root, logger: logger.child({ component: 'repo' }) }),
    search: new CardSearch({ root: config.root, logger: logger.child({ component: 'search' }) })
  };
}

export { CardRepo, CardSearch, loadConfig, createLogger };
export type { CardsConfig, Logger };
export type { CardLocator, CreateCardInput, UpdateCardInput, MoveCardInput, ListCardsInput, StructureInput } from './cards/repo.js';
export type { SearchInput, TagSearchInput, TagListInput } from './cards/search.js';
export { scoreCard, TITLE_MATCH_WEIGHT, DEFAULT_MAX_RESULTS } from './cards/search.js';
export { resolveCardPath, resolveScope } from './cards/paths.js';
export type { ResolvedCardPath, ResolvedScope } from './cards/paths.js';
export { matchesMetadata, normalizeField, normalizeValue, toField } from './cards/metadata.js';
export type { MetadataField, MatchMode } from './cards/metadata.js';
export { extractSnippet } from './cards/snippet.js';
export { parseCardMarkdown, serializeCardFile } from './cards/card.js';
export { StoreError, resolutionHint, isResolutionError } from './cards/result.js';
export type { StoreErrorCode, StoreResult } from './cards/result.js';
export type * from './cards/types.js';
export { CARD_EXTENSION, STRUCTURE_KEYS } from './cards/types.js';
