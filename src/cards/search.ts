import path from 'node:path';
import type { Logger } from 'pino';
import { silentLogger } from '../logger.js';
import { isDirectory, walkFiles } from './fs.js';
import { cardTags, matchesMetadata } from './metadata.js';
import { globToRegExp, resolveScope, splitLogicalPath, toRelPosix } from './paths.js';
import { ok } from './result.js';
import type { StoreResult } from './result.js';
import { foldCards } from './scan.js';
import { countOccurrences, extractSnippet } from './snippet.js';
import { CARD_EXTENSION } from './types.js';
import type { CardSummary, MetadataFilters, ParsedCardFile, ScanOutcome, SearchResult } from './types.js';

export const TITLE_MATCH_WEIGHT = 10;
export const DEFAULT_MAX_RESULTS = 50;

export interface CardSearchOptions {
  root: string;
  logger?: Logger;
}

export interface SearchInput {
  query?: string;
  metadataFilters?: MetadataFilters;
  /** Root-relative glob such as `proj/**`; `<scope>/*.md` is searched. */
  pathScope?: string;
  maxResults?: number;
  includeContent?: boolean;
}

export interface TagSearchInput {
  tags: string[];
  matchAll?: boolean;
  maxResults?: number;
  pathScope?: string;
}

export interface TagListInput {
  project?: string;
  subpath?: string;
}

/**
 * Relevance of a card for a lowercased query: a title hit weighs
 * TITLE_MATCH_WEIGHT, each body occurrence one point.
 * An empty query scores every card 1.
 */
export function scoreCard(card: ParsedCardFile, queryLower: string): number {
  if (!queryLower) return 1;
  let score = 0;
  if (card.title.toLowerCase().includes(queryLower)) score += TITLE_MATCH_WEIGHT;
  score += countOccurrences(card.content.toLowerCase(), queryLower);
  return score;
}

export class CardSearch {
  readonly root: string;
  private readonly logger: Logger;

  constructor(opts: CardSearchOptions) {
    this.root = path.resolve(opts.root);
    this.logger = opts.logger ?? silentLogger();
  }

  /** Candidate card files in scan order: depth-first, entries sorted by name. */
  private async candidates(pathScope: string): Promise<StoreResult<string[]>> {
    const scope = pathScope.trim();
    const checked = splitLogicalPath(scope);
    if (!checked.ok) return checked;
    if (!(await isDirectory(this.root))) return ok([]);

    if (!scope || scope.endsWith(CARD_EXTENSION)) {
      return ok(await walkFiles(this.root, (p) => p.endsWith(CARD_EXTENSION)));
    }

    const pattern = globToRegExp(`${checked.value.join('/')}/*${CARD_EXTENSION}`);
    return ok(await walkFiles(this.root, (p) => pattern.test(toRelPosix(this.root, p))));
  }

  async search(input: SearchInput = {}): Promise<StoreResult<ScanOutcome<SearchResult>>> {
    const maxResults = input.maxResults ?? DEFAULT_MAX_RESULTS;
    const query = input.query ?? '';
    const queryLower = query.toLowerCase();
    const filters = input.metadataFilters;

    if (maxResults <= 0) return ok({ items: [], skipped: [] });

    const files = await this.candidates(input.pathScope ?? '');
    if (!files.ok) return files;

    const outcome = await foldCards<SearchResult>(this.root, files.value, this.logger, ({ relPath, card }, items) => {
      if (filters && !matchesMetadata(card.metadata, filters)) return 'continue';

      const score = scoreCard(card, queryLower);
      if (score === 0) return 'continue';

      const result: SearchResult = { path: relPath, title: card.title, score, metadata: card.metadata };
      if (input.includeContent) {
        result.content = card.content;
      } else if (queryLower && card.content) {
        result.snippet = extractSnippet(card.content, query);
      }
      items.push(result);

      // Without a query every score is 1, so the first hits in scan order are the answer.
      return !queryLower && items.length >= maxResults ? 'stop' : 'continue';
    });

    // Array.prototype.sort is stable: equal scores keep scan order.
    const ranked = [...outcome.items].sort((a, b) => b.score - a.score).slice(0, maxResults);
    this.logger.debug({ query, hits: outcome.items.length, skipped: outcome.skipped.length }, 'search finished');
    return ok({ items: ranked, skipped: outcome.skipped });
  }

  async searchByTags(input: TagSearchInput): Promise<StoreResult<ScanOutcome<CardSummary>>> {
    const tags = input.tags.map((t) => t.toLowerCase());
    const maxResults = input.maxResults ?? DEFAULT_MAX_RESULTS;
    if (tags.length === 0 || maxResults <= 0) return ok({ items: [], skipped: [] });

    const files = await this.candidates(input.pathScope ?? '');
    if (!files.ok) return files;

    const mode = input.matchAll ? 'all' : 'any';
    const outcome = await foldCards<CardSummary>(this.root, files.value, this.logger, ({ relPath, card }, items) => {
      if (!matchesMetadata(card.metadata, { tags }, mode)) return 'continue';
      items.push({ path: relPath, title: card.title, metadata: card.metadata });
      return items.length >= maxResults ? 'stop' : 'continue';
    });
    return ok(outcome);
  }

  /** Unique lowercased tags in scope, sorted. A scope that does not exist has none. */
  async getAllTags(input: TagListInput = {}): Promise<StoreResult<ScanOutcome<string>>> {
    const scope = resolveScope(this.root, input.project, input.subpath);
    if (!scope.ok) return scope;
    if (!(await isDirectory(scope.value.absPath))) return ok({ items: [], skipped: [] });

    const files = await walkFiles(scope.value.absPath, (p) => p.endsWith(CARD_EXTENSION));
    const seen = new Set<string>();
    const outcome = await foldCards<string>(this.root, files, this.logger, ({ card }) => {
      for (const tag of cardTags(card.metadata)) seen.add(tag);
    });
    return ok({ items: [...seen].sort(), skipped: outcome.skipped });
  }
}
