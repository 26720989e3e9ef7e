import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Logger } from 'pino';
import { silentLogger } from '../logger.js';
import { applyCardPatch, newCardFile, parseCardMarkdown, serializeCardFile } from './card.js';
import { ensureDir, fileExists, isDirectory, isFile, pruneEmptyDirs, readText, walkFiles, writeText } from './fs.js';
import { resolveCardPath, resolveScope } from './paths.js';
import type { ResolvedCardPath } from './paths.js';
import { fail, ok } from './result.js';
import type { StoreResult } from './result.js';
import { foldCards } from './scan.js';
import { buildStructure } from './structure.js';
import { CARD_EXTENSION } from './types.js';
import type { Card, CardMetadata, CardSummary, DirectoryNode, ParsedCardFile, ScanOutcome, StructureOutcome } from './types.js';

export interface CardRepoOptions {
  root: string; // store root, one directory per project below it
  logger?: Logger;
}

export interface CardLocator {
  project?: string;
  path: string;
}

export interface CreateCardInput extends CardLocator {
  title: string;
  content?: string;
  metadata?: CardMetadata;
}

export interface UpdateCardInput extends CardLocator {
  title?: string;
  content?: string;
  metadata?: CardMetadata; // merged key by key into the stored metadata
}

export interface MoveCardInput {
  project?: string;
  from: string;
  to: string;
}

export interface ListCardsInput {
  project?: string;
  subpath?: string;
  recursive?: boolean;
  includeContent?: boolean;
}

export interface StructureInput {
  project?: string;
  subpath?: string;
}

function toCard(relPath: string, file: ParsedCardFile): Card {
  return { path: relPath, title: file.title, content: file.content, metadata: file.metadata };
}

export class CardRepo {
  readonly root: string;
  private readonly logger: Logger;

  constructor(opts: CardRepoOptions) {
    this.root = path.resolve(opts.root);
    this.logger = opts.logger ?? silentLogger();
  }

  private resolve(project: string | undefined, logicalPath: string): StoreResult<ResolvedCardPath> {
    return resolveCardPath(this.root, project, logicalPath);
  }

  private async loadFile(absPath: string, relPath: string): Promise<StoreResult<ParsedCardFile>> {
    const md = await readText(absPath);
    try {
      return ok(parseCardMarkdown(md));
    } catch (err) {
      return fail('MALFORMED_CARD', `cannot parse ${relPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private async pruneFrom(dir: string): Promise<void> {
    try {
      const removed = await pruneEmptyDirs(dir, this.root);
      if (removed.length > 0) this.logger.debug({ removed }, 'pruned empty directories');
    } catch (err) {
      // Another writer may have raced us; the card operation itself succeeded.
      this.logger.warn({ dir, err }, 'could not prune empty directories');
    }
  }

  async create(input: CreateCardInput): Promise<StoreResult<Card>> {
    const resolved = this.resolve(input.project, input.path);
    if (!resolved.ok) return resolved;
    const { absPath, relPath } = resolved.value;

    const file = newCardFile(input.title, input.content ?? '', input.metadata);
    await ensureDir(path.dirname(absPath));
    await writeText(absPath, serializeCardFile(file));
    this.logger.debug({ path: relPath }, 'created card');
    return ok(toCard(relPath, file));
  }

  async read(input: CardLocator): Promise<StoreResult<Card | null>> {
    const resolved = this.resolve(input.project, input.path);
    if (!resolved.ok) return resolved;
    const { absPath, relPath } = resolved.value;

    if (!(await isFile(absPath))) return ok(null);
    const loaded = await this.loadFile(absPath, relPath);
    if (!loaded.ok) return loaded;
    return ok(toCard(relPath, loaded.value));
  }

  async update(input: UpdateCardInput): Promise<StoreResult<Card | null>> {
    const resolved = this.resolve(input.project, input.path);
    if (!resolved.ok) return resolved;
    const { absPath, relPath } = resolved.value;

    if (!(await isFile(absPath))) return ok(null);
    const loaded = await this.loadFile(absPath, relPath);
    if (!loaded.ok) return loaded;

    const next = applyCardPatch(loaded.value, { title: input.title, content: input.content, metadata: input.metadata });
    await writeText(absPath, serializeCardFile(next));
    this.logger.debug({ path: relPath }, 'updated card');
    return ok(toCard(relPath, next));
  }

  async delete(input: CardLocator): Promise<StoreResult<boolean>> {
    const resolved = this.resolve(input.project, input.path);
    if (!resolved.ok) return resolved;
    const { absPath, relPath } = resolved.value;

    if (!(await isFile(absPath))) return ok(false);
    await fs.unlink(absPath);
    await this.pruneFrom(path.dirname(absPath));
    this.logger.debug({ path: relPath }, 'deleted card');
    return ok(true);
  }

  async move(input: MoveCardInput): Promise<StoreResult<boolean>> {
    const from = this.resolve(input.project, input.from);
    if (!from.ok) return from;
    const to = this.resolve(input.project, input.to);
    if (!to.ok) return to;

    const src = from.value.absPath;
    const dst = to.value.absPath;
    if (!(await isFile(src)) || (await fileExists(dst))) return ok(false);

    await ensureDir(path.dirname(dst));
    await fs.rename(src, dst);
    await this.pruneFrom(path.dirname(src));
    this.logger.debug({ from: from.value.relPath, to: to.value.relPath }, 'moved card');
    return ok(true);
  }

  async list(input: ListCardsInput = {}): Promise<StoreResult<ScanOutcome<CardSummary>>> {
    const scope = resolveScope(this.root, input.project, input.subpath);
    if (!scope.ok) return scope;

    if (!(await isDirectory(scope.value.absPath))) return ok({ items: [], skipped: [] });

    const files = await walkFiles(scope.value.absPath, (p) => p.endsWith(CARD_EXTENSION), {
      recursive: input.recursive ?? true
    });
    const outcome = await foldCards<CardSummary>(this.root, files, this.logger, ({ relPath, card }, items) => {
      const summary: CardSummary = { path: relPath, title: card.title, metadata: card.metadata };
      if (input.includeContent) summary.content = card.content;
      items.push(summary);
    });
    return ok(outcome);
  }

  async getStructure(input: StructureInput = {}): Promise<StoreResult<StructureOutcome>> {
    const scope = resolveScope(this.root, input.project, input.subpath);
    if (!scope.ok) return scope;
    const { absPath, relPath, project } = scope.value;

    if (project === null) {
      if (!(await isDirectory(this.root))) {
        const empty: DirectoryNode = { type: 'directory', name: 'root', children: [] };
        return ok({ tree: empty, skipped: [] });
      }
      return ok(await buildStructure(this.root, this.root, 'root', this.logger));
    }

    if (!(await isDirectory(absPath))) {
      const message = relPath === project ? `project '${project}' not found` : `'${relPath}' not found in project '${project}'`;
      return fail('PROJECT_NOT_FOUND', message);
    }
    return ok(await buildStructure(this.root, absPath, path.basename(absPath), this.logger));
  }
}
