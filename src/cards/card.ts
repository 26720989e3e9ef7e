import { parseFrontmatter, stringifyFrontmatter } from './frontmatter.js';
import { STORE_MANAGED_KEYS } from './types.js';
import type { CardMetadata, MetadataValue, ParsedCardFile } from './types.js';

export function nowIso(): string {
  return new Date().toISOString();
}

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

const MANAGED_KEYS: ReadonlySet<string> = new Set(STORE_MANAGED_KEYS);

function isManagedKey(key: string): boolean {
  return MANAGED_KEYS.has(key);
}

function readValue(key: string, value: unknown): MetadataValue {
  // `key:` with nothing after it loads as null
  if (value === null || value === undefined) return '';
  if (isString(value)) return value;
  if (Array.isArray(value)) {
    return value.map((item) => {
      if (item === null) return '';
      if (!isString(item)) throw new Error(`${key} must be a string or a list of strings`);
      return item;
    });
  }
  throw new Error(`${key} must be a string or a list of strings`);
}

export function validateCardFrontmatter(data: Record<string, unknown>): { title: string; metadata: CardMetadata } {
  const rawTitle = data.title;
  if (rawTitle !== undefined && rawTitle !== null && !isString(rawTitle)) {
    throw new Error('title must be a string');
  }

  const metadata: CardMetadata = {};
  for (const [key, value] of Object.entries(data)) {
    if (key === 'title') continue;
    metadata[key] = readValue(key, value);
  }

  return { title: isString(rawTitle) ? rawTitle : '', metadata };
}

export function parseCardMarkdown(markdown: string): ParsedCardFile {
  const { data, body, hasFrontmatter } = parseFrontmatter(markdown);
  const { title, metadata } = validateCardFrontmatter(data);
  // serializeCardFile puts one blank line between the fence and the body
  const content = hasFrontmatter ? body.replace(/^\r?\n/, '') : body;
  return { title, metadata, content };
}

export function serializeCardFile(card: ParsedCardFile): string {
  return `${stringifyFrontmatter({ title: card.title, ...card.metadata })}\n${card.content}`;
}

/** Caller-supplied metadata without the keys only the store may write. */
export function callerMetadata(metadata: CardMetadata | undefined): CardMetadata {
  const out: CardMetadata = {};
  for (const [key, value] of Object.entries(metadata ?? {})) {
    if (isManagedKey(key)) continue;
    out[key] = Array.isArray(value) ? [...value] : value;
  }
  return out;
}

export function newCardFile(title: string, content: string, metadata: CardMetadata | undefined, at: string = nowIso()): ParsedCardFile {
  return {
    title,
    content,
    metadata: { created: at, updated: at, ...callerMetadata(metadata) }
  };
}

export interface CardPatch {
  title?: string;
  content?: string;
  metadata?: CardMetadata;
}

export function applyCardPatch(card: ParsedCardFile, patch: CardPatch, at: string = nowIso()): ParsedCardFile {
  const next: ParsedCardFile = {
    ...card,
    metadata: { ...card.metadata, ...callerMetadata(patch.metadata) }
  };

  if (patch.title !== undefined) next.title = patch.title;
  if (patch.content !== undefined) next.content = patch.content;

  next.metadata.updated = at;
  return next;
}
