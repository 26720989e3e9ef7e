export type MetadataValue = string | string[];

// Insertion order is the on-disk key order.
export type CardMetadata = Record<string, MetadataValue>;

export type MetadataFilters = Record<string, MetadataValue>;

export const STORE_MANAGED_KEYS = ['title', 'created', 'updated'] as const;
export const STRUCTURE_KEYS = ['status', 'priority', 'tags'] as const;

export const CARD_EXTENSION = '.md';

export interface ParsedCardFile {
  title: string;
  metadata: CardMetadata;
  content: string; // body without the front-matter block
}

export interface CardSummary {
  path: string; // canonical, project-prefixed, forward slashes
  title: string;
  metadata: CardMetadata;
  content?: string;
}

export interface Card extends CardSummary {
  content: string;
}

export interface SearchResult extends CardSummary {
  score: number;
  snippet?: string;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface ScanOutcome<T> {
  items: T[];
  skipped: SkippedFile[];
}

export interface DirectoryNode {
  type: 'directory';
  name: string;
  children: StructureNode[];
}

export interface CardNode {
  type: 'task';
  name: string;
  path: string;
  title: string;
  metadata: Partial<Record<(typeof STRUCTURE_KEYS)[number], MetadataValue>>;
}

export type StructureNode = DirectoryNode | CardNode;

export interface StructureOutcome {
  tree: DirectoryNode;
  skipped: SkippedFile[];
}
