import type { CardMetadata, MetadataFilters, MetadataValue } from './types.js';

export type MetadataField = { kind: 'scalar'; value: string } | { kind: 'sequence'; values: string[] };

export type MatchMode = 'any' | 'all';

export function toField(value: MetadataValue): MetadataField {
  return Array.isArray(value) ? { kind: 'sequence', values: value } : { kind: 'scalar', value };
}

/** Lowercased value list; a scalar becomes a one-element list. */
export function normalizeField(field: MetadataField): string[] {
  if (field.kind === 'scalar') return [field.value.toLowerCase()];
  return field.values.map((v) => v.toLowerCase());
}

export function normalizeValue(value: MetadataValue): string[] {
  return normalizeField(toField(value));
}

function fieldMatches(actual: string[], wanted: MetadataField, mode: MatchMode): boolean {
  if (wanted.kind === 'scalar') return actual.includes(wanted.value.toLowerCase());
  const wantedValues = normalizeField(wanted);
  return mode === 'all' ? wantedValues.every((v) => actual.includes(v)) : wantedValues.some((v) => actual.includes(v));
}

/**
 * Every filter key must be present on the card. Values compare
 * case-insensitively and a scalar on either side acts as a one-element list.
 * A list filter needs one shared value in `any` mode, all of them in `all` mode.
 */
export function matchesMetadata(metadata: CardMetadata, filters: MetadataFilters, mode: MatchMode = 'any'): boolean {
  for (const [key, wanted] of Object.entries(filters)) {
    if (!Object.prototype.hasOwnProperty.call(metadata, key)) return false;
    const actual = normalizeValue(metadata[key]);
    if (!fieldMatches(actual, toField(wanted), mode)) return false;
  }
  return true;
}

/** Tags of a card, lowercased; missing `tags` yields none. */
export function cardTags(metadata: CardMetadata): string[] {
  const tags = metadata.tags;
  return tags === undefined ? [] : normalizeValue(tags);
}
