export const SNIPPET_CONTEXT_CHARS = 100;
export const SNIPPET_FALLBACK_CHARS = 200;

export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let idx = haystack.indexOf(needle);
  while (idx !== -1) {
    count++;
    idx = haystack.indexOf(needle, idx + needle.length);
  }
  return count;
}

/**
 * Window of `contextChars` around the first case-insensitive hit, with `...`
 * marking a cut at either end. Falls back to the head of the content.
 */
export function extractSnippet(content: string, query: string, contextChars: number = SNIPPET_CONTEXT_CHARS): string {
  const index = content.toLowerCase().indexOf(query.toLowerCase());
  if (!query || index === -1) {
    return content.length > SNIPPET_FALLBACK_CHARS ? `${content.slice(0, SNIPPET_FALLBACK_CHARS)}...` : content;
  }

  const start = Math.max(0, index - contextChars);
  const end = Math.min(content.length, index + query.length + contextChars);

  let snippet = content.slice(start, end);
  if (start > 0) snippet = `...${snippet}`;
  if (end < content.length) snippet = `${snippet}...`;
  return snippet;
}
