import yaml from 'js-yaml';

export interface FrontmatterParseResult {
  data: Record<string, unknown>;
  body: string;
  hasFrontmatter: boolean;
}

const OPEN_FENCE = /^---\r?\n/;
const CLOSE_FENCE = /(?:^|\r?\n)---(?:\r?\n|$)/;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

/**
 * Splits a Markdown document into its YAML front matter and body.
 * Supports:
 * ---\n<yaml>\n---\n<body>
 *
 * The FAILSAFE schema keeps every scalar a string, so `1`, `true` or dates
 * come back exactly as written. A block that is not a mapping throws.
 */
export function parseFrontmatter(markdown: string): FrontmatterParseResult {
  const open = OPEN_FENCE.exec(markdown);
  if (!open) {
    return { data: {}, body: markdown, hasFrontmatter: false };
  }

  const rest = markdown.slice(open[0].length);
  const close = CLOSE_FENCE.exec(rest);
  if (!close) {
    // unterminated fence, treat as no frontmatter
    return { data: {}, body: markdown, hasFrontmatter: false };
  }

  // Fences may end in \r\n; the body is returned byte for byte.
  const yamlText = rest.slice(0, close.index).replace(/\r\n/g, '\n');
  const body = rest.slice(close.index + close[0].length);
  const loaded: unknown = yaml.load(yamlText, { schema: yaml.FAILSAFE_SCHEMA }) ?? {};
  if (!isRecord(loaded)) {
    throw new Error('Front matter must be a YAML mapping');
  }
  return { data: loaded, body, hasFrontmatter: true };
}

export function stringifyFrontmatter(data: Record<string, unknown>): string {
  // Keep stable diffs: no refs, no line wrapping.
  const yamlText = yaml
    .dump(data, {
      noRefs: true,
      lineWidth: -1,
      sortKeys: false
    })
    .trimEnd();
  return `---\n${yamlText}\n---\n`;
}
