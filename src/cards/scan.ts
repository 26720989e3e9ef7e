import type { Logger } from 'pino';
import { parseCardMarkdown } from './card.js';
import { readText } from './fs.js';
import { toRelPosix } from './paths.js';
import type { ParsedCardFile, ScanOutcome, SkippedFile } from './types.js';

export interface LoadedCard {
  absPath: string;
  relPath: string;
  card: ParsedCardFile;
}

export type ScanStep = 'continue' | 'stop';

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Loads each file in order and hands parsed cards to `visit`. A file that
 * cannot be read or parsed is recorded in `skipped` and the scan goes on.
 * `visit` may return 'stop' to end the scan early.
 */
export async function foldCards<T>(
  root: string,
  files: string[],
  logger: Logger,
  visit: (loaded: LoadedCard, items: T[]) => ScanStep | void
): Promise<ScanOutcome<T>> {
  const items: T[] = [];
  const skipped: SkippedFile[] = [];

  for (const absPath of files) {
    const relPath = toRelPosix(root, absPath);
    let card: ParsedCardFile;
    try {
      card = parseCardMarkdown(await readText(absPath));
    } catch (err) {
      skipped.push({ path: relPath, reason: describe(err) });
      logger.warn({ file: relPath, err }, 'skipping unreadable card');
      continue;
    }
    if (visit({ absPath, relPath, card }, items) === 'stop') break;
  }

  return { items, skipped };
}
