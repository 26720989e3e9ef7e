import path from 'node:path';
import type { Logger } from 'pino';
import { parseCardMarkdown } from './card.js';
import { readDirSorted, readText } from './fs.js';
import { toRelPosix } from './paths.js';
import { CARD_EXTENSION, STRUCTURE_KEYS } from './types.js';
import type { CardMetadata, CardNode, DirectoryNode, SkippedFile, StructureOutcome } from './types.js';

function structureMetadata(metadata: CardMetadata): CardNode['metadata'] {
  const out: CardNode['metadata'] = {};
  for (const key of STRUCTURE_KEYS) {
    const value = metadata[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Directory tree below `dir`. Cards that fail to parse are left out of the
 * tree and reported in `skipped`.
 */
export async function buildStructure(root: string, dir: string, name: string, logger: Logger): Promise<StructureOutcome> {
  const skipped: SkippedFile[] = [];

  async function build(abs: string, nodeName: string): Promise<DirectoryNode> {
    const node: DirectoryNode = { type: 'directory', name: nodeName, children: [] };
    for (const ent of await readDirSorted(abs)) {
      const child = path.join(abs, ent.name);
      if (ent.isDirectory()) {
        node.children.push(await build(child, ent.name));
        continue;
      }
      if (!ent.isFile() || !ent.name.endsWith(CARD_EXTENSION)) continue;

      const relPath = toRelPosix(root, child);
      try {
        const card = parseCardMarkdown(await readText(child));
        node.children.push({
          type: 'task',
          name: ent.name,
          path: relPath,
          title: card.title,
          metadata: structureMetadata(card.metadata)
        });
      } catch (err) {
        skipped.push({ path: relPath, reason: err instanceof Error ? err.message : String(err) });
        logger.warn({ file: relPath, err }, 'skipping unreadable card');
      }
    }
    return node;
  }

  return { tree: await build(dir, name), skipped };
}
