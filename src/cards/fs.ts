import { promises as fs } from 'node:fs';
import path from 'node:path';

export async function ensureDir(p: string): Promise<void> {
  await fs.mkdir(p, { recursive: true });
}

export async function fileExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

export async function readText(p: string): Promise<string> {
  return await fs.readFile(p, 'utf8');
}

/**
 * Atomic-ish write for local filesystem:
 * - write to a temp file in the same directory
 * - fsync the file
 * - rename over the destination
 *
 * NOTE: no locking; of two concurrent writers the last rename wins.
 */
export async function writeTextAtomic(p: string, content: string): Promise<void> {
  const dir = path.dirname(p);
  await ensureDir(dir);

  const tmp = path.join(dir, `.${path.basename(p)}.${process.pid}.${Date.now()}.tmp`);

  const fh = await fs.open(tmp, 'w');
  try {
    await fh.writeFile(content, 'utf8');
    await fh.sync();
  } finally {
    await fh.close();
  }

  await fs.rename(tmp, p);
}

export async function writeText(p: string, content: string): Promise<void> {
  // Default to atomic writes to avoid partially-written markdown/frontmatter.
  await writeTextAtomic(p, content);
}

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/** Directory entries sorted by name, dot-entries left out. */
export async function readDirSorted(dir: string) {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter((ent) => !ent.name.startsWith('.')).sort(byName);
}

/** Depth-first, name-ordered walk. `recursive: false` stays in `rootDir`. */
export async function walkFiles(
  rootDir: string,
  predicate?: (absPath: string) => boolean,
  opts: { recursive?: boolean } = {}
): Promise<string[]> {
  const recursive = opts.recursive ?? true;
  const out: string[] = [];
  async function walk(dir: string): Promise<void> {
    const entries = await readDirSorted(dir);
    for (const ent of entries) {
      const abs = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        if (recursive) await walk(abs);
      } else if (ent.isFile()) {
        if (!predicate || predicate(abs)) out.push(abs);
      }
    }
  }
  await walk(rootDir);
  return out;
}

/**
 * Removes `startDir` and its ancestors while they are empty, stopping at the
 * first non-empty directory. `stopDir` itself is never removed.
 */
export async function pruneEmptyDirs(startDir: string, stopDir: string): Promise<string[]> {
  const removed: string[] = [];
  let dir = path.resolve(startDir);
  const stop = path.resolve(stopDir);
  while (dir !== stop && dir.startsWith(stop + path.sep)) {
    const entries = await fs.readdir(dir);
    if (entries.length > 0) break;
    await fs.rmdir(dir);
    removed.push(dir);
    dir = path.dirname(dir);
  }
  return removed;
}
