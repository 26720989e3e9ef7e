import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { CardRepo } from '../src/cards/repo.js';
import { CardSearch } from '../src/cards/search.js';
import type { StoreError, StoreResult } from '../src/cards/result.js';

export function unwrap<T>(res: StoreResult<T>): T {
  if (!res.ok) throw res.error;
  return res.value;
}

export function errorOf<T>(res: StoreResult<T>): StoreError {
  if (res.ok) throw new Error(`expected an error, got ${JSON.stringify(res.value)}`);
  return res.error;
}

export async function mkStore(): Promise<{ root: string; repo: CardRepo; search: CardSearch }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'taskcards-'));
  const root = path.join(dir, 'tasks');
  await fs.mkdir(root, { recursive: true });
  return { root, repo: new CardRepo({ root }), search: new CardSearch({ root }) };
}

export async function writeRaw(root: string, relPath: string, text: string): Promise<void> {
  const abs = path.join(root, ...relPath.split('/'));
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, text, 'utf8');
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}
