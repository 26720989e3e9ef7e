import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { CardSearch } from '../src/cards/search.js';

import { errorOf, mkStore, unwrap, writeRaw } from './helpers.js';

async function seed() {
  const store = await mkStore();
  const { repo } = store;
  unwrap(
    await repo.create({
      path: 'proj/auth.md',
      title: 'Authentication Task',
      content: 'Implement login and auth tokens',
      metadata: { status: 'open', tags: ['auth', 'backend'] }
    })
  );
  unwrap(await repo.create({ path: 'proj/ui.md', title: 'Frontend', content: 'Button styling', metadata: { status: 'done', tags: 'Auth' } }));
  unwrap(await repo.create({ path: 'other/db.md', title: 'Database', content: 'auth auth schema', metadata: { status: 'open', tags: ['db'] } }));
  return store;
}

test('query ranks title hits above body hits and drops non-matches', async () => {
  const { search } = await seed();
  const { items } = unwrap(await search.search({ query: 'AUTH' }));
  assert.deepEqual(
    items.map((r) => [r.path, r.score]),
    [
      ['proj/auth.md', 11],
      ['other/db.md', 2]
    ]
  );
  assert.equal(items[0].title, 'Authentication Task');
  assert.equal(items[0].snippet, 'Implement login and auth tokens');
  assert.equal(items[0].content, undefined);
});

test('includeContent returns the body instead of a snippet', async () => {
  const { search } = await seed();
  const { items } = unwrap(await search.search({ query: 'schema', includeContent: true }));
  assert.equal(items.length, 1);
  assert.equal(items[0].content, 'auth auth schema');
  assert.equal(items[0].snippet, undefined);
});

test('a scalar tag filter matches scalar and list tags alike', async () => {
  const { search } = await seed();
  const { items } = unwrap(await search.search({ metadataFilters: { tags: 'Auth' } }));
  assert.deepEqual(
    items.map((r) => [r.path, r.score]),
    [
      ['proj/auth.md', 1],
      ['proj/ui.md', 1]
    ]
  );
  assert.equal(items[0].snippet, undefined);
});

test('filters combine with a query', async () => {
  const { search } = await seed();
  const { items } = unwrap(await search.search({ query: 'auth', metadataFilters: { status: 'OPEN', tags: ['db', 'nothing'] } }));
  assert.deepEqual(
    items.map((r) => r.path),
    ['other/db.md']
  );
});

test('a title hit outweighs an identical body-only card by exactly the title weight', async () => {
  const { repo, search } = await mkStore();
  unwrap(await repo.create({ path: 'w/a.md', title: 'Deploy', content: 'deploy once' }));
  unwrap(await repo.create({ path: 'w/b.md', title: 'Other', content: 'deploy once' }));

  const { items } = unwrap(await search.search({ query: 'deploy' }));
  assert.deepEqual(
    items.map((r) => [r.path, r.score]),
    [
      ['w/a.md', 11],
      ['w/b.md', 1]
    ]
  );
});

test('maxResults caps equally scored results', async () => {
  const { repo, search } = await mkStore();
  for (let i = 0; i < 20; i++) {
    const n = String(i).padStart(2, '0');
    unwrap(await repo.create({ path: `bulk/t${n}.md`, title: `Task ${n}`, content: 'same body' }));
  }

  const browse = unwrap(await search.search({ maxResults: 5 }));
  assert.deepEqual(
    browse.items.map((r) => r.path),
    ['bulk/t00.md', 'bulk/t01.md', 'bulk/t02.md', 'bulk/t03.md', 'bulk/t04.md']
  );
  assert.ok(browse.items.every((r) => r.score === 1));

  const queried = unwrap(await search.search({ query: 'body', maxResults: 5 }));
  assert.equal(queried.items.length, 5);
  assert.equal(unwrap(await search.search({ maxResults: 0 })).items.length, 0);
});

test('the best match is found even when it is scanned last', async () => {
  const { repo, search } = await mkStore();
  for (const n of [1, 2, 3, 4, 5]) {
    unwrap(await repo.create({ path: `p/a${n}.md`, title: `A${n}`, content: 'match' }));
  }
  unwrap(await repo.create({ path: 'p/z.md', title: 'match here', content: 'match match' }));

  const { items } = unwrap(await search.search({ query: 'match', maxResults: 2 }));
  assert.deepEqual(
    items.map((r) => [r.path, r.score]),
    [
      ['p/z.md', 12],
      ['p/a1.md', 1]
    ]
  );
});

test('pathScope limits the scan to a glob below the root', async () => {
  const { repo, search } = await seed();
  unwrap(await repo.create({ path: 'proj/nested/deep.md', title: 'Deep auth', content: '' }));

  const flat = unwrap(await search.search({ pathScope: 'proj' }));
  assert.deepEqual(
    flat.items.map((r) => r.path),
    ['proj/auth.md', 'proj/ui.md']
  );

  const deep = unwrap(await search.search({ pathScope: 'proj/**' }));
  assert.deepEqual(
    deep.items.map((r) => r.path),
    ['proj/auth.md', 'proj/nested/deep.md', 'proj/ui.md']
  );

  // a card filename as scope searches the whole store
  assert.equal(unwrap(await search.search({ pathScope: 'proj/auth.md' })).items.length, 4);
  assert.equal(errorOf(await search.search({ pathScope: 'proj/../other' })).code, 'INVALID_PATH');
});

test('a title-only hit on an empty body carries no snippet', async () => {
  const { repo, search } = await mkStore();
  unwrap(await repo.create({ path: 'p/e.md', title: 'Release notes', content: '' }));
  const { items } = unwrap(await search.search({ query: 'release' }));
  assert.equal(items[0].score, 10);
  assert.equal(items[0].snippet, undefined);
});

test('unparseable cards are skipped and counted', async () => {
  const { search, root } = await seed();
  await writeRaw(root, 'proj/broken.md', '---\ntitle: [unclosed\n---\n');

  const out = unwrap(await search.search());
  assert.equal(out.items.length, 3);
  assert.deepEqual(
    out.skipped.map((s) => s.path),
    ['proj/broken.md']
  );
});

test('searchByTags: any by default, all on request', async () => {
  const { search } = await seed();
  assert.deepEqual(
    unwrap(await search.searchByTags({ tags: ['AUTH'] })).items.map((r) => r.path),
    ['proj/auth.md', 'proj/ui.md']
  );
  assert.deepEqual(
    unwrap(await search.searchByTags({ tags: ['auth', 'backend'], matchAll: true })).items.map((r) => r.path),
    ['proj/auth.md']
  );
  assert.deepEqual(
    unwrap(await search.searchByTags({ tags: ['db', 'auth'], maxResults: 1 })).items.map((r) => r.path),
    ['other/db.md']
  );
  assert.deepEqual(unwrap(await search.searchByTags({ tags: [] })), { items: [], skipped: [] });
});

test('getAllTags lowercases, dedupes and scopes like list', async () => {
  const { search } = await seed();
  assert.deepEqual(unwrap(await search.getAllTags()).items, ['auth', 'backend', 'db']);
  assert.deepEqual(unwrap(await search.getAllTags({ project: 'other' })).items, ['db']);
  assert.deepEqual(unwrap(await search.getAllTags({ subpath: 'proj' })).items, ['auth', 'backend']);
});

test('tags of a missing project are empty while its structure is an error', async () => {
  const { repo, search } = await seed();
  assert.deepEqual(unwrap(await search.getAllTags({ project: 'nope' })), { items: [], skipped: [] });
  assert.equal(errorOf(await repo.getStructure({ project: 'nope' })).code, 'PROJECT_NOT_FOUND');
});

test('getAllTags skips a malformed card and keeps the rest', async () => {
  const { search, root } = await seed();
  await writeRaw(root, 'other/bad.md', '---\n- a\n---\n');

  const out = unwrap(await search.getAllTags({ project: 'other' }));
  assert.deepEqual(out.items, ['db']);
  assert.deepEqual(
    out.skipped.map((s) => s.path),
    ['other/bad.md']
  );
});

test('pathScope is validated even when the root does not exist', async () => {
  const { root } = await mkStore();
  const search = new CardSearch({ root: path.join(root, 'absent') });
  assert.equal(errorOf(await search.search({ pathScope: '../x' })).code, 'INVALID_PATH');
  assert.deepEqual(unwrap(await search.search({ pathScope: 'proj' })), { items: [], skipped: [] });
});
