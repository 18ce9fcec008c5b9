import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createSourceMatcher, listSourceDocuments } from '../../src/ingest/sources.js';
import { batches } from '../../src/ingest/batches.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'docsync-sources-test-'));
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe('createSourceMatcher', () => {
  it('applies include and exclude globs case-insensitively', () => {
    const matches = createSourceMatcher({ include: ['*.md'], exclude: ['draft-*'] });
    expect(matches('notes.md')).toBe(true);
    expect(matches('NOTES.MD')).toBe(true);
    expect(matches('notes.txt')).toBe(false);
    expect(matches('draft-notes.md')).toBe(false);
  });
});

describe('listSourceDocuments', () => {
  it('lists matching top-level files sorted by name with their hashes', async () => {
    await writeFile(join(tmpDir, 'b.md'), 'hello world\n');
    await writeFile(join(tmpDir, 'a.md'), 'a');
    await writeFile(join(tmpDir, 'desktop.ini'), 'x');
    await mkdir(join(tmpDir, 'nested.md'));

    const docs = await listSourceDocuments(tmpDir, { include: ['*.md'], exclude: ['desktop.ini'] });
    expect(docs.map((d) => d.filename)).toEqual(['a.md', 'b.md']);
    expect(docs[1]).toEqual({
      filename: 'b.md',
      path: join(tmpDir, 'b.md'),
      contentHash: '6f5902ac237024bdd0c176cb93063dc4',
    });
  });

  it('returns nothing for a missing directory', async () => {
    expect(await listSourceDocuments(join(tmpDir, 'missing'), { include: ['*.md'], exclude: [] })).toEqual([]);
  });
});

describe('batches', () => {
  it('splits into fixed-size batches with a shorter tail', () => {
    expect([...batches([1, 2, 3, 4, 5], 2)]).toEqual([[1, 2], [3, 4], [5]]);
    expect([...batches([], 3)]).toEqual([]);
  });
});
