import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { mkdtemp, mkdir, rm, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { StagingArea, type StagingDirs } from '../../src/staging/staging.js';
import { parseChunkFile, serializeChunkFile } from '../../src/staging/chunk-file.js';
import type { ChunkRecord } from '../../src/types.js';

let tmpDir: string;
let staging: StagingArea;
let dirs: StagingDirs;

function record(i: number, total: number): ChunkRecord {
  return {
    _id: `id-${i}`,
    text: `text ${i}`,
    filename: 'docs/NDA.md',
    chunk_index: i,
    total_chunks: total,
    doc_type: 'contract',
  };
}

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'docsync-staging-test-'));
  dirs = {
    sourceDocs: join(tmpDir, 'source_docs'),
    chunks: join(tmpDir, 'chunks'),
    archivedChunks: join(tmpDir, 'archived_chunks'),
    archivedSourceDocs: join(tmpDir, 'archived_source_docs'),
  };
  staging = new StagingArea(dirs);
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe('StagingArea', () => {
  it('creates all four document directories', async () => {
    await staging.ensureDirectories();
    expect((await readdir(tmpDir)).sort()).toEqual(['archived_chunks', 'archived_source_docs', 'chunks', 'source_docs']);
  });

  it('stages chunks under a safe file name', async () => {
    const path = await staging.stage([record(0, 2), record(1, 2)], 'docs/NDA.md', new Date('2024-01-02T03:04:05.000Z'));
    expect(path).toBe(join(dirs.chunks, 'docs_NDA.md.json'));

    const json = JSON.parse(await readFile(path, 'utf-8'));
    expect(json).toEqual({
      filename: 'docs/NDA.md',
      doc_type: 'contract',
      total_chunks: 2,
      created_at: '2024-01-02T03:04:05.000Z',
      status: 'staging',
      chunks: [
        { id: 'id-0', chunk_index: 0, text: 'text 0' },
        { id: 'id-1', chunk_index: 1, text: 'text 1' },
      ],
    });
  });

  it('archives a staged chunk file', async () => {
    const path = await staging.stage([record(0, 1)], 'a.md', new Date('2024-01-02T03:04:05.000Z'));
    const archived = await staging.archiveChunks(path, new Date('2024-01-03T00:00:00.000Z'));

    expect(archived).toBe(join(dirs.archivedChunks, 'a.md.json'));
    expect(await readdir(dirs.chunks)).toEqual([]);
    const file = parseChunkFile(JSON.parse(await readFile(archived, 'utf-8')), 'a.md');
    expect(file.status).toBe('archived');
    expect(file.archivedAt).toBe('2024-01-03T00:00:00.000Z');
    expect(file.createdAt).toBe('2024-01-02T03:04:05.000Z');
  });

  it('moves a source document to the archive, replacing an older copy', async () => {
    const sourceDir = dirs.sourceDocs;
    await mkdir(sourceDir);
    await mkdir(dirs.archivedSourceDocs);
    await writeFile(join(sourceDir, 'a.md'), 'new');
    await writeFile(join(dirs.archivedSourceDocs, 'a.md'), 'old');

    const archived = await staging.archiveSource(join(sourceDir, 'a.md'));
    expect(await readFile(archived, 'utf-8')).toBe('new');
    expect(await readdir(sourceDir)).toEqual([]);
  });
});

describe('chunk files', () => {
  it('fills defaults for missing fields', () => {
    expect(parseChunkFile({ chunks: [{ id: 'x', chunk_index: 0, text: 't' }] }, 'fallback')).toEqual({
      filename: 'fallback',
      docType: 'unknown',
      totalChunks: 1,
      createdAt: null,
      status: null,
      archivedAt: null,
      uploadedAt: null,
      chunks: [{ id: 'x', chunkIndex: 0, text: 't' }],
    });
  });

  it('writes chunks in index order', () => {
    const text = serializeChunkFile({
      filename: 'a.md',
      docType: 'other',
      totalChunks: 2,
      createdAt: null,
      status: null,
      archivedAt: null,
      uploadedAt: null,
      chunks: [
        { id: 'second', chunkIndex: 1, text: 'b' },
        { id: 'first', chunkIndex: 0, text: 'a' },
      ],
    });
    expect(JSON.parse(text).chunks.map((c: { id: string }) => c.id)).toEqual(['first', 'second']);
  });
});
