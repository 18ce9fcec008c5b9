import { describe, it, expect } from 'vitest';
import { analyzeChanges } from '../../src/tracking/changes.js';
import type { SourceDocument, Tracking } from '../../src/types.js';

function doc(filename: string, contentHash: string): SourceDocument {
  return { filename, path: `/docs/${filename}`, contentHash };
}

const tracking: Tracking = {
  index: 'i',
  namespace: 'n',
  lastUpdated: '2024-01-01T00:00:00.000Z',
  files: {
    'same.md': { contentHash: 'h1', chunkIds: ['s1'], chunksCount: 1, uploadedAt: null, source: null },
    'changed.md': { contentHash: 'old', chunkIds: ['c1', 'c2'], chunksCount: 2, uploadedAt: null, source: null },
    'gone.md': { contentHash: 'h3', chunkIds: ['g1'], chunksCount: 1, uploadedAt: null, source: null },
  },
};

describe('analyzeChanges', () => {
  it('classifies new, changed and unchanged files', () => {
    const changes = analyzeChanges(
      [doc('new.md', 'n1'), doc('changed.md', 'new'), doc('same.md', 'h1')],
      tracking,
    );
    expect(changes.newFiles.map((f) => f.filename)).toEqual(['new.md']);
    expect(changes.changedFiles.map((f) => f.filename)).toEqual(['changed.md']);
    expect(changes.unchangedFiles.map((f) => f.filename)).toEqual(['same.md']);
  });

  it('collects the old chunk ids of changed files as orphans', () => {
    const changes = analyzeChanges([doc('changed.md', 'new')], tracking);
    expect(changes.orphanChunkIds).toEqual(['c1', 'c2']);
  });

  it('ignores tracked files that are not in the source directory', () => {
    const changes = analyzeChanges([], tracking);
    expect(changes).toEqual({ newFiles: [], changedFiles: [], unchangedFiles: [], orphanChunkIds: [] });
  });
});
