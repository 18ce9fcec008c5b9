import { readdir, access } from 'node:fs/promises';
import { join } from 'node:path';
import { computeFileHash } from '../chunking/index.js';
import { readChunkFile, INDEX_FILENAME } from '../staging/index.js';
import { TrackingError, errorMessage } from '../errors.js';
import { fileStem } from '../utils/paths.js';
import type { ChunkFile, TrackedFile } from '../types.js';
import type { TrackingStore } from './store.js';

export interface TrackingSyncOptions {
  store: TrackingStore;
  chunksDir: string;
  archivedSourceDir: string;
  clock?: () => Date;
  onFile?: (filename: string, outcome: 'added' | 'updated' | 'skipped', chunks: number) => void;
}

export interface TrackingSyncResult {
  added: number;
  updated: number;
  skipped: number;
  total: number;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function sameIds(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((id) => right.has(id));
}

/**
 * Rebuilds tracking entries from local chunk files, e.g. after `download`.
 * Existing entries with the same chunk id set are left untouched.
 */
export async function syncTrackingFromChunks(options: TrackingSyncOptions): Promise<TrackingSyncResult> {
  const { store, chunksDir, archivedSourceDir } = options;
  const clock = options.clock ?? (() => new Date());

  if (!(await exists(chunksDir))) {
    throw new TrackingError(`Chunk directory ${chunksDir} does not exist. Run "docsync download" first.`);
  }

  const names = (await readdir(chunksDir))
    .filter((n) => n.endsWith('.json') && n !== INDEX_FILENAME)
    .sort();

  const tracking = await store.load();
  const result: TrackingSyncResult = { added: 0, updated: 0, skipped: 0, total: 0 };

  for (const name of names) {
    const stem = fileStem(name);
    let chunkFile: ChunkFile;
    try {
      chunkFile = await readChunkFile(join(chunksDir, name), stem);
    } catch (err) {
      throw new TrackingError(`Cannot read chunk file ${name}: ${errorMessage(err)}`);
    }

    const { filename } = chunkFile;
    const chunkIds = chunkFile.chunks.map((c) => c.id);

    const sourcePath = join(archivedSourceDir, filename);
    const hasSource = await exists(sourcePath);
    const entry: TrackedFile = {
      contentHash: hasSource ? await computeFileHash(sourcePath) : `chunks_only_${stem.slice(0, 16)}`,
      chunkIds,
      chunksCount: chunkIds.length,
      uploadedAt: chunkFile.uploadedAt ?? chunkFile.archivedAt ?? chunkFile.createdAt ?? clock().toISOString(),
      source: hasSource ? 'archived_source_docs' : 'chunks_only',
    };

    const existing = tracking.files[filename];
    if (existing && sameIds(existing.chunkIds, chunkIds)) {
      result.skipped++;
      options.onFile?.(filename, 'skipped', chunkIds.length);
      continue;
    }

    if (existing) {
      result.updated++;
      options.onFile?.(filename, 'updated', chunkIds.length);
    } else {
      result.added++;
      options.onFile?.(filename, 'added', chunkIds.length);
    }
    tracking.files[filename] = entry;
  }

  await store.save(tracking, clock());
  result.total = Object.keys(tracking.files).length;
  return result;
}
