import { mkdir, rename, copyFile, unlink } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { ChunkFile, ChunkRecord } from '../types.js';
import { safeFilename } from '../utils/paths.js';
import { readChunkFile, writeChunkFile } from './chunk-file.js';

export interface StagingDirs {
  sourceDocs: string;
  chunks: string;
  archivedChunks: string;
  archivedSourceDocs: string;
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err) {
    // rename cannot cross devices
    if (err instanceof Error && 'code' in err && err.code === 'EXDEV') {
      await copyFile(from, to);
      await unlink(from);
      return;
    }
    throw err;
  }
}

export class StagingArea {
  constructor(private readonly dirs: StagingDirs) {}

  async ensureDirectories(): Promise<void> {
    await Promise.all([
      mkdir(this.dirs.sourceDocs, { recursive: true }),
      mkdir(this.dirs.chunks, { recursive: true }),
      mkdir(this.dirs.archivedChunks, { recursive: true }),
      mkdir(this.dirs.archivedSourceDocs, { recursive: true }),
    ]);
  }

  /** Writes the chunks of one document to the staging directory. */
  async stage(records: readonly ChunkRecord[], filename: string, now: Date = new Date()): Promise<string> {
    await mkdir(this.dirs.chunks, { recursive: true });
    const file: ChunkFile = {
      filename,
      docType: records[0]?.doc_type ?? 'unknown',
      totalChunks: records.length,
      createdAt: now.toISOString(),
      status: 'staging',
      archivedAt: null,
      uploadedAt: null,
      chunks: records.map((r) => ({ id: r._id, chunkIndex: r.chunk_index, text: r.text })),
    };
    const path = join(this.dirs.chunks, `${safeFilename(filename)}.json`);
    await writeChunkFile(path, file);
    return path;
  }

  /** Marks a staged chunk file archived and moves it out of staging. */
  async archiveChunks(stagingPath: string, now: Date = new Date()): Promise<string> {
    await mkdir(this.dirs.archivedChunks, { recursive: true });
    const name = basename(stagingPath);
    const file = await readChunkFile(stagingPath, name.replace(/\.json$/, ''));
    file.status = 'archived';
    file.archivedAt = now.toISOString();

    const archivePath = join(this.dirs.archivedChunks, name);
    await writeChunkFile(archivePath, file);
    await unlink(stagingPath);
    return archivePath;
  }

  /** Moves an uploaded source document to the archive, replacing an older copy. */
  async archiveSource(sourcePath: string): Promise<string> {
    await mkdir(this.dirs.archivedSourceDocs, { recursive: true });
    const archivePath = join(this.dirs.archivedSourceDocs, basename(sourcePath));
    await moveFile(sourcePath, archivePath);
    return archivePath;
  }
}
