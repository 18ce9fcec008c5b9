import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { VectorIndex, FetchedRecord, MetadataValue } from '../pinecone/client.js';
import type { ChunkFile } from '../types.js';
import { INDEX_FILENAME, writeChunkFile } from '../staging/index.js';
import { safeFilename } from '../utils/paths.js';
import { batches } from './batches.js';

export interface DownloadOptions {
  index: VectorIndex;
  outDir: string;
  fetchBatchSize: number;
  onProgress?: (message: string) => void;
}

export interface DownloadResult {
  totalRecords: number;
  files: Array<{ filename: string; chunks: number; path: string }>;
}

function asString(value: MetadataValue | undefined, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function asNumber(value: MetadataValue | undefined, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

export function groupByDocument(records: readonly FetchedRecord[]): Map<string, ChunkFile> {
  const files = new Map<string, ChunkFile>();

  for (const record of records) {
    const { metadata } = record;
    const filename = asString(metadata.filename, 'unknown');
    let file = files.get(filename);
    if (!file) {
      file = {
        filename,
        docType: asString(metadata.doc_type, 'unknown'),
        totalChunks: asNumber(metadata.total_chunks, 0),
        createdAt: null,
        status: null,
        archivedAt: null,
        uploadedAt: null,
        chunks: [],
      };
      files.set(filename, file);
    }
    file.chunks.push({
      id: record.id,
      chunkIndex: asNumber(metadata.chunk_index, 0),
      text: asString(metadata.text, ''),
    });
  }

  for (const file of files.values()) {
    file.chunks.sort((a, b) => a.chunkIndex - b.chunkIndex);
  }
  return files;
}

/**
 * Backs up every record of the namespace as one chunk file per document,
 * plus an `_index.json` summary. An empty namespace writes nothing.
 */
export async function downloadChunks(options: DownloadOptions): Promise<DownloadResult> {
  const { index, outDir, fetchBatchSize } = options;
  const progress = options.onProgress ?? (() => {});

  const stats = await index.stats();
  progress(`Records in namespace "${index.namespace}": ${stats.namespaceRecordCount}`);
  if (stats.namespaceRecordCount === 0) {
    return { totalRecords: 0, files: [] };
  }

  const ids: string[] = [];
  for await (const page of index.listIds()) {
    ids.push(...page);
    progress(`Listed ${ids.length} ids`);
  }

  const records: FetchedRecord[] = [];
  for (const batch of batches(ids, fetchBatchSize)) {
    records.push(...(await index.fetch(batch)));
    progress(`Fetched ${records.length}/${ids.length}`);
  }

  await mkdir(outDir, { recursive: true });
  const grouped = groupByDocument(records);
  const result: DownloadResult = { totalRecords: records.length, files: [] };
  const summary: Record<string, { chunks_count: number; chunk_ids: string[] }> = {};

  for (const [filename, file] of grouped) {
    const path = join(outDir, `${safeFilename(filename)}.json`);
    await writeChunkFile(path, file);
    result.files.push({ filename, chunks: file.chunks.length, path });
    summary[filename] = {
      chunks_count: file.chunks.length,
      chunk_ids: file.chunks.map((c) => c.id),
    };
  }

  const indexData = {
    pinecone_index: index.name,
    namespace: index.namespace,
    total_records: records.length,
    files: summary,
  };
  await writeFile(join(outDir, INDEX_FILENAME), JSON.stringify(indexData, null, 2) + '\n', 'utf-8');

  return result;
}
