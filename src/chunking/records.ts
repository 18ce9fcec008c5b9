import type { CategoryRule } from '../config.js';
import type { ChunkRecord } from '../types.js';
import { chunkText, type ChunkOptions } from './chunker.js';
import { categorizeDocument } from './categorize.js';
import { generateChunkId } from './ids.js';

export interface BuildRecordsOptions extends ChunkOptions {
  categories: readonly CategoryRule[];
}

export function buildChunkRecords(filename: string, text: string, options: BuildRecordsOptions): ChunkRecord[] {
  const chunks = chunkText(text, options);
  const docType = categorizeDocument(filename, options.categories);

  return chunks.map((chunk, i) => ({
    _id: generateChunkId(filename, i, chunk),
    text: chunk,
    filename,
    chunk_index: i,
    total_chunks: chunks.length,
    doc_type: docType,
  }));
}
