import { z } from 'zod';
import { readFile, writeFile } from 'node:fs/promises';
import type { ChunkFile } from '../types.js';

export const INDEX_FILENAME = '_index.json';

const chunkFileSchema = z.object({
  filename: z.string().optional(),
  doc_type: z.string().optional(),
  total_chunks: z.number().int().nonnegative().optional(),
  created_at: z.string().optional(),
  status: z.enum(['staging', 'archived']).optional(),
  archived_at: z.string().optional(),
  uploaded_at: z.string().optional(),
  chunks: z
    .array(
      z.object({
        id: z.string(),
        chunk_index: z.number().int().nonnegative(),
        text: z.string(),
      }),
    )
    .default([]),
});

type ChunkFileJson = z.infer<typeof chunkFileSchema>;

/** Parses a chunk file; `fallbackName` is used when it carries no filename. */
export function parseChunkFile(data: unknown, fallbackName: string): ChunkFile {
  const json = chunkFileSchema.parse(data);
  return {
    filename: json.filename ?? fallbackName,
    docType: json.doc_type ?? 'unknown',
    totalChunks: json.total_chunks ?? json.chunks.length,
    createdAt: json.created_at ?? null,
    status: json.status ?? null,
    archivedAt: json.archived_at ?? null,
    uploadedAt: json.uploaded_at ?? null,
    chunks: json.chunks.map((c) => ({ id: c.id, chunkIndex: c.chunk_index, text: c.text })),
  };
}

export function serializeChunkFile(file: ChunkFile): string {
  const json: ChunkFileJson = {
    filename: file.filename,
    doc_type: file.docType,
    total_chunks: file.totalChunks,
    ...(file.createdAt ? { created_at: file.createdAt } : {}),
    ...(file.status ? { status: file.status } : {}),
    ...(file.archivedAt ? { archived_at: file.archivedAt } : {}),
    ...(file.uploadedAt ? { uploaded_at: file.uploadedAt } : {}),
    chunks: [...file.chunks]
      .sort((a, b) => a.chunkIndex - b.chunkIndex)
      .map((c) => ({ id: c.id, chunk_index: c.chunkIndex, text: c.text })),
  };
  return JSON.stringify(json, null, 2) + '\n';
}

export async function readChunkFile(path: string, fallbackName: string): Promise<ChunkFile> {
  return parseChunkFile(JSON.parse(await readFile(path, 'utf-8')), fallbackName);
}

export async function writeChunkFile(path: string, file: ChunkFile): Promise<void> {
  await writeFile(path, serializeChunkFile(file), 'utf-8');
}
