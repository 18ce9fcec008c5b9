export type DocType = string;

/** A chunk as upserted into the index. The text field is embedded by the index. */
export type ChunkRecord = {
  _id: string;
  text: string;
  filename: string;
  chunk_index: number;
  total_chunks: number;
  doc_type: DocType;
};

export type ChunkFileStatus = 'staging' | 'archived';

export interface ChunkEntry {
  id: string;
  chunkIndex: number;
  text: string;
}

export interface ChunkFile {
  filename: string;
  docType: DocType;
  totalChunks: number;
  createdAt: string | null;
  status: ChunkFileStatus | null;
  archivedAt: string | null;
  uploadedAt: string | null;
  chunks: ChunkEntry[];
}

export type TrackedSource = 'archived_source_docs' | 'chunks_only';

export interface TrackedFile {
  contentHash: string;
  chunkIds: string[];
  chunksCount: number;
  uploadedAt: string | null;
  source: TrackedSource | null;
}

export interface Tracking {
  index: string;
  namespace: string;
  lastUpdated: string | null;
  files: Record<string, TrackedFile>;
}

export interface SourceDocument {
  filename: string;
  path: string;
  contentHash: string;
}

export interface ChangeSet {
  newFiles: SourceDocument[];
  changedFiles: SourceDocument[];
  unchangedFiles: SourceDocument[];
  orphanChunkIds: string[];
}

export type RunStatus = 'started' | 'completed' | 'partial' | 'failed';

export interface FileReport {
  filename: string;
  chunksCount: number;
  status: 'uploaded' | 'failed' | 'planned';
  timestamp: string;
  chunkIds?: string[];
  contentHash?: string;
}

export interface RunReport {
  timestamp: string;
  status: RunStatus;
  message?: string;
  filesProcessed: FileReport[];
  chunksCreated: number;
  chunksUploaded: number;
  orphansDeleted: number;
  errors: string[];
  warnings: string[];
}

export type HistoryAction = 'upload' | 'delete' | 'archive' | 'download' | 'sync' | 'error';

export interface McpServerEntry {
  command: string;
  args: string[];
  env: Record<string, string>;
}
