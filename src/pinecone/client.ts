import { Pinecone, type Index, type RecordMetadata } from '@pinecone-database/pinecone';
import { IndexRequestError } from '../errors.js';
import type { ChunkRecord } from '../types.js';

export type MetadataValue = string | number | boolean | string[];

export interface FetchedRecord {
  id: string;
  metadata: Record<string, MetadataValue>;
}

export interface IndexStats {
  namespaceRecordCount: number;
  totalRecordCount: number;
}

/** One namespace of a search index holding integrated-embedding records. */
export interface VectorIndex {
  readonly name: string;
  readonly namespace: string;
  stats(): Promise<IndexStats>;
  upsertRecords(records: readonly ChunkRecord[]): Promise<void>;
  deleteIds(ids: readonly string[]): Promise<void>;
  listIds(): AsyncIterable<string[]>;
  fetch(ids: readonly string[]): Promise<FetchedRecord[]>;
}

export interface PineconeIndexOptions {
  apiKey: string;
  index: string;
  namespace: string;
  /** Retries after the first attempt. */
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class PineconeIndex implements VectorIndex {
  readonly name: string;
  readonly namespace: string;
  private readonly index: Index<RecordMetadata>;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: PineconeIndexOptions) {
    this.name = options.index;
    this.namespace = options.namespace;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    const client = new Pinecone({ apiKey: options.apiKey });
    this.index = client.index(options.index);
  }

  private get ns(): Index<RecordMetadata> {
    return this.index.namespace(this.namespace);
  }

  async stats(): Promise<IndexStats> {
    const stats = await this.withRetry('describeIndexStats', () => this.index.describeIndexStats());
    const namespaces = stats.namespaces ?? {};
    const total = Object.values(namespaces).reduce((sum, ns) => sum + (ns.recordCount ?? 0), 0);
    return {
      namespaceRecordCount: namespaces[this.namespace]?.recordCount ?? 0,
      totalRecordCount: stats.totalRecordCount ?? total,
    };
  }

  async upsertRecords(records: readonly ChunkRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.withRetry('upsertRecords', () => this.ns.upsertRecords(records.map((r) => ({ ...r }))));
  }

  async deleteIds(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.withRetry('deleteMany', () => this.ns.deleteMany([...ids]));
  }

  async *listIds(): AsyncIterable<string[]> {
    let paginationToken: string | undefined;
    do {
      const token = paginationToken;
      const page = await this.withRetry('listPaginated', () =>
        this.ns.listPaginated(token ? { paginationToken: token } : {}),
      );
      const ids = (page.vectors ?? []).flatMap((v) => (v.id ? [v.id] : []));
      if (ids.length > 0) yield ids;
      paginationToken = page.pagination?.next;
    } while (paginationToken);
  }

  async fetch(ids: readonly string[]): Promise<FetchedRecord[]> {
    if (ids.length === 0) return [];
    const result = await this.withRetry('fetch', () => this.ns.fetch([...ids]));
    return Object.entries(result.records ?? {}).map(([id, record]) => ({
      id,
      metadata: { ...(record.metadata ?? {}) },
    }));
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    let lastError: unknown;
    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await fn();
      } catch (err) {
        lastError = err;
      }
      if (attempt < this.maxRetries) {
        // Exponential backoff: 1s, 2s, 4s
        await this.sleep(this.retryDelayMs * Math.pow(2, attempt));
      }
    }
    throw new IndexRequestError(operation, lastError);
  }
}
