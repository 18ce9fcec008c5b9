import type { FetchedRecord, IndexStats, MetadataValue, VectorIndex } from '../../src/pinecone/client.js';
import type { ChunkRecord } from '../../src/types.js';

type Operation = 'stats' | 'upsertRecords' | 'deleteIds' | 'listIds' | 'fetch';

/** In-process stand-in for one namespace of a vector index. */
export class MemoryIndex implements VectorIndex {
  readonly records = new Map<string, Record<string, MetadataValue>>();
  readonly calls: Array<{ operation: Operation; size: number }> = [];
  private readonly failures = new Map<Operation, (size: number) => boolean>();
  private hidden: (metadata: Record<string, MetadataValue>) => boolean = () => false;

  constructor(
    readonly name = 'test-index',
    readonly namespace = 'test-ns',
    private readonly pageSize = 100,
  ) {}

  /** Makes `operation` throw whenever `when` returns true for the call's batch size. */
  failOn(operation: Operation, when: (size: number) => boolean = () => true): void {
    this.failures.set(operation, when);
  }

  /** Leaves matching records out of `fetch` results, as if not yet indexed. */
  hideFromFetch(when: (metadata: Record<string, MetadataValue>) => boolean): void {
    this.hidden = when;
  }

  seed(records: readonly ChunkRecord[]): void {
    for (const { _id, ...metadata } of records) {
      this.records.set(_id, { ...metadata });
    }
  }

  private record(operation: Operation, size: number): void {
    this.calls.push({ operation, size });
    if (this.failures.get(operation)?.(size)) {
      throw new Error(`${operation} unavailable`);
    }
  }

  async stats(): Promise<IndexStats> {
    this.record('stats', 0);
    return { namespaceRecordCount: this.records.size, totalRecordCount: this.records.size };
  }

  async upsertRecords(records: readonly ChunkRecord[]): Promise<void> {
    this.record('upsertRecords', records.length);
    this.seed(records);
  }

  async deleteIds(ids: readonly string[]): Promise<void> {
    this.record('deleteIds', ids.length);
    for (const id of ids) this.records.delete(id);
  }

  async *listIds(): AsyncIterable<string[]> {
    this.record('listIds', 0);
    const ids = [...this.records.keys()];
    for (let i = 0; i < ids.length; i += this.pageSize) {
      yield ids.slice(i, i + this.pageSize);
    }
  }

  async fetch(ids: readonly string[]): Promise<FetchedRecord[]> {
    this.record('fetch', ids.length);
    return ids.flatMap((id) => {
      const metadata = this.records.get(id);
      return metadata && !this.hidden(metadata) ? [{ id, metadata: { ...metadata } }] : [];
    });
  }

  count(operation: Operation): number {
    return this.calls.filter((c) => c.operation === operation).length;
  }
}
