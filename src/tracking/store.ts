import { z } from 'zod';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TrackingError } from '../errors.js';
import type { TrackedFile, Tracking } from '../types.js';

const trackedFileSchema = z.object({
  content_hash: z.string(),
  chunk_ids: z.array(z.string()),
  chunks_count: z.number().int().nonnegative().optional(),
  uploaded_at: z.string().nullable().optional(),
  source: z.enum(['archived_source_docs', 'chunks_only']).nullable().optional(),
});

const trackingSchema = z.object({
  index: z.string(),
  namespace: z.string(),
  last_updated: z.string().nullable(),
  files: z.record(trackedFileSchema),
});

type TrackingJson = z.infer<typeof trackingSchema>;

function fromJson(json: TrackingJson): Tracking {
  const files: Record<string, TrackedFile> = {};
  for (const [name, f] of Object.entries(json.files)) {
    files[name] = {
      contentHash: f.content_hash,
      chunkIds: f.chunk_ids,
      chunksCount: f.chunks_count ?? f.chunk_ids.length,
      uploadedAt: f.uploaded_at ?? null,
      source: f.source ?? null,
    };
  }
  return {
    index: json.index,
    namespace: json.namespace,
    lastUpdated: json.last_updated,
    files,
  };
}

function toJson(tracking: Tracking): TrackingJson {
  const files: TrackingJson['files'] = {};
  for (const [name, f] of Object.entries(tracking.files)) {
    files[name] = {
      content_hash: f.contentHash,
      chunk_ids: f.chunkIds,
      chunks_count: f.chunksCount,
      uploaded_at: f.uploadedAt,
      ...(f.source ? { source: f.source } : {}),
    };
  }
  return {
    index: tracking.index,
    namespace: tracking.namespace,
    last_updated: tracking.lastUpdated,
    files,
  };
}

/** Reads and writes `tracking.json`, the record of what has been uploaded. */
export class TrackingStore {
  constructor(
    private readonly path: string,
    private readonly index: string,
    private readonly namespace: string,
  ) {}

  get filePath(): string {
    return this.path;
  }

  empty(): Tracking {
    return { index: this.index, namespace: this.namespace, lastUpdated: null, files: {} };
  }

  async load(): Promise<Tracking> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return this.empty();
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new TrackingError(`${this.path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = trackingSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new TrackingError(`${this.path} is malformed at "${issue?.path.join('.') ?? ''}": ${issue?.message ?? 'invalid'}`);
    }
    return fromJson(result.data);
  }

  /** Stamps `lastUpdated` and writes the tracking file. */
  async save(tracking: Tracking, now: Date = new Date()): Promise<void> {
    tracking.lastUpdated = now.toISOString();
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(toJson(tracking), null, 2) + '\n', 'utf-8');
  }
}
