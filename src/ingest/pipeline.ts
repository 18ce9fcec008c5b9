import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { buildChunkRecords } from '../chunking/index.js';
import { analyzeChanges, TrackingStore } from '../tracking/index.js';
import { StagingArea } from '../staging/index.js';
import { errorMessage } from '../errors.js';
import type { DocsyncConfig } from '../config.js';
import type { HistoryDB, RunLogger } from '../history/index.js';
import type { VectorIndex } from '../pinecone/client.js';
import type { WorkspacePaths } from '../utils/paths.js';
import type { ChangeSet, ChunkRecord, RunReport, SourceDocument, TrackedFile, Tracking } from '../types.js';
import { listSourceDocuments } from './sources.js';
import { batches } from './batches.js';

export interface IngestPipelineOptions {
  config: DocsyncConfig;
  paths: WorkspacePaths;
  logger: RunLogger;
  /** Opens the index; called only when an API key is configured. */
  connect: () => VectorIndex;
  history?: HistoryDB;
  dryRun?: boolean;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

interface StagedDocument {
  source: SourceDocument;
  stagingPath: string | null;
  records: ChunkRecord[];
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Uploads new and changed documents from the source directory: chunk, stage,
 * upsert, verify, archive, then record the result in the tracking file.
 */
export class IngestPipeline {
  private readonly config: DocsyncConfig;
  private readonly paths: WorkspacePaths;
  private readonly logger: RunLogger;
  private readonly connect: () => VectorIndex;
  private readonly history: HistoryDB | undefined;
  private readonly dryRun: boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => Date;
  private readonly tracking: TrackingStore;
  private readonly staging: StagingArea;

  constructor(options: IngestPipelineOptions) {
    this.config = options.config;
    this.paths = options.paths;
    this.logger = options.logger;
    this.connect = options.connect;
    this.history = options.history;
    this.dryRun = options.dryRun ?? false;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? (() => new Date());
    this.tracking = new TrackingStore(this.paths.tracking, this.config.pinecone.index, this.config.pinecone.namespace);
    this.staging = new StagingArea(this.paths);
  }

  async run(): Promise<RunReport> {
    const { logger } = this;
    const { index: indexName, namespace } = this.config.pinecone;

    logger.section(this.dryRun ? 'DOCUMENT UPLOADER (dry run)' : 'DOCUMENT UPLOADER');
    logger.info(`Index: ${indexName}`);
    logger.info(`Namespace: ${namespace}`);

    let index: VectorIndex | null = null;
    if (!this.dryRun && !this.config.pinecone.apiKey) {
      logger.error('PINECONE_API_KEY is not set (environment or .env)');
      return this.finish('failed');
    }

    const tracking = await this.tracking.load();
    if (tracking.lastUpdated) {
      logger.info(`Last update: ${tracking.lastUpdated}`);
      logger.info(`Tracked files: ${Object.keys(tracking.files).length}`);
    }

    if (!this.dryRun) {
      await this.staging.ensureDirectories();

      logger.subsection('Step 1: Connecting to the index');
      try {
        index = this.connect();
        const stats = await index.stats();
        logger.success(`Connected. Records in index: ${stats.totalRecordCount}`);
      } catch (err) {
        logger.error(`Connection failed: ${errorMessage(err)}`);
        return this.finish('failed');
      }
    }

    logger.subsection('Step 2: Looking for documents');
    const files = await listSourceDocuments(this.paths.sourceDocs, this.config.ingest);
    logger.info(`Found in ${this.config.paths.sourceDocs}/: ${files.length} files`);
    if (files.length === 0) {
      logger.info('No new documents to process');
      return this.finish('completed', 'No new files to process');
    }

    logger.subsection('Step 3: Analyzing changes');
    const changes = analyzeChanges(files, tracking);
    this.logChanges(changes, tracking);

    const toProcess = [...changes.newFiles, ...changes.changedFiles];
    if (toProcess.length === 0) {
      logger.info('All files are up to date, nothing to upload');
      return this.finish('completed', 'All files up to date');
    }

    if (index && changes.orphanChunkIds.length > 0) {
      logger.subsection('Step 4: Deleting stale chunks');
      try {
        await this.deleteOrphans(index, changes.orphanChunkIds);
        this.logger.report.orphansDeleted = changes.orphanChunkIds.length;
      } catch (err) {
        logger.error(`Could not delete stale chunks: ${errorMessage(err)}`);
        return this.finish('failed');
      }
    }

    logger.subsection(this.dryRun ? 'Step 5: Chunking documents' : 'Step 5: Chunking documents (staging)');
    const staged: StagedDocument[] = [];
    for (const source of toProcess) {
      staged.push(await this.chunkDocument(source));
    }
    const allRecords = staged.flatMap((s) => s.records);
    logger.info(`Total chunks to upload: ${allRecords.length}`);

    if (!index) {
      for (const doc of staged) {
        logger.addFileReport({ filename: doc.source.filename, chunksCount: doc.records.length, status: 'planned' });
      }
      return this.finish('completed', `Dry run: ${staged.length} files would be uploaded`);
    }

    logger.subsection('Step 6: Uploading');
    const failedFiles = await this.upload(index, allRecords);

    logger.subsection('Step 7: Verifying upload');
    if (await this.verify(index, allRecords.map((r) => r._id))) {
      logger.success('Verification passed');
    } else {
      logger.warning('Verification found problems');
    }

    logger.subsection('Step 8: Archiving files');
    const uploaded: Record<string, TrackedFile> = {};
    for (const doc of staged) {
      try {
        await this.archiveDocument(doc, failedFiles, uploaded);
      } catch (err) {
        const { filename } = doc.source;
        logger.error(`Could not archive ${filename}: ${errorMessage(err)}`);
        logger.addFileReport({ filename, chunksCount: doc.records.length, status: 'failed' });
        this.history?.addEntry('error', filename, 'uploaded but not archived');
      }
    }

    logger.subsection('Step 9: Updating tracking');
    tracking.files = { ...tracking.files, ...uploaded };
    await this.tracking.save(tracking, this.clock());
    logger.success(`Tracking updated: ${Object.keys(tracking.files).length} files`);

    this.logSummary(toProcess.length);
    return this.finish(failedFiles.size > 0 || logger.report.errors.length > 0 ? 'partial' : 'completed');
  }

  private logChanges(changes: ChangeSet, tracking: Tracking): void {
    for (const f of changes.newFiles) {
      this.logger.info(`  [NEW] ${f.filename}`);
    }
    for (const f of changes.changedFiles) {
      this.logger.info(`  [CHANGED] ${f.filename} (old: ${tracking.files[f.filename]?.chunkIds.length ?? 0} chunks)`);
    }
    for (const f of changes.unchangedFiles) {
      this.logger.info(`  [UNCHANGED] ${f.filename}`);
    }

    this.logger.info('Summary:');
    this.logger.info(`  New files: ${changes.newFiles.length}`);
    this.logger.info(`  Changed files: ${changes.changedFiles.length}`);
    this.logger.info(`  Unchanged: ${changes.unchangedFiles.length}`);
    if (changes.orphanChunkIds.length > 0) {
      this.logger.warning(`Stale chunks to delete: ${changes.orphanChunkIds.length}`);
    }
  }

  private async deleteOrphans(index: VectorIndex, ids: readonly string[]): Promise<void> {
    this.logger.info(`Deleting ${ids.length} stale chunks...`);
    for (const batch of batches(ids, this.config.ingest.deleteBatchSize)) {
      await index.deleteIds(batch);
      this.logger.info(`  Deleted batch: ${batch.length} ids`);
    }
    this.history?.addEntry('delete', this.config.pinecone.namespace, `${ids.length} stale chunks`);
  }

  private async chunkDocument(source: SourceDocument): Promise<StagedDocument> {
    const text = await readFile(source.path, 'utf-8');
    const records = buildChunkRecords(source.filename, text, {
      ...this.config.chunking,
      categories: this.config.categories,
    });

    this.logger.info(`Processing: ${source.filename}`);
    this.logger.info(`    Type: ${records[0]?.doc_type ?? 'n/a'}`);
    this.logger.info(`    Size: ${text.length.toLocaleString('en-US')} characters`);
    this.logger.info(`    Chunks: ${records.length}`);

    let stagingPath: string | null = null;
    if (!this.dryRun) {
      stagingPath = await this.staging.stage(records, source.filename, this.clock());
      this.logger.info(`    Staged: ${basename(stagingPath)}`);
    }
    this.logger.report.chunksCreated += records.length;
    return { source, stagingPath, records };
  }

  /** Upserts in batches; returns the names of files with a failed batch. */
  private async upload(index: VectorIndex, records: readonly ChunkRecord[]): Promise<Set<string>> {
    const failedFiles = new Set<string>();
    const batchSize = this.config.ingest.upsertBatchSize;
    const total = Math.ceil(records.length / batchSize);
    let uploadedCount = 0;
    let batchNum = 0;

    for (const batch of batches(records, batchSize)) {
      batchNum++;
      try {
        await index.upsertRecords(batch);
        uploadedCount += batch.length;
        this.logger.info(`  Batch ${batchNum}/${total}: ${batch.length} records`);
      } catch (err) {
        this.logger.error(`Batch ${batchNum} failed: ${errorMessage(err)}`);
        for (const r of batch) failedFiles.add(r.filename);
      }
    }

    this.logger.report.chunksUploaded = uploadedCount;
    if (failedFiles.size > 0) {
      this.logger.error(`Upload errors affected ${failedFiles.size} files`);
    } else {
      this.logger.success(`Uploaded ${uploadedCount} chunks`);
    }
    return failedFiles;
  }

  private async verify(index: VectorIndex, ids: readonly string[]): Promise<boolean> {
    try {
      await this.sleep(this.config.ingest.verifyDelayMs);
      const stats = await index.stats();
      this.logger.info(`  Records in namespace: ${stats.namespaceRecordCount}`);

      const sample = ids.slice(0, this.config.ingest.fetchBatchSize);
      const found = new Set((await index.fetch(sample)).map((r) => r.id));
      const missing = sample.filter((id) => !found.has(id));
      if (missing.length > 0) {
        this.logger.warning(`${missing.length} of ${sample.length} sampled chunks are not visible yet`);
        return false;
      }
      return true;
    } catch (err) {
      this.logger.warning(`Verification failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private async archiveDocument(
    doc: StagedDocument,
    failedFiles: ReadonlySet<string>,
    uploaded: Record<string, TrackedFile>,
  ): Promise<void> {
    const { filename } = doc.source;
    const chunkIds = doc.records.map((r) => r._id);

    if (failedFiles.has(filename)) {
      this.logger.warning(`Kept in staging for retry: ${filename}`);
      this.logger.addFileReport({ filename, chunksCount: chunkIds.length, status: 'failed' });
      this.history?.addEntry('error', filename, 'upload failed, kept in staging');
      return;
    }

    this.logger.info(`Archiving: ${filename}`);
    if (doc.stagingPath) {
      await this.staging.archiveChunks(doc.stagingPath, this.clock());
    }
    await this.staging.archiveSource(doc.source.path);

    uploaded[filename] = {
      contentHash: doc.source.contentHash,
      chunkIds,
      chunksCount: chunkIds.length,
      uploadedAt: this.clock().toISOString(),
      source: 'archived_source_docs',
    };
    this.logger.addFileReport({
      filename,
      chunksCount: chunkIds.length,
      status: 'uploaded',
      chunkIds,
      contentHash: doc.source.contentHash,
    });
    this.history?.addEntry('upload', filename, `${chunkIds.length} chunks`);
    this.history?.addEntry('archive', filename);
  }

  private logSummary(processed: number): void {
    const { report } = this.logger;
    this.logger.section('FINAL REPORT');
    this.logger.info(`Files processed: ${processed}`);
    this.logger.info(`Chunks created: ${report.chunksCreated}`);
    this.logger.info(`Chunks uploaded: ${report.chunksUploaded}`);
    if (report.orphansDeleted > 0) {
      this.logger.info(`Stale chunks deleted: ${report.orphansDeleted}`);
    }
    for (const file of report.filesProcessed) {
      this.logger.info(`  - ${file.filename}: ${file.chunksCount} chunks (${file.status})`);
    }
  }

  private async finish(status: RunReport['status'], message?: string): Promise<RunReport> {
    const { report } = this.logger;
    report.status = status;
    if (message) report.message = message;
    if (status === 'failed') {
      this.history?.addEntry('error', this.paths.sourceDocs, report.errors[report.errors.length - 1]);
    }
    const { logFile, reportFile } = await this.logger.save();
    this.logger.info(`Log: ${logFile}`);
    this.logger.info(`Report: ${reportFile}`);
    return report;
  }
}
