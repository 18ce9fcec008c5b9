export { IngestPipeline } from './pipeline.js';
export type { IngestPipelineOptions } from './pipeline.js';
export { listSourceDocuments, createSourceMatcher } from './sources.js';
export type { SourceFilter } from './sources.js';
export { downloadChunks } from './download.js';
export type { DownloadOptions, DownloadResult } from './download.js';
export { batches } from './batches.js';
