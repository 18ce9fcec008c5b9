export { StagingArea } from './staging.js';
export type { StagingDirs } from './staging.js';
export { parseChunkFile, serializeChunkFile, readChunkFile, writeChunkFile, INDEX_FILENAME } from './chunk-file.js';
