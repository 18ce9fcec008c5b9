export { chunkText } from './chunker.js';
export type { ChunkOptions } from './chunker.js';
export { categorizeDocument, FALLBACK_DOC_TYPE } from './categorize.js';
export { generateChunkId, computeFileHash, md5Hex } from './ids.js';
export { buildChunkRecords } from './records.js';
export type { BuildRecordsOptions } from './records.js';
