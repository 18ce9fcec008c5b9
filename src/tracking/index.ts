export { TrackingStore } from './store.js';
export { analyzeChanges } from './changes.js';
export { syncTrackingFromChunks } from './sync.js';
export type { TrackingSyncResult, TrackingSyncOptions } from './sync.js';
