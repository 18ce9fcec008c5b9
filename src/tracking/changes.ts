import type { ChangeSet, SourceDocument, Tracking } from '../types.js';

export function analyzeChanges(files: readonly SourceDocument[], tracking: Tracking): ChangeSet {
  const changes: ChangeSet = {
    newFiles: [],
    changedFiles: [],
    unchangedFiles: [],
    orphanChunkIds: [],
  };

  for (const file of files) {
    const tracked = tracking.files[file.filename];
    if (!tracked) {
      changes.newFiles.push(file);
    } else if (tracked.contentHash !== file.contentHash) {
      changes.changedFiles.push(file);
      changes.orphanChunkIds.push(...tracked.chunkIds);
    } else {
      changes.unchangedFiles.push(file);
    }
  }

  return changes;
}
