import picomatch from 'picomatch';
import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import { computeFileHash } from '../chunking/index.js';
import type { SourceDocument } from '../types.js';

export interface SourceFilter {
  include: readonly string[];
  exclude: readonly string[];
}

export function createSourceMatcher(filter: SourceFilter): (name: string) => boolean {
  const included = picomatch([...filter.include], { nocase: true });
  const excluded = filter.exclude.length > 0 ? picomatch([...filter.exclude], { nocase: true }) : () => false;
  return (name) => included(name) && !excluded(name);
}

/** Top-level documents of the source directory, sorted by name. */
export async function listSourceDocuments(dir: string, filter: SourceFilter): Promise<SourceDocument[]> {
  const matches = createSourceMatcher(filter);
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }

  const names = entries
    .filter((e) => e.isFile() && matches(e.name))
    .map((e) => e.name)
    .sort();

  const docs: SourceDocument[] = [];
  for (const filename of names) {
    const path = join(dir, filename);
    docs.push({ filename, path, contentHash: await computeFileHash(path) });
  }
  return docs;
}
