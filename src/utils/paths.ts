import { basename, extname, isAbsolute, join, relative, resolve } from 'node:path';
import { homedir } from 'node:os';
import type { DocsyncConfig } from '../config.js';

export interface WorkspacePaths {
  root: string;
  sourceDocs: string;
  chunks: string;
  archivedChunks: string;
  archivedSourceDocs: string;
  tracking: string;
  logs: string;
  history: string;
  env: string;
  mcpJson: string;
  claudeSettings: string;
  gitignore: string;
}

export function resolvePaths(workspace: string, config: DocsyncConfig): WorkspacePaths {
  const root = resolve(workspace);
  const at = (p: string): string => (isAbsolute(p) ? p : join(root, p));
  return {
    root,
    sourceDocs: at(config.paths.sourceDocs),
    chunks: at(config.paths.chunks),
    archivedChunks: at(config.paths.archivedChunks),
    archivedSourceDocs: at(config.paths.archivedSourceDocs),
    tracking: at(config.paths.tracking),
    logs: at(config.paths.logs),
    history: at(config.paths.history),
    env: join(root, '.env'),
    mcpJson: join(root, '.mcp.json'),
    claudeSettings: join(root, '.claude', 'settings.local.json'),
    gitignore: join(root, '.gitignore'),
  };
}

/** File name safe to use inside a single directory. */
export function safeFilename(filename: string): string {
  return filename.replace(/[/\\]/g, '_');
}

export function fileStem(path: string): string {
  return basename(path, extname(path));
}

export function shortenPath(path: string, from?: string): string {
  if (from) {
    const rel = relative(from, path);
    if (rel && !rel.startsWith('..') && !isAbsolute(rel)) return rel;
  }
  const home = homedir();
  if (path.startsWith(home)) {
    return '~' + path.slice(home.length);
  }
  return path;
}
