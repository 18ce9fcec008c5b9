import { Command } from 'commander';
import chalk from 'chalk';
import { TrackingStore } from '../tracking/index.js';
import type { TrackedFile } from '../types.js';
import { fail, loadWorkspace } from './context.js';

function formatDate(iso: string | null): string {
  if (!iso) return '—';
  const d = new Date(iso);
  if (isNaN(d.getTime())) return iso;
  const year = d.getFullYear();
  const month = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  const hours = String(d.getHours()).padStart(2, '0');
  const minutes = String(d.getMinutes()).padStart(2, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}`;
}

function colorSource(source: TrackedFile['source']): string {
  switch (source) {
    case 'archived_source_docs':
      return chalk.green('archived');
    case 'chunks_only':
      return chalk.yellow('chunks only');
    default:
      return chalk.dim('unknown');
  }
}

function printTableHeader(): void {
  console.log(
    chalk.bold('  FILE') + '                                      ' +
    chalk.bold('CHUNKS') + '  ' +
    chalk.bold('UPLOADED') + '          ' +
    chalk.bold('SOURCE'),
  );
  console.log(chalk.dim('  ' + '─'.repeat(80)));
}

export const filesCommand = new Command('files')
  .description('List files recorded in tracking.json')
  .option('-m, --match <text>', 'Only files whose name contains the text')
  .option('--json', 'Output as JSON')
  .action(async (opts: { match?: string; json?: boolean }, cmd: Command) => {
    try {
      const { config, paths } = await loadWorkspace(cmd);
      const tracking = await new TrackingStore(paths.tracking, config.pinecone.index, config.pinecone.namespace).load();

      let entries = Object.entries(tracking.files).sort(([a], [b]) => a.localeCompare(b));
      if (opts.match) {
        const needle = opts.match.toLowerCase();
        entries = entries.filter(([name]) => name.toLowerCase().includes(needle));
      }

      if (entries.length === 0) {
        console.log(chalk.dim('No files tracked.'));
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      console.log('');
      printTableHeader();
      for (const [name, file] of entries) {
        const label = name.length > 40 ? name.slice(0, 39) + '…' : name;
        console.log(
          `  ${label.padEnd(42)}${String(file.chunksCount).padEnd(8)}${formatDate(file.uploadedAt).padEnd(18)}${colorSource(file.source)}`,
        );
      }

      const chunks = entries.reduce((sum, [, f]) => sum + f.chunksCount, 0);
      console.log('');
      console.log(chalk.dim(`  ${entries.length} files | ${chunks} chunks | last update ${formatDate(tracking.lastUpdated)}`));
      console.log('');
    } catch (err) {
      fail(err);
    }
  });
