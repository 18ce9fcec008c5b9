import { Command } from 'commander';
import chalk from 'chalk';
import { fail, fileExists, loadWorkspace, openHistory } from './context.js';

export function parseSince(value: string, now: number = Date.now()): number {
  // Try duration format: 1h, 2d, 7d, 30m, etc.
  const match = value.match(/^(\d+)([mhd])$/);
  if (match) {
    const amount = parseInt(match[1]!, 10);
    const unit = match[2]!;
    switch (unit) {
      case 'm':
        return now - amount * 60 * 1000;
      case 'h':
        return now - amount * 60 * 60 * 1000;
      case 'd':
        return now - amount * 24 * 60 * 60 * 1000;
      default:
        return now;
    }
  }

  // Try ISO 8601 date
  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    return date.getTime();
  }

  throw new Error(`Invalid --since value: "${value}". Use format like "1h", "7d", or an ISO 8601 date.`);
}

function formatRelativeTime(timestamp: number): string {
  const now = Date.now();
  const diff = now - timestamp;
  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days >= 7) {
    // Absolute date for entries older than 7 days
    const d = new Date(timestamp);
    const year = d.getFullYear();
    const month = String(d.getMonth() + 1).padStart(2, '0');
    const day = String(d.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
  }

  if (days > 0) return `${days}d ago`;
  if (hours > 0) return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return 'just now';
}

function colorAction(action: string): string {
  switch (action) {
    case 'upload':
      return chalk.green(action);
    case 'download':
      return chalk.blue(action);
    case 'delete':
      return chalk.red(action);
    case 'archive':
      return chalk.dim(action);
    case 'sync':
      return chalk.cyan(action);
    case 'error':
      return chalk.red.bold(action);
    default:
      return action;
  }
}

export const logCommand = new Command('log')
  .description('Show upload activity history')
  .option('-a, --action <action>', 'Filter by action (upload, delete, archive, download, sync, error)')
  .option('-p, --path <path>', 'Filter by file name prefix')
  .option('-n, --limit <n>', 'Number of entries', '20')
  .option('--since <duration>', 'Show entries after (e.g. "1h", "7d", ISO date)')
  .option('--json', 'Output as JSON')
  .action(async (opts: { action?: string; path?: string; limit: string; since?: string; json?: boolean }, cmd: Command) => {
    try {
      const { paths } = await loadWorkspace(cmd);

      if (!(await fileExists(paths.history))) {
        console.log(chalk.dim('No history found. Run "docsync upload" first.'));
        return;
      }

      const since = opts.since ? parseSince(opts.since) : undefined;
      const limit = parseInt(opts.limit, 10);
      if (isNaN(limit) || limit <= 0) {
        throw new Error(`Invalid --limit value: "${opts.limit}"`);
      }

      const db = await openHistory(paths);
      const entries = db.getEntries({ action: opts.action, path: opts.path, since, limit });
      db.close();

      if (entries.length === 0) {
        console.log(chalk.dim('No activity found.'));
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      console.log('');
      console.log(
        chalk.bold('  TIME') + '          ' +
        chalk.bold('ACTION') + '    ' +
        chalk.bold('PATH') + '                                 ' +
        chalk.bold('DETAILS'),
      );
      console.log(chalk.dim('  ' + '─'.repeat(80)));

      for (const entry of entries) {
        const time = formatRelativeTime(entry.timestamp).padEnd(14);
        const action = colorAction(entry.action).padEnd(10 + (colorAction(entry.action).length - entry.action.length));
        const path = entry.path.length > 36 ? '…' + entry.path.slice(-35) : entry.path;
        const details = entry.details ?? '';

        console.log(`  ${time}${action}${path.padEnd(37)}${details}`);
      }

      console.log('');
    } catch (err) {
      fail(err);
    }
  });
