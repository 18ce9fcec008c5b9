import { Command } from 'commander';
import chalk from 'chalk';
import { readdir } from 'node:fs/promises';
import { getConfigPath } from '../config.js';
import { TrackingStore, analyzeChanges } from '../tracking/index.js';
import { listSourceDocuments } from '../ingest/index.js';
import { diagnose } from '../mcp/index.js';
import { shortenPath } from '../utils/paths.js';
import { fail, fileExists, loadWorkspace } from './context.js';

async function countJson(dir: string): Promise<number> {
  try {
    return (await readdir(dir)).filter((n) => n.endsWith('.json')).length;
  } catch {
    return 0;
  }
}

export const statusCommand = new Command('status')
  .description('Show workspace, tracking and MCP status')
  .action(async (_opts: unknown, cmd: Command) => {
    try {
      const { root, config, paths } = await loadWorkspace(cmd);
      const rel = (p: string): string => shortenPath(p, root);

      console.log('');
      console.log(chalk.bold('docsync Status'));
      console.log(chalk.dim('─'.repeat(40)));

      const hasConfig = await fileExists(getConfigPath(root));
      console.log(`  Workspace: ${root}`);
      console.log(`  Config:    ${hasConfig ? rel(getConfigPath(root)) : chalk.dim('defaults (no docsync.toml)')}`);
      console.log(`  Index:     ${config.pinecone.index}  Namespace: ${config.pinecone.namespace}`);
      console.log(`  API key:   ${config.pinecone.apiKey ? chalk.green('set') : chalk.red('not set')}`);

      const tracking = await new TrackingStore(paths.tracking, config.pinecone.index, config.pinecone.namespace).load();
      const tracked = Object.values(tracking.files);
      const chunks = tracked.reduce((sum, f) => sum + f.chunksCount, 0);

      console.log('');
      console.log(chalk.bold('  Documents'));
      console.log(`    Tracked:  ${tracked.length} files, ${chunks} chunks`);
      console.log(`    Updated:  ${tracking.lastUpdated ?? chalk.dim('never')}`);

      const sources = await listSourceDocuments(paths.sourceDocs, config.ingest);
      const changes = analyzeChanges(sources, tracking);
      console.log(
        `    Pending:  ${chalk.green(`${changes.newFiles.length} new`)}  ` +
        `${chalk.yellow(`${changes.changedFiles.length} changed`)}  ` +
        `${chalk.dim(`${changes.unchangedFiles.length} unchanged`)}  in ${rel(paths.sourceDocs)}/`,
      );

      const staged = await countJson(paths.chunks);
      if (staged > 0) {
        console.log(`    Staging:  ${chalk.yellow(`${staged} chunk files left from a failed upload`)}`);
      }

      const findings = await diagnose(paths, config);
      const errors = findings.filter((f) => f.severity === 'error');
      console.log('');
      console.log(chalk.bold('  MCP'));
      console.log(`    Server:   ${config.mcp.serverName} (${config.mcp.command} ${config.mcp.args.join(' ')})`);
      if (errors.length === 0) {
        console.log(`    Status:   ${chalk.green('configured')}`);
      } else {
        console.log(`    Status:   ${chalk.red(`${errors.length} problems`)} ${chalk.dim('(run "docsync mcp doctor")')}`);
      }
      console.log('');
    } catch (err) {
      fail(err);
    }
  });
