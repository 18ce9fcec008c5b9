import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { downloadChunks } from '../ingest/index.js';
import { PineconeIndex } from '../pinecone/client.js';
import { shortenPath } from '../utils/paths.js';
import { fail, loadWorkspace, openHistory } from './context.js';

export const downloadCommand = new Command('download')
  .description('Back up every chunk in the index namespace as local chunk files')
  .option('-o, --out <dir>', 'Output directory (default: the archived chunks directory)')
  .action(async (opts: { out?: string }, cmd: Command) => {
    try {
      const { root, config, paths } = await loadWorkspace(cmd);
      if (!config.pinecone.apiKey) {
        console.error(chalk.red('PINECONE_API_KEY is not set (environment or .env).'));
        process.exit(1);
      }

      const outDir = opts.out ? resolve(root, opts.out) : paths.archivedChunks;
      console.log('');
      console.log(chalk.bold('Chunk Download'));
      console.log(chalk.dim('─'.repeat(40)));
      console.log(`  Index:     ${config.pinecone.index}`);
      console.log(`  Namespace: ${config.pinecone.namespace}`);
      console.log(`  Output:    ${shortenPath(outDir, root)}`);
      console.log('');

      const index = new PineconeIndex({
        apiKey: config.pinecone.apiKey,
        index: config.pinecone.index,
        namespace: config.pinecone.namespace,
        maxRetries: config.ingest.maxRetries,
      });

      const result = await downloadChunks({
        index,
        outDir,
        fetchBatchSize: config.ingest.fetchBatchSize,
        onProgress: (message) => console.log(chalk.dim(`  ${message}`)),
      });

      if (result.totalRecords === 0) {
        console.log(chalk.dim('  The namespace is empty, nothing to download.'));
        return;
      }

      const history = await openHistory(paths);
      try {
        for (const file of result.files) {
          console.log(`  ${file.filename}: ${file.chunks} chunks`);
          history.addEntry('download', file.filename, `${file.chunks} chunks`);
        }
      } finally {
        history.close();
      }

      console.log('');
      console.log(chalk.green.bold(`Downloaded ${result.totalRecords} chunks from ${result.files.length} files.`));
      console.log(chalk.dim('Run "docsync tracking sync" to rebuild tracking from them.'));
      console.log('');
    } catch (err) {
      fail(err);
    }
  });
