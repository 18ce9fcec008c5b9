import { Command } from 'commander';
import chalk from 'chalk';
import { IngestPipeline } from '../ingest/index.js';
import { RunLogger } from '../history/index.js';
import { PineconeIndex } from '../pinecone/client.js';
import type { RunReport } from '../types.js';
import { fail, loadWorkspace, openHistory } from './context.js';

export const uploadCommand = new Command('upload')
  .description('Chunk new and changed documents and upload them to the index')
  .option('--dry-run', 'Analyze and chunk without touching the index or moving files')
  .action(async (opts: { dryRun?: boolean }, cmd: Command) => {
    try {
      const { config, paths } = await loadWorkspace(cmd);
      const history = opts.dryRun ? undefined : await openHistory(paths);
      const logger = new RunLogger({ logsDir: paths.logs, prefix: opts.dryRun ? 'dry-run' : 'upload' });

      const pipeline = new IngestPipeline({
        config,
        paths,
        logger,
        history,
        dryRun: opts.dryRun,
        connect: () =>
          new PineconeIndex({
            apiKey: config.pinecone.apiKey ?? '',
            index: config.pinecone.index,
            namespace: config.pinecone.namespace,
            maxRetries: config.ingest.maxRetries,
          }),
      });

      let report: RunReport;
      try {
        report = await pipeline.run();
      } finally {
        history?.close();
      }

      console.log('');
      if (report.status === 'completed') {
        console.log(chalk.green.bold(`Done${report.message ? `: ${report.message}` : ''}`));
      } else if (report.status === 'partial') {
        console.log(chalk.yellow.bold(`Finished with ${report.errors.length} errors. Failed files stay in staging; run "docsync upload" again.`));
        process.exitCode = 1;
      } else {
        console.log(chalk.red.bold('Upload failed.'));
        process.exitCode = 1;
      }
    } catch (err) {
      fail(err);
    }
  });
