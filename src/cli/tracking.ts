import { Command } from 'commander';
import chalk from 'chalk';
import { TrackingStore, syncTrackingFromChunks } from '../tracking/index.js';
import { fail, loadWorkspace, openHistory } from './context.js';

const syncCommand = new Command('sync')
  .description('Rebuild tracking.json from local chunk files')
  .action(async (_opts: unknown, cmd: Command) => {
    try {
      const { config, paths } = await loadWorkspace(cmd);
      const store = new TrackingStore(paths.tracking, config.pinecone.index, config.pinecone.namespace);

      console.log('');
      console.log(chalk.bold('Tracking Sync'));
      console.log(chalk.dim('─'.repeat(40)));

      const result = await syncTrackingFromChunks({
        store,
        chunksDir: paths.archivedChunks,
        archivedSourceDir: paths.archivedSourceDocs,
        onFile: (filename, outcome, chunks) => {
          switch (outcome) {
            case 'added':
              console.log(`  ${chalk.green('+')} ${filename} ${chalk.dim(`(${chunks} chunks)`)}`);
              break;
            case 'updated':
              console.log(`  ${chalk.yellow('~')} ${filename} ${chalk.dim(`(${chunks} chunks)`)}`);
              break;
            default:
              console.log(chalk.dim(`  = ${filename} (unchanged)`));
          }
        },
      });

      const history = await openHistory(paths);
      history.addEntry('sync', paths.tracking, `${result.added} added, ${result.updated} updated`);
      history.close();

      console.log('');
      console.log(`  Added:   ${result.added}`);
      console.log(`  Updated: ${result.updated}`);
      console.log(`  Skipped: ${result.skipped}`);
      console.log(`  Total:   ${result.total} files tracked`);
      console.log('');
    } catch (err) {
      fail(err);
    }
  });

export const trackingCommand = new Command('tracking')
  .description('Manage the tracking of uploaded files');

trackingCommand.addCommand(syncCommand);
