import { Command } from 'commander';
import chalk from 'chalk';
import { appendFile, readFile, writeFile } from 'node:fs/promises';
import { stdin } from 'node:process';
import {
  getConfigPath,
  getDefaultConfig,
  readEnvFile,
  saveConfig,
} from '../config.js';
import { StagingArea } from '../staging/index.js';
import { API_KEY_VAR, ensureGitignore } from '../mcp/index.js';
import { resolvePaths, shortenPath } from '../utils/paths.js';
import { ask, fail, fileExists, workspaceRoot } from './context.js';

export const initCommand = new Command('init')
  .description('Set up a docsync workspace in the current directory')
  .option('-i, --index <name>', 'Index name')
  .option('-n, --namespace <name>', 'Namespace inside the index')
  .option('-y, --yes', 'Do not prompt for the API key')
  .action(async (opts: { index?: string; namespace?: string; yes?: boolean }, cmd: Command) => {
    try {
      const root = workspaceRoot(cmd);
      const configPath = getConfigPath(root);
      const config = getDefaultConfig();
      if (opts.index) config.pinecone.index = opts.index;
      if (opts.namespace) config.pinecone.namespace = opts.namespace;
      const paths = resolvePaths(root, config);
      const rel = (p: string): string => shortenPath(p, root);

      console.log('');
      console.log(chalk.bold('docsync Setup'));
      console.log('');

      if (await fileExists(configPath)) {
        console.log(`  ${chalk.dim('o')} ${rel(configPath)} ${chalk.dim('already exists, left unchanged')}`);
      } else {
        await saveConfig(root, config);
        console.log(`  ${chalk.green('*')} ${rel(configPath)} created`);
      }

      await new StagingArea(paths).ensureDirectories();
      console.log(`  ${chalk.green('*')} ${rel(paths.sourceDocs)}/, ${rel(paths.chunks)}/, ${rel(paths.archivedChunks)}/, ${rel(paths.archivedSourceDocs)}/`);

      const env = await readEnvFile(root);
      if (env[API_KEY_VAR] || process.env[API_KEY_VAR]) {
        console.log(`  ${chalk.dim('o')} ${API_KEY_VAR} ${chalk.dim('already set')}`);
      } else {
        const key = !opts.yes && stdin.isTTY ? (await ask(chalk.bold(`${API_KEY_VAR} (leave empty to add later): `))).trim() : '';
        const line = `${API_KEY_VAR}=${key}\n`;
        if (await fileExists(paths.env)) {
          const current = await readFile(paths.env, 'utf-8');
          await appendFile(paths.env, current === '' || current.endsWith('\n') ? line : `\n${line}`, 'utf-8');
        } else {
          await writeFile(paths.env, line, { encoding: 'utf-8', mode: 0o600 });
        }
        console.log(`  ${chalk.green('*')} ${rel(paths.env)} ${key ? 'saved the API key' : chalk.yellow(`has an empty ${API_KEY_VAR}; fill it in`)}`);
      }

      const added = await ensureGitignore(paths.gitignore);
      if (added.length > 0) {
        console.log(`  ${chalk.green('*')} .gitignore: added ${added.join(', ')}`);
      }

      console.log('');
      console.log(chalk.bold('Next steps:'));
      console.log(`  Put Markdown files in ${chalk.cyan(rel(paths.sourceDocs) + '/')}`);
      console.log(`  ${chalk.cyan('docsync upload')}      Chunk and upload them`);
      console.log(`  ${chalk.cyan('docsync mcp setup')}   Connect the index to your coding assistant`);
      console.log('');
    } catch (err) {
      fail(err);
    }
  });
