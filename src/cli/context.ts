import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { access, mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { loadConfig, type DocsyncConfig } from '../config.js';
import { HistoryDB } from '../history/index.js';
import { resolvePaths, type WorkspacePaths } from '../utils/paths.js';
import { errorMessage } from '../errors.js';

export interface Workspace {
  root: string;
  config: DocsyncConfig;
  paths: WorkspacePaths;
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function workspaceRoot(cmd: Command): string {
  const { cwd } = cmd.optsWithGlobals<{ cwd?: string }>();
  return resolve(cwd ?? process.cwd());
}

export async function loadWorkspace(cmd: Command): Promise<Workspace> {
  const root = workspaceRoot(cmd);
  const config = await loadConfig(root);
  return { root, config, paths: resolvePaths(root, config) };
}

export async function openHistory(paths: WorkspacePaths): Promise<HistoryDB> {
  await mkdir(dirname(paths.history), { recursive: true });
  return new HistoryDB(paths.history);
}

export async function ask(prompt: string): Promise<string> {
  const rl = readline.createInterface({ input: stdin, output: stdout });
  const answer = await rl.question(prompt);
  rl.close();
  return answer;
}

export function fail(err: unknown): never {
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  process.exit(1);
}
