import { parse, stringify } from 'smol-toml';
import { parse as parseEnv } from 'dotenv';
import { z } from 'zod';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError } from './errors.js';

export const CONFIG_FILENAME = 'docsync.toml';
export const ENV_FILENAME = '.env';

const positiveInt = z.number().int().positive();

const categoryRuleSchema = z.object({
  docType: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

const configSchema = z
  .object({
    pinecone: z.object({
      index: z.string().min(1),
      namespace: z.string().min(1),
    }),
    paths: z.object({
      sourceDocs: z.string().min(1),
      chunks: z.string().min(1),
      archivedChunks: z.string().min(1),
      archivedSourceDocs: z.string().min(1),
      tracking: z.string().min(1),
      logs: z.string().min(1),
      history: z.string().min(1),
    }),
    chunking: z.object({
      chunkSize: positiveInt,
      minChunkSize: positiveInt,
    }),
    ingest: z.object({
      include: z.array(z.string()).min(1),
      exclude: z.array(z.string()),
      upsertBatchSize: positiveInt,
      deleteBatchSize: positiveInt,
      fetchBatchSize: positiveInt,
      verifyDelayMs: z.number().int().nonnegative(),
      maxRetries: z.number().int().nonnegative(),
    }),
    categories: z.array(categoryRuleSchema),
    mcp: z.object({
      serverName: z.string().regex(/^[A-Za-z0-9_-]+$/, 'may only contain letters, digits, "-" and "_"'),
      command: z.string().min(1),
      args: z.array(z.string()),
    }),
  })
  .refine((c) => c.chunking.chunkSize > c.chunking.minChunkSize, {
    message: 'chunkSize must be greater than minChunkSize',
    path: ['chunking', 'chunkSize'],
  });

export type CategoryRule = z.infer<typeof categoryRuleSchema>;

export type DocsyncConfig = z.infer<typeof configSchema> & {
  pinecone: { apiKey?: string };
};

export function getConfigPath(workspace: string): string {
  return join(workspace, CONFIG_FILENAME);
}

export function getDefaultConfig(): DocsyncConfig {
  return {
    pinecone: {
      index: 'docs',
      namespace: 'default',
    },
    paths: {
      sourceDocs: 'source_docs',
      chunks: 'chunks',
      archivedChunks: 'archived_chunks',
      archivedSourceDocs: 'archived_source_docs',
      tracking: '.docsync/tracking.json',
      logs: '.docsync/logs',
      history: '.docsync/history.db',
    },
    chunking: {
      chunkSize: 2000,
      minChunkSize: 100,
    },
    ingest: {
      include: ['*.md'],
      exclude: ['desktop.ini'],
      upsertBatchSize: 96,
      deleteBatchSize: 1000,
      fetchBatchSize: 100,
      verifyDelayMs: 2000,
      maxRetries: 3,
    },
    categories: [
      { docType: 'legislation', keywords: ['закон'] },
      { docType: 'research', keywords: ['gem'] },
      { docType: 'article', keywords: ['expert', 'article'] },
      { docType: 'analysis', keywords: ['аналіз'] },
      { docType: 'contract', keywords: ['договір', 'договор', 'nda'] },
    ],
    mcp: {
      serverName: 'pinecone',
      command: 'npx',
      args: ['-y', '@pinecone-database/mcp'],
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export function deepMerge(defaults: unknown, overrides: unknown): unknown {
  if (!isPlainObject(defaults) || !isPlainObject(overrides)) {
    return overrides === undefined ? defaults : overrides;
  }
  const result: Record<string, unknown> = { ...defaults };
  for (const key of Object.keys(overrides)) {
    const overrideVal = overrides[key];
    if (overrideVal === undefined) continue;
    result[key] = key in result ? deepMerge(result[key], overrideVal) : overrideVal;
  }
  return result;
}

export async function readEnvFile(workspace: string): Promise<Record<string, string>> {
  try {
    return parseEnv(await readFile(join(workspace, ENV_FILENAME), 'utf-8'));
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Loads `docsync.toml` from the workspace over the defaults, then applies
 * `PINECONE_API_KEY` / `PINECONE_INDEX` from the process environment or,
 * failing that, the workspace `.env` file.
 */
export async function loadConfig(
  workspace: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<DocsyncConfig> {
  let overrides: unknown = {};
  try {
    const raw = await readFile(getConfigPath(workspace), 'utf-8');
    try {
      overrides = parse(raw);
    } catch (err) {
      throw new ConfigError(`${CONFIG_FILENAME} is not valid TOML: ${err instanceof Error ? err.message : String(err)}`);
    }
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }

  const result = configSchema.safeParse(deepMerge(getDefaultConfig(), overrides));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new ConfigError(`Invalid ${CONFIG_FILENAME}${where ? ` at "${where}"` : ''}: ${issue?.message ?? result.error.message}`);
  }

  const config: DocsyncConfig = result.data;
  const fileEnv = await readEnvFile(workspace);
  const apiKey = env.PINECONE_API_KEY || fileEnv.PINECONE_API_KEY;
  const index = env.PINECONE_INDEX || fileEnv.PINECONE_INDEX;
  if (apiKey) config.pinecone.apiKey = apiKey;
  if (index) config.pinecone.index = index;
  return config;
}

export async function saveConfig(workspace: string, config: DocsyncConfig): Promise<void> {
  const { apiKey: _apiKey, ...pinecone } = config.pinecone;
  const toml = stringify({ ...config, pinecone });
  await writeFile(getConfigPath(workspace), toml, 'utf-8');
}
