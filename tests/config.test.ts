import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { deepMerge, getDefaultConfig, loadConfig, saveConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'docsync-config-test-'));
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] } })).toEqual({ a: { b: 1, c: [3] }, d: 1 });
  });
});

describe('loadConfig', () => {
  it('returns the defaults without a config file', async () => {
    expect(await loadConfig(tmpDir, {})).toEqual(getDefaultConfig());
  });

  it('applies TOML overrides', async () => {
    await writeFile(join(tmpDir, 'docsync.toml'), [
      '[pinecone]',
      'index = "legal-docs"',
      'namespace = "ip-law"',
      '',
      '[chunking]',
      'chunkSize = 1500',
      '',
      '[ingest]',
      'include = ["*.md", "*.txt"]',
    ].join('\n'));

    const config = await loadConfig(tmpDir, {});
    expect(config.pinecone).toEqual({ index: 'legal-docs', namespace: 'ip-law' });
    expect(config.chunking).toEqual({ chunkSize: 1500, minChunkSize: 100 });
    expect(config.ingest.include).toEqual(['*.md', '*.txt']);
    expect(config.ingest.exclude).toEqual(['desktop.ini']);
  });

  it('reads the API key from .env, with the environment taking priority', async () => {
    await writeFile(join(tmpDir, '.env'), 'PINECONE_API_KEY=test-secret\nPINECONE_INDEX=from-file\n');

    const fromFile = await loadConfig(tmpDir, {});
    expect(fromFile.pinecone.apiKey).toBe('test-secret');
    expect(fromFile.pinecone.index).toBe('from-file');

    const fromEnv = await loadConfig(tmpDir, { PINECONE_API_KEY: 'env-secret' });
    expect(fromEnv.pinecone.apiKey).toBe('env-secret');
    expect(fromEnv.pinecone.index).toBe('from-file');
  });

  it('rejects invalid TOML', async () => {
    await writeFile(join(tmpDir, 'docsync.toml'), '[pinecone\nindex = ');
    await expect(loadConfig(tmpDir, {})).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects values that fail validation', async () => {
    await writeFile(join(tmpDir, 'docsync.toml'), '[chunking]\nchunkSize = 50\n');
    await expect(loadConfig(tmpDir, {})).rejects.toThrow(
      'Invalid docsync.toml at "chunking.chunkSize": chunkSize must be greater than minChunkSize',
    );
  });

  it('rejects an invalid server name', async () => {
    await writeFile(join(tmpDir, 'docsync.toml'), '[mcp]\nserverName = "bad name"\n');
    await expect(loadConfig(tmpDir, {})).rejects.toThrow('at "mcp.serverName"');
  });
});

describe('saveConfig', () => {
  it('never writes the API key', async () => {
    const config = getDefaultConfig();
    config.pinecone.apiKey = 'test-secret';
    config.pinecone.index = 'saved';
    await saveConfig(tmpDir, config);

    expect(await readFile(join(tmpDir, 'docsync.toml'), 'utf-8')).not.toContain('test-secret');
    expect((await loadConfig(tmpDir, {})).pinecone).toEqual({ index: 'saved', namespace: 'default' });
  });
});
