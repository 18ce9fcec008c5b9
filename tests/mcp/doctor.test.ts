import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { diagnose } from '../../src/mcp/doctor.js';
import {
  buildServerEntry,
  enableProjectServer,
  ensureGitignore,
  writeMcpJson,
} from '../../src/mcp/project-config.js';
import { getDefaultConfig, type DocsyncConfig } from '../../src/config.js';
import { resolvePaths, type WorkspacePaths } from '../../src/utils/paths.js';

let tmpDir: string;
let config: DocsyncConfig;
let paths: WorkspacePaths;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'docsync-doctor-test-'));
  config = getDefaultConfig();
  config.pinecone.apiKey = 'test-secret';
  paths = resolvePaths(tmpDir, config);
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

async function configure(env: Record<string, string>): Promise<void> {
  await writeMcpJson(paths.mcpJson, 'pinecone', { ...buildServerEntry(config, 'test-secret'), env });
  await enableProjectServer(paths.claudeSettings, 'pinecone');
  await ensureGitignore(paths.gitignore);
}

describe('diagnose', () => {
  it('finds nothing in a configured project', async () => {
    await configure({ PINECONE_API_KEY: 'test-secret' });
    expect(await diagnose(paths, config)).toEqual([]);
  });

  it('reports an unconfigured project', async () => {
    delete config.pinecone.apiKey;
    const findings = await diagnose(paths, config);
    expect(findings.map((f) => f.code)).toEqual([
      'mcp-json-missing',
      'server-not-enabled',
      'not-gitignored',
      'not-gitignored',
      'not-gitignored',
      'ingest-key-missing',
    ]);
    expect(findings[5]?.cause).toBe('.env does not exist');
  });

  it('flags variable substitution in env values', async () => {
    await configure({ PINECONE_API_KEY: '${PINECONE_API_KEY}' });
    const findings = await diagnose(paths, config);
    expect(findings.map((f) => f.code)).toEqual(['env-substitution']);
    expect(findings[0]?.cause).toBe(
      'Variable substitution is not supported in .mcp.json env values (PINECONE_API_KEY)',
    );
  });

  it('flags a server entry without the API key', async () => {
    await configure({});
    expect((await diagnose(paths, config)).map((f) => f.code)).toEqual(['api-key-missing']);
  });

  it('reports invalid JSON and a missing server entry', async () => {
    await enableProjectServer(paths.claudeSettings, 'pinecone');
    await ensureGitignore(paths.gitignore);

    await writeFile(paths.mcpJson, '{ broken');
    expect((await diagnose(paths, config)).map((f) => f.code)).toEqual(['mcp-json-invalid']);

    await writeFile(paths.mcpJson, JSON.stringify({ mcpServers: {} }));
    expect((await diagnose(paths, config)).map((f) => f.code)).toEqual(['server-missing']);
  });

  it('names a .env without the key', async () => {
    await configure({ PINECONE_API_KEY: 'test-secret' });
    await writeFile(paths.env, 'OTHER=1\n');
    delete config.pinecone.apiKey;
    const findings = await diagnose(paths, config);
    expect(findings.map((f) => [f.code, f.cause])).toEqual([
      ['ingest-key-missing', '.env has no PINECONE_API_KEY'],
    ]);
  });
});
