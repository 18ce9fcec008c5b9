import { z } from 'zod';
import picomatch from 'picomatch';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { DocsyncConfig } from '../config.js';
import type { McpServerEntry } from '../types.js';

export const API_KEY_VAR = 'PINECONE_API_KEY';

/** Files that carry secrets or machine-local choices and must stay out of git. */
export const SECRET_FILES = ['.mcp.json', '.env', '.claude/settings.local.json'] as const;

export const GITIGNORE_HEADER = '# MCP configuration and secrets';

export type MergeResult = 'created' | 'updated' | 'already-configured';

const serverEntrySchema = z
  .object({
    command: z.string(),
    args: z.array(z.string()).optional(),
    env: z.record(z.string()).optional(),
  })
  .passthrough();

const mcpJsonSchema = z
  .object({
    mcpServers: z.record(serverEntrySchema).optional(),
  })
  .passthrough();

export type McpJson = z.infer<typeof mcpJsonSchema>;

const settingsSchema = z
  .object({
    enabledMcpjsonServers: z.array(z.string()).optional(),
  })
  .passthrough();

export class McpConfigError extends Error {
  constructor(
    readonly path: string,
    message: string,
  ) {
    super(`${path}: ${message}`);
    this.name = 'McpConfigError';
  }
}

/** The server entry for the index's MCP server. Env values are literals. */
export function buildServerEntry(config: DocsyncConfig, apiKey: string): McpServerEntry {
  return {
    command: config.mcp.command,
    args: [...config.mcp.args],
    env: { [API_KEY_VAR]: apiKey },
  };
}

async function readJsonObject<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new McpConfigError(path, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new McpConfigError(path, `unexpected shape at "${issue?.path.join('.') ?? ''}": ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

async function writeJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2) + '\n', 'utf-8');
}

export async function readMcpJson(path: string): Promise<McpJson | null> {
  return readJsonObject(path, mcpJsonSchema);
}

function sameEntry(current: z.infer<typeof serverEntrySchema>, entry: McpServerEntry): boolean {
  const args = current.args ?? [];
  const env = current.env ?? {};
  const envKeys = Object.keys(env);
  return (
    current.command === entry.command &&
    args.length === entry.args.length &&
    args.every((a, i) => a === entry.args[i]) &&
    envKeys.length === Object.keys(entry.env).length &&
    envKeys.every((k) => env[k] === entry.env[k])
  );
}

/**
 * Adds or replaces one server in `.mcp.json`, keeping every other server.
 * A file that is not valid JSON is reported, never overwritten.
 */
export async function writeMcpJson(path: string, name: string, entry: McpServerEntry): Promise<MergeResult> {
  const existing = await readMcpJson(path);
  const servers = { ...(existing?.mcpServers ?? {}) };

  const current = servers[name];
  if (current && sameEntry(current, entry)) {
    return 'already-configured';
  }

  servers[name] = { ...entry };
  await writeJson(path, { ...(existing ?? {}), mcpServers: servers });
  return existing ? 'updated' : 'created';
}

export async function readEnabledServers(path: string): Promise<string[] | null> {
  const settings = await readJsonObject(path, settingsSchema);
  return settings ? settings.enabledMcpjsonServers ?? [] : null;
}

/** Adds `name` to `enabledMcpjsonServers` in `.claude/settings.local.json`. */
export async function enableProjectServer(path: string, name: string): Promise<boolean> {
  const settings: z.infer<typeof settingsSchema> = (await readJsonObject(path, settingsSchema)) ?? {};
  const enabled = settings.enabledMcpjsonServers ?? [];
  if (enabled.includes(name)) return false;

  await writeJson(path, { ...settings, enabledMcpjsonServers: [...enabled, name] });
  return true;
}

export interface GitignoreRule {
  pattern: string;
  negated: boolean;
  dirOnly: boolean;
  anchored: boolean;
}

export function parseGitignore(content: string): GitignoreRule[] {
  const rules: GitignoreRule[] = [];
  for (const line of content.split(/\r?\n/)) {
    let pattern = line.trim();
    if (!pattern || pattern.startsWith('#')) continue;

    const negated = pattern.startsWith('!');
    if (negated) pattern = pattern.slice(1);
    const dirOnly = pattern.endsWith('/');
    pattern = pattern.replace(/\/+$/, '');
    // a slash anywhere but the end ties the pattern to the root
    const anchored = pattern.includes('/');
    pattern = pattern.replace(/^\//, '');
    if (pattern) rules.push({ pattern, negated, dirOnly, anchored });
  }
  return rules;
}

function ruleMatches(rule: GitignoreRule, entry: string): boolean {
  const isMatch = picomatch(rule.pattern, { dot: true, basename: !rule.anchored });
  const segments = entry.split('/');
  for (let i = 1; i <= segments.length; i++) {
    if (i === segments.length && rule.dirOnly) break;
    if (isMatch(segments.slice(0, i).join('/'))) return true;
  }
  return false;
}

export async function readGitignore(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return '';
    throw err;
  }
}

/** True when `entry` or one of its parent directories is ignored. The last matching rule wins. */
export function isIgnored(rules: readonly GitignoreRule[], entry: string): boolean {
  let ignored = false;
  for (const rule of rules) {
    if (ruleMatches(rule, entry)) ignored = !rule.negated;
  }
  return ignored;
}

/** Appends the entries missing from `.gitignore`; returns the ones added. */
export async function ensureGitignore(path: string, entries: readonly string[] = SECRET_FILES): Promise<string[]> {
  const content = await readGitignore(path);
  const present = parseGitignore(content);
  const missing = entries.filter((e) => !isIgnored(present, e));
  if (missing.length === 0) return [];

  const prefix = content === '' || content.endsWith('\n') ? content : content + '\n';
  const block = [GITIGNORE_HEADER, ...missing].join('\n') + '\n';
  await writeFile(path, prefix + (prefix ? '\n' : '') + block, 'utf-8');
  return missing;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** The assistant CLI command that registers the server for every project of the user. */
export function addJsonCommand(name: string, entry: McpServerEntry): string {
  const json = JSON.stringify({ type: 'stdio', ...entry });
  return `claude mcp add-json ${name} ${shellQuote(json)} -s user`;
}

export function maskSecret(value: string): string {
  if (value.length <= 8) return '*'.repeat(value.length);
  return `${value.slice(0, 4)}${'*'.repeat(value.length - 8)}${value.slice(-4)}`;
}
