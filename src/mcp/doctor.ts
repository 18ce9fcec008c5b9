import { access } from 'node:fs/promises';
import type { DocsyncConfig } from '../config.js';
import type { WorkspacePaths } from '../utils/paths.js';
import {
  API_KEY_VAR,
  SECRET_FILES,
  McpConfigError,
  isIgnored,
  parseGitignore,
  readEnabledServers,
  readGitignore,
  readMcpJson,
  type McpJson,
} from './project-config.js';

export type FindingCode =
  | 'mcp-json-missing'
  | 'mcp-json-invalid'
  | 'server-missing'
  | 'env-substitution'
  | 'api-key-missing'
  | 'server-not-enabled'
  | 'not-gitignored'
  | 'ingest-key-missing';

export interface Finding {
  code: FindingCode;
  severity: 'error' | 'warning';
  symptom: string;
  cause: string;
  solution: string;
}

const SUBSTITUTION = /\$\{[^}]*\}|\$[A-Z_][A-Z0-9_]*/;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function checkMcpJson(paths: WorkspacePaths, name: string): Promise<Finding[]> {
  let mcpJson: McpJson | null;
  try {
    mcpJson = await readMcpJson(paths.mcpJson);
  } catch (err) {
    if (!(err instanceof McpConfigError)) throw err;
    return [{
      code: 'mcp-json-invalid',
      severity: 'error',
      symptom: 'The assistant lists no servers from this project',
      cause: err.message,
      solution: 'Fix the JSON syntax in .mcp.json, or delete it and run "docsync mcp setup"',
    }];
  }

  if (!mcpJson) {
    return [{
      code: 'mcp-json-missing',
      severity: 'error',
      symptom: `"${name}" does not appear in "claude mcp list"`,
      cause: '.mcp.json does not exist in the project root',
      solution: 'Run "docsync mcp setup"',
    }];
  }

  const entry = mcpJson.mcpServers?.[name];
  if (!entry) {
    return [{
      code: 'server-missing',
      severity: 'error',
      symptom: `"${name}" does not appear in "claude mcp list"`,
      cause: `.mcp.json has no mcpServers.${name} entry`,
      solution: 'Run "docsync mcp setup"',
    }];
  }

  const findings: Finding[] = [];
  const env = entry.env ?? {};
  const substituted = Object.keys(env).filter((k) => SUBSTITUTION.test(env[k] ?? ''));
  if (substituted.length > 0) {
    findings.push({
      code: 'env-substitution',
      severity: 'error',
      symptom: 'The server starts but every request fails to authenticate',
      cause: `Variable substitution is not supported in .mcp.json env values (${substituted.join(', ')})`,
      solution: 'Put the literal value in .mcp.json and keep the file out of git',
    });
  }

  if (!env[API_KEY_VAR]) {
    findings.push({
      code: 'api-key-missing',
      severity: 'error',
      symptom: 'The server reports "API key not set"',
      cause: `mcpServers.${name}.env has no ${API_KEY_VAR}`,
      solution: `Set ${API_KEY_VAR} in .env and run "docsync mcp setup" again`,
    });
  }

  return findings;
}

async function checkEnabled(paths: WorkspacePaths, name: string): Promise<Finding[]> {
  let enabled: string[] | null;
  try {
    enabled = await readEnabledServers(paths.claudeSettings);
  } catch (err) {
    if (!(err instanceof McpConfigError)) throw err;
    enabled = null;
  }
  if (enabled?.includes(name)) return [];

  return [{
    code: 'server-not-enabled',
    severity: 'error',
    symptom: `"${name}" is listed but never connects`,
    cause: `"${name}" is not in enabledMcpjsonServers of .claude/settings.local.json`,
    solution: 'Run "docsync mcp setup", or "claude mcp reset-project-choices" and approve the server on the next start',
  }];
}

async function checkGitignore(paths: WorkspacePaths): Promise<Finding[]> {
  const rules = parseGitignore(await readGitignore(paths.gitignore));
  const findings: Finding[] = [];
  for (const file of SECRET_FILES) {
    if (isIgnored(rules, file)) continue;
    findings.push({
      code: 'not-gitignored',
      severity: 'warning',
      symptom: `${file} could be committed`,
      cause: `${file} holds secrets or local choices and is not in .gitignore`,
      solution: 'Run "docsync mcp setup" or add it to .gitignore',
    });
  }
  return findings;
}

/** Checks the project's MCP wiring and the ingest key. Findings are listed in check order. */
export async function diagnose(paths: WorkspacePaths, config: DocsyncConfig): Promise<Finding[]> {
  const name = config.mcp.serverName;
  const findings: Finding[] = [
    ...(await checkMcpJson(paths, name)),
    ...(await checkEnabled(paths, name)),
    ...(await checkGitignore(paths)),
  ];

  if (!config.pinecone.apiKey) {
    findings.push({
      code: 'ingest-key-missing',
      severity: 'error',
      symptom: '"docsync upload" stops with "PINECONE_API_KEY is not set"',
      cause: (await exists(paths.env)) ? `.env has no ${API_KEY_VAR}` : '.env does not exist',
      solution: `Add ${API_KEY_VAR}=<your key> to .env`,
    });
  }

  return findings;
}
