export {
  API_KEY_VAR,
  SECRET_FILES,
  McpConfigError,
  buildServerEntry,
  readMcpJson,
  writeMcpJson,
  readEnabledServers,
  enableProjectServer,
  ensureGitignore,
  isIgnored,
  parseGitignore,
  addJsonCommand,
  maskSecret,
} from './project-config.js';
export type { GitignoreRule, MergeResult, McpJson } from './project-config.js';
export { diagnose } from './doctor.js';
export type { Finding, FindingCode } from './doctor.js';
