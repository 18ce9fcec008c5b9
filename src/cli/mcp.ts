import { Command } from 'commander';
import chalk from 'chalk';
import {
  API_KEY_VAR,
  addJsonCommand,
  buildServerEntry,
  diagnose,
  enableProjectServer,
  ensureGitignore,
  maskSecret,
  writeMcpJson,
} from '../mcp/index.js';
import { shortenPath } from '../utils/paths.js';
import { fail, loadWorkspace } from './context.js';

const setupCommand = new Command('setup')
  .description('Connect the index MCP server to the coding assistant')
  .option('-s, --scope <scope>', 'project (write .mcp.json) or user (print the add-json command)', 'project')
  .option('--json', 'Print the .mcp.json server entry (API key masked) and exit')
  .action(async (opts: { scope: string; json?: boolean }, cmd: Command) => {
    try {
      if (opts.scope !== 'project' && opts.scope !== 'user') {
        throw new Error(`Invalid --scope "${opts.scope}". Use "project" or "user".`);
      }

      const { root, config, paths } = await loadWorkspace(cmd);
      const name = config.mcp.serverName;
      const apiKey = config.pinecone.apiKey;

      if (opts.json) {
        const entry = buildServerEntry(config, apiKey ? maskSecret(apiKey) : '<your API key>');
        console.log(JSON.stringify({ mcpServers: { [name]: entry } }, null, 2));
        return;
      }

      if (!apiKey) {
        console.error(chalk.red(`${API_KEY_VAR} is not set.`));
        console.error(chalk.dim(`Add ${API_KEY_VAR}=<your key> to ${shortenPath(paths.env, root)} and run this again.`));
        process.exit(1);
      }

      const entry = buildServerEntry(config, apiKey);

      console.log('');
      console.log(chalk.bold('MCP Setup'));
      console.log(chalk.dim('─'.repeat(40)));
      console.log('');

      if (opts.scope === 'user') {
        console.log('  Run this once to make the server available in every project:');
        console.log('');
        console.log(`  ${chalk.cyan(addJsonCommand(name, entry))}`);
        console.log('');
        console.log(chalk.dim('  The command contains your API key; do not paste it into shared logs.'));
        console.log('');
        return;
      }

      const result = await writeMcpJson(paths.mcpJson, name, entry);
      const mcpPath = shortenPath(paths.mcpJson, root);
      if (result === 'already-configured') {
        console.log(`  ${chalk.green('*')} ${mcpPath}: ${chalk.green('already configured')}`);
      } else if (result === 'created') {
        console.log(`  ${chalk.green('*')} ${mcpPath}: ${chalk.green('created')}`);
      } else {
        console.log(`  ${chalk.green('*')} ${mcpPath}: ${chalk.green('updated')} ${chalk.dim('(other servers preserved)')}`);
      }

      const settingsPath = shortenPath(paths.claudeSettings, root);
      if (await enableProjectServer(paths.claudeSettings, name)) {
        console.log(`  ${chalk.green('*')} ${settingsPath}: ${chalk.green(`enabled "${name}"`)}`);
      } else {
        console.log(`  ${chalk.green('*')} ${settingsPath}: ${chalk.dim(`"${name}" already enabled`)}`);
      }

      const added = await ensureGitignore(paths.gitignore);
      if (added.length > 0) {
        console.log(`  ${chalk.green('*')} .gitignore: ${chalk.green(`added ${added.join(', ')}`)}`);
      } else {
        console.log(`  ${chalk.green('*')} .gitignore: ${chalk.dim('secrets already ignored')}`);
      }

      console.log('');
      console.log(chalk.dim('─'.repeat(40)));
      console.log('Restart the assistant in this directory, then verify with:');
      console.log(`  ${chalk.cyan('claude mcp list')}`);
      console.log('');
      console.log(chalk.dim('If the server was rejected before, clear the earlier choice with:'));
      console.log(`  ${chalk.cyan('claude mcp reset-project-choices')}`);
      console.log('');
    } catch (err) {
      fail(err);
    }
  });

const doctorCommand = new Command('doctor')
  .description('Check the MCP wiring and explain how to fix what is wrong')
  .option('--json', 'Output findings as JSON')
  .action(async (opts: { json?: boolean }, cmd: Command) => {
    try {
      const { config, paths } = await loadWorkspace(cmd);
      const findings = await diagnose(paths, config);
      const errors = findings.filter((f) => f.severity === 'error').length;

      if (opts.json) {
        console.log(JSON.stringify(findings, null, 2));
      } else if (findings.length === 0) {
        console.log(chalk.green(`No problems found. "${config.mcp.serverName}" is configured for this project.`));
      } else {
        console.log('');
        for (const finding of findings) {
          const mark = finding.severity === 'error' ? chalk.red('x') : chalk.yellow('!');
          console.log(`  ${mark} ${chalk.bold(finding.symptom)} ${chalk.dim(`[${finding.code}]`)}`);
          console.log(`    Cause:    ${finding.cause}`);
          console.log(`    Solution: ${finding.solution}`);
          console.log('');
        }
        console.log(chalk.dim(`  ${errors} errors, ${findings.length - errors} warnings`));
        console.log('');
      }

      if (errors > 0) process.exitCode = 1;
    } catch (err) {
      fail(err);
    }
  });

export const mcpCommand = new Command('mcp')
  .description('Wire the index into the coding assistant over MCP');

mcpCommand.addCommand(setupCommand);
mcpCommand.addCommand(doctorCommand);
