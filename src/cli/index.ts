import { Command } from 'commander';
import { initCommand } from './init.js';
import { uploadCommand } from './upload.js';
import { downloadCommand } from './download.js';
import { trackingCommand } from './tracking.js';
import { filesCommand } from './files.js';
import { logCommand } from './log.js';
import { statusCommand } from './status.js';
import { mcpCommand } from './mcp.js';

export const program = new Command()
  .name('docsync')
  .description('Keep a folder of Markdown documents in sync with a search index')
  .version('0.1.0')
  .option('-C, --cwd <dir>', 'Workspace directory (default: current directory)');

program.addCommand(initCommand);
program.addCommand(uploadCommand);
program.addCommand(downloadCommand);
program.addCommand(trackingCommand);
program.addCommand(filesCommand);
program.addCommand(logCommand);
program.addCommand(statusCommand);
program.addCommand(mcpCommand);
