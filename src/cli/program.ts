/**
 * rolerag command tree
 */

import { Command } from 'commander';
import { registerClearCommand } from './commands/clear.js';
import { registerConfigCommand } from './commands/config.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerSearchCommand } from './commands/search.js';
import { registerStatsCommand } from './commands/stats.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('rolerag')
    .description('Role-aware document retrieval')
    .version('0.1.0')
    .option('-c, --config <path>', 'Configuration file')
    .option('-v, --verbose', 'Debug logging and error details');

  registerIngestCommand(program);
  registerSearchCommand(program);
  registerStatsCommand(program);
  registerClearCommand(program);
  registerConfigCommand(program);

  return program;
}
