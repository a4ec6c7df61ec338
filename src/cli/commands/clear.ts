/**
 * `rolerag clear <partition>` - drop every chunk of one partition
 *
 * Other partitions are untouched, so a chunk tagged for several roles
 * stays reachable through its remaining copies.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { createContext, globalOptions } from '../context.js';
import { handleCLIError } from '../errors.js';
import { PARTITIONS, isPartition } from '../../core/types.js';
import { createRagError, ErrorCode } from '../../core/errors.js';

interface ClearOptions {
  format: 'text' | 'json';
}

export function registerClearCommand(program: Command): void {
  program
    .command('clear')
    .description('Remove every chunk from one partition')
    .argument('<partition>', `Partition to clear (${PARTITIONS.join(', ')})`)
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .action(async (partition: string, options: ClearOptions, command: Command) => {
      const globals = globalOptions(command);
      try {
        if (!isPartition(partition)) {
          throw createRagError(
            ErrorCode.INVALID_CONFIG,
            `Unknown partition "${partition}" (expected one of ${PARTITIONS.join(', ')})`,
            { partition }
          );
        }

        const { store } = await createContext(globals);
        let removed: number;
        try {
          const before = await store.stats();
          await store.clearPartition(partition);
          const after = await store.stats();
          removed = before[partition] - after[partition];
        } finally {
          await store.close();
        }

        if (options.format === 'json') {
          console.log(JSON.stringify({ backend: store.backend, partition, removed }, null, 2));
        } else {
          console.log(chalk.green(`✓ Cleared partition ${partition} (${removed} chunk${removed === 1 ? '' : 's'} removed)`));
        }
      } catch (error) {
        handleCLIError(error, globals.verbose);
      }
    });
}
