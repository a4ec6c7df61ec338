/**
 * `rolerag stats` - chunk counts per partition
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { createContext, globalOptions } from '../context.js';
import { handleCLIError } from '../errors.js';
import { PARTITIONS } from '../../core/types.js';
import type { PartitionStats } from '../../vector-db/ChunkStore.js';

interface StatsOptions {
  format: 'text' | 'json';
}

export function formatStats(backend: string, stats: PartitionStats, health?: string): string {
  const width = Math.max(...PARTITIONS.map((partition) => partition.length));
  const total = PARTITIONS.reduce((sum, partition) => sum + stats[partition], 0);

  const lines = [chalk.bold(`\nChunk store (${backend})`)];
  if (health !== undefined) {
    lines.push(`  Backend health: ${health}`);
  }
  for (const partition of PARTITIONS) {
    lines.push(`  ${partition.padEnd(width)}  ${stats[partition]}`);
  }
  lines.push(chalk.gray(`  ${'total'.padEnd(width)}  ${total} (chunks are counted once per partition)`));

  return lines.join('\n');
}

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show chunk counts per partition')
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .action(async (options: StatsOptions, command: Command) => {
      const globals = globalOptions(command);
      try {
        const { store } = await createContext(globals);

        let stats: PartitionStats;
        let health: string | undefined;
        try {
          stats = await store.stats();
          health = await store.health?.();
        } finally {
          await store.close();
        }

        if (options.format === 'json') {
          console.log(JSON.stringify({ backend: store.backend, health, partitions: stats }, null, 2));
        } else {
          console.log(formatStats(store.backend, stats, health));
        }
      } catch (error) {
        handleCLIError(error, globals.verbose);
      }
    });
}
