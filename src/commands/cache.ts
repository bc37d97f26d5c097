import { Command } from 'commander';
import type { CommandResult } from '../types/index.js';
import { clearCache, getCacheStats, type CacheStats } from '../core/cache/config-cache.js';
import { getHostformDirectories } from '../core/directory.js';
import { consoleOutput } from '../core/ports/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatCacheStats } from '../utils/formatters.js';

async function cacheStatsCommand(): Promise<CommandResult<CacheStats>> {
  const stats = await getCacheStats(getHostformDirectories());
  consoleOutput.note(formatCacheStats(stats), 'Cache');
  return { success: true, data: stats };
}

async function cacheClearCommand(): Promise<CommandResult> {
  await clearCache(getHostformDirectories());
  consoleOutput.success('Cache cleared');
  return { success: true };
}

/**
 * Setup cache command
 */
export function setupCacheCommand(program: Command): void {
  const cache = program.command('cache').description('Inspect or clear the configuration and package caches');

  cache
    .command('stats')
    .description('Show cache location, size and age')
    .action(
      withErrorHandling(async () => {
        await cacheStatsCommand();
      })
    );

  cache
    .command('clear')
    .description('Delete every cached record')
    .action(
      withErrorHandling(async () => {
        await cacheClearCommand();
      })
    );
}
