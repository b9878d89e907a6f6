/**
 * Cache Commands Index
 *
 * Subcommands:
 *   info    Entry counts and sizes per namespace
 *   clear   Remove cached entries
 *
 * @module cli/commands/cache
 */

import type { Command } from 'commander';
import { registerClearCommand, registerInfoCommand } from './cache.js';

export function registerCacheCommands(program: Command): void {
  const cache = program.command('cache').description('Inspect and clear the on-disk cache');

  registerInfoCommand(cache);
  registerClearCommand(cache);
}
