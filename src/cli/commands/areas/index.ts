/**
 * Areas Commands Index
 *
 * Subcommands:
 *   list   Selectable areas from OSM or the bundled registry
 *
 * @module cli/commands/areas
 */

import type { Command } from 'commander';
import { registerListCommand } from './list.js';

export function registerAreasCommands(program: Command): void {
  const areas = program.command('areas').description('Browse selectable areas');

  registerListCommand(areas);
}
