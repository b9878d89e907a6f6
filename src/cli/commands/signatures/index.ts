/**
 * Signatures Commands Index
 *
 * Subcommands:
 *   check   Validate the signature files and report counts
 *   init    Write starter signature files
 *
 * @module cli/commands/signatures
 */

import type { Command } from 'commander';
import { registerCheckCommand } from './check.js';
import { registerInitCommand } from './init.js';

export function registerSignaturesCommands(program: Command): void {
  const signatures = program
    .command('signatures')
    .description('Manage BSSID prefix and SSID pattern files');

  registerCheckCommand(signatures);
  registerInitCommand(signatures);
}
