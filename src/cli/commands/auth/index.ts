/**
 * Auth Commands Index
 *
 * @module cli/commands/auth
 */

import type { Command } from 'commander';
import { registerCheckCommand } from './check.js';

export function registerAuthCommands(program: Command): void {
  const auth = program.command('auth').description('WiGLE credentials');

  registerCheckCommand(auth);
}
