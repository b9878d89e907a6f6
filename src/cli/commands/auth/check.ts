/**
 * Auth Check Command
 *
 * Verifies the WiGLE credentials and prints the account's query statistics.
 *
 * Exit codes: 0 valid, 3 credentials missing, 4 rejected or unreachable.
 *
 * @module cli/commands/auth/check
 */

import type { Command } from 'commander';
import { loadEnvironment } from '../../../core/config.js';
import { toError } from '../../../core/errors.js';
import { WigleClient } from '../../../providers/wigle-client.js';
import { EXIT_CODES, exitCodeForError, getGlobalContext, type ExitCode } from '../../lib/context.js';
import { formatJson, printError, printOutput, printSuccess } from '../../lib/output.js';

export function registerCheckCommand(parent: Command): void {
  parent
    .command('check')
    .description('Verify the WiGLE API token and show quota usage')
    .action(async () => {
      const code = await executeCheck();
      if (code !== EXIT_CODES.SUCCESS) {
        process.exit(code);
      }
    });
}

async function executeCheck(): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();
  logger.commandStart('auth check');

  try {
    const env = loadEnvironment();
    const client = new WigleClient(config.engine.wigle, env.wigleAuthToken);

    if (!(await client.checkAuth())) {
      printError('WiGLE rejected the configured credentials');
      logger.commandEnd(false, { authenticated: false });
      return EXIT_CODES.NETWORK_ERROR;
    }

    const quota = await client.getQuota();
    if (config.json) {
      printOutput(formatJson({ authenticated: true, ...quota }));
    } else {
      printSuccess(`authenticated${quota.user !== null ? ` as ${quota.user}` : ''}`);
      printOutput(`  Queries yesterday:  ${quota.queriesPreviousDay}`);
      printOutput(`  Queries this month: ${quota.queriesPreviousMonth}`);
      printOutput(`  Discovered (GPS):   ${quota.discoveredGps}`);
    }
    logger.commandEnd(true, { authenticated: true });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const err = toError(error);
    logger.commandEnd(false, { error: err.message });
    printError(err.message);
    return exitCodeForError(error);
  }
}
