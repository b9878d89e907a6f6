/**
 * Signatures Check Command
 *
 * Loads both signature files the way a search would and reports what was
 * accepted, rejected and collapsed as a duplicate.
 *
 * Exit codes: 0 all entries valid, 1 some entries ignored, 3 unusable files.
 *
 * @module cli/commands/signatures/check
 */

import type { Command } from 'commander';
import { isConfigurationError, toError } from '../../../core/errors.js';
import {
  BSSID_FILE_NAME,
  SignatureStore,
  SSID_FILE_NAME,
  type SignatureValidationReport,
} from '../../../signatures/signature-store.js';
import { EXIT_CODES, exitCodeForError, getGlobalContext, type ExitCode } from '../../lib/context.js';
import { formatJson, printError, printOutput, printSuccess, printWarning } from '../../lib/output.js';

export function registerCheckCommand(parent: Command): void {
  parent
    .command('check')
    .description(`Validate ${BSSID_FILE_NAME} and ${SSID_FILE_NAME}`)
    .action(async () => {
      const code = await executeCheck();
      if (code !== EXIT_CODES.SUCCESS) {
        process.exit(code);
      }
    });
}

export function countIgnored(report: SignatureValidationReport): number {
  return report.invalidBssidPrefixes.length + report.invalidSsidPatterns.length + report.duplicates.length;
}

async function executeCheck(): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();
  logger.commandStart('signatures check', { directory: config.paths.config });

  try {
    const { store, report } = await SignatureStore.load(config.paths.config);
    const ignored = countIgnored(report);

    if (config.json) {
      printOutput(
        formatJson({
          directory: config.paths.config,
          bssidPrefixes: store.bssidPrefixes,
          ssidPatterns: store.ssidPatterns,
          ...report,
        })
      );
    } else {
      printOutput(`Signature directory: ${config.paths.config}`);
      printOutput(`  BSSID prefixes: ${store.bssidPrefixes.length}`);
      printOutput(`  SSID patterns:  ${store.ssidPatterns.length}`);
      for (const entry of report.invalidBssidPrefixes) {
        printWarning(`invalid BSSID prefix ignored: "${entry}"`);
      }
      for (const entry of report.invalidSsidPatterns) {
        printWarning(`invalid SSID pattern ignored: "${entry}"`);
      }
      for (const entry of report.duplicates) {
        printWarning(`duplicate entry ignored: "${entry}"`);
      }
      if (ignored === 0) {
        printSuccess('all signature entries are valid');
      }
    }

    logger.commandEnd(true, { ignored });
    return ignored > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
  } catch (error) {
    const err = toError(error);
    logger.commandEnd(false, { error: err.message });
    printError(err.message);
    if (isConfigurationError(error)) {
      for (const detail of error.details) {
        printOutput(`  ${detail}`);
      }
    }
    return exitCodeForError(error);
  }
}
