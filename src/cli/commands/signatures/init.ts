/**
 * Signatures Init Command
 *
 * Writes starter signature files into the configured directory. Existing
 * files are left alone unless --force is given.
 *
 * @module cli/commands/signatures/init
 */

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import type { Command } from 'commander';
import { toError } from '../../../core/errors.js';
import { atomicWriteJSON, isMissingFileError } from '../../../core/utils/atomic-write.js';
import { SIGNATURE_TEMPLATES } from '../../../signatures/signature-store.js';
import { EXIT_CODES, exitCodeForError, getGlobalContext, type ExitCode } from '../../lib/context.js';
import { printError, printOutput, printWarning } from '../../lib/output.js';

interface InitOptions {
  readonly force?: boolean;
}

export interface InitResult {
  readonly written: string[];
  readonly skipped: string[];
}

export function registerInitCommand(parent: Command): void {
  parent
    .command('init')
    .description('Write starter signature files')
    .option('--force', 'Overwrite existing files')
    .action(async (options: InitOptions) => {
      const code = await executeInit(options);
      if (code !== EXIT_CODES.SUCCESS) {
        process.exit(code);
      }
    });
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) return false;
    throw error;
  }
}

/**
 * Write each template file, skipping existing files unless forced
 */
export async function writeSignatureTemplates(directory: string, force: boolean): Promise<InitResult> {
  const written: string[] = [];
  const skipped: string[] = [];

  for (const [fileName, template] of Object.entries(SIGNATURE_TEMPLATES)) {
    const path = join(directory, fileName);
    if (!force && (await fileExists(path))) {
      skipped.push(path);
      continue;
    }
    await atomicWriteJSON(path, template);
    written.push(path);
  }

  return { written, skipped };
}

async function executeInit(options: InitOptions): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();
  logger.commandStart('signatures init', { directory: config.paths.config, force: options.force === true });

  try {
    const { written, skipped } = await writeSignatureTemplates(config.paths.config, options.force === true);
    for (const path of written) {
      printOutput(`Wrote ${path}`);
    }
    for (const path of skipped) {
      printWarning(`${path} exists; use --force to overwrite`);
    }
    logger.commandEnd(true, { written: written.length, skipped: skipped.length });
    return skipped.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
  } catch (error) {
    const err = toError(error);
    logger.commandEnd(false, { error: err.message });
    printError(err.message);
    return exitCodeForError(error);
  }
}
