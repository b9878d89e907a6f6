/**
 * Cache Info and Clear Commands
 *
 * Usage:
 *   alpr-scout cache info
 *   alpr-scout cache clear [--namespace boundaries|pages|catalog]
 *
 * @module cli/commands/cache/cache
 */

import type { Command } from 'commander';
import { ConfigurationError, toError } from '../../../core/errors.js';
import {
  CACHE_NAMESPACES,
  FileCacheStore,
  isCacheNamespace,
  type CacheNamespace,
} from '../../../services/boundary-cache.js';
import { EXIT_CODES, exitCodeForError, getGlobalContext, type ExitCode } from '../../lib/context.js';
import { formatBytes } from '../../lib/logger.js';
import { formatOutput, formatters, printError, printSuccess, printOutput, type TableColumn } from '../../lib/output.js';

interface ClearOptions {
  readonly namespace?: string;
}

const INFO_COLUMNS: TableColumn[] = [
  { key: 'namespace', header: 'Namespace' },
  { key: 'files', header: 'Entries', align: 'right', formatter: formatters.number },
  { key: 'size', header: 'Size', align: 'right' },
  { key: 'oldest', header: 'Oldest', formatter: formatters.dash },
  { key: 'newest', header: 'Newest', formatter: formatters.dash },
];

export function registerInfoCommand(parent: Command): void {
  parent
    .command('info')
    .description('Show cache entries per namespace')
    .action(async () => {
      const code = await executeInfo();
      if (code !== EXIT_CODES.SUCCESS) {
        process.exit(code);
      }
    });
}

export function registerClearCommand(parent: Command): void {
  parent
    .command('clear')
    .description('Remove cached entries')
    .option('-n, --namespace <name>', `Only this namespace: ${CACHE_NAMESPACES.join('|')}`)
    .action(async (options: ClearOptions) => {
      const code = await executeClear(options);
      if (code !== EXIT_CODES.SUCCESS) {
        process.exit(code);
      }
    });
}

export function parseNamespace(value: string | undefined): CacheNamespace | undefined {
  if (value === undefined) return undefined;
  if (!isCacheNamespace(value)) {
    throw new ConfigurationError(`Unknown cache namespace "${value}"`, [
      `expected one of ${CACHE_NAMESPACES.join(', ')}`,
    ]);
  }
  return value;
}

async function executeInfo(): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();
  logger.commandStart('cache info', { directory: config.paths.cache });

  try {
    const info = await new FileCacheStore(config.paths.cache).info();
    const rows = info.map((entry) => ({ ...entry, size: formatBytes(entry.bytes) }));

    if (!config.json) {
      printOutput(`Cache directory: ${config.paths.cache}`);
    }
    printOutput(formatOutput(rows, config.json ? 'json' : 'table', INFO_COLUMNS));
    logger.commandEnd(true);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const err = toError(error);
    logger.commandEnd(false, { error: err.message });
    printError(err.message);
    return exitCodeForError(error);
  }
}

async function executeClear(options: ClearOptions): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();
  logger.commandStart('cache clear', { directory: config.paths.cache, namespace: options.namespace });

  try {
    const namespace = parseNamespace(options.namespace);
    const removed = await new FileCacheStore(config.paths.cache).clear(namespace);
    printSuccess(`removed ${removed} cache entr${removed === 1 ? 'y' : 'ies'}`);
    logger.commandEnd(true, { removed });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const err = toError(error);
    logger.commandEnd(false, { error: err.message });
    printError(err.message);
    return exitCodeForError(error);
  }
}
