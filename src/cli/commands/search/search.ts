/**
 * Search Command
 *
 * Resolve the selected areas, run the query units, match against the
 * signatures and write the requested export files.
 *
 * Usage:
 *   alpr-scout search --area zipset:TX/Collin county:US-TX:Dallas County
 *   alpr-scout search --metro TX/dallas-fort-worth --format csv,kml
 *   alpr-scout search --registry TX --county Collin Denton
 *
 * Options:
 *   --area <id...>        Explicit area ids
 *   --metro <STATE/KEY>   Metro area from the registry
 *   --registry <STATE>    Registry state (all counties unless --county is given)
 *   --county <name...>    Counties within --registry
 *   --strategy <name>     bbox|ssid-patterns
 *   --since <YYYYMMDD>    Oldest last-update date to request
 *   --format <list>       Export formats: json,csv,kml,summary
 *
 * SIGINT stops scheduling new units; in-flight units finish and the rest are
 * reported as skipped.
 */

import type { Command } from 'commander';
import { loadEnvironment } from '../../../core/config.js';
import { ConfigurationError, toError } from '../../../core/errors.js';
import type { SearchStrategy } from '../../../core/types/query.js';
import type { SearchResultSet } from '../../../core/types/results.js';
import {
  buildSummaryReport,
  EXPORT_FORMATS,
  exportResults,
  formatSummaryText,
  isExportFormat,
  type ExportedFile,
  type ExportFormat,
} from '../../../output/index.js';
import { selectAreas, StaticRegistry, type AreaSelection } from '../../../registry/static-registry.js';
import type { UnitProgress } from '../../../services/query-orchestrator.js';
import { createSearchService } from '../../../services/search-service.js';
import {
  EXIT_CODES,
  exitCodeForError,
  exitCodeForSearch,
  getGlobalContext,
  type ExitCode,
} from '../../lib/context.js';
import { formatBytes } from '../../lib/logger.js';
import { formatJson, formatTable, printError, printOutput } from '../../lib/output.js';

export interface SearchOptions {
  readonly area?: readonly string[];
  readonly metro?: string;
  readonly registry?: string;
  readonly county?: readonly string[];
  readonly strategy?: string;
  readonly since?: string;
  readonly format: string;
}

const DEFAULT_FORMATS = 'json,csv,kml,summary';

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search selected areas for surveillance camera networks')
    .option('-a, --area <id...>', 'Area ids (country:US, state:US-TX, county:US-TX:Collin County, zip:75024, zipset:TX/Collin)')
    .option('-m, --metro <state/key>', 'Metro area from the registry (e.g., TX/dallas-fort-worth)')
    .option('-r, --registry <state>', 'Every registry county of a state')
    .option('-c, --county <name...>', 'Limit --registry to these counties')
    .option('-s, --strategy <name>', 'Query strategy: bbox|ssid-patterns')
    .option('--since <YYYYMMDD>', 'Oldest last-update date to request')
    .option('-f, --format <list>', `Export formats: ${EXPORT_FORMATS.join(',')}`, DEFAULT_FORMATS)
    .action(async (options: SearchOptions) => {
      const code = await executeSearch(options);
      if (code !== EXIT_CODES.SUCCESS) {
        process.exit(code);
      }
    });
}

/**
 * Turn the mutually exclusive selection flags into an AreaSelection
 *
 * @throws ConfigurationError for no selection, several selections, or a malformed metro
 */
export function buildSelection(options: SearchOptions): AreaSelection {
  const chosen = [options.area, options.metro, options.registry].filter((value) => value !== undefined);
  if (chosen.length === 0) {
    throw new ConfigurationError('No area selected: use --area, --metro or --registry');
  }
  if (chosen.length > 1) {
    throw new ConfigurationError('Use only one of --area, --metro or --registry');
  }
  if (options.county !== undefined && options.registry === undefined) {
    throw new ConfigurationError('--county requires --registry');
  }

  if (options.area !== undefined) {
    return { kind: 'explicit', ids: options.area };
  }
  if (options.metro !== undefined) {
    const [state, metro, ...rest] = options.metro.split('/');
    if (!state || !metro || rest.length > 0) {
      throw new ConfigurationError(`Invalid metro "${options.metro}", expected STATE/KEY`);
    }
    return { kind: 'metro', state, metro };
  }
  return { kind: 'registry', state: options.registry ?? '', counties: options.county ?? 'all' };
}

/**
 * @throws ConfigurationError for an unknown format
 */
export function parseFormats(value: string): ExportFormat[] {
  const formats: ExportFormat[] = [];
  for (const raw of value.split(',')) {
    const format = raw.trim().toLowerCase();
    if (format === '') continue;
    if (!isExportFormat(format)) {
      throw new ConfigurationError(`Unknown export format "${format}"`, [
        `expected one of ${EXPORT_FORMATS.join(', ')}`,
      ]);
    }
    if (!formats.includes(format)) formats.push(format);
  }
  if (formats.length === 0) {
    throw new ConfigurationError('No export format selected');
  }
  return formats;
}

function parseStrategy(value: string | undefined): SearchStrategy | undefined {
  if (value === undefined) return undefined;
  if (value === 'bbox' || value === 'ssid-patterns') return value;
  throw new ConfigurationError(`Unknown strategy "${value}", expected bbox or ssid-patterns`);
}

async function executeSearch(options: SearchOptions): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();
  logger.commandStart('search', { format: options.format });

  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn('Cancelling: waiting for in-flight units to finish');
    controller.abort();
  };

  try {
    const selection = buildSelection(options);
    const formats = parseFormats(options.format);
    const strategy = parseStrategy(options.strategy);
    const env = loadEnvironment();

    const registryDir = config.paths.registry ?? undefined;
    const registry = await StaticRegistry.load(registryDir);
    const areaIds = selectAreas(registry.catalog, selection);
    logger.info('Areas selected', { areas: areaIds.join(', ') });

    const service = await createSearchService({
      config: config.engine,
      authToken: env.wigleAuthToken,
      signaturesDir: config.paths.config,
      ...(registryDir !== undefined ? { registryDir } : {}),
    });

    process.once('SIGINT', onSigint);
    const results = await service.search({
      areaIds,
      strategy,
      seenSince: options.since,
      signal: controller.signal,
      onProgress: (update: UnitProgress) => {
        if (update.event === 'started') return;
        logger.progress({
          total: update.total,
          finished: update.completed + update.failed + update.skipped,
          failed: update.failed,
          label: update.unit.id,
        });
      },
    });

    const files = await exportResults(results, formats, config.paths.output);
    printReport(results, files, config.json);

    const code = exitCodeForSearch(results.metadata);
    logger.commandEnd(true, { devices: results.devices.length, exit_code: code });
    return code;
  } catch (error) {
    const err = toError(error);
    logger.commandEnd(false, { error: err.message });
    printError(err.message);
    return exitCodeForError(error);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

function printReport(results: SearchResultSet, files: readonly ExportedFile[], json: boolean): void {
  const { metadata } = results;

  if (json) {
    printOutput(
      formatJson({
        searchId: metadata.searchId,
        devices: results.devices.length,
        units: metadata.units,
        failedAreas: metadata.failedAreas,
        cancelled: metadata.cancelled,
        files,
        warnings: metadata.warnings,
      })
    );
    return;
  }

  printOutput(formatSummaryText(buildSummaryReport(results)));

  if (metadata.failedUnits.length > 0) {
    printOutput('\nFailed units:');
    printOutput(
      formatTable(
        metadata.failedUnits.map((unit) => ({ ...unit })),
        [
          { key: 'unitId', header: 'Unit' },
          { key: 'attempts', header: 'Attempts', align: 'right' },
          { key: 'error', header: 'Error', width: 60 },
        ]
      )
    );
  }

  if (metadata.failedAreas.length > 0) {
    printOutput('\nFailed areas:');
    for (const area of metadata.failedAreas) {
      printOutput(`  ${area.areaId}: ${area.error}`);
    }
  }

  printOutput('\nFiles written:');
  printOutput(
    formatTable(
      files.map((file) => ({ format: file.format, path: file.path, size: formatBytes(file.bytes) })),
      [
        { key: 'format', header: 'Format' },
        { key: 'path', header: 'Path' },
        { key: 'size', header: 'Size', align: 'right' },
      ]
    )
  );
}
