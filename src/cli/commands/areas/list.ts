/**
 * Areas List Command
 *
 * Usage:
 *   alpr-scout areas list                 States of the default country (OSM)
 *   alpr-scout areas list --state US-TX   Counties of a state (OSM)
 *   alpr-scout areas list --registry      Registry states and counties
 *   alpr-scout areas list --metros        Registry metro areas
 *
 * OSM listings go through the catalog cache (24 hour TTL by default).
 *
 * @module cli/commands/areas/list
 */

import type { Command } from 'commander';
import { toError } from '../../../core/errors.js';
import { OverpassBoundarySource } from '../../../providers/overpass-boundary-source.js';
import { StaticRegistry, zipSetId, type AreaCatalog } from '../../../registry/static-registry.js';
import { FileCacheStore } from '../../../services/boundary-cache.js';
import { DivisionCatalog } from '../../../services/division-catalog.js';
import { EXIT_CODES, exitCodeForError, getGlobalContext, type ExitCode } from '../../lib/context.js';
import {
  formatters,
  formatOutput,
  printError,
  printOutput,
  printWarning,
  type TableColumn,
} from '../../lib/output.js';

export interface ListOptions {
  readonly country: string;
  readonly state?: string;
  readonly registry?: boolean;
  readonly metros?: boolean;
}

const DIVISION_COLUMNS: TableColumn[] = [
  { key: 'name', header: 'Name' },
  { key: 'areaId', header: 'Area id' },
  { key: 'relationId', header: 'OSM relation', align: 'right' },
];

const REGISTRY_COLUMNS: TableColumn[] = [
  { key: 'state', header: 'State' },
  { key: 'county', header: 'County' },
  { key: 'zipCount', header: 'ZIPs', align: 'right', formatter: formatters.number },
  { key: 'majorCities', header: 'Major cities', width: 40 },
  { key: 'areaId', header: 'Area id' },
];

const METRO_COLUMNS: TableColumn[] = [
  { key: 'metro', header: 'Metro' },
  { key: 'name', header: 'Name' },
  { key: 'counties', header: 'Counties', width: 50 },
];

export function registerListCommand(parent: Command): void {
  parent
    .command('list')
    .description('List selectable areas')
    .option('--country <code>', 'Country whose states to list (ISO 3166-1)', 'US')
    .option('--state <code>', 'State whose counties to list (ISO 3166-2, e.g., US-TX)')
    .option('--registry', 'List registry states and counties instead of OSM divisions')
    .option('--metros', 'List registry metro areas')
    .action(async (options: ListOptions) => {
      const code = await executeList(options);
      if (code !== EXIT_CODES.SUCCESS) {
        process.exit(code);
      }
    });
}

export function registryRows(catalog: AreaCatalog): Record<string, unknown>[] {
  return catalog.states.flatMap((state) =>
    state.counties.map((county) => ({
      state: state.code,
      county: county.name,
      zipCount: county.zipCount,
      majorCities: county.majorCities,
      areaId: zipSetId(state.code, county.name),
    }))
  );
}

export function metroRows(catalog: AreaCatalog): Record<string, unknown>[] {
  return catalog.metros.map((metro) => ({
    metro: `${metro.stateCode}/${metro.key}`,
    name: metro.name,
    counties: metro.counties,
  }));
}

async function executeList(options: ListOptions): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();
  logger.commandStart('areas list', { ...options });
  const format = config.json ? 'json' : 'table';

  try {
    if (options.registry || options.metros) {
      const registry = await StaticRegistry.load(config.paths.registry ?? undefined);
      const rows = options.metros ? metroRows(registry.catalog) : registryRows(registry.catalog);
      printOutput(formatOutput(rows, format, options.metros ? METRO_COLUMNS : REGISTRY_COLUMNS));
      logger.commandEnd(true, { rows: rows.length });
      return EXIT_CODES.SUCCESS;
    }

    const { engine } = config;
    const catalog = new DivisionCatalog({
      source: new OverpassBoundarySource(engine.overpass),
      ttlMs: engine.cache.catalogTtlMs,
      ...(engine.cache.enabled ? { store: new FileCacheStore(engine.cache.directory) } : {}),
    });

    const listing = await catalog.list(options.state ?? options.country);
    if (listing.stale) {
      printWarning(`Showing cached listing from ${listing.fetchedAt}; refresh failed`);
    }

    const rows = listing.divisions.map((division) => ({ ...division }));
    printOutput(formatOutput(rows, format, DIVISION_COLUMNS));
    logger.commandEnd(true, { rows: rows.length, fromCache: listing.fromCache });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const err = toError(error);
    logger.commandEnd(false, { error: err.message });
    printError(err.message);
    return exitCodeForError(error);
  }
}
