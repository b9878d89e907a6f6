/**
 * Result Aggregator
 *
 * Assembles the SearchResultSet from resolver, orchestrator and match engine
 * output. No matching logic lives here. The returned set is deep-frozen.
 */

import type { SearchStrategy } from '../core/types/query.js';
import type { AreaSummary, SearchMetadata, SearchResultSet } from '../core/types/results.js';
import type { OrchestrationResult } from '../core/types/query.js';
import type { ResolutionResult } from './area-resolver.js';
import type { MatchOutput } from './match-engine.js';

export interface AggregationInput {
  readonly searchId: string;
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly strategy: SearchStrategy;
  readonly seenSince: string;
  readonly areasRequested: readonly string[];
  readonly resolution: ResolutionResult;
  readonly orchestration: OrchestrationResult;
  readonly match: MatchOutput;
  readonly signatures: { readonly bssidPrefixes: number; readonly ssidPatterns: number };
}

/**
 * Percentage with two decimals; 0 when nothing was returned
 */
export function matchRate(deduplicated: number, raw: number): number {
  if (raw === 0) return 0;
  return Math.round((deduplicated / raw) * 10000) / 100;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function summarizeAreas(resolution: ResolutionResult): AreaSummary[] {
  return resolution.areas.map(({ area, bbox, unitCount }) => ({
    id: area.id,
    displayName: area.displayName,
    kind: area.kind,
    source: area.source,
    bbox,
    units: unitCount,
    boundaryStale: area.source === 'dynamic-osm' ? area.boundaryStale : false,
    ...(area.source === 'static-registry'
      ? { zipCodes: area.zipCodes.map((zip) => zip.code) }
      : {}),
  }));
}

export function aggregateResults(input: AggregationInput): SearchResultSet {
  const { orchestration, match, resolution } = input;

  const metadata: SearchMetadata = {
    searchId: input.searchId,
    startedAt: input.startedAt.toISOString(),
    completedAt: input.completedAt.toISOString(),
    durationMs: input.completedAt.getTime() - input.startedAt.getTime(),
    strategy: input.strategy,
    seenSince: input.seenSince,
    areasRequested: [...input.areasRequested],
    areas: summarizeAreas(resolution),
    failedAreas: [...resolution.failedAreas],
    units: {
      requested: resolution.units.length,
      completed: orchestration.completed.length,
      failed: orchestration.failed.length,
      skipped: orchestration.skipped.length,
      fromCache: orchestration.completed.filter((unit) => unit.fromCache).length,
    },
    failedUnits: [...orchestration.failed],
    skippedUnits: [...orchestration.skipped],
    counts: match.counts,
    matchRate: matchRate(match.counts.deduplicated, match.counts.raw),
    signatures: { ...input.signatures },
    warnings: [...resolution.warnings, ...orchestration.warnings],
    cancelled: orchestration.cancelled,
  };

  return deepFreeze({ devices: [...match.devices], metadata });
}
