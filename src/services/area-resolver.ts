/**
 * Area Resolver
 *
 * Turns selected area ids into an ordered, deduplicated list of QueryUnits
 * covering every requested area.
 *
 * - ZIP sets: one box per member ZIP, centroid +/- zipRadiusKm
 * - Boundaries: cached or fetched outline, bbox quadrant-split until each
 *   piece is under maxUnitAreaKm2 (or maxSplitDepth is hit)
 *
 * All ids are parsed before anything is fetched, so a malformed id fails
 * without network activity. AreaNotFoundError aborts resolution; a boundary
 * that cannot be fetched (and is not cached) fails only its own area.
 */

import { isDynamicRef, parseAreaId, type AreaRef, type DynamicAreaRef } from '../core/area-id.js';
import type { ResolverConfig } from '../core/config.js';
import {
  AreaNotFoundError,
  BoundaryFetchError,
  ConfigurationError,
  toError,
} from '../core/errors.js';
import {
  bboxAroundPoint,
  bboxKey,
  bboxOfGeometry,
  decomposeBBox,
  unionBBoxes,
} from '../core/geo-utils.js';
import type { BBox, DynamicGeoArea, GeoArea, StaticZipArea } from '../core/types/geo.js';
import type { SearchStrategy, QueryUnit } from '../core/types/query.js';
import type { FailedArea } from '../core/types/results.js';
import { createLogger } from '../core/utils/logger.js';
import type { BoundaryRecord, BoundarySource } from '../providers/overpass-boundary-source.js';
import type { StaticRegistry } from '../registry/static-registry.js';
import { toSsidLike } from '../signatures/signature-store.js';
import type { BoundaryCache } from './boundary-cache.js';

const log = createLogger({ module: 'area-resolver' });

export interface ResolvedArea {
  readonly area: GeoArea;
  readonly bbox: BBox | null;
  readonly unitCount: number;
}

export interface ResolutionResult {
  readonly areas: readonly ResolvedArea[];
  readonly units: readonly QueryUnit[];
  readonly failedAreas: readonly FailedArea[];
  readonly warnings: readonly string[];
}

export interface ResolveOptions {
  readonly strategy?: SearchStrategy;
  /** Required by the ssid-patterns strategy */
  readonly ssidPatterns?: readonly string[];
  /** Stops resolution before the next area and interrupts boundary fetches */
  readonly signal?: AbortSignal;
}

export interface AreaResolverDeps {
  readonly boundarySource: BoundarySource;
  readonly registry: StaticRegistry;
  readonly boundaryCache?: BoundaryCache;
  readonly now?: () => number;
}

export function unitId(areaId: string, bbox: BBox, ssidLike?: string): string {
  return `${areaId}#${bboxKey(bbox)}#${ssidLike ?? '*'}`;
}

export class AreaResolver {
  private readonly now: () => number;

  constructor(
    private readonly config: ResolverConfig,
    private readonly deps: AreaResolverDeps
  ) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * @throws ConfigurationError when nothing is selected or a strategy input is missing
   * @throws AreaNotFoundError when any id does not resolve
   */
  async resolve(areaIds: readonly string[], options: ResolveOptions = {}): Promise<ResolutionResult> {
    if (areaIds.length === 0) {
      throw new ConfigurationError('No areas selected');
    }

    const strategy = options.strategy ?? this.config.strategy;
    const ssidFilters = this.ssidFilters(strategy, options.ssidPatterns);

    const refs = dedupeRefs(areaIds.map(parseAreaId));

    const areas: ResolvedArea[] = [];
    const failedAreas: FailedArea[] = [];
    const warnings: string[] = [];
    const units: QueryUnit[] = [];
    const seenUnits = new Set<string>();
    const seenAreas = new Set<string>();

    const { signal } = options;

    for (const ref of refs) {
      if (signal?.aborted) {
        log.warn('Area resolution cancelled', { resolved: areas.length });
        break;
      }

      let area: GeoArea;
      let boxes: readonly BBox[];

      if (isDynamicRef(ref)) {
        let resolved: DynamicGeoArea;
        try {
          resolved = await this.resolveBoundary(ref, warnings, signal);
        } catch (error) {
          if (signal?.aborted) {
            continue;
          }
          if (error instanceof BoundaryFetchError) {
            log.warn('Boundary unavailable, area skipped', { areaId: ref.id, error: error.message });
            failedAreas.push({ areaId: ref.id, error: error.message, errorName: error.name });
            continue;
          }
          throw error;
        }
        area = resolved;
        boxes = this.decompose(resolved, warnings, signal);
      } else {
        const resolved = await this.deps.registry.resolve(ref);
        area = resolved;
        boxes = this.zipBoxes(resolved);
      }

      // Ids that only differ before canonicalization resolve to one area
      if (seenAreas.has(area.id)) continue;
      seenAreas.add(area.id);

      let added = 0;
      for (const bbox of boxes) {
        for (const ssidLike of ssidFilters) {
          const unit = buildUnit(area, bbox, ssidLike);
          if (seenUnits.has(unit.id)) continue;
          seenUnits.add(unit.id);
          units.push(unit);
          added++;
        }
      }

      areas.push({ area, bbox: unionBBoxes(boxes), unitCount: added });
      log.info('Area resolved', { areaId: area.id, name: area.displayName, units: added });
    }

    return { areas, units, failedAreas, warnings };
  }

  /**
   * Fresh cache entry, else the source, else a stale cache entry
   *
   * @throws AreaNotFoundError when the source has no such boundary
   * @throws BoundaryFetchError when the source fails and nothing is cached
   */
  private async resolveBoundary(
    ref: DynamicAreaRef,
    warnings: string[],
    signal: AbortSignal | undefined
  ): Promise<DynamicGeoArea> {
    const cache = this.deps.boundaryCache;
    const cached = await cache?.get(ref.id);

    if (cached !== undefined && cache !== undefined && !cache.isStale(cached)) {
      log.debug('Boundary cache hit', { areaId: ref.id });
      return toDynamicArea(ref.id, cached, false);
    }

    let record: BoundaryRecord | null;
    try {
      record = await this.deps.boundarySource.fetchBoundary(ref, signal);
    } catch (error) {
      if (cached !== undefined) {
        const message = `Boundary refresh failed for ${ref.id}; using cached copy from ${cached.fetchedAt}`;
        log.warn(message, { error: toError(error).message });
        warnings.push(message);
        return toDynamicArea(ref.id, cached, true);
      }
      throw new BoundaryFetchError(ref.id, toError(error).message, error);
    }

    if (record === null) {
      throw new AreaNotFoundError(ref.id, `no boundary found by ${this.deps.boundarySource.name}`);
    }

    const entry = {
      areaId: ref.id,
      displayName: record.displayName,
      kind: record.kind,
      geometry: record.geometry,
      fetchedAt: new Date(this.now()).toISOString(),
    };

    if (cache !== undefined) {
      try {
        await cache.put(entry);
      } catch (error) {
        const message = `Could not cache boundary for ${ref.id}: ${toError(error).message}`;
        log.warn(message);
        warnings.push(message);
      }
    }

    return toDynamicArea(ref.id, entry, false);
  }

  private decompose(
    area: DynamicGeoArea,
    warnings: string[],
    signal: AbortSignal | undefined
  ): readonly BBox[] {
    const result = decomposeBBox(bboxOfGeometry(area.geometry), {
      maxAreaKm2: this.config.maxUnitAreaKm2,
      maxDepth: this.config.maxSplitDepth,
      shouldStop: () => signal?.aborted === true,
    });

    if (result.oversized > 0) {
      const message =
        `${area.id}: ${result.oversized} box(es) exceed ${this.config.maxUnitAreaKm2} km² ` +
        `at split depth ${this.config.maxSplitDepth}`;
      log.warn(message);
      warnings.push(message);
    }
    return result.boxes;
  }

  private zipBoxes(area: StaticZipArea): readonly BBox[] {
    return area.zipCodes.map((zip) => bboxAroundPoint(zip.centroid, this.config.zipRadiusKm));
  }

  private ssidFilters(
    strategy: SearchStrategy,
    patterns: readonly string[] | undefined
  ): readonly (string | undefined)[] {
    if (strategy === 'bbox') {
      return [undefined];
    }
    if (patterns === undefined || patterns.length === 0) {
      throw new ConfigurationError('The ssid-patterns strategy needs at least one SSID pattern');
    }
    return [...new Set(patterns.map(toSsidLike))];
  }
}

function dedupeRefs(refs: readonly AreaRef[]): AreaRef[] {
  const seen = new Set<string>();
  return refs.filter((ref) => {
    if (seen.has(ref.id)) return false;
    seen.add(ref.id);
    return true;
  });
}

function toDynamicArea(
  id: string,
  entry: Pick<DynamicGeoArea, 'displayName' | 'kind' | 'geometry'>,
  boundaryStale: boolean
): DynamicGeoArea {
  return {
    source: 'dynamic-osm',
    id,
    displayName: entry.displayName,
    kind: entry.kind,
    geometry: entry.geometry,
    boundaryStale,
  };
}

function buildUnit(area: GeoArea, bbox: BBox, ssidLike: string | undefined): QueryUnit {
  return {
    id: unitId(area.id, bbox, ssidLike),
    bbox,
    areaId: area.id,
    areaName: area.displayName,
    ...(area.source === 'dynamic-osm'
      ? { polygon: area.geometry }
      : { postalCodes: area.zipCodes.map((zip) => zip.code) }),
    ...(ssidLike !== undefined ? { ssidLike } : {}),
  };
}
