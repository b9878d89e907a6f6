/**
 * Division catalogue for `areas list`
 *
 * Child administrative divisions of a country or state, read through the
 * 'catalog' cache namespace. An expired entry is refreshed; when the refresh
 * fails the expired listing is returned with `stale: true`.
 */

import { z } from 'zod';
import type {
  BoundarySource,
  DivisionListing,
} from '../providers/overpass-boundary-source.js';
import { createLogger } from '../core/utils/logger.js';
import { isExpired, type FileCacheStore } from './boundary-cache.js';

const log = createLogger({ module: 'catalog' });

/** OSM admin_level of US states */
export const STATE_ADMIN_LEVEL = 4;
/** OSM admin_level of US counties */
export const COUNTY_ADMIN_LEVEL = 6;

const ListingSchema = z.array(
  z.object({
    relationId: z.number().int(),
    name: z.string(),
    adminLevel: z.number().nullable(),
    isoCode: z.string().nullable(),
  })
);

export interface DivisionEntry extends DivisionListing {
  /** Identifier accepted by `search --area` */
  readonly areaId: string;
}

export interface CatalogListing {
  readonly parent: string;
  readonly adminLevel: number;
  readonly divisions: readonly DivisionEntry[];
  readonly fetchedAt: string;
  readonly fromCache: boolean;
  readonly stale: boolean;
}

export interface DivisionCatalogDeps {
  readonly source: BoundarySource;
  readonly store?: FileCacheStore;
  readonly ttlMs: number;
  readonly now?: () => number;
}

/**
 * Search id for a listed division
 */
export function divisionAreaId(parentIso: string, division: DivisionListing): string {
  if (division.isoCode !== null && division.isoCode.includes('-')) {
    return `state:${division.isoCode}`;
  }
  if (parentIso.includes('-')) {
    return `county:${parentIso}:${division.name}`;
  }
  return `osm:${division.relationId}`;
}

export class DivisionCatalog {
  private readonly now: () => number;

  constructor(private readonly deps: DivisionCatalogDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * States of a country (ISO 3166-1 parent) or counties of a state (ISO 3166-2 parent)
   */
  async list(parentIso: string, adminLevel?: number): Promise<CatalogListing> {
    const parent = parentIso.trim().toUpperCase();
    const level = adminLevel ?? (parent.includes('-') ? COUNTY_ADMIN_LEVEL : STATE_ADMIN_LEVEL);
    const key = `divisions:${parent}:${level}`;

    const cached = this.deps.store
      ? await this.deps.store.read('catalog', key, ListingSchema)
      : undefined;

    if (cached !== undefined && !isExpired(cached.storedAt, this.deps.ttlMs, this.now())) {
      return this.toListing(parent, level, cached.value, cached.storedAt, true, false);
    }

    let fetched: DivisionListing[];
    try {
      fetched = await this.deps.source.listDivisions(parent, level);
    } catch (error) {
      if (cached === undefined) throw error;
      log.warn('Division refresh failed, serving expired listing', {
        parent,
        storedAt: cached.storedAt,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.toListing(parent, level, cached.value, cached.storedAt, true, true);
    }

    const fetchedAt = new Date(this.now()).toISOString();
    if (this.deps.store) {
      try {
        await this.deps.store.write('catalog', key, fetched, fetchedAt);
      } catch (error) {
        log.warn('Could not cache division listing', {
          parent,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return this.toListing(parent, level, fetched, fetchedAt, false, false);
  }

  private toListing(
    parent: string,
    adminLevel: number,
    listings: readonly DivisionListing[],
    fetchedAt: string,
    fromCache: boolean,
    stale: boolean
  ): CatalogListing {
    return {
      parent,
      adminLevel,
      divisions: listings.map((division) => ({
        ...division,
        areaId: divisionAreaId(parent, division),
      })),
      fetchedAt,
      fromCache,
      stale,
    };
  }
}
