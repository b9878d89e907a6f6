/**
 * Query Result Cache
 *
 * Complete per-unit observation lists keyed by (box, time window, SSID
 * filter). Entries older than the TTL are never served. Held in memory for the
 * life of the process; also written to the `pages` namespace when persistence
 * is enabled.
 */

import { z } from 'zod';
import { bboxKey } from '../core/geo-utils.js';
import type { BBox } from '../core/types/geo.js';
import type { Observation } from '../core/types/observation.js';
import { createLogger } from '../core/utils/logger.js';
import { isExpired, type FileCacheStore } from './boundary-cache.js';

const log = createLogger({ module: 'result-cache' });

export interface ResultCacheKey {
  readonly bbox: BBox;
  readonly seenSince: string;
  readonly ssidLike?: string;
}

export interface CachedUnitResult {
  readonly observations: readonly Observation[];
  readonly malformed: number;
  readonly pages: number;
}

interface MemoryEntry {
  readonly storedAt: string;
  readonly result: CachedUnitResult;
}

const RawValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const ObservationSchema = z.object({
  bssid: z.string(),
  ssid: z.string().nullable(),
  latitude: z.number(),
  longitude: z.number(),
  lastSeen: z.string().nullable(),
  firstSeen: z.string().nullable(),
  raw: z.record(RawValueSchema),
});

const UnitResultSchema = z.object({
  observations: z.array(ObservationSchema),
  malformed: z.number().int().nonnegative(),
  pages: z.number().int().nonnegative(),
});

export function resultCacheKey(key: ResultCacheKey): string {
  return `${bboxKey(key.bbox)}|${key.seenSince}|${key.ssidLike ?? '*'}`;
}

export interface QueryResultCacheOptions {
  readonly ttlMs: number;
  /** Backing store; results stay in memory only when absent */
  readonly store?: FileCacheStore;
  readonly now?: () => number;
}

export class QueryResultCache {
  private readonly memory = new Map<string, MemoryEntry>();
  private readonly ttlMs: number;
  private readonly store?: FileCacheStore;
  private readonly now: () => number;

  constructor(options: QueryResultCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.store = options.store;
    this.now = options.now ?? Date.now;
  }

  async get(key: ResultCacheKey): Promise<CachedUnitResult | undefined> {
    const id = resultCacheKey(key);
    const now = this.now();

    const hit = this.memory.get(id);
    if (hit !== undefined) {
      if (!isExpired(hit.storedAt, this.ttlMs, now)) {
        return hit.result;
      }
      this.memory.delete(id);
    }

    if (this.store === undefined) {
      return undefined;
    }

    const persisted = await this.store.read('pages', id, UnitResultSchema);
    if (persisted === undefined || isExpired(persisted.storedAt, this.ttlMs, now)) {
      return undefined;
    }

    const result: CachedUnitResult = {
      observations: Object.freeze(
        persisted.value.observations.map((observation) =>
          Object.freeze({ ...observation, raw: Object.freeze(observation.raw) })
        )
      ),
      malformed: persisted.value.malformed,
      pages: persisted.value.pages,
    };
    this.memory.set(id, { storedAt: persisted.storedAt, result });
    return result;
  }

  /**
   * Store a complete unit result. Callers never pass partial pagination.
   */
  async set(key: ResultCacheKey, result: CachedUnitResult): Promise<void> {
    const id = resultCacheKey(key);
    const storedAt = new Date(this.now()).toISOString();
    this.memory.set(id, { storedAt, result });

    if (this.store !== undefined) {
      await this.store.write('pages', id, result, storedAt);
      log.debug('Unit result persisted', { key: id, observations: result.observations.length });
    }
  }

  get size(): number {
    return this.memory.size;
  }
}
