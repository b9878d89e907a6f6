/**
 * Boundary Cache
 *
 * File-backed store for administrative boundary geometries, plus the generic
 * namespaced store it sits on (also used for persisted page results and the
 * division catalogue).
 *
 * STORAGE:
 * - One JSON envelope per key: { key, storedAt, value }
 * - File name: sanitized key + short SHA-1, so ids with ':' or '/' map to
 *   distinct safe names
 * - Writes go through atomicWriteJSON; a failed write leaves the previous
 *   entry in place
 * - A corrupt or unreadable file reads as a miss and logs a warning
 *
 * TTL is advisory: `get` returns stale entries and the caller decides.
 */

import { createHash } from 'node:crypto';
import { readdir, readFile, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { AreaGeometry, DynamicAreaKind } from '../core/types/geo.js';
import { atomicWriteJSON, isMissingFileError } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'cache' });

export const CACHE_NAMESPACES = ['boundaries', 'pages', 'catalog'] as const;
export type CacheNamespace = (typeof CACHE_NAMESPACES)[number];

export function isCacheNamespace(value: string): value is CacheNamespace {
  return CACHE_NAMESPACES.some((namespace) => namespace === value);
}

const MAX_NAME_LENGTH = 64;

/**
 * Safe, collision-free file name for a cache key
 */
export function cacheFileName(key: string): string {
  const readable = key.replace(/[^A-Za-z0-9_-]+/g, '_').slice(0, MAX_NAME_LENGTH);
  const digest = createHash('sha1').update(key).digest('hex').slice(0, 10);
  return `${readable}-${digest}.json`;
}

export function isExpired(storedAt: string, ttlMs: number, now: number): boolean {
  const stored = Date.parse(storedAt);
  return Number.isNaN(stored) || now - stored > ttlMs;
}

const EnvelopeSchema = z.object({
  key: z.string(),
  storedAt: z.string(),
  value: z.unknown(),
});

export interface CachedValue<T> {
  readonly value: T;
  readonly storedAt: string;
}

export interface NamespaceInfo {
  readonly namespace: CacheNamespace;
  readonly files: number;
  readonly bytes: number;
  readonly oldest: string | null;
  readonly newest: string | null;
}

export interface FileCacheDeps {
  readonly now?: () => number;
}

export class FileCacheStore {
  private readonly now: () => number;

  constructor(
    readonly directory: string,
    deps: FileCacheDeps = {}
  ) {
    this.now = deps.now ?? Date.now;
  }

  pathFor(namespace: CacheNamespace, key: string): string {
    return join(this.directory, namespace, cacheFileName(key));
  }

  /**
   * Read and validate one entry
   *
   * @returns undefined for a missing, corrupt or mismatched entry
   */
  async read<T>(
    namespace: CacheNamespace,
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<CachedValue<T> | undefined> {
    const path = this.pathFor(namespace, key);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (!isMissingFileError(error)) {
        log.warn('Unreadable cache entry treated as miss', { namespace, key, error: String(error) });
      }
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch {
      log.warn('Corrupt cache entry treated as miss', { namespace, key, path });
      return undefined;
    }

    const envelope = EnvelopeSchema.safeParse(json);
    const value = envelope.success ? schema.safeParse(envelope.data.value) : undefined;
    if (!envelope.success || value === undefined || !value.success || envelope.data.key !== key) {
      log.warn('Invalid cache entry treated as miss', { namespace, key, path });
      return undefined;
    }

    return { value: value.data, storedAt: envelope.data.storedAt };
  }

  async write(
    namespace: CacheNamespace,
    key: string,
    value: unknown,
    storedAt: string = new Date(this.now()).toISOString()
  ): Promise<void> {
    await atomicWriteJSON(this.pathFor(namespace, key), { key, storedAt, value });
  }

  async info(): Promise<NamespaceInfo[]> {
    const result: NamespaceInfo[] = [];

    for (const namespace of CACHE_NAMESPACES) {
      const files = await this.listFiles(namespace);
      let bytes = 0;
      let oldest: number | null = null;
      let newest: number | null = null;

      for (const file of files) {
        const stats = await stat(join(this.directory, namespace, file));
        bytes += stats.size;
        oldest = oldest === null ? stats.mtimeMs : Math.min(oldest, stats.mtimeMs);
        newest = newest === null ? stats.mtimeMs : Math.max(newest, stats.mtimeMs);
      }

      result.push({
        namespace,
        files: files.length,
        bytes,
        oldest: oldest === null ? null : new Date(oldest).toISOString(),
        newest: newest === null ? null : new Date(newest).toISOString(),
      });
    }

    return result;
  }

  /**
   * Remove every entry in one namespace, or in all of them
   *
   * @returns number of files removed
   */
  async clear(namespace?: CacheNamespace): Promise<number> {
    const targets = namespace === undefined ? CACHE_NAMESPACES : [namespace];
    let removed = 0;

    for (const target of targets) {
      removed += (await this.listFiles(target)).length;
      await rm(join(this.directory, target), { recursive: true, force: true });
    }

    log.info('Cache cleared', { namespaces: targets.join(','), removed });
    return removed;
  }

  private async listFiles(namespace: CacheNamespace): Promise<string[]> {
    try {
      const entries = await readdir(join(this.directory, namespace));
      return entries.filter((entry) => entry.endsWith('.json'));
    } catch (error) {
      if (isMissingFileError(error)) return [];
      throw error;
    }
  }
}

// ============================================================================
// Boundaries
// ============================================================================

const PositionSchema = z.array(z.number()).min(2);
const RingSchema = z.array(PositionSchema).min(4);

const GeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(RingSchema).min(1) }),
  z.object({
    type: z.literal('MultiPolygon'),
    coordinates: z.array(z.array(RingSchema).min(1)).min(1),
  }),
]);

const BoundaryEntrySchema = z.object({
  areaId: z.string(),
  displayName: z.string(),
  kind: z.enum(['country', 'state', 'province', 'county']),
  geometry: GeometrySchema,
  fetchedAt: z.string(),
});

export interface BoundaryCacheEntry {
  readonly areaId: string;
  readonly displayName: string;
  readonly kind: DynamicAreaKind;
  readonly geometry: AreaGeometry;
  /** ISO-8601 */
  readonly fetchedAt: string;
}

export class BoundaryCache {
  private readonly now: () => number;

  constructor(
    private readonly store: FileCacheStore,
    private readonly ttlMs: number,
    deps: FileCacheDeps = {}
  ) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Cached boundary, stale or not
   */
  async get(areaId: string): Promise<BoundaryCacheEntry | undefined> {
    const cached = await this.store.read('boundaries', areaId, BoundaryEntrySchema);
    if (cached === undefined || cached.value.areaId !== areaId) {
      return undefined;
    }
    return cached.value;
  }

  async put(entry: BoundaryCacheEntry): Promise<void> {
    await this.store.write('boundaries', entry.areaId, entry, entry.fetchedAt);
    log.debug('Boundary cached', { areaId: entry.areaId });
  }

  isStale(entry: BoundaryCacheEntry): boolean {
    return isExpired(entry.fetchedAt, this.ttlMs, this.now());
  }
}
