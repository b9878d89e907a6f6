/**
 * Area Resolver Tests
 *
 * Tests:
 * - ZIP boxes around registry centroids
 * - Boundary decomposition into units
 * - Id parsing before any fetch, and id deduplication
 * - Boundary cache hits, stale fallback and failure isolation
 * - SSID-pattern strategy fan-out
 * - Cancellation during resolution
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ResolverConfig } from '../../../core/config.js';
import { AreaNotFoundError, ConfigurationError } from '../../../core/errors.js';
import { bboxAroundPoint } from '../../../core/geo-utils.js';
import type {
  BoundaryRecord,
  BoundarySource,
} from '../../../providers/overpass-boundary-source.js';
import { StaticRegistry } from '../../../registry/static-registry.js';
import { AreaResolver, unitId } from '../../../services/area-resolver.js';
import { BoundaryCache, FileCacheStore } from '../../../services/boundary-cache.js';
import { FakeBoundarySource, rectangle } from '../../utils/fakes.js';

const CONFIG: ResolverConfig = {
  maxUnitAreaKm2: 5000,
  maxSplitDepth: 8,
  zipRadiusKm: 5,
  strategy: 'bbox',
};

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = Date.parse('2025-03-01T00:00:00.000Z');

const SMALL_STATE: BoundaryRecord = {
  relationId: 1,
  displayName: 'Small State',
  kind: 'state',
  geometry: rectangle(0, 0, 0.1, 0.1),
};

const LARGE_STATE: BoundaryRecord = {
  relationId: 2,
  displayName: 'Large State',
  kind: 'state',
  geometry: rectangle(0, 0, 1, 1),
};

let registry: StaticRegistry;

beforeAll(async () => {
  registry = await StaticRegistry.load();
});

function resolverWith(
  boundaries: Record<string, BoundaryRecord | Error>,
  options: { config?: Partial<ResolverConfig>; cache?: BoundaryCache } = {}
): { resolver: AreaResolver; source: FakeBoundarySource } {
  const source = new FakeBoundarySource(new Map(Object.entries(boundaries)));
  const resolver = new AreaResolver(
    { ...CONFIG, ...options.config },
    {
      boundarySource: source,
      registry,
      now: () => NOW,
      ...(options.cache !== undefined ? { boundaryCache: options.cache } : {}),
    }
  );
  return { resolver, source };
}

describe('AreaResolver', () => {
  describe('registry areas', () => {
    it('should build one box around the ZIP centroid', async () => {
      const { resolver } = resolverWith({});

      const result = await resolver.resolve(['zip:75024']);

      const bbox = bboxAroundPoint({ lat: 33.0753, lng: -96.7961 }, 5);
      expect(result.units).toEqual([
        {
          id: unitId('zip:75024', bbox),
          bbox,
          areaId: 'zip:75024',
          areaName: '75024 Plano, TX',
          postalCodes: ['75024'],
        },
      ]);
      expect(result.areas[0]).toMatchObject({ bbox, unitCount: 1 });
    });

    it('should build one unit per ZIP of a county', async () => {
      const { resolver } = resolverWith({});

      const result = await resolver.resolve(['zipset:TX/Collin']);

      expect(result.units).toHaveLength(8);
      expect(result.units.every((unit) => unit.areaId === 'zipset:TX/Collin')).toBe(true);
    });

    it('should resolve differently-cased ids once', async () => {
      const { resolver } = resolverWith({});

      const result = await resolver.resolve(['zip:75024', 'ZIP:75024']);

      expect(result.areas).toHaveLength(1);
      expect(result.units).toHaveLength(1);
    });

    it('should resolve differently-cased county ids once', async () => {
      const { resolver } = resolverWith({});

      const result = await resolver.resolve(['zipset:TX/Collin', 'zipset:tx/collin']);

      expect(result.areas).toHaveLength(1);
      expect(result.areas[0]).toMatchObject({ unitCount: 8 });
      expect(result.units).toHaveLength(8);
    });
  });

  describe('boundary areas', () => {
    it('should query a small boundary as a single unit carrying its polygon', async () => {
      const { resolver } = resolverWith({ 'state:US-XA': SMALL_STATE });

      const result = await resolver.resolve(['state:US-XA']);

      expect(result.units).toHaveLength(1);
      expect(result.units[0]).toMatchObject({
        bbox: [0, 0, 0.1, 0.1],
        areaName: 'Small State',
        polygon: SMALL_STATE.geometry,
      });
    });

    it('should split a large boundary into quadrants', async () => {
      const { resolver } = resolverWith({ 'state:US-XB': LARGE_STATE });

      const result = await resolver.resolve(['state:US-XB']);

      expect(result.units.map((unit) => unit.bbox)).toEqual([
        [0, 0, 0.5, 0.5],
        [0.5, 0, 1, 0.5],
        [0, 0.5, 0.5, 1],
        [0.5, 0.5, 1, 1],
      ]);
      expect(result.areas[0].bbox).toEqual([0, 0, 1, 1]);
    });

    it('should warn when the split depth leaves oversized boxes', async () => {
      const { resolver } = resolverWith(
        { 'state:US-XB': LARGE_STATE },
        { config: { maxSplitDepth: 0 } }
      );

      const result = await resolver.resolve(['state:US-XB']);

      expect(result.units).toHaveLength(1);
      expect(result.warnings).toEqual(['state:US-XB: 1 box(es) exceed 5000 km² at split depth 0']);
    });

    it('should reject a malformed id before fetching anything', async () => {
      const { resolver, source } = resolverWith({ 'state:US-XA': SMALL_STATE });

      await expect(resolver.resolve(['state:US-XA', 'bogus:1'])).rejects.toThrow(AreaNotFoundError);
      expect(source.fetched).toEqual([]);
    });

    it('should reject a boundary the source does not know', async () => {
      const { resolver } = resolverWith({});

      await expect(resolver.resolve(['state:US-ZZ'])).rejects.toThrow(AreaNotFoundError);
    });

    it('should fail only the area whose boundary cannot be fetched', async () => {
      const { resolver } = resolverWith({ 'state:US-XA': new Error('socket hang up') });

      const result = await resolver.resolve(['state:US-XA', 'zip:75024']);

      expect(result.failedAreas).toEqual([
        {
          areaId: 'state:US-XA',
          error: 'Boundary fetch failed for state:US-XA: socket hang up',
          errorName: 'BoundaryFetchError',
        },
      ]);
      expect(result.areas.map((entry) => entry.area.id)).toEqual(['zip:75024']);
    });
  });

  describe('boundary cache', () => {
    let directory: string;
    let cache: BoundaryCache;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'resolver-test-'));
      cache = new BoundaryCache(new FileCacheStore(directory), 30 * DAY_MS, { now: () => NOW });
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('should store a fetched boundary', async () => {
      const { resolver } = resolverWith({ 'state:US-XA': SMALL_STATE }, { cache });

      await resolver.resolve(['state:US-XA']);

      await expect(cache.get('state:US-XA')).resolves.toMatchObject({
        displayName: 'Small State',
        fetchedAt: '2025-03-01T00:00:00.000Z',
      });
    });

    it('should serve a fresh cached boundary without fetching', async () => {
      await cache.put({
        areaId: 'state:US-XA',
        displayName: 'Cached State',
        kind: 'state',
        geometry: SMALL_STATE.geometry,
        fetchedAt: '2025-02-20T00:00:00.000Z',
      });
      const { resolver, source } = resolverWith({ 'state:US-XA': SMALL_STATE }, { cache });

      const result = await resolver.resolve(['state:US-XA']);

      expect(source.fetched).toEqual([]);
      expect(result.areas[0].area.displayName).toBe('Cached State');
    });

    it('should fall back to an expired boundary when the refresh fails', async () => {
      await cache.put({
        areaId: 'state:US-XA',
        displayName: 'Cached State',
        kind: 'state',
        geometry: SMALL_STATE.geometry,
        fetchedAt: '2025-01-01T00:00:00.000Z',
      });
      const { resolver, source } = resolverWith(
        { 'state:US-XA': new Error('timeout') },
        { cache }
      );

      const result = await resolver.resolve(['state:US-XA']);

      expect(source.fetched).toEqual(['state:US-XA']);
      expect(result.failedAreas).toEqual([]);
      expect(result.areas[0].area).toMatchObject({ boundaryStale: true });
      expect(result.warnings).toEqual([
        'Boundary refresh failed for state:US-XA; using cached copy from 2025-01-01T00:00:00.000Z',
      ]);
    });
  });

  describe('ssid-patterns strategy', () => {
    it('should create one unit per pattern for every box', async () => {
      const { resolver } = resolverWith({});

      const result = await resolver.resolve(['zip:75024'], {
        strategy: 'ssid-patterns',
        ssidPatterns: ['Flock-*', 'Penguin'],
      });

      expect(result.units.map((unit) => unit.ssidLike)).toEqual(['Flock-%', '%Penguin%']);
    });

    it('should require at least one pattern', async () => {
      const { resolver } = resolverWith({});

      await expect(resolver.resolve(['zip:75024'], { strategy: 'ssid-patterns' })).rejects.toThrow(
        ConfigurationError
      );
    });
  });

  describe('cancellation', () => {
    function abortingSource(
      controller: AbortController,
      record: BoundaryRecord | Error
    ): BoundarySource {
      return {
        name: 'aborting',
        fetchBoundary: async () => {
          controller.abort();
          if (record instanceof Error) throw record;
          return record;
        },
        listDivisions: async () => [],
      };
    }

    it('should hand the signal to the boundary source', async () => {
      const controller = new AbortController();
      const { resolver, source } = resolverWith({ 'state:US-XA': SMALL_STATE });

      await resolver.resolve(['state:US-XA'], { signal: controller.signal });

      expect(source.signals).toEqual([controller.signal]);
    });

    it('should resolve nothing once already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const { resolver, source } = resolverWith({ 'state:US-XA': SMALL_STATE });

      const result = await resolver.resolve(['state:US-XA', 'zip:75024'], {
        signal: controller.signal,
      });

      expect(result.areas).toEqual([]);
      expect(result.units).toEqual([]);
      expect(source.fetched).toEqual([]);
    });

    it('should not report a fetch interrupted by cancellation as a failed area', async () => {
      const controller = new AbortController();
      const resolver = new AreaResolver(CONFIG, {
        boundarySource: abortingSource(controller, new Error('The operation was aborted')),
        registry,
        now: () => NOW,
      });

      const result = await resolver.resolve(['state:US-XA', 'state:US-XB'], {
        signal: controller.signal,
      });

      expect(result.failedAreas).toEqual([]);
      expect(result.areas).toEqual([]);
    });

    it('should leave a boundary unsplit when cancelled while it was fetched', async () => {
      const controller = new AbortController();
      const resolver = new AreaResolver(CONFIG, {
        boundarySource: abortingSource(controller, LARGE_STATE),
        registry,
        now: () => NOW,
      });

      const result = await resolver.resolve(['state:US-XB'], { signal: controller.signal });

      expect(result.units.map((unit) => unit.bbox)).toEqual([[0, 0, 1, 1]]);
    });
  });

  it('should reject an empty selection', async () => {
    const { resolver } = resolverWith({});

    await expect(resolver.resolve([])).rejects.toThrow('No areas selected');
  });
});
