/**
 * Search Service Tests
 *
 * End-to-end searches over in-process sources:
 * - ZIP search reporting a known device
 * - Unit accounting and counts in the metadata
 * - Time window override and validation
 * - SSID-pattern strategy
 * - Shared result cache across searches
 * - Cancellation and unit failures
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { createConfig, type DeepPartial, type SearchEngineConfig } from '../../../core/config.js';
import { ConfigurationError, SourceResponseError } from '../../../core/errors.js';
import { StaticRegistry } from '../../../registry/static-registry.js';
import { aggregateResults, deepFreeze, matchRate } from '../../../services/result-aggregator.js';
import { SearchService } from '../../../services/search-service.js';
import {
  FakeBoundarySource,
  FakeObservationSource,
  observation,
  page,
  testSignatures,
  type PageHandler,
} from '../../utils/fakes.js';

let registry: StaticRegistry;

beforeAll(async () => {
  registry = await StaticRegistry.load();
});

function serviceWith(handler: PageHandler, overrides: DeepPartial<SearchEngineConfig> = {}) {
  let time = 0;
  const source = new FakeObservationSource(handler);
  const service = new SearchService(
    createConfig({ retry: { maxAttempts: 2, jitterFactor: 0 }, ...overrides }),
    {
      signatures: testSignatures(),
      observationSource: source,
      boundarySource: new FakeBoundarySource(new Map()),
      registry,
      now: () => time,
      sleep: async (ms: number) => {
        time += ms;
      },
      generateId: () => 'search-1',
    }
  );
  return { service, source };
}

const KNOWN_DEVICE = observation({
  bssid: '08:3A:88:11:22:33',
  ssid: 'Flock-ABC123',
  latitude: 33.02,
  longitude: -96.7,
});

const NEIGHBOUR = observation({ bssid: 'AA:BB:CC:00:00:01', ssid: 'HomeNet' });

describe('SearchService', () => {
  it('should find a known camera radio in a ZIP code', async () => {
    const { service } = serviceWith(() => page([KNOWN_DEVICE, NEIGHBOUR], null, 1));

    const results = await service.search({ areaIds: ['zip:75024'] });

    expect(results.devices).toHaveLength(1);
    expect(results.devices[0]).toMatchObject({
      bssid: '08:3A:88:11:22:33',
      matchReason: 'bssid-prefix',
      matchedSignature: '08:3A:88',
      areaId: 'zip:75024',
    });
    expect(results.metadata).toMatchObject({
      searchId: 'search-1',
      startedAt: '1970-01-01T00:00:00.000Z',
      strategy: 'bbox',
      seenSince: '20200101',
      areasRequested: ['zip:75024'],
      units: { requested: 1, completed: 1, failed: 0, skipped: 0, fromCache: 0 },
      counts: {
        raw: 2,
        malformed: 1,
        matched: 1,
        outsideBoundary: 0,
        duplicatesCollapsed: 0,
        deduplicated: 1,
      },
      matchRate: 50,
      signatures: { bssidPrefixes: 1, ssidPatterns: 1 },
      cancelled: false,
    });
    expect(results.metadata.areas[0]).toMatchObject({
      id: 'zip:75024',
      source: 'static-registry',
      zipCodes: ['75024'],
    });
  });

  it('should return a frozen result set', async () => {
    const { service } = serviceWith(() => page([KNOWN_DEVICE]));

    const results = await service.search({ areaIds: ['zip:75024'] });

    expect(Object.isFrozen(results)).toBe(true);
    expect(Object.isFrozen(results.metadata.counts)).toBe(true);
    expect(Object.isFrozen(results.devices[0])).toBe(true);
  });

  it('should send the requested time window', async () => {
    const { service, source } = serviceWith(() => page([]));

    const results = await service.search({ areaIds: ['zip:75024'], seenSince: '20240101' });

    expect(source.requests[0].seenSince).toBe('20240101');
    expect(results.metadata.seenSince).toBe('20240101');
  });

  it('should reject a malformed time window before any request', async () => {
    const { service, source } = serviceWith(() => page([]));

    await expect(
      service.search({ areaIds: ['zip:75024'], seenSince: '2024-01-01' })
    ).rejects.toThrow(ConfigurationError);
    expect(source.requests).toEqual([]);
  });

  it('should query once per SSID pattern under the ssid-patterns strategy', async () => {
    const { service, source } = serviceWith(() => page([]));

    const results = await service.search({ areaIds: ['zip:75024'], strategy: 'ssid-patterns' });

    expect(source.requests.map((request) => request.ssidLike)).toEqual(['Flock-%']);
    expect(results.metadata.strategy).toBe('ssid-patterns');
  });

  it('should reuse unit results across searches from one service', async () => {
    const { service, source } = serviceWith(() => page([KNOWN_DEVICE]));

    await service.search({ areaIds: ['zip:75024'] });
    const second = await service.search({ areaIds: ['zip:75024'] });

    expect(source.requests).toHaveLength(1);
    expect(second.metadata.units.fromCache).toBe(1);
    expect(second.devices).toHaveLength(1);
  });

  it('should resolve and query nothing when cancelled before the run', async () => {
    const controller = new AbortController();
    controller.abort();
    const { service, source } = serviceWith(() => page([KNOWN_DEVICE]));

    const results = await service.search({ areaIds: ['zip:75024'], signal: controller.signal });

    expect(source.requests).toEqual([]);
    expect(results.devices).toEqual([]);
    expect(results.metadata.cancelled).toBe(true);
    expect(results.metadata.units).toMatchObject({ requested: 0, completed: 0, skipped: 0 });
  });

  it('should keep partial results when a unit fails', async () => {
    const { service } = serviceWith(() => {
      throw new SourceResponseError('wigle', 'bad request');
    });

    const results = await service.search({ areaIds: ['zip:75024'] });

    expect(results.devices).toEqual([]);
    expect(results.metadata.units).toMatchObject({ requested: 1, completed: 0, failed: 1 });
    expect(results.metadata.failedUnits[0]).toMatchObject({
      areaId: 'zip:75024',
      attempts: 1,
      error: 'wigle: bad request',
    });
  });
});

describe('matchRate', () => {
  it('should be zero when nothing was returned', () => {
    expect(matchRate(0, 0)).toBe(0);
  });

  it('should round to two decimals', () => {
    expect(matchRate(1, 3)).toBe(33.33);
  });
});

describe('aggregateResults', () => {
  it('should merge resolver and orchestrator warnings in order', () => {
    const results = aggregateResults({
      searchId: 'search-2',
      startedAt: new Date(0),
      completedAt: new Date(1500),
      strategy: 'bbox',
      seenSince: '20200101',
      areasRequested: [],
      resolution: { areas: [], units: [], failedAreas: [], warnings: ['resolver warning'] },
      orchestration: {
        completed: [],
        failed: [],
        skipped: [],
        warnings: ['orchestrator warning'],
        cancelled: false,
      },
      match: {
        devices: [],
        counts: {
          raw: 0,
          malformed: 0,
          matched: 0,
          outsideBoundary: 0,
          duplicatesCollapsed: 0,
          deduplicated: 0,
        },
      },
      signatures: { bssidPrefixes: 3, ssidPatterns: 2 },
    });

    expect(results.metadata.warnings).toEqual(['resolver warning', 'orchestrator warning']);
    expect(results.metadata.durationMs).toBe(1500);
    expect(results.metadata.completedAt).toBe('1970-01-01T00:00:01.500Z');
  });
});

describe('deepFreeze', () => {
  it('should freeze nested objects and arrays', () => {
    const value = deepFreeze({ list: [{ name: 'a' }] });

    expect(Object.isFrozen(value.list)).toBe(true);
    expect(Object.isFrozen(value.list[0])).toBe(true);
  });
});
