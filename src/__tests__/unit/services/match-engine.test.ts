/**
 * Match Engine Tests
 *
 * Tests:
 * - Prefix and SSID classification
 * - Postal code and polygon boundary filtering
 * - BSSID deduplication across overlapping units
 * - Observation counts
 */

import { describe, it, expect } from 'vitest';
import { filterByPolygon, MatchEngine, normalizePostalCode } from '../../../services/match-engine.js';
import {
  observation,
  queryUnit,
  rectangle,
  testSignatures,
  unitResult,
} from '../../utils/fakes.js';

describe('MatchEngine', () => {
  const engine = new MatchEngine(testSignatures());

  it('should report a known prefix seen inside a ZIP unit', () => {
    const unit = queryUnit({ postalCodes: ['75024'] });

    const { devices, counts } = engine.process([unitResult(unit, [observation()])]);

    expect(devices).toHaveLength(1);
    expect(devices[0]).toMatchObject({
      bssid: '08:3A:88:11:22:33',
      ssid: 'Flock-ABC123',
      matchReason: 'bssid-prefix',
      matchedSignature: '08:3A:88',
      unitId: unit.id,
      areaId: 'zip:75024',
      areaName: '75024 Plano, TX',
      sightings: 1,
    });
    expect(counts).toEqual({
      raw: 1,
      malformed: 0,
      matched: 1,
      outsideBoundary: 0,
      duplicatesCollapsed: 0,
      deduplicated: 1,
    });
  });

  it('should fall back to SSID patterns when the prefix is unknown', () => {
    const unit = queryUnit();

    const { devices } = engine.process([
      unitResult(unit, [observation({ bssid: 'AA:BB:CC:00:00:02', ssid: 'flock-xyz' })]),
    ]);

    expect(devices[0]).toMatchObject({ matchReason: 'ssid-pattern', matchedSignature: 'Flock-*' });
  });

  it('should count unmatched observations as raw only', () => {
    const { devices, counts } = engine.process([
      unitResult(queryUnit(), [observation({ bssid: 'AA:BB:CC:00:00:01', ssid: 'HomeNet' })], 2),
    ]);

    expect(devices).toEqual([]);
    expect(counts).toMatchObject({ raw: 1, malformed: 2, matched: 0, deduplicated: 0 });
  });

  it('should drop matches whose postal code is outside the ZIP set', () => {
    const unit = queryUnit({ postalCodes: ['75024'] });

    const { devices, counts } = engine.process([
      unitResult(unit, [
        observation({ bssid: '08:3A:88:00:00:01', raw: { postalcode: '75201' } }),
        observation({ bssid: '08:3A:88:00:00:02', raw: { postalcode: '75024-1234' } }),
        observation({ bssid: '08:3A:88:00:00:03' }),
      ]),
    ]);

    expect(devices.map((device) => device.bssid)).toEqual([
      '08:3A:88:00:00:02',
      '08:3A:88:00:00:03',
    ]);
    expect(counts.outsideBoundary).toBe(1);
  });

  it('should drop matches outside the polygon but keep them in the raw count', () => {
    const unit = queryUnit({ polygon: rectangle(-96.75, 33.0, -96.65, 33.05) });

    const { devices, counts } = engine.process([
      unitResult(unit, [
        observation({ bssid: '08:3A:88:00:00:01', latitude: 33.02 }),
        observation({ bssid: '08:3A:88:00:00:02', latitude: 33.08 }),
      ]),
    ]);

    expect(devices.map((device) => device.bssid)).toEqual(['08:3A:88:00:00:01']);
    expect(counts).toMatchObject({ raw: 2, matched: 2, outsideBoundary: 1, deduplicated: 1 });
  });

  it('should keep the most recent sighting from overlapping units', () => {
    const first = queryUnit({ id: 'unit-a' });
    const second = queryUnit({ id: 'unit-b' });

    const { devices, counts } = engine.process([
      unitResult(first, [
        observation({ lastSeen: '2025-01-10T00:00:00.000Z', latitude: 33.01 }),
        observation({ bssid: '08:3A:88:99:99:99' }),
      ]),
      unitResult(second, [observation({ lastSeen: '2025-02-01T00:00:00.000Z', latitude: 33.03 })]),
    ]);

    expect(devices.map((device) => device.bssid)).toEqual([
      '08:3A:88:11:22:33',
      '08:3A:88:99:99:99',
    ]);
    expect(devices[0]).toMatchObject({
      unitId: 'unit-b',
      latitude: 33.03,
      lastSeen: '2025-02-01T00:00:00.000Z',
      sightings: 2,
    });
    expect(counts).toMatchObject({ raw: 3, duplicatesCollapsed: 1, deduplicated: 2 });
  });

  it('should never let a sighting without a timestamp replace a dated one', () => {
    const { devices } = engine.process([
      unitResult(queryUnit({ id: 'unit-a' }), [observation()]),
      unitResult(queryUnit({ id: 'unit-b' }), [observation({ lastSeen: null })]),
    ]);

    expect(devices[0].unitId).toBe('unit-a');
  });

  it('should return frozen devices', () => {
    const { devices } = engine.process([unitResult(queryUnit(), [observation()])]);

    expect(Object.isFrozen(devices[0])).toBe(true);
  });
});

describe('filterByPolygon', () => {
  const polygon = rectangle(0, 0, 10, 10);
  const points = [
    { latitude: 5, longitude: 5 },
    { latitude: 0, longitude: 3 },
    { latitude: 11, longitude: 5 },
  ];

  it('should keep points inside or on the edge', () => {
    expect(filterByPolygon(points, polygon)).toEqual([
      { latitude: 5, longitude: 5 },
      { latitude: 0, longitude: 3 },
    ]);
  });

  it('should give the same result when applied twice', () => {
    const once = filterByPolygon(points, polygon);

    expect(filterByPolygon(once, polygon)).toEqual(once);
  });
});

describe('normalizePostalCode', () => {
  it('should read five-digit and ZIP+4 codes', () => {
    expect(normalizePostalCode('75024')).toBe('75024');
    expect(normalizePostalCode(' 75024-1234 ')).toBe('75024');
    expect(normalizePostalCode(75024)).toBe('75024');
  });

  it('should return null for absent or unusable values', () => {
    expect(normalizePostalCode(undefined)).toBeNull();
    expect(normalizePostalCode(null)).toBeNull();
    expect(normalizePostalCode(true)).toBeNull();
    expect(normalizePostalCode('T2P 1J9')).toBeNull();
  });
});
