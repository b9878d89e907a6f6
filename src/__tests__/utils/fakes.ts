/**
 * In-process stand-ins for the observation and boundary sources
 */

import type { DynamicAreaRef } from '../../core/area-id.js';
import type { AreaGeometry, BBox } from '../../core/types/geo.js';
import type { Observation } from '../../core/types/observation.js';
import type {
  ObservationPage,
  ObservationSource,
  PageRequest,
  QueryUnit,
  UnitResult,
} from '../../core/types/query.js';
import type {
  BoundaryRecord,
  BoundarySource,
  DivisionListing,
} from '../../providers/overpass-boundary-source.js';
import { SignatureStore } from '../../signatures/signature-store.js';

export type PageHandler = (request: PageRequest) => ObservationPage | Promise<ObservationPage>;

export class FakeObservationSource implements ObservationSource {
  readonly name = 'fake-observations';
  readonly requests: PageRequest[] = [];

  constructor(private readonly handler: PageHandler) {}

  async searchPage(request: PageRequest): Promise<ObservationPage> {
    this.requests.push(request);
    return this.handler(request);
  }
}

export class FakeBoundarySource implements BoundarySource {
  readonly name = 'fake-boundaries';
  readonly fetched: string[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(
    private readonly boundaries: ReadonlyMap<string, BoundaryRecord | Error>,
    private readonly divisions: ReadonlyMap<string, DivisionListing[] | Error> = new Map()
  ) {}

  async fetchBoundary(ref: DynamicAreaRef, signal?: AbortSignal): Promise<BoundaryRecord | null> {
    this.fetched.push(ref.id);
    this.signals.push(signal);
    const entry = this.boundaries.get(ref.id);
    if (entry instanceof Error) throw entry;
    return entry ?? null;
  }

  async listDivisions(parentIso: string, adminLevel: number): Promise<DivisionListing[]> {
    const entry = this.divisions.get(`${parentIso}:${adminLevel}`);
    if (entry instanceof Error) throw entry;
    return entry ?? [];
  }
}

export function observation(overrides: Partial<Observation> = {}): Observation {
  return {
    bssid: '08:3A:88:11:22:33',
    ssid: 'Flock-ABC123',
    latitude: 33.02,
    longitude: -96.7,
    lastSeen: '2025-01-15T10:00:00.000Z',
    firstSeen: null,
    raw: {},
    ...overrides,
  };
}

export function page(
  observations: readonly Observation[],
  nextCursor: string | null = null,
  malformed = 0
): ObservationPage {
  return { observations, malformed, nextCursor };
}

/** Closed rectangle as a GeoJSON Polygon */
export function rectangle(minLon: number, minLat: number, maxLon: number, maxLat: number): AreaGeometry {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [minLon, minLat],
        [maxLon, minLat],
        [maxLon, maxLat],
        [minLon, maxLat],
        [minLon, minLat],
      ],
    ],
  };
}

export function queryUnit(overrides: Partial<QueryUnit> = {}): QueryUnit {
  const bbox: BBox = overrides.bbox ?? [-96.8, 33.0, -96.6, 33.1];
  return {
    id: `zip:75024#${bbox.join(',')}#*`,
    bbox,
    areaId: 'zip:75024',
    areaName: '75024 Plano, TX',
    ...overrides,
  };
}

export function unitResult(
  unit: QueryUnit,
  observations: readonly Observation[],
  malformed = 0
): UnitResult {
  return { unit, observations, malformed, pages: 1, fromCache: false };
}

export function testSignatures(): SignatureStore {
  return SignatureStore.fromLists(['08:3A:88'], ['Flock-*']).store;
}

export const instantSleep = async (): Promise<void> => {};
