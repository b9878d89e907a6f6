/**
 * OpenStreetMap Boundary Source (Overpass API)
 *
 * Fetches administrative boundary relations with `out geom` and assembles
 * their member ways into closed rings. Inner rings are attached to the outer
 * ring that contains them; one outer ring yields a Polygon, several yield a
 * MultiPolygon.
 *
 * Returns null when no relation matches, which the resolver reports as
 * AreaNotFound. Transport and geometry failures throw.
 *
 * @module providers/overpass-boundary-source
 */

import type { Position } from 'geojson';
import { z } from 'zod';
import type { DynamicAreaRef } from '../core/area-id.js';
import type { ServiceEndpointConfig } from '../core/config.js';
import { SourceResponseError } from '../core/errors.js';
import { HTTPClient, HTTPSchemaError, type HTTPClientDeps } from '../core/http-client.js';
import type { AreaGeometry, DynamicAreaKind } from '../core/types/geo.js';
import { createLogger } from '../core/utils/logger.js';
import { PointInPolygonEngine } from '../services/pip-engine.js';

const log = createLogger({ module: 'overpass' });

const QUERY_TIMEOUT_S = 90;
const COORD_EPSILON = 1e-9;

const GeometryPointSchema = z.object({ lat: z.number(), lon: z.number() });

const MemberSchema = z.object({
  type: z.string(),
  ref: z.number(),
  role: z.string().optional(),
  geometry: z.array(GeometryPointSchema.nullable()).optional(),
});

const ElementSchema = z.object({
  type: z.string(),
  id: z.number(),
  tags: z.record(z.string()).optional(),
  members: z.array(MemberSchema).optional(),
});

const OverpassResponseSchema = z.object({
  elements: z.array(ElementSchema),
});

type OverpassElement = z.infer<typeof ElementSchema>;

export interface BoundaryRecord {
  readonly relationId: number;
  readonly displayName: string;
  readonly kind: DynamicAreaKind;
  readonly geometry: AreaGeometry;
}

export interface DivisionListing {
  readonly relationId: number;
  readonly name: string;
  readonly adminLevel: number | null;
  readonly isoCode: string | null;
}

/**
 * Administrative boundary lookup
 */
export interface BoundarySource {
  readonly name: string;
  /** Boundary for a reference, or null when it does not exist */
  fetchBoundary(ref: DynamicAreaRef, signal?: AbortSignal): Promise<BoundaryRecord | null>;
  listDivisions(parentIso: string, adminLevel: number): Promise<DivisionListing[]>;
}

// ============================================================================
// Query construction
// ============================================================================

const header = `[out:json][timeout:${QUERY_TIMEOUT_S}];`;

function escapeValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function parentAreaFilter(parentIso: string): string {
  const key = parentIso.includes('-') ? 'ISO3166-2' : 'ISO3166-1';
  return `area["${key}"="${escapeValue(parentIso)}"]["boundary"="administrative"]->.parent;`;
}

export function buildBoundaryQuery(ref: DynamicAreaRef): string {
  switch (ref.type) {
    case 'osm':
      return `${header}relation(${ref.relationId});out geom;`;
    case 'country':
      return `${header}relation["boundary"="administrative"]["admin_level"="2"]["ISO3166-1"="${escapeValue(ref.countryCode)}"];out geom;`;
    case 'state':
      return `${header}relation["boundary"="administrative"]["ISO3166-2"="${escapeValue(ref.isoCode)}"];out geom;`;
    case 'county':
      return (
        `${header}${parentAreaFilter(ref.stateIso)}` +
        `relation["boundary"="administrative"]["admin_level"="6"]["name"="${escapeValue(ref.name)}"](area.parent);out geom;`
      );
  }
}

export function buildDivisionQuery(parentIso: string, adminLevel: number): string {
  return (
    `${header}${parentAreaFilter(parentIso)}` +
    `relation["boundary"="administrative"]["admin_level"="${adminLevel}"](area.parent);out tags;`
  );
}

// ============================================================================
// Ring assembly
// ============================================================================

function samePoint(a: Position, b: Position): boolean {
  return Math.abs(a[0] - b[0]) <= COORD_EPSILON && Math.abs(a[1] - b[1]) <= COORD_EPSILON;
}

function isClosed(ring: readonly Position[]): boolean {
  return ring.length >= 4 && samePoint(ring[0], ring[ring.length - 1]);
}

export interface RingAssembly {
  readonly rings: Position[][];
  /** Way chains that could not be closed */
  readonly unclosed: number;
}

/**
 * Stitch ways into closed rings by matching endpoints, reversing ways as needed
 */
export function assembleRings(ways: readonly (readonly Position[])[]): RingAssembly {
  const remaining = ways.filter((way) => way.length >= 2).map((way) => [...way]);
  const rings: Position[][] = [];
  let unclosed = 0;

  while (remaining.length > 0) {
    const first = remaining.shift();
    if (first === undefined) break;
    let ring = first;

    while (!isClosed(ring)) {
      const head = ring[0];
      const tail = ring[ring.length - 1];
      const index = remaining.findIndex(
        (way) =>
          samePoint(way[0], tail) ||
          samePoint(way[way.length - 1], tail) ||
          samePoint(way[0], head) ||
          samePoint(way[way.length - 1], head)
      );
      if (index === -1) break;

      const [way] = remaining.splice(index, 1);
      if (samePoint(way[0], tail)) {
        ring = ring.concat(way.slice(1));
      } else if (samePoint(way[way.length - 1], tail)) {
        ring = ring.concat([...way].reverse().slice(1));
      } else if (samePoint(way[way.length - 1], head)) {
        ring = way.slice(0, -1).concat(ring);
      } else {
        ring = [...way].reverse().slice(0, -1).concat(ring);
      }
    }

    if (isClosed(ring)) {
      rings.push(ring);
    } else {
      unclosed++;
    }
  }

  return { rings, unclosed };
}

/**
 * Build a Polygon or MultiPolygon from a relation's members
 *
 * @returns null when no outer ring can be closed
 */
export function buildRelationGeometry(
  members: readonly z.infer<typeof MemberSchema>[],
  pip: PointInPolygonEngine = new PointInPolygonEngine()
): { geometry: AreaGeometry; unclosed: number } | null {
  const outerWays: Position[][] = [];
  const innerWays: Position[][] = [];

  for (const member of members) {
    if (member.type !== 'way' || member.geometry === undefined) continue;
    const coords: Position[] = [];
    for (const point of member.geometry) {
      if (point !== null) coords.push([point.lon, point.lat]);
    }
    if (member.role === 'inner') {
      innerWays.push(coords);
    } else if (member.role === 'outer' || member.role === '' || member.role === undefined) {
      outerWays.push(coords);
    }
  }

  const outer = assembleRings(outerWays);
  if (outer.rings.length === 0) {
    return null;
  }
  const inner = assembleRings(innerWays);

  const polygons: Position[][][] = outer.rings.map((ring) => [ring]);
  for (const hole of inner.rings) {
    const [lng, lat] = hole[0];
    const owner = polygons.find((polygon) =>
      pip.isPointInPolygon({ lat, lng }, { type: 'Polygon', coordinates: [polygon[0]] })
    );
    owner?.push(hole);
  }

  const unclosed = outer.unclosed + inner.unclosed;
  if (polygons.length === 1) {
    return { geometry: { type: 'Polygon', coordinates: polygons[0] }, unclosed };
  }
  return { geometry: { type: 'MultiPolygon', coordinates: polygons }, unclosed };
}

function kindFor(ref: DynamicAreaRef, tags: Readonly<Record<string, string>>): DynamicAreaKind {
  if (ref.type === 'country' || ref.type === 'county') {
    return ref.type;
  }
  const level = Number(tags.admin_level);
  if (ref.type === 'osm' && level === 2) return 'country';
  if (ref.type === 'osm' && level >= 5) return 'county';
  return tags.border_type === 'province' ? 'province' : 'state';
}

// ============================================================================
// Source
// ============================================================================

export class OverpassBoundarySource implements BoundarySource {
  readonly name = 'overpass';
  private readonly http: HTTPClient;
  private readonly pip = new PointInPolygonEngine();

  constructor(
    private readonly config: ServiceEndpointConfig,
    deps: HTTPClientDeps = {}
  ) {
    this.http = new HTTPClient(
      { timeoutMs: config.timeoutMs, userAgent: config.userAgent, maxRetries: 2 },
      deps
    );
  }

  async fetchBoundary(ref: DynamicAreaRef, signal?: AbortSignal): Promise<BoundaryRecord | null> {
    const elements = await this.runQuery(buildBoundaryQuery(ref), signal);
    const relation = elements.find((element) => element.type === 'relation');
    if (relation === undefined) {
      return null;
    }

    const built = buildRelationGeometry(relation.members ?? [], this.pip);
    if (built === null) {
      throw new SourceResponseError('overpass', `relation ${relation.id} has no closed outer ring`);
    }
    if (built.unclosed > 0) {
      log.warn('Dropped unclosed way chains', { relation: relation.id, unclosed: built.unclosed });
    }

    const tags = relation.tags ?? {};
    return {
      relationId: relation.id,
      displayName: tags['name:en'] ?? tags.name ?? ref.id,
      kind: kindFor(ref, tags),
      geometry: built.geometry,
    };
  }

  async listDivisions(parentIso: string, adminLevel: number): Promise<DivisionListing[]> {
    const elements = await this.runQuery(buildDivisionQuery(parentIso, adminLevel));

    return elements
      .filter((element) => element.type === 'relation')
      .map((element) => {
        const tags = element.tags ?? {};
        const level = Number(tags.admin_level);
        return {
          relationId: element.id,
          name: tags['name:en'] ?? tags.name ?? `relation ${element.id}`,
          adminLevel: Number.isFinite(level) ? level : null,
          isoCode: tags['ISO3166-2'] ?? null,
        };
      })
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  private async runQuery(query: string, signal?: AbortSignal): Promise<OverpassElement[]> {
    try {
      const { data } = await this.http.fetchParsed(this.config.baseUrl, OverpassResponseSchema, {
        method: 'POST',
        body: new URLSearchParams({ data: query }),
        signal,
      });
      return data.elements;
    } catch (error) {
      if (error instanceof HTTPSchemaError) {
        throw new SourceResponseError('overpass', 'unexpected response', error.issues);
      }
      throw error;
    }
  }
}
