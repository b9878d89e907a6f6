/**
 * Geographic Area Types
 *
 * Selectable areas come from two places: administrative boundaries fetched
 * from OpenStreetMap, and the static ZIP registry shipped with the tool.
 */

import type { Polygon, MultiPolygon } from 'geojson';

/**
 * Bounding box in GeoJSON order: [minLon, minLat, maxLon, maxLat]
 */
export type BBox = readonly [number, number, number, number];

/**
 * Exact area outline used for point-in-polygon filtering
 */
export type AreaGeometry = Polygon | MultiPolygon;

export interface LatLng {
  readonly lat: number;
  readonly lng: number;
}

export type DynamicAreaKind = 'country' | 'state' | 'province' | 'county';

export type GeoAreaKind = DynamicAreaKind | 'static-zip-set';

/**
 * One postal code from the static registry
 */
export interface ZipCodeEntry {
  readonly code: string;
  readonly city: string;
  readonly county: string;
  readonly state: string;
  /** Representative point used to build the query box */
  readonly centroid: LatLng;
}

/**
 * Area resolved from an administrative boundary relation
 */
export interface DynamicGeoArea {
  readonly source: 'dynamic-osm';
  readonly id: string;
  readonly displayName: string;
  readonly kind: DynamicAreaKind;
  readonly geometry: AreaGeometry;
  /** True when a refresh failed and an expired cache entry was served */
  readonly boundaryStale: boolean;
}

/**
 * Area defined by an explicit list of registry ZIP codes. Never carries geometry.
 */
export interface StaticZipArea {
  readonly source: 'static-registry';
  readonly id: string;
  readonly displayName: string;
  readonly kind: 'static-zip-set';
  readonly zipCodes: readonly ZipCodeEntry[];
}

export type GeoArea = DynamicGeoArea | StaticZipArea;
