/**
 * Geographic Utilities
 *
 * Bounding-box arithmetic and area decomposition. Boxes use GeoJSON order
 * [minLon, minLat, maxLon, maxLat]; areas are geodesic, via turf.
 */

import { area, bbox as turfBbox, bboxPolygon } from '@turf/turf';
import type { AreaGeometry, BBox, LatLng } from './types/geo.js';

const KM_PER_DEGREE_LAT = 111.32;

/**
 * Bounding box of an area outline
 */
export function bboxOfGeometry(geometry: AreaGeometry): BBox {
  const [minLon, minLat, maxLon, maxLat] = turfBbox(geometry);
  return [minLon, minLat, maxLon, maxLat];
}

/**
 * Geodesic area of a box in square kilometres
 */
export function bboxAreaKm2(box: BBox): number {
  const [minLon, minLat, maxLon, maxLat] = box;
  if (maxLon <= minLon || maxLat <= minLat) {
    return 0;
  }
  return area(bboxPolygon([minLon, minLat, maxLon, maxLat])) / 1_000_000;
}

/**
 * Square box of half-width `radiusKm` around a point, clamped to valid coordinates
 */
export function bboxAroundPoint(center: LatLng, radiusKm: number): BBox {
  const dLat = radiusKm / KM_PER_DEGREE_LAT;
  // Longitude degrees shrink with cos(lat); floor it so polar boxes stay finite
  const cosLat = Math.max(Math.cos((center.lat * Math.PI) / 180), 0.01);
  const dLon = radiusKm / (KM_PER_DEGREE_LAT * cosLat);

  return [
    Math.max(-180, center.lng - dLon),
    Math.max(-90, center.lat - dLat),
    Math.min(180, center.lng + dLon),
    Math.min(90, center.lat + dLat),
  ];
}

/**
 * Split a box into four quadrants: SW, SE, NW, NE. The quadrants tile the parent.
 */
export function splitBBox(box: BBox): [BBox, BBox, BBox, BBox] {
  const [minLon, minLat, maxLon, maxLat] = box;
  const midLon = (minLon + maxLon) / 2;
  const midLat = (minLat + maxLat) / 2;

  return [
    [minLon, minLat, midLon, midLat],
    [midLon, minLat, maxLon, midLat],
    [minLon, midLat, midLon, maxLat],
    [midLon, midLat, maxLon, maxLat],
  ];
}

export interface DecomposeOptions {
  readonly maxAreaKm2: number;
  readonly maxDepth: number;
  /** Checked before each box is examined; returning true stops early */
  readonly shouldStop?: () => boolean;
}

export interface DecomposeResult {
  readonly boxes: readonly BBox[];
  /** Boxes still over the threshold because maxDepth was reached */
  readonly oversized: number;
  readonly maxDepthReached: number;
  readonly stopped: boolean;
}

/**
 * Quadrant-split a box until every piece is under the area threshold
 *
 * Uses an explicit FIFO work queue. Every split replaces a box with four
 * children that tile it exactly, so the output always covers the input.
 */
export function decomposeBBox(root: BBox, options: DecomposeOptions): DecomposeResult {
  const queue: Array<{ box: BBox; depth: number }> = [{ box: root, depth: 0 }];
  const boxes: BBox[] = [];
  let oversized = 0;
  let maxDepthReached = 0;

  while (queue.length > 0) {
    if (options.shouldStop?.()) {
      // Emit the remainder unsplit so coverage still holds
      for (const pending of queue) {
        boxes.push(pending.box);
      }
      return { boxes, oversized, maxDepthReached, stopped: true };
    }

    const next = queue.shift();
    if (next === undefined) break;
    const { box, depth } = next;
    maxDepthReached = Math.max(maxDepthReached, depth);

    if (bboxAreaKm2(box) <= options.maxAreaKm2) {
      boxes.push(box);
      continue;
    }

    if (depth >= options.maxDepth) {
      oversized++;
      boxes.push(box);
      continue;
    }

    for (const child of splitBBox(box)) {
      queue.push({ box: child, depth: depth + 1 });
    }
  }

  return { boxes, oversized, maxDepthReached, stopped: false };
}

export function isPointInBBox(point: LatLng, box: BBox): boolean {
  const [minLon, minLat, maxLon, maxLat] = box;
  return (
    point.lng >= minLon &&
    point.lng <= maxLon &&
    point.lat >= minLat &&
    point.lat <= maxLat
  );
}

/**
 * Smallest box containing every input box
 */
export function unionBBoxes(boxes: readonly BBox[]): BBox | null {
  if (boxes.length === 0) return null;

  let [minLon, minLat, maxLon, maxLat] = boxes[0];
  for (const [a, b, c, d] of boxes.slice(1)) {
    minLon = Math.min(minLon, a);
    minLat = Math.min(minLat, b);
    maxLon = Math.max(maxLon, c);
    maxLat = Math.max(maxLat, d);
  }
  return [minLon, minLat, maxLon, maxLat];
}

/**
 * Stable string key for a box, rounded to 6 decimals (~0.1 m)
 */
export function bboxKey(box: BBox): string {
  return box.map((value) => value.toFixed(6)).join(',');
}

export function isValidCoordinate(lat: number, lon: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lon) &&
    lat >= -90 &&
    lat <= 90 &&
    lon >= -180 &&
    lon <= 180
  );
}
