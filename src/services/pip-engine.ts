/**
 * Point-in-Polygon Engine
 *
 * Ray-casting containment test used to trim bounding-box over-fetch back to
 * an area's exact outline. Points on an edge or vertex count as inside.
 */

import type { Position } from 'geojson';
import type { AreaGeometry, BBox, LatLng } from '../core/types/geo.js';
import { bboxOfGeometry, isPointInBBox } from '../core/geo-utils.js';

type Ring = readonly Position[];

/** ~1 mm in degrees */
const DEFAULT_TOLERANCE = 1e-9;

export class PointInPolygonEngine {
  private readonly bboxCache = new WeakMap<AreaGeometry, BBox>();

  /**
   * Test if point is inside polygon or on its boundary
   *
   * @param tolerance - distance in degrees treated as "on boundary"
   */
  isPointInPolygon(
    point: LatLng,
    polygon: AreaGeometry,
    tolerance: number = DEFAULT_TOLERANCE
  ): boolean {
    if (!isPointInBBox(point, this.bboxFor(polygon))) {
      return false;
    }

    if (this.isPointOnBoundary(point, polygon, tolerance)) {
      return true;
    }

    if (polygon.type === 'Polygon') {
      return this.testPolygon(point, polygon.coordinates);
    }
    // MultiPolygon: inside any member
    return polygon.coordinates.some((polygonCoords) => this.testPolygon(point, polygonCoords));
  }

  isPointOnBoundary(
    point: LatLng,
    polygon: AreaGeometry,
    tolerance: number = DEFAULT_TOLERANCE
  ): boolean {
    const rings = polygon.type === 'Polygon' ? polygon.coordinates : polygon.coordinates.flat();
    return rings.some((ring) => this.isPointOnRing(point, ring, tolerance));
  }

  private bboxFor(polygon: AreaGeometry): BBox {
    let box = this.bboxCache.get(polygon);
    if (box === undefined) {
      box = bboxOfGeometry(polygon);
      this.bboxCache.set(polygon, box);
    }
    return box;
  }

  /**
   * Inside exterior ring (coordinates[0]) and outside every hole
   */
  private testPolygon(point: LatLng, coordinates: readonly Ring[]): boolean {
    if (coordinates.length === 0 || !this.testRing(point, coordinates[0])) {
      return false;
    }

    for (let i = 1; i < coordinates.length; i++) {
      if (this.testRing(point, coordinates[i])) {
        return false;
      }
    }

    return true;
  }

  private testRing(point: LatLng, ring: Ring): boolean {
    return this.countRayIntersections(point, ring) % 2 === 1;
  }

  /**
   * Crossings of an eastward ray from the point with the ring's edges.
   * GeoJSON positions are [lng, lat]. The half-open y-range test keeps a
   * vertex lying on the ray from being counted twice.
   */
  private countRayIntersections(point: LatLng, ring: Ring): number {
    let intersections = 0;
    const px = point.lng;
    const py = point.lat;

    for (let i = 0; i < ring.length - 1; i++) {
      const [x1, y1] = ring[i];
      const [x2, y2] = ring[i + 1];

      if (y1 === y2) {
        continue;
      }

      if (py < Math.min(y1, y2) || py >= Math.max(y1, y2)) {
        continue;
      }

      const t = (py - y1) / (y2 - y1);
      const xIntersection = x1 + t * (x2 - x1);

      if (xIntersection > px) {
        intersections++;
      }
    }

    return intersections;
  }

  private isPointOnRing(point: LatLng, ring: Ring, tolerance: number): boolean {
    for (let i = 0; i < ring.length - 1; i++) {
      const [x1, y1] = ring[i];
      const [x2, y2] = ring[i + 1];

      if (this.pointToSegmentDistance(point.lng, point.lat, x1, y1, x2, y2) <= tolerance) {
        return true;
      }
    }

    return false;
  }

  private pointToSegmentDistance(
    px: number,
    py: number,
    x1: number,
    y1: number,
    x2: number,
    y2: number
  ): number {
    const dx = x2 - x1;
    const dy = y2 - y1;
    const lengthSquared = dx * dx + dy * dy;

    if (lengthSquared === 0) {
      return Math.hypot(px - x1, py - y1);
    }

    const t = Math.max(0, Math.min(1, ((px - x1) * dx + (py - y1) * dy) / lengthSquared));
    return Math.hypot(px - (x1 + t * dx), py - (y1 + t * dy));
  }
}
