/**
 * Bounding-box arithmetic and decomposition
 */

import { describe, it, expect } from 'vitest';
import {
  bboxAreaKm2,
  bboxAroundPoint,
  bboxKey,
  decomposeBBox,
  isPointInBBox,
  isValidCoordinate,
  splitBBox,
  unionBBoxes,
} from '../../../core/geo-utils.js';
import type { BBox } from '../../../core/types/geo.js';

describe('bboxAroundPoint', () => {
  it('should build a box one degree wide per 111.32 km at the equator', () => {
    expect(bboxAroundPoint({ lat: 0, lng: 0 }, 111.32)).toEqual([-1, -1, 1, 1]);
  });

  it('should clamp to valid coordinates', () => {
    const box = bboxAroundPoint({ lat: 89.9, lng: 179.9 }, 50);
    expect(box[2]).toBe(180);
    expect(box[3]).toBe(90);
  });
});

describe('splitBBox', () => {
  it('should return SW, SE, NW, NE quadrants', () => {
    expect(splitBBox([0, 0, 4, 2])).toEqual([
      [0, 0, 2, 1],
      [2, 0, 4, 1],
      [0, 1, 2, 2],
      [2, 1, 4, 2],
    ]);
  });
});

describe('decomposeBBox', () => {
  const root: BBox = [0, 0, 2, 2];

  it('should split until every box is under the threshold', () => {
    const rootArea = bboxAreaKm2(root);
    const result = decomposeBBox(root, { maxAreaKm2: rootArea / 2, maxDepth: 8 });

    expect(result.boxes).toHaveLength(4);
    expect(result.oversized).toBe(0);
    expect(result.stopped).toBe(false);
    for (const box of result.boxes) {
      expect(bboxAreaKm2(box)).toBeLessThanOrEqual(rootArea / 2);
    }
  });

  it('should cover the root with no gaps', () => {
    const rootArea = bboxAreaKm2(root);
    const result = decomposeBBox(root, { maxAreaKm2: rootArea / 20, maxDepth: 8 });

    expect(unionBBoxes(result.boxes)).toEqual(root);
    const total = result.boxes.reduce((sum, box) => sum + bboxAreaKm2(box), 0);
    expect(total / rootArea).toBeCloseTo(1, 9);
  });

  it('should emit an oversized box at the depth limit', () => {
    const result = decomposeBBox(root, { maxAreaKm2: 1, maxDepth: 0 });
    expect(result.boxes).toEqual([root]);
    expect(result.oversized).toBe(1);
  });

  it('should emit pending boxes unsplit when stopped', () => {
    const result = decomposeBBox(root, { maxAreaKm2: 1, maxDepth: 8, shouldStop: () => true });
    expect(result.boxes).toEqual([root]);
    expect(result.stopped).toBe(true);
  });
});

describe('box predicates', () => {
  it('should treat box edges as inside', () => {
    expect(isPointInBBox({ lat: 1, lng: 1 }, [0, 0, 1, 1])).toBe(true);
    expect(isPointInBBox({ lat: 1.01, lng: 1 }, [0, 0, 1, 1])).toBe(false);
  });

  it('should union boxes', () => {
    expect(unionBBoxes([])).toBeNull();
    expect(
      unionBBoxes([
        [0, 0, 1, 1],
        [2, -1, 3, 0.5],
      ])
    ).toEqual([0, -1, 3, 1]);
  });

  it('should key boxes at six decimals', () => {
    expect(bboxKey([1, 2.5, 3, 4])).toBe('1.000000,2.500000,3.000000,4.000000');
  });

  it('should reject out-of-range coordinates', () => {
    expect(isValidCoordinate(33.02, -96.7)).toBe(true);
    expect(isValidCoordinate(91, 0)).toBe(false);
    expect(isValidCoordinate(0, Number.NaN)).toBe(false);
  });

  it('should report zero area for an inverted box', () => {
    expect(bboxAreaKm2([1, 1, 0, 0])).toBe(0);
  });
});
