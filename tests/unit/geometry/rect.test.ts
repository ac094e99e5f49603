/**
 * Geometry helper tests
 */

import { describe, it, expect } from 'vitest';
import { RectSchema, distance, originOf, sizeDelta } from '../../../src/geometry/rect.js';

describe('geometry', () => {
  it('should measure Euclidean distance between origins', () => {
    expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });

  it('should report absolute per-axis size deltas', () => {
    expect(sizeDelta({ x: 0, y: 0, width: 100, height: 50 }, { x: 9, y: 9, width: 90, height: 58 })).toEqual({
      width: 10,
      height: 8,
    });
  });

  it('should extract the origin of a rect', () => {
    expect(originOf({ x: 7, y: 8, width: 1, height: 1 })).toEqual({ x: 7, y: 8 });
  });

  it('should reject negative sizes', () => {
    expect(RectSchema.safeParse({ x: 0, y: 0, width: -1, height: 10 }).success).toBe(false);
  });
});
