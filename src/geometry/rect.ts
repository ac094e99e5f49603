/**
 * Geometry primitives
 *
 * Screen-space rectangles and points as reported by host queries.
 */

import { z } from 'zod';

export const PointSchema = z.object({
  x: z.number().describe('X coordinate'),
  y: z.number().describe('Y coordinate'),
});

export type Point = z.infer<typeof PointSchema>;

export const RectSchema = z.object({
  x: z.number().describe('X coordinate'),
  y: z.number().describe('Y coordinate'),
  width: z.number().nonnegative().describe('Width'),
  height: z.number().nonnegative().describe('Height'),
});

export type Rect = z.infer<typeof RectSchema>;

/**
 * Euclidean distance between two points (or rect origins).
 */
export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/**
 * Per-axis size change between two rects.
 */
export function sizeDelta(previous: Rect, current: Rect): { width: number; height: number } {
  return {
    width: Math.abs(current.width - previous.width),
    height: Math.abs(current.height - previous.height),
  };
}

export function originOf(rect: Rect): Point {
  return { x: rect.x, y: rect.y };
}
