/**
 * Core geometry types for room layout.
 * All types are immutable value objects.
 */

/**
 * 2D point with integer grid coordinates. `+y` points north.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Bounding box defined by min/max corners (inclusive)
 */
export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

/**
 * Unit offsets tried around an anchor room, per axis
 */
export const AXIS_OFFSETS = [-1, 0, 1] as const;

export function pointKey(point: Point): string {
  return `${point.x},${point.y}`;
}

export function euclideanDistance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function boundsOf(points: readonly Point[]): Bounds | undefined {
  const [first, ...rest] = points;
  if (!first) return undefined;

  let minX = first.x;
  let minY = first.y;
  let maxX = first.x;
  let maxY = first.y;
  for (const p of rest) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  return { minX, minY, maxX, maxY };
}
