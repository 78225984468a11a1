// ─── Convex Hull ───────────────────────────────────────────────────
// Graham scan over sampled zone points, vertex-count simplification,
// and polygon measurement.

import type { Point, Polygon } from "./types";

/** Relative tolerance for treating a turn as collinear. */
const COLLINEAR_EPSILON = 1e-9;

/**
 * Orientation of the turn o → a → b.
 * Positive is counter-clockwise, negative clockwise. Values within a
 * tolerance scaled to the two edge lengths are reported as 0.
 */
export function cross(o: Point, a: Point, b: Point): number {
  const ax = a.x - o.x;
  const ay = a.y - o.y;
  const bx = b.x - o.x;
  const by = b.y - o.y;
  const value = ax * by - ay * bx;
  const scale = (Math.abs(ax) + Math.abs(ay)) * (Math.abs(bx) + Math.abs(by));
  return Math.abs(value) <= COLLINEAR_EPSILON * scale ? 0 : value;
}

function squaredDistance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

function dedupe(points: readonly Point[]): Point[] {
  const seen = new Set<string>();
  const unique: Point[] = [];
  for (const p of points) {
    const key = `${p.x},${p.y}`;
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(p);
    }
  }
  return unique;
}

/**
 * Convex hull by Graham scan.
 *
 * The pivot is the lowest point (lowest x on ties); the rest are sorted
 * by polar angle around it, nearer first on equal angles, and swept
 * while popping every clockwise or collinear turn. The hull comes back
 * counter-clockwise starting at the pivot.
 *
 * Returns `[]` when fewer than 3 distinct points remain or all of them
 * are collinear.
 */
export function convexHull(points: readonly Point[]): Polygon {
  const unique = dedupe(points);
  if (unique.length < 3) return [];

  let pivot = unique[0] ?? { x: 0, y: 0 };
  for (const p of unique) {
    if (p.y < pivot.y || (p.y === pivot.y && p.x < pivot.x)) {
      pivot = p;
    }
  }

  const rest = unique.filter((p) => p !== pivot);
  rest.sort((a, b) => {
    const turn = cross(pivot, a, b);
    if (turn > 0) return -1;
    if (turn < 0) return 1;
    return squaredDistance(pivot, a) - squaredDistance(pivot, b);
  });

  const stack: Point[] = [pivot];
  for (const p of rest) {
    while (stack.length >= 2) {
      const top = stack[stack.length - 1];
      const below = stack[stack.length - 2];
      if (top === undefined || below === undefined || cross(below, top, p) > 0) {
        break;
      }
      stack.pop();
    }
    stack.push(p);
  }

  return stack.length >= 3 ? stack : [];
}

/**
 * Thins a hull to at most `maxVertices` by keeping every Nth vertex plus
 * the final one. Hulls already within the limit are returned as-is.
 *
 * @throws {RangeError} if maxVertices is not an integer of at least 3.
 */
export function simplifyHull(hull: Polygon, maxVertices: number): Polygon {
  if (!Number.isInteger(maxVertices) || maxVertices < 3) {
    throw new RangeError(`maxVertices must be an integer >= 3, got ${maxVertices}`);
  }
  if (hull.length <= maxVertices) return hull;

  const lastIndex = hull.length - 1;
  const step = Math.ceil(lastIndex / (maxVertices - 1));
  const kept: Point[] = [];
  for (let i = 0; i < lastIndex; i += step) {
    const p = hull[i];
    if (p !== undefined) kept.push(p);
  }
  const last = hull[lastIndex];
  if (last !== undefined) kept.push(last);
  return kept;
}

/** Unsigned area by the shoelace formula. */
export function polygonArea(polygon: Polygon): number {
  let area = 0;
  const n = polygon.length;

  for (let i = 0; i < n; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % n];
    if (a === undefined || b === undefined) continue;
    area += a.x * b.y;
    area -= b.x * a.y;
  }

  return Math.abs(area) / 2;
}
