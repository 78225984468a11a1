// ─── Zone Sampler ──────────────────────────────────────────────────
// Approximates a zone as a polygon: test membership at grid cell
// centers, then wrap the hits in a convex hull.
//
// The result is the convex envelope of sampled membership, not the exact
// boundary. A non-convex zone, or an OR of two distant regions, is drawn
// as one convex shape.

import {
  containsPoint,
  type CompiledEquation,
} from "../zone/compiled-equation";
import { convexHull, simplifyHull } from "./convex-hull";
import type { FieldBounds, Point, Polygon } from "./types";

/** Default grid step in inches. */
export const DEFAULT_SAMPLE_RESOLUTION = 3;

/** Default vertex cap for approximated polygons. */
export const DEFAULT_MAX_HULL_VERTICES = 64;

const MAX_SAMPLE_CELLS = 1_000_000;

export interface ApproximationOptions {
  /** Vertex cap applied after the hull is built. Defaults to DEFAULT_MAX_HULL_VERTICES. */
  readonly maxVertices?: number;
}

/** Number of `step`-wide cells needed to cover `[min, max]`. */
function cellCount(min: number, max: number, step: number): number {
  // Small slack so that accumulated float error does not add a sliver cell
  return Math.max(1, Math.ceil((max - min) / step - 1e-9));
}

/**
 * Centers of the cells tiling `[min, max]`, `step` apart. A last cell
 * that overhangs `max` is clipped, and sampled at the center of what
 * remains.
 */
function cellCenters(min: number, max: number, step: number): number[] {
  const count = cellCount(min, max, step);
  const centers: number[] = [];
  for (let i = 0; i < count; i++) {
    const lo = min + i * step;
    const hi = Math.min(lo + step, max);
    centers.push((lo + hi) / 2);
  }
  return centers;
}

function validateGrid(bounds: FieldBounds, resolution: number): void {
  if (!Number.isFinite(resolution) || resolution <= 0) {
    throw new RangeError(`resolution must be a positive finite number, got ${resolution}`);
  }
  const { minX, maxX, minY, maxY } = bounds;
  if (![minX, maxX, minY, maxY].every(Number.isFinite)) {
    throw new RangeError("bounds must be finite");
  }
  if (minX > maxX || minY > maxY) {
    throw new RangeError(
      `bounds are inverted: x [${minX}, ${maxX}], y [${minY}, ${maxY}]`
    );
  }
  const cells = cellCount(minX, maxX, resolution) * cellCount(minY, maxY, resolution);
  if (cells > MAX_SAMPLE_CELLS) {
    throw new RangeError(
      `resolution ${resolution} is too fine for these bounds (${cells} samples, limit ${MAX_SAMPLE_CELLS})`
    );
  }
}

/**
 * Every grid cell center inside `bounds` that the equation claims, row
 * by row from the bottom.
 *
 * @throws {RangeError} on a non-positive resolution, invalid bounds, or a
 *   grid larger than 1,000,000 cells.
 */
export function sampleZone(
  compiled: CompiledEquation,
  bounds: FieldBounds,
  resolution: number
): Point[] {
  validateGrid(bounds, resolution);
  if (compiled.kind === "invalid") return [];

  const xs = cellCenters(bounds.minX, bounds.maxX, resolution);
  const ys = cellCenters(bounds.minY, bounds.maxY, resolution);
  const hits: Point[] = [];
  for (const y of ys) {
    for (const x of xs) {
      if (containsPoint(compiled, x, y)) {
        hits.push({ x, y });
      }
    }
  }
  return hits;
}

/**
 * Renderable outline of a zone: sample, hull, then cap the vertex count.
 * Too few hits, or hits on a single line, give `[]`.
 */
export function approximatePolygon(
  compiled: CompiledEquation,
  bounds: FieldBounds,
  resolution: number,
  options: ApproximationOptions = {}
): Polygon {
  const maxVertices = options.maxVertices ?? DEFAULT_MAX_HULL_VERTICES;
  const hits = sampleZone(compiled, bounds, resolution);
  const hull = hits.length < 3 ? [] : convexHull(hits);
  return simplifyHull(hull, maxVertices);
}
