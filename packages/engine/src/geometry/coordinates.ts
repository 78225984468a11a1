// ─── Field Coordinates ─────────────────────────────────────────────
// Mapping between field inches (center origin, y up) and a rendering
// surface (top-left origin, y down), plus grid snapping.

import type { FieldBounds, Point, SurfaceRect } from "./types";

/** Full field side length in inches (6 × 6 tiles). */
export const FIELD_SIZE_INCHES = 144;

/** Side length of one foam field tile. */
export const TILE_SIZE_INCHES = 23.5;

export const DEFAULT_FIELD_BOUNDS: FieldBounds = {
  minX: -FIELD_SIZE_INCHES / 2,
  maxX: FIELD_SIZE_INCHES / 2,
  minY: -FIELD_SIZE_INCHES / 2,
  maxY: FIELD_SIZE_INCHES / 2,
};

export interface FieldTransformOptions {
  /** Field side length in inches. Defaults to FIELD_SIZE_INCHES. */
  readonly fieldSize?: number;
  readonly surface: SurfaceRect;
}

export interface FieldTransform {
  readonly fieldSize: number;
  readonly surface: SurfaceRect;
  fieldToSurface(x: number, y: number): Point;
  surfaceToField(sx: number, sy: number): Point;
}

function assertPositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${label} must be a positive finite number, got ${value}`);
  }
}

/**
 * Builds the pair of inverse mappings for one surface.
 * @throws {RangeError} if the field size or surface dimensions are not positive.
 */
export function createFieldTransform(options: FieldTransformOptions): FieldTransform {
  const fieldSize = options.fieldSize ?? FIELD_SIZE_INCHES;
  const { surface } = options;
  assertPositive(fieldSize, "fieldSize");
  assertPositive(surface.width, "surface.width");
  assertPositive(surface.height, "surface.height");

  const half = fieldSize / 2;
  const scaleX = surface.width / fieldSize;
  const scaleY = surface.height / fieldSize;

  return {
    fieldSize,
    surface,
    fieldToSurface(x, y) {
      return {
        x: surface.left + (x + half) * scaleX,
        y: surface.top + (half - y) * scaleY,
      };
    },
    surfaceToField(sx, sy) {
      return {
        x: (sx - surface.left) / scaleX - half,
        y: half - (sy - surface.top) / scaleY,
      };
    },
  };
}

/**
 * Rounds each coordinate independently to the nearest multiple of `resolution`.
 * @throws {RangeError} if resolution is not positive.
 */
export function snapToGrid(x: number, y: number, resolution: number): Point {
  assertPositive(resolution, "resolution");
  return {
    x: Math.round(x / resolution) * resolution,
    y: Math.round(y / resolution) * resolution,
  };
}

/** Clamps a point into the field square centered on the origin. */
export function clampToField(
  x: number,
  y: number,
  fieldSize: number = FIELD_SIZE_INCHES
): Point {
  const half = fieldSize / 2;
  return {
    x: Math.max(-half, Math.min(half, x)),
    y: Math.max(-half, Math.min(half, y)),
  };
}

/**
 * Snap spacing for a view zoom level: one tile when zoomed out, halving
 * with each doubling of zoom, and a flat inch past 16×.
 */
export function gridSpacingForZoom(zoom: number): number {
  if (zoom <= 1) return TILE_SIZE_INCHES;
  if (zoom <= 2) return TILE_SIZE_INCHES / 2;
  if (zoom <= 4) return TILE_SIZE_INCHES / 4;
  if (zoom <= 8) return TILE_SIZE_INCHES / 8;
  if (zoom <= 16) return TILE_SIZE_INCHES / 16;
  return 1;
}
