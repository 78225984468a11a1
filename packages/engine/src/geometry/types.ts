// ─── Geometry Types ────────────────────────────────────────────────
// All coordinates are field inches with the origin at field center,
// +x to the right and +y up, unless a name says "surface".

export interface Point {
  readonly x: number;
  readonly y: number;
}

/** An ordered closed boundary. Fewer than 3 points means "nothing to draw". */
export type Polygon = readonly Point[];

/** Inclusive axis-aligned region of the field. */
export interface FieldBounds {
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
}

/** Rectangle of the rendering surface the field image occupies. Surface y grows downward. */
export interface SurfaceRect {
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
}
