export type { Point, Polygon, FieldBounds, SurfaceRect } from "./types";
export {
  FIELD_SIZE_INCHES,
  TILE_SIZE_INCHES,
  DEFAULT_FIELD_BOUNDS,
  createFieldTransform,
  snapToGrid,
  clampToField,
  gridSpacingForZoom,
  type FieldTransform,
  type FieldTransformOptions,
} from "./coordinates";
export { convexHull, simplifyHull, polygonArea, cross } from "./convex-hull";
export {
  sampleZone,
  approximatePolygon,
  DEFAULT_SAMPLE_RESOLUTION,
  DEFAULT_MAX_HULL_VERTICES,
  type ApproximationOptions,
} from "./zone-sampler";
export {
  ZonePolygonCache,
  polygonCacheKey,
  type PolygonCache,
  type CachedPolygon,
} from "./polygon-cache";
export {
  lineThroughPoints,
  evaluateLine,
  classifyPoint,
  halfPlaneEquation,
  type LineCoefficients,
  type LineSide,
} from "./boundary-line";
