// ─── Polygon Cache ─────────────────────────────────────────────────
// Host-owned memo of approximated zone polygons, so re-rendering an
// unchanged zone does not resample. One cache per rendering surface,
// one writer.

import type { Zone } from "../zone/zone";
import {
  approximatePolygon,
  DEFAULT_MAX_HULL_VERTICES,
  type ApproximationOptions,
} from "./zone-sampler";
import type { FieldBounds, Polygon } from "./types";

/** Storage contract a host can back with anything map-like. */
export interface PolygonCache<Entry = Polygon> {
  get(key: string): Entry | undefined;
  set(key: string, entry: Entry): void;
  delete(key: string): boolean;
  clear(): void;
}

/** Cache key for a zone: its name and equation, encoded without ambiguity. */
export function polygonCacheKey(zone: Pick<Zone, "name" | "equation">): string {
  return JSON.stringify([zone.name, zone.equation]);
}

export interface CachedPolygon {
  readonly bounds: FieldBounds;
  readonly resolution: number;
  readonly maxVertices: number;
  readonly polygon: Polygon;
}

function sameBounds(a: FieldBounds, b: FieldBounds): boolean {
  return a.minX === b.minX && a.maxX === b.maxX && a.minY === b.minY && a.maxY === b.maxY;
}

/**
 * Map-backed polygon cache keyed by (name, equation).
 * An entry is only reused when it was sampled with the same bounds,
 * resolution and vertex cap.
 */
export class ZonePolygonCache implements PolygonCache<CachedPolygon> {
  private readonly entries = new Map<string, CachedPolygon>();

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CachedPolygon | undefined {
    return this.entries.get(key);
  }

  set(key: string, entry: CachedPolygon): void {
    this.entries.set(key, entry);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Cached polygon for the zone, sampling it on a miss. */
  getOrCompute(
    zone: Zone,
    bounds: FieldBounds,
    resolution: number,
    options: ApproximationOptions = {}
  ): Polygon {
    const key = polygonCacheKey(zone);
    const maxVertices = options.maxVertices ?? DEFAULT_MAX_HULL_VERTICES;
    const cached = this.entries.get(key);
    if (
      cached &&
      cached.resolution === resolution &&
      cached.maxVertices === maxVertices &&
      sameBounds(cached.bounds, bounds)
    ) {
      return cached.polygon;
    }
    const polygon = approximatePolygon(zone.compiled, bounds, resolution, { maxVertices });
    this.entries.set(key, { bounds, resolution, maxVertices, polygon });
    return polygon;
  }

  /** Drops the zone's entry. Call when a zone's equation changes or it is removed. */
  invalidate(zone: Pick<Zone, "name" | "equation">): boolean {
    return this.entries.delete(polygonCacheKey(zone));
  }
}
