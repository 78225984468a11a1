// ─── Zone ──────────────────────────────────────────────────────────
// A named field region defined by an equation over x and y.
// Zones are immutable: editing one means building a replacement.

import {
  DEFAULT_ZONE_OPACITY,
  DEFAULT_ZONE_TYPE,
  ZONE_TYPE_COLORS,
  type ZoneRecord,
  type ZoneType,
} from "@field-zones/schema";
import { DEFAULT_FIELD_BOUNDS } from "../geometry/coordinates";
import {
  approximatePolygon,
  DEFAULT_SAMPLE_RESOLUTION,
  type ApproximationOptions,
} from "../geometry/zone-sampler";
import type { FieldBounds, Point, Polygon } from "../geometry/types";
import {
  compileEquation,
  containsPoint,
  type CompiledEquation,
} from "./compiled-equation";

export interface Zone {
  readonly name: string;
  /** Source text exactly as the author typed it. */
  readonly equation: string;
  /** Derived from `equation` alone. */
  readonly compiled: CompiledEquation;
  readonly zoneType: ZoneType;
  readonly color: string;
  readonly opacity: number;
}

/**
 * Builds a zone from its record, compiling the equation immediately.
 * A bad equation still yields a zone, marked invalid with the reason.
 */
export function createZone(record: ZoneRecord): Zone {
  const zoneType = record.zone_type ?? DEFAULT_ZONE_TYPE;
  return {
    name: record.name,
    equation: record.equation,
    compiled: compileEquation(record.equation),
    zoneType,
    color: record.color ?? ZONE_TYPE_COLORS[zoneType],
    opacity: record.opacity ?? DEFAULT_ZONE_OPACITY,
  };
}

/** Returns a new zone with the equation replaced and recompiled. */
export function withEquation(zone: Zone, equation: string): Zone {
  return { ...zone, equation, compiled: compileEquation(equation) };
}

/** Serializable record for the zone, with the resolved color written out. */
export function zoneToRecord(zone: Zone): ZoneRecord {
  return {
    name: zone.name,
    equation: zone.equation,
    color: zone.color,
    opacity: zone.opacity,
    zone_type: zone.zoneType,
  };
}

export function isZoneValid(zone: Zone): boolean {
  return zone.compiled.kind === "valid";
}

export function zoneContainsPoint(zone: Zone, x: number, y: number): boolean {
  return containsPoint(zone.compiled, x, y);
}

/** Polygon approximation of a zone; see approximatePolygon. */
export function approximateZonePolygon(
  zone: Zone,
  bounds: FieldBounds = DEFAULT_FIELD_BOUNDS,
  resolution: number = DEFAULT_SAMPLE_RESOLUTION,
  options: ApproximationOptions = {}
): Polygon {
  return approximatePolygon(zone.compiled, bounds, resolution, options);
}

// ─── Zone Tools ────────────────────────────────────────────────────

/** Names of every zone that claims the point, in list order. */
export function zonesContainingPoint(
  zones: readonly Zone[],
  x: number,
  y: number
): string[] {
  return zones.filter((zone) => zoneContainsPoint(zone, x, y)).map((zone) => zone.name);
}

export const DEFAULT_PROBE_POINTS: readonly Point[] = [
  { x: 0, y: 0 },
  { x: 25, y: 25 },
  { x: -25, y: -25 },
  { x: 50, y: 0 },
  { x: 0, y: 50 },
];

export interface ProbeHit {
  readonly point: Point;
  readonly inside: boolean;
}

export type ProbeResult =
  | { readonly ok: true; readonly hits: readonly ProbeHit[] }
  | { readonly ok: false; readonly reason: string };

/** Quick check of an equation against a handful of points while authoring. */
export function probeZone(
  zone: Zone,
  points: readonly Point[] = DEFAULT_PROBE_POINTS
): ProbeResult {
  if (zone.compiled.kind === "invalid") {
    return { ok: false, reason: zone.compiled.reason };
  }
  return {
    ok: true,
    hits: points.map((point) => ({
      point,
      inside: zoneContainsPoint(zone, point.x, point.y),
    })),
  };
}
