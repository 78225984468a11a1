// ─── Zone Record ───────────────────────────────────────────────────
// The persisted shape of a field zone, as read from and written to
// .zones.json files. Keys use the on-disk snake_case names.

// ─── Zone Types ────────────────────────────────────────────────────

/** Closed set of zone categories. Each one carries a default color. */
export const ZONE_TYPES = [
  "custom",
  "red_alliance",
  "blue_alliance",
  "neutral",
  "launch",
  "parking",
  "loading",
  "risky",
] as const;

export type ZoneType = (typeof ZONE_TYPES)[number];

/** Display color used when a zone record has no explicit color. */
export const ZONE_TYPE_COLORS: Readonly<Record<ZoneType, string>> = {
  custom: "#ff6b6b",
  red_alliance: "#ff4d4d",
  blue_alliance: "#4da6ff",
  neutral: "#ffaa00",
  launch: "#ff8800",
  parking: "#cc6600",
  loading: "#990033",
  risky: "#ffff00",
};

export const DEFAULT_ZONE_TYPE: ZoneType = "custom";

export const DEFAULT_ZONE_OPACITY = 0.3;

// ─── Records ───────────────────────────────────────────────────────

export interface ZoneRecord {
  readonly name: string;
  /** Equation source over `x` and `y`, kept verbatim. */
  readonly equation: string;
  /** Absent or null means "use the zone type's color". */
  readonly color?: string | null;
  readonly opacity?: number;
  readonly zone_type?: ZoneType;
}

/** Contents of a .zones.json file. */
export interface ZoneSetRecord {
  readonly name: string;
  readonly zones: readonly ZoneRecord[];
}
