// ─── Schema Validation ─────────────────────────────────────────────
// Zod schemas for runtime validation of zone records and .zones.json
// files. This is the "parse boundary": raw JSON enters, typed data exits.
// Equations are only checked for being strings here; whether they
// compile is the engine's concern, and a bad equation still loads.

import { z } from "zod";
import { ZONE_TYPES } from "../types/zone";

// ─── Primitives ────────────────────────────────────────────────────

const MAX_EQUATION_LENGTH = 2000;

const HexColorSchema = z
  .string()
  .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, {
    message: "color must be a hex color such as #ff8800",
  });

const ZoneTypeSchema = z.enum(ZONE_TYPES);

// ─── Records ───────────────────────────────────────────────────────

export const ZoneRecordSchema = z.object({
  name: z.string().min(1),
  equation: z.string().max(MAX_EQUATION_LENGTH),
  color: HexColorSchema.nullable().optional(),
  opacity: z.number().min(0).max(1).optional(),
  zone_type: ZoneTypeSchema.optional(),
});

export const ZoneSetSchema = z.object({
  name: z.string().min(1),
  zones: z.array(ZoneRecordSchema),
});

/** Inferred types from the Zod schemas. These should match ZoneRecord and ZoneSetRecord. */
export type ParsedZoneRecord = z.infer<typeof ZoneRecordSchema>;
export type ParsedZoneSet = z.infer<typeof ZoneSetSchema>;

/**
 * Parses raw JSON into a validated zone record.
 * Returns the parsed data or throws a ZodError with detailed issues.
 */
export function parseZoneRecord(raw: unknown): ParsedZoneRecord {
  return ZoneRecordSchema.parse(raw);
}

export function safeParseZoneRecord(
  raw: unknown
): z.SafeParseReturnType<unknown, ParsedZoneRecord> {
  return ZoneRecordSchema.safeParse(raw);
}

/**
 * Parses the contents of a .zones.json file.
 * Throws a ZodError on malformed input.
 */
export function parseZoneSet(raw: unknown): ParsedZoneSet {
  return ZoneSetSchema.parse(raw);
}

/**
 * Safe parse variant, returns a discriminated result instead of throwing.
 */
export function safeParseZoneSet(
  raw: unknown
): z.SafeParseReturnType<unknown, ParsedZoneSet> {
  return ZoneSetSchema.safeParse(raw);
}
