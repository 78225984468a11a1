// ─── File Importer ─────────────────────────────────────────────────
// Loads a .zones.json zone set from a local file.

import { readFile } from "node:fs/promises";
import { safeParseZoneSet } from "@field-zones/schema";
import { createZone, type Zone } from "@field-zones/engine";

import { formatZodIssues } from "./format-zod-issues";

export const ZONE_FILE_EXTENSION = ".zones.json";

/** A named list of compiled zones, in file order. */
export interface ZoneSet {
  readonly name: string;
  readonly zones: readonly Zone[];
}

/**
 * Result of a file import attempt. Discriminated union.
 * Zones whose equation does not compile still load; each one adds a
 * `"<zone name>: <reason>"` warning.
 */
export type FileImportResult =
  | { readonly ok: true; readonly zoneSet: ZoneSet; readonly warnings: readonly string[] }
  | { readonly ok: false; readonly error: string };

/**
 * Reads a .zones.json file, validates it with the Zod schema and
 * compiles every zone.
 *
 * @param filePath - Path to the .zones.json file.
 */
export async function importZoneSet(filePath: string): Promise<FileImportResult> {
  if (!filePath.endsWith(ZONE_FILE_EXTENSION)) {
    return { ok: false, error: `File must have a ${ZONE_FILE_EXTENSION} extension.` };
  }

  // ── Read file contents ───────────────────────────────────────────
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Failed to read file: ${message}` };
  }

  // ── Parse JSON ───────────────────────────────────────────────────
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: "File is not valid JSON." };
  }

  // ── Validate against schema ──────────────────────────────────────
  const result = safeParseZoneSet(json);
  if (!result.success) {
    return { ok: false, error: formatZodIssues(result.error.issues, json) };
  }

  // ── Compile ──────────────────────────────────────────────────────
  const zones = result.data.zones.map(createZone);
  const warnings: string[] = [];
  for (const zone of zones) {
    if (zone.compiled.kind === "invalid") {
      warnings.push(`${zone.name}: ${zone.compiled.reason}`);
    }
  }

  return { ok: true, zoneSet: { name: result.data.name, zones }, warnings };
}
