// ─── File Exporter ─────────────────────────────────────────────────
// Writes zones back out as a .zones.json file that importZoneSet reads.

import { writeFile } from "node:fs/promises";
import { safeParseZoneSet, type ZoneSetRecord } from "@field-zones/schema";
import { zoneToRecord, type Zone } from "@field-zones/engine";

import { ZONE_FILE_EXTENSION } from "../import/file-importer";
import { formatZodIssues } from "../import/format-zod-issues";

export type FileExportResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: string };

/**
 * Serializes the zones with two-space indentation. Equations are written
 * exactly as typed, invalid ones included. The document is validated
 * before anything touches the disk.
 */
export async function exportZoneSet(
  filePath: string,
  name: string,
  zones: readonly Zone[]
): Promise<FileExportResult> {
  if (!filePath.endsWith(ZONE_FILE_EXTENSION)) {
    return { ok: false, error: `File must have a ${ZONE_FILE_EXTENSION} extension.` };
  }

  const record: ZoneSetRecord = { name, zones: zones.map(zoneToRecord) };
  const result = safeParseZoneSet(record);
  if (!result.success) {
    return { ok: false, error: formatZodIssues(result.error.issues, record) };
  }

  try {
    await writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, "utf8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Failed to write file: ${message}` };
  }

  return { ok: true };
}
