#!/usr/bin/env tsx
// ─── Validate Zones ────────────────────────────────────────────────
// CLI script that validates all .zones.json files: schema, then every
// equation. Prints each zone's approximate area on the field.
// Exits 0 if all pass, 1 if any fail.

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { approximateZonePolygon, polygonArea } from "../packages/engine/src/index";
import { importZoneSet, ZONE_FILE_EXTENSION } from "../packages/io/src/index";

const ZONES_DIR = fileURLToPath(new URL("../zones", import.meta.url));

async function main(): Promise<void> {
  const entries = await readdir(ZONES_DIR);
  const files = entries.filter((f) => f.endsWith(ZONE_FILE_EXTENSION)).sort();

  if (files.length === 0) {
    console.error(`No ${ZONE_FILE_EXTENSION} files found in zones/`);
    process.exit(1);
  }

  console.log(`\nValidating ${files.length} zone set(s)...\n`);

  let failed = 0;

  for (const file of files) {
    const result = await importZoneSet(join(ZONES_DIR, file));

    if (!result.ok) {
      console.error(`  ❌ ${file}`);
      console.error(`     ${result.error}`);
      failed++;
      continue;
    }

    if (result.warnings.length > 0) {
      console.error(`  ❌ ${file}`);
      for (const warning of result.warnings) {
        console.error(`     ${warning}`);
      }
      failed++;
      continue;
    }

    console.log(`  ✅ ${file} (${result.zoneSet.zones.length} zones)`);
    for (const zone of result.zoneSet.zones) {
      const polygon = approximateZonePolygon(zone);
      const area = polygonArea(polygon).toFixed(1);
      console.log(`     ${zone.name}: ${polygon.length} vertices, ~${area} sq in`);
    }
  }

  console.log();

  if (failed > 0) {
    console.error(`${failed} of ${files.length} zone set(s) failed validation.`);
    process.exit(1);
  }

  console.log(`All ${files.length} zone set(s) passed validation.`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
