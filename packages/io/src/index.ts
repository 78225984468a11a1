// ─── @field-zones/io ───────────────────────────────────────────────
// Zone sets on disk: .zones.json import and export.

export * from "./import/index";
export * from "./export/index";
