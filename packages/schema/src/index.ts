// ─── @field-zones/schema ───────────────────────────────────────────
// Canonical zone record types and Zod validation for .zones.json files.
// All types and schemas are re-exported from this single entry point.

export * from "./types/index";
export * from "./schema/index";
