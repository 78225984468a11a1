// ─── @field-zones/engine ───────────────────────────────────────────
// Pure TypeScript zone engine. No framework dependencies, no I/O.
// Equation parsing and evaluation, zone model, coordinate mapping and
// polygon approximation.

export * from "./expression/index";
export * from "./zone/index";
export * from "./geometry/index";
