// ─── Zone File Issues ──────────────────────────────────────────────
// Turns Zod validation issues for a .zones.json document into one
// readable line. Issues inside a zone are labelled with that zone's name
// when the document carries one, so authors can find the entry without
// counting array indices.

/** Minimal shape of a Zod issue (path + message). */
export interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/** Name of the zone an issue path points into, if the document has a usable one. */
function zoneNameAt(document: unknown, path: readonly (string | number)[]): string | undefined {
  const [root, index] = path;
  if (root !== "zones" || typeof index !== "number") return undefined;
  if (typeof document !== "object" || document === null || !("zones" in document)) {
    return undefined;
  }
  const { zones } = document;
  if (!Array.isArray(zones)) return undefined;

  const zone: unknown = zones[index];
  if (typeof zone !== "object" || zone === null || !("name" in zone)) return undefined;
  return typeof zone.name === "string" && zone.name.length > 0 ? zone.name : undefined;
}

function issueLabel(issue: ZodIssueLike, document: unknown): string {
  if (issue.path.length === 0) return "(root)";
  const path = issue.path.join(".");
  const zoneName = zoneNameAt(document, issue.path);
  return zoneName === undefined ? path : `${path} (zone "${zoneName}")`;
}

/**
 * Renders each issue as `path: message`, joined by "; ".
 * Pass the validated document to have zone entries named.
 *
 * @example
 * formatZodIssues(
 *   [{ path: ["zones", 0, "color"], message: "Invalid" }],
 *   { name: "Field", zones: [{ name: "Launch" }] },
 * )
 * // => 'Invalid zone file: zones.0.color (zone "Launch"): Invalid'
 */
export function formatZodIssues(
  issues: readonly ZodIssueLike[],
  document?: unknown,
): string {
  const details = issues.map((issue) => `${issueLabel(issue, document)}: ${issue.message}`);
  return `Invalid zone file: ${details.join("; ")}`;
}
