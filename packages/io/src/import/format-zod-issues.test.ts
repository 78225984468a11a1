import { describe, it, expect } from "vitest";
import { ZoneSetSchema } from "@field-zones/schema";
import { formatZodIssues } from "./format-zod-issues.js";

// ══════════════════════════════════════════════════════════════════════
// Factories
// ══════════════════════════════════════════════════════════════════════

function makeIssue(
  path: readonly (string | number)[],
  message: string,
): { readonly path: readonly (string | number)[]; readonly message: string } {
  return { path, message };
}

// ══════════════════════════════════════════════════════════════════════
// Tests
// ══════════════════════════════════════════════════════════════════════

describe("formatZodIssues", () => {
  it("formats a single issue as 'path: message'", () => {
    const result = formatZodIssues([makeIssue(["name"], "Required")]);

    expect(result).toBe("Invalid zone file: name: Required");
  });

  it("joins numeric path segments with dots", () => {
    const result = formatZodIssues([makeIssue(["zones", 2, "opacity"], "Too big")]);

    expect(result).toBe("Invalid zone file: zones.2.opacity: Too big");
  });

  it("joins issues with '; '", () => {
    const result = formatZodIssues([
      makeIssue(["name"], "Required"),
      makeIssue(["zones"], "Required"),
    ]);

    expect(result).toBe("Invalid zone file: name: Required; zones: Required");
  });

  it("uses '(root)' for an empty path", () => {
    const result = formatZodIssues([makeIssue([], "Expected object, received array")]);

    expect(result).toBe("Invalid zone file: (root): Expected object, received array");
  });

  it("names the zone an issue points into", () => {
    const document = { name: "Field", zones: [{ name: "Launch" }, { name: "Park" }] };

    const result = formatZodIssues([makeIssue(["zones", 1, "opacity"], "Too big")], document);

    expect(result).toBe('Invalid zone file: zones.1.opacity (zone "Park"): Too big');
  });

  it("falls back to the bare path when the zone has no usable name", () => {
    const document = { name: "Field", zones: [{ name: "" }, { equation: "x > 0" }, "junk"] };

    const result = formatZodIssues(
      [
        makeIssue(["zones", 0, "name"], "Too short"),
        makeIssue(["zones", 1, "name"], "Required"),
        makeIssue(["zones", 2], "Expected object, received string"),
        makeIssue(["zones", 7, "color"], "Invalid"),
      ],
      document,
    );

    expect(result).toBe(
      "Invalid zone file: zones.0.name: Too short; zones.1.name: Required; " +
        "zones.2: Expected object, received string; zones.7.color: Invalid",
    );
  });

  it("does not name zones for paths outside the zone list", () => {
    const document = { name: 5, zones: [{ name: "Launch" }] };

    const result = formatZodIssues([makeIssue(["name"], "Expected string")], document);

    expect(result).toBe("Invalid zone file: name: Expected string");
  });

  it("formats issues produced by the zone set schema", () => {
    const document = {
      name: "Field",
      zones: [{ name: "Tinted", equation: "x > 0", color: "orange" }],
    };
    const parsed = ZoneSetSchema.safeParse(document);
    if (parsed.success) throw new Error("expected validation to fail");

    expect(formatZodIssues(parsed.error.issues, document)).toBe(
      'Invalid zone file: zones.0.color (zone "Tinted"): color must be a hex color such as #ff8800',
    );
  });
});
