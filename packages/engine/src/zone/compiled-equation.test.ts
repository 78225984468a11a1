import { describe, it, expect } from "vitest";
import { compileEquation, containsPoint } from "./compiled-equation.js";

describe("compileEquation", () => {
  it("keeps the AST of a valid equation", () => {
    const compiled = compileEquation("x > 0");
    expect(compiled.kind).toBe("valid");
  });

  it("records the reason for a malformed equation", () => {
    expect(compileEquation("x > > 0")).toEqual({
      kind: "invalid",
      reason: "Unexpected token '>' at position 4",
    });
  });

  it("records lexer errors as reasons", () => {
    expect(compileEquation("x = 0")).toEqual({
      kind: "invalid",
      reason: "Unexpected character '=' at position 2. Did you mean '=='?",
    });
  });

  it("rejects arithmetic without a comparison", () => {
    expect(compileEquation("x + y")).toEqual({
      kind: "invalid",
      reason:
        "Equation must contain a comparison (for example 'x > 0'); arithmetic alone has no membership",
    });
  });
});

describe("containsPoint", () => {
  it("claims points inside a diagonal band", () => {
    const compiled = compileEquation("y <= x - 46 && y >= -x + 46");
    expect(containsPoint(compiled, 60, 0)).toBe(true);
    expect(containsPoint(compiled, 46, 0)).toBe(true);
    expect(containsPoint(compiled, 40, 0)).toBe(false);
  });

  it("claims either side of an OR", () => {
    const compiled = compileEquation("x < -40 || x > 40");
    expect(containsPoint(compiled, -50, 0)).toBe(true);
    expect(containsPoint(compiled, 50, 0)).toBe(true);
    expect(containsPoint(compiled, 0, 0)).toBe(false);
  });

  it("claims a mixed '||' and '&&' zone with '&&' grouped first", () => {
    const compiled = compileEquation("x > 50 || x < -50 && y > 0");
    expect(containsPoint(compiled, 60, -10)).toBe(true);
    expect(containsPoint(compiled, -60, -10)).toBe(false);
  });

  it("claims nothing for an invalid equation", () => {
    const compiled = compileEquation("x >");
    expect(containsPoint(compiled, 0, 0)).toBe(false);
    expect(containsPoint(compiled, 100, 100)).toBe(false);
  });

  it("does not claim points where evaluation divides by zero", () => {
    const compiled = compileEquation("x / (y - y) > 0");
    expect(compiled.kind).toBe("valid");
    expect(containsPoint(compiled, 1, 1)).toBe(false);
    expect(containsPoint(compiled, -5, 3)).toBe(false);
  });

  it("lets a short-circuited OR skip a division by zero", () => {
    const compiled = compileEquation("x > 0 || 1 / x > 0");
    expect(containsPoint(compiled, 5, 0)).toBe(true);
    expect(containsPoint(compiled, 0, 0)).toBe(false);
  });
});
