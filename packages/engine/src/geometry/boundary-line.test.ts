import { describe, it, expect } from "vitest";
import {
  lineThroughPoints,
  evaluateLine,
  classifyPoint,
  halfPlaneEquation,
} from "./boundary-line.js";
import { compileEquation, containsPoint } from "../zone/compiled-equation.js";

describe("lineThroughPoints", () => {
  it("computes standard-form coefficients", () => {
    expect(lineThroughPoints({ x: 0, y: 1 }, { x: 2, y: 5 })).toEqual({ a: -4, b: 2, c: -2 });
  });

  it("passes through both points", () => {
    const p1 = { x: -12.5, y: 30 };
    const p2 = { x: 40, y: -7.25 };
    const line = lineThroughPoints(p1, p2);
    expect(evaluateLine(line, p1.x, p1.y)).toBeCloseTo(0, 9);
    expect(evaluateLine(line, p2.x, p2.y)).toBeCloseTo(0, 9);
  });

  it("normalizes vertical lines", () => {
    expect(lineThroughPoints({ x: 3, y: 0 }, { x: 3, y: 10 })).toEqual({ a: 1, b: 0, c: -3 });
  });

  it("normalizes horizontal lines", () => {
    expect(lineThroughPoints({ x: 0, y: 2 }, { x: 5, y: 2 })).toEqual({ a: 0, b: 1, c: -2 });
  });

  it("rejects coincident points", () => {
    expect(() => lineThroughPoints({ x: 1, y: 1 }, { x: 1, y: 1 })).toThrow(
      "A line needs two distinct points"
    );
  });
});

describe("classifyPoint", () => {
  const diagonal = lineThroughPoints({ x: 0, y: 0 }, { x: 10, y: 10 });

  it("puts points above y = x on the positive side", () => {
    expect(classifyPoint(diagonal, 0, 5)).toBe("positive");
  });

  it("puts points below y = x on the negative side", () => {
    expect(classifyPoint(diagonal, 5, 0)).toBe("negative");
  });

  it("reports points on the line", () => {
    expect(classifyPoint(diagonal, 3, 3)).toBe("on");
    expect(classifyPoint(diagonal, -40, -40)).toBe("on");
  });
});

describe("halfPlaneEquation", () => {
  it("writes the positive side with >=", () => {
    const line = lineThroughPoints({ x: 0, y: 0 }, { x: 10, y: 10 });
    expect(halfPlaneEquation(line, "positive")).toBe("-10 * x + 10 * y + 0 >= 0");
  });

  it("writes the negative side with <=", () => {
    const line = lineThroughPoints({ x: 3, y: 0 }, { x: 3, y: 10 });
    expect(halfPlaneEquation(line, "negative")).toBe("1 * x + 0 * y + -3 <= 0");
  });

  it("rounds coefficients to six decimals", () => {
    const line = lineThroughPoints({ x: 0, y: 0 }, { x: 1 / 3, y: 1 });
    expect(halfPlaneEquation(line, "positive")).toBe("-1 * x + 0.333333 * y + 0 >= 0");
  });

  it("never writes negative zero", () => {
    const line = lineThroughPoints({ x: 0, y: 0 }, { x: 10, y: -10 });
    expect(Object.is(line.c, -0)).toBe(true);
    expect(halfPlaneEquation(line, "negative")).toBe("10 * x + 10 * y + 0 <= 0");
  });

  it("produces an equation that claims the chosen side and the line", () => {
    const line = lineThroughPoints({ x: 0, y: 0 }, { x: 10, y: 10 });
    const compiled = compileEquation(halfPlaneEquation(line, "positive"));

    expect(compiled.kind).toBe("valid");
    expect(containsPoint(compiled, 0, 5)).toBe(true);
    expect(containsPoint(compiled, 3, 3)).toBe(true);
    expect(containsPoint(compiled, 5, 0)).toBe(false);
  });

  it("compiles with negative constants", () => {
    const line = lineThroughPoints({ x: 3, y: 0 }, { x: 3, y: 10 });
    const compiled = compileEquation(halfPlaneEquation(line, "positive"));

    expect(containsPoint(compiled, 4, 0)).toBe(true);
    expect(containsPoint(compiled, 2, 0)).toBe(false);
  });
});
