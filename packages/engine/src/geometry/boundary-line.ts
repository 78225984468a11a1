// ─── Boundary Lines ────────────────────────────────────────────────
// A line drawn between two field points, in standard form
// a·x + b·y + c = 0, and the zone equation for either side of it.

import type { Point } from "./types";

export interface LineCoefficients {
  readonly a: number;
  readonly b: number;
  readonly c: number;
}

export type LineSide = "on" | "positive" | "negative";

const DEGENERATE_EPSILON = 1e-10;
const ON_LINE_EPSILON = 1e-6;

/**
 * Standard-form coefficients of the line through two points.
 * Vertical lines come out as (1, 0, -x1) and horizontal ones as (0, 1, -y1).
 *
 * @throws {RangeError} if the points coincide.
 */
export function lineThroughPoints(p1: Point, p2: Point): LineCoefficients {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  if (Math.abs(dx) < DEGENERATE_EPSILON && Math.abs(dy) < DEGENERATE_EPSILON) {
    throw new RangeError("A line needs two distinct points");
  }
  if (Math.abs(dx) < DEGENERATE_EPSILON) {
    return { a: 1, b: 0, c: -p1.x };
  }
  if (Math.abs(dy) < DEGENERATE_EPSILON) {
    return { a: 0, b: 1, c: -p1.y };
  }
  return {
    a: p1.y - p2.y,
    b: p2.x - p1.x,
    c: p1.x * (p2.y - p1.y) - p1.y * (p2.x - p1.x),
  };
}

/** a·x + b·y + c. Zero on the line; the sign tells the side. */
export function evaluateLine(line: LineCoefficients, x: number, y: number): number {
  return line.a * x + line.b * y + line.c;
}

export function classifyPoint(line: LineCoefficients, x: number, y: number): LineSide {
  const value = evaluateLine(line, x, y);
  if (Math.abs(value) < ON_LINE_EPSILON) return "on";
  return value > 0 ? "positive" : "negative";
}

function formatCoefficient(value: number): string {
  // Six decimals, trailing zeros dropped, and never "-0"
  const rounded = Number(value.toFixed(6));
  return String(rounded === 0 ? 0 : rounded);
}

/**
 * Zone equation for one side of the line, boundary included, e.g.
 * `"1 * x + 0 * y + -3 >= 0"`.
 */
export function halfPlaneEquation(
  line: LineCoefficients,
  side: Exclude<LineSide, "on">
): string {
  const op = side === "positive" ? ">=" : "<=";
  return `${formatCoefficient(line.a)} * x + ${formatCoefficient(line.b)} * y + ${formatCoefficient(line.c)} ${op} 0`;
}
