// ─── Compiled Equation ─────────────────────────────────────────────
// A zone's equation after compilation: either a valid AST or the
// reason it was rejected. Never a partially built tree.

import {
  evaluate,
  parseEquation,
  type BooleanNode,
} from "../expression/expression-evaluator";

export type CompiledEquation =
  | { readonly kind: "valid"; readonly ast: BooleanNode }
  | { readonly kind: "invalid"; readonly reason: string };

/** Compiles an equation, capturing lex and parse errors as an invalid marker. */
export function compileEquation(equation: string): CompiledEquation {
  const result = parseEquation(equation);
  if (!result.ok) {
    return { kind: "invalid", reason: result.error.message };
  }
  return { kind: "valid", ast: result.ast };
}

/**
 * Membership test. Invalid equations claim no point, and a point where
 * evaluation fails (division by zero) is simply not claimed.
 */
export function containsPoint(compiled: CompiledEquation, x: number, y: number): boolean {
  if (compiled.kind === "invalid") return false;
  const result = evaluate(compiled.ast, x, y);
  return result.ok && result.value;
}
