// ─── Expression Evaluator ──────────────────────────────────────────
// A safe, sandboxed evaluator for zone equations.
// Equations are strings like "x >= 0 && x <= 50 && y > 20" over the two
// field coordinates. NO eval() or Function(): we tokenize against an
// allow-list and parse a closed grammar into a typed AST.

// ─── AST Node Types ────────────────────────────────────────────────
// Discriminated union on `kind`. Arithmetic and boolean nodes are kept
// apart in the types so an ill-typed tree cannot be built.

export type Variable = "x" | "y";

export type ArithmeticOperator = "+" | "-" | "*" | "/";

export type ComparisonOperator = ">=" | "<=" | ">" | "<" | "==" | "!=";

export type LogicalOperator = "&&" | "||";

export interface NumberNode {
  readonly kind: "Number";
  readonly value: number;
}

export interface VariableNode {
  readonly kind: "Variable";
  readonly name: Variable;
}

export interface BinaryArithNode {
  readonly kind: "BinaryArith";
  readonly operator: ArithmeticOperator;
  readonly left: ArithmeticNode;
  readonly right: ArithmeticNode;
}

export interface CompareNode {
  readonly kind: "Compare";
  readonly operator: ComparisonOperator;
  readonly left: ArithmeticNode;
  readonly right: ArithmeticNode;
}

export interface LogicalNode {
  readonly kind: "Logical";
  readonly operator: LogicalOperator;
  readonly left: BooleanNode;
  readonly right: BooleanNode;
}

export type ArithmeticNode = NumberNode | VariableNode | BinaryArithNode;

export type BooleanNode = CompareNode | LogicalNode;

export type ASTNode = ArithmeticNode | BooleanNode;

// ─── Errors ────────────────────────────────────────────────────────

/** Base class for every error the equation pipeline raises. */
export class ExpressionError extends Error {
  constructor(
    message: string,
    readonly position: number
  ) {
    super(message);
    this.name = "ExpressionError";
  }
}

/** An invalid character, identifier or numeric literal. */
export class LexError extends ExpressionError {
  constructor(message: string, position: number) {
    super(message, position);
    this.name = "LexError";
  }
}

/** A grammar violation: unmatched parens, missing comparison, trailing tokens, empty input. */
export class ParseError extends ExpressionError {
  constructor(message: string, position: number) {
    super(message, position);
    this.name = "ParseError";
  }
}

export type EvalErrorCode = "DivisionByZero";

/** Raised while evaluating a well-formed tree at a specific point. */
export class EvalError extends Error {
  constructor(
    readonly code: EvalErrorCode,
    message: string
  ) {
    super(message);
    this.name = "EvalError";
  }
}

// ─── Tokens ────────────────────────────────────────────────────────

export type TokenKind =
  | "Number"
  | "Identifier"
  | "Arithmetic"
  | "Comparison"
  | "Logical"
  | "LParen"
  | "RParen"
  | "EOF";

export interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly position: number;
}

// ─── Tokenizer ─────────────────────────────────────────────────────

const ARITHMETIC_CHARS = new Set(["+", "-", "*", "/"]);

// Two-character operators that must be matched before single-char ones
const TWO_CHAR_COMPARISONS = new Set([">=", "<=", "==", "!="]);
const TWO_CHAR_LOGICALS = new Set(["&&", "||"]);

/**
 * Converts an equation string into an array of tokens, ending with EOF.
 * Pure function, no side effects.
 *
 * @throws {LexError} at the first character or identifier outside the allow-list.
 */
export function tokenize(equation: string): readonly Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < equation.length) {
    const ch = equation.charAt(pos);

    // Skip whitespace
    if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
      pos++;
      continue;
    }

    // Numbers, with a leading '-' folded in where no operand precedes it
    const negative =
      ch === "-" &&
      isDigit(equation.charAt(pos + 1)) &&
      !endsOperand(tokens[tokens.length - 1]);
    if (isDigit(ch) || negative) {
      const start = pos;
      pos = readNumber(equation, negative ? pos + 1 : pos);
      tokens.push({
        kind: "Number",
        value: equation.slice(start, pos),
        position: start,
      });
      continue;
    }

    // Identifiers: only the two field coordinates are allowed
    if (isIdentStart(ch)) {
      const start = pos;
      while (pos < equation.length && isIdentContinue(equation.charAt(pos))) {
        pos++;
      }
      const word = equation.slice(start, pos);
      if (word !== "x" && word !== "y") {
        throw new LexError(
          `Unknown identifier '${word}' at position ${start}; only 'x' and 'y' are allowed`,
          start
        );
      }
      tokens.push({ kind: "Identifier", value: word, position: start });
      continue;
    }

    const twoChar = equation.slice(pos, pos + 2);
    if (TWO_CHAR_COMPARISONS.has(twoChar)) {
      tokens.push({ kind: "Comparison", value: twoChar, position: pos });
      pos += 2;
      continue;
    }
    if (TWO_CHAR_LOGICALS.has(twoChar)) {
      tokens.push({ kind: "Logical", value: twoChar, position: pos });
      pos += 2;
      continue;
    }

    if (ch === ">" || ch === "<") {
      tokens.push({ kind: "Comparison", value: ch, position: pos });
      pos++;
      continue;
    }

    if (ARITHMETIC_CHARS.has(ch)) {
      tokens.push({ kind: "Arithmetic", value: ch, position: pos });
      pos++;
      continue;
    }

    if (ch === "(") {
      tokens.push({ kind: "LParen", value: "(", position: pos });
      pos++;
      continue;
    }
    if (ch === ")") {
      tokens.push({ kind: "RParen", value: ")", position: pos });
      pos++;
      continue;
    }

    // Lone halves of two-char operators get a hint
    if (ch === "=" || ch === "&" || ch === "|") {
      throw new LexError(
        `Unexpected character '${ch}' at position ${pos}. Did you mean '${ch}${ch}'?`,
        pos
      );
    }

    throw new LexError(`Unexpected character '${ch}' at position ${pos}`, pos);
  }

  tokens.push({ kind: "EOF", value: "", position: pos });
  return tokens;
}

/** Reads digits with an optional fractional part starting at `pos`; returns the end index. */
function readNumber(equation: string, pos: number): number {
  const start = pos;
  while (pos < equation.length && isDigit(equation.charAt(pos))) {
    pos++;
  }
  if (equation.charAt(pos) === ".") {
    pos++;
    if (!isDigit(equation.charAt(pos))) {
      throw new LexError(
        `Invalid number at position ${start}: trailing decimal point`,
        start
      );
    }
    while (pos < equation.length && isDigit(equation.charAt(pos))) {
      pos++;
    }
  }
  return pos;
}

function endsOperand(token: Token | undefined): boolean {
  return (
    token !== undefined &&
    (token.kind === "Number" ||
      token.kind === "Identifier" ||
      token.kind === "RParen")
  );
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isIdentStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isIdentContinue(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

// ─── Parser ────────────────────────────────────────────────────────
// Recursive descent parser. Precedence (low → high):
//   ||  →  &&  (both left-assoc)  →  one comparison  →  +, -  →  *, /  →  unary -  →  primary

const MAX_AST_NODES = 1000;
const MAX_NESTING_DEPTH = 64;

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set<ComparisonOperator>([
  ">=",
  "<=",
  ">",
  "<",
  "==",
  "!=",
]);

function isBooleanNode(node: ASTNode): node is BooleanNode {
  return node.kind === "Compare" || node.kind === "Logical";
}

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.has(value);
}

function describeToken(tok: Token): string {
  return tok.kind === "EOF" ? "end of equation" : `'${tok.value}'`;
}

/**
 * Parses a token stream into a boolean AST.
 * Pure function, no side effects.
 *
 * @throws {ParseError} on grammar violations, or if the tree exceeds 1000
 *   nodes or 64 levels of parentheses.
 */
export function parse(tokens: readonly Token[]): BooleanNode {
  let pos = 0;
  let nodeCount = 0;
  let nesting = 0;

  const endPosition = tokens[tokens.length - 1]?.position ?? 0;

  function countNode(): void {
    nodeCount++;
    if (nodeCount > MAX_AST_NODES) {
      throw new ParseError(
        `Equation too complex: AST exceeds ${MAX_AST_NODES} nodes`,
        current().position
      );
    }
  }

  function current(): Token {
    return tokens[pos] ?? { kind: "EOF", value: "", position: endPosition };
  }

  function advance(): Token {
    const tok = current();
    pos++;
    return tok;
  }

  function expectArithmetic(node: ASTNode, tok: Token, role: string): ArithmeticNode {
    if (isBooleanNode(node)) {
      throw new ParseError(
        `${role} at position ${tok.position} must be arithmetic, not a comparison`,
        tok.position
      );
    }
    return node;
  }

  function expectBoolean(node: ASTNode, tok: Token, role: string): BooleanNode {
    if (!isBooleanNode(node)) {
      throw new ParseError(
        `${role} at position ${tok.position} must be a comparison`,
        tok.position
      );
    }
    return node;
  }

  // ── Precedence levels ──

  function parseOr(): ASTNode {
    const leftTok = current();
    let left = parseAnd();
    while (current().kind === "Logical" && current().value === "||") {
      advance();
      const rightTok = current();
      const right = parseAnd();
      countNode();
      left = {
        kind: "Logical",
        operator: "||",
        left: expectBoolean(left, leftTok, "Left side of '||'"),
        right: expectBoolean(right, rightTok, "Right side of '||'"),
      };
    }
    return left;
  }

  function parseAnd(): ASTNode {
    const leftTok = current();
    let left = parseComparison();
    while (current().kind === "Logical" && current().value === "&&") {
      advance();
      const rightTok = current();
      const right = parseComparison();
      countNode();
      left = {
        kind: "Logical",
        operator: "&&",
        left: expectBoolean(left, leftTok, "Left side of '&&'"),
        right: expectBoolean(right, rightTok, "Right side of '&&'"),
      };
    }
    return left;
  }

  function parseComparison(): ASTNode {
    const leftTok = current();
    const left = parseArithmetic();
    const opTok = current();
    if (opTok.kind !== "Comparison" || !isComparisonOperator(opTok.value)) {
      return left;
    }
    advance();
    const rightTok = current();
    const right = parseArithmetic();
    countNode();
    const node: CompareNode = {
      kind: "Compare",
      operator: opTok.value,
      left: expectArithmetic(left, leftTok, `Left operand of '${opTok.value}'`),
      right: expectArithmetic(right, rightTok, `Right operand of '${opTok.value}'`),
    };
    if (current().kind === "Comparison") {
      const tok = current();
      throw new ParseError(
        `Chained comparison '${tok.value}' at position ${tok.position}; combine comparisons with '&&' or '||'`,
        tok.position
      );
    }
    return node;
  }

  function parseArithmetic(): ASTNode {
    const leftTok = current();
    let left = parseTerm();
    while (
      current().kind === "Arithmetic" &&
      (current().value === "+" || current().value === "-")
    ) {
      const opTok = advance();
      const rightTok = current();
      const right = parseTerm();
      countNode();
      left = {
        kind: "BinaryArith",
        operator: opTok.value === "+" ? "+" : "-",
        left: expectArithmetic(left, leftTok, `Left operand of '${opTok.value}'`),
        right: expectArithmetic(right, rightTok, `Right operand of '${opTok.value}'`),
      };
    }
    return left;
  }

  function parseTerm(): ASTNode {
    const leftTok = current();
    let left = parseUnary();
    while (
      current().kind === "Arithmetic" &&
      (current().value === "*" || current().value === "/")
    ) {
      const opTok = advance();
      const rightTok = current();
      const right = parseUnary();
      countNode();
      left = {
        kind: "BinaryArith",
        operator: opTok.value === "*" ? "*" : "/",
        left: expectArithmetic(left, leftTok, `Left operand of '${opTok.value}'`),
        right: expectArithmetic(right, rightTok, `Right operand of '${opTok.value}'`),
      };
    }
    return left;
  }

  function parseUnary(): ASTNode {
    if (current().kind === "Arithmetic" && current().value === "-") {
      advance();
      const operandTok = current();
      const operand = expectArithmetic(parsePrimary(), operandTok, "Operand of unary '-'");
      if (operand.kind === "Number") {
        return { kind: "Number", value: -operand.value };
      }
      countNode();
      countNode();
      return {
        kind: "BinaryArith",
        operator: "-",
        left: { kind: "Number", value: 0 },
        right: operand,
      };
    }
    return parsePrimary();
  }

  function parsePrimary(): ASTNode {
    const tok = current();

    if (tok.kind === "Number") {
      advance();
      countNode();
      return { kind: "Number", value: Number(tok.value) };
    }

    if (tok.kind === "Identifier") {
      advance();
      countNode();
      return { kind: "Variable", name: tok.value === "x" ? "x" : "y" };
    }

    if (tok.kind === "LParen") {
      advance();
      nesting++;
      if (nesting > MAX_NESTING_DEPTH) {
        throw new ParseError(
          `Equation too complex: parentheses nested deeper than ${MAX_NESTING_DEPTH}`,
          tok.position
        );
      }
      const inner = parseOr();
      if (current().kind !== "RParen") {
        throw new ParseError(
          `Unmatched '(' at position ${tok.position}: expected ')' but found ${describeToken(current())}`,
          current().position
        );
      }
      advance();
      nesting--;
      return inner;
    }

    if (tok.kind === "EOF") {
      throw new ParseError(
        `Unexpected end of equation at position ${tok.position}`,
        tok.position
      );
    }

    throw new ParseError(
      `Unexpected token '${tok.value}' at position ${tok.position}`,
      tok.position
    );
  }

  if (current().kind === "EOF") {
    throw new ParseError("Empty equation", current().position);
  }

  const startTok = current();
  const ast = parseOr();

  // Ensure we consumed all tokens
  if (current().kind !== "EOF") {
    const tok = current();
    const reason =
      tok.kind === "RParen"
        ? `Unmatched ')' at position ${tok.position}`
        : `Unexpected token '${tok.value}' at position ${tok.position} (expected end of equation)`;
    throw new ParseError(reason, tok.position);
  }

  if (!isBooleanNode(ast)) {
    throw new ParseError(
      "Equation must contain a comparison (for example 'x > 0'); arithmetic alone has no membership",
      startTok.position
    );
  }

  return ast;
}

// ─── Evaluator ─────────────────────────────────────────────────────

/** Outcome of evaluating a boolean tree at one point. */
export type EvalResult =
  | { readonly ok: true; readonly value: boolean }
  | { readonly ok: false; readonly error: EvalError };

function evaluateArithmetic(node: ArithmeticNode, x: number, y: number): number {
  switch (node.kind) {
    case "Number":
      return node.value;
    case "Variable":
      return node.name === "x" ? x : y;
    case "BinaryArith": {
      const left = evaluateArithmetic(node.left, x, y);
      const right = evaluateArithmetic(node.right, x, y);
      switch (node.operator) {
        case "+":
          return left + right;
        case "-":
          return left - right;
        case "*":
          return left * right;
        case "/":
          if (right === 0) {
            throw new EvalError("DivisionByZero", "Division by zero");
          }
          return left / right;
      }
    }
  }
}

function compare(operator: ComparisonOperator, left: number, right: number): boolean {
  // Every comparison with NaN is false, `!=` included
  if (Number.isNaN(left) || Number.isNaN(right)) {
    return false;
  }
  switch (operator) {
    case ">=":
      return left >= right;
    case "<=":
      return left <= right;
    case ">":
      return left > right;
    case "<":
      return left < right;
    case "==":
      return left === right;
    case "!=":
      return left !== right;
  }
}

function evaluateBoolean(node: BooleanNode, x: number, y: number): boolean {
  switch (node.kind) {
    case "Compare":
      return compare(
        node.operator,
        evaluateArithmetic(node.left, x, y),
        evaluateArithmetic(node.right, x, y)
      );
    case "Logical":
      if (node.operator === "&&") {
        return evaluateBoolean(node.left, x, y) && evaluateBoolean(node.right, x, y);
      }
      return evaluateBoolean(node.left, x, y) || evaluateBoolean(node.right, x, y);
  }
}

/**
 * Evaluates a parsed equation at `(x, y)`.
 * Only division by zero can fail; it comes back as an error result.
 */
export function evaluate(ast: BooleanNode, x: number, y: number): EvalResult {
  try {
    return { ok: true, value: evaluateBoolean(ast, x, y) };
  } catch (err) {
    if (err instanceof EvalError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

// ─── Public API ────────────────────────────────────────────────────

export type ParseResult =
  | { readonly ok: true; readonly ast: BooleanNode }
  | { readonly ok: false; readonly error: LexError | ParseError };

/**
 * Tokenizes and parses an equation. Malformed input comes back as an
 * error result; nothing is thrown for bad user text.
 */
export function parseEquation(equation: string): ParseResult {
  try {
    return { ok: true, ast: parse(tokenize(equation)) };
  } catch (err) {
    if (err instanceof LexError || err instanceof ParseError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
