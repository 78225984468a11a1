export {
  tokenize,
  parse,
  parseEquation,
  evaluate,
  ExpressionError,
  LexError,
  ParseError,
  EvalError,
  type Token,
  type TokenKind,
  type ASTNode,
  type ArithmeticNode,
  type BooleanNode,
  type NumberNode,
  type VariableNode,
  type BinaryArithNode,
  type CompareNode,
  type LogicalNode,
  type Variable,
  type ArithmeticOperator,
  type ComparisonOperator,
  type LogicalOperator,
  type EvalErrorCode,
  type EvalResult,
  type ParseResult,
} from "./expression-evaluator";
