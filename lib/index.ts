/**
 * Integer arithmetic calculator: tokenizing, parsing, evaluating, and the
 * line-oriented session around them.
 *
 * This module re-exports the public API:
 * - Expression trees, their constructors and pretty-printing
 * - The tokenizer, the recursive-descent parser and the evaluator
 * - The single-line pipeline and its outcome type
 * - Line framing and the read-eval session
 *
 * @example
 * ```ts
 * import { calculate, formatOutcome } from "arith-calc";
 * formatOutcome(calculate("2 + 6 * 6 =")); // "38"
 * ```
 *
 * @module
 */
// Expression tree exports
export {
  add,
  type ArithExpression,
  binOp,
  depth,
  div,
  equivalent,
  mul,
  num,
  type NumberNode,
  type OperatorNode,
  prettyPrint,
  size,
  sub
} from './arith/expression.js';
export { isOperator, Operator } from './arith/operator.js';
export { randExpression, type RandomSource } from './arith/generator.js';

// Tokenizer and parser exports
export { isTokenStream, tokenize, type TokenStream } from './parser/tokenizer.js';
export { TokenizeError } from './parser/tokenizeError.js';
export {
  parseAddition,
  parseArithmetic,
  parseMultiplication,
  parseNumber,
  parseParenthesis
} from './parser/arithmetic.js';
export { ParseError, type ParseErrorReason } from './parser/parseError.js';
export { createParserState, type ParserState } from './parser/parserState.js';

// Evaluator exports
export { evaluate } from './evaluator/evaluator.js';
export { EvalError, type EvalErrorReason } from './evaluator/evalError.js';

// Pipeline exports
export {
  type CalcError,
  calculate,
  type CalcOutcome,
  describeError,
  formatOutcome,
  isCalcError
} from './calculator.js';

// Session exports
export { frameLines, LineFramer } from './io/lineFramer.js';
export {
  FAREWELL,
  GREETING,
  respond,
  runSession,
  type SessionSink,
  type SessionSummary,
  USAGE
} from './io/session.js';

// Configuration exports
export {
  type CalcConfig,
  ConfigError,
  DEFAULT_CONFIG,
  maxLineLength,
  resolveConfig,
  truncateLine
} from './shared/config.js';
export { VERSION } from './shared/version.js';
export { helpText, parseArgs, selectMode } from './cli/args.js';
export { EXIT_INVALID, EXIT_OK, runOneShot } from './cli/oneShot.js';
