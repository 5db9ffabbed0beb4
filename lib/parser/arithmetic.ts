/**
 * Arithmetic expression parser.
 *
 * Four mutually recursive sub-parsers, one per precedence level, thread a
 * `ParserState` through and return it alongside the subtree they built.
 *
 * @module
 */
import { type ArithExpression, binOp, num } from '../arith/expression.js';
import {
  isAdditive,
  isMultiplicative,
  type Operator
} from '../arith/operator.js';
import { DIGIT_REGEX, LEFT_PAREN } from './consts.js';
import { parseWithEOF } from './eof.js';
import { ParseError } from './parseError.js';
import { consume, matchRP, type ParserState, peek } from './parserState.js';

type SubParser = (state: ParserState) => [ArithExpression, ParserState];

/**
 * Parses `operand ((op) operand)*`, folding to the left.
 */
function parseLeftAssociative(
  state: ParserState,
  parseOperand: SubParser,
  acceptsOperator: (tok: string | null) => tok is Operator
): [ArithExpression, ParserState] {
  let [expr, current] = parseOperand(state);
  let next = peek(current);

  while (acceptsOperator(next)) {
    const [rgt, afterRgt] = parseOperand(consume(current));
    expr = binOp(next, expr, rgt);
    current = afterRgt;
    next = peek(current);
  }

  return [expr, current];
}

export function parseAddition(
  state: ParserState
): [ArithExpression, ParserState] {
  return parseLeftAssociative(state, parseMultiplication, isAdditive);
}

export function parseMultiplication(
  state: ParserState
): [ArithExpression, ParserState] {
  return parseLeftAssociative(state, parseParenthesis, isMultiplicative);
}

export function parseParenthesis(
  state: ParserState
): [ArithExpression, ParserState] {
  if (peek(state) !== LEFT_PAREN) {
    return parseNumber(state);
  }

  const [inner, afterInner] = parseAddition(consume(state));
  return [inner, matchRP(afterInner)];
}

export function parseNumber(
  state: ParserState
): [ArithExpression, ParserState] {
  let digits = '';
  let current = state;
  let next = peek(current);

  while (next !== null && DIGIT_REGEX.test(next)) {
    digits += next;
    current = consume(current);
    next = peek(current);
  }

  if (digits.length === 0) {
    if (next === null) {
      throw new ParseError(
        'unexpected-end',
        current.idx,
        'expected a number but found EOF'
      );
    }
    throw new ParseError(
      'malformed-number',
      current.idx,
      `expected a number but found '${next}'`
    );
  }

  const value = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(value)) {
    throw new ParseError(
      'malformed-number',
      state.idx,
      `number ${digits} is out of range`
    );
  }

  return [num(value), current];
}

/**
 * Parses a token stream into an expression tree.
 *
 * @param tokens a token stream as produced by `tokenize`
 * @returns the parsed `ArithExpression`
 * @throws ParseError when the stream is empty, a number is missing where one
 *         is required, a parenthesis is left open, or tokens remain after a
 *         complete expression
 */
export function parseArithmetic(tokens: string): ArithExpression {
  const [expr] = parseWithEOF(tokens, parseAddition);
  return expr;
}
