/**
 * The tokenize → parse → evaluate pipeline for a single line.
 *
 * @module
 */
import type { ArithExpression } from './arith/expression.js';
import { EvalError } from './evaluator/evalError.js';
import { evaluate } from './evaluator/evaluator.js';
import { parseArithmetic } from './parser/arithmetic.js';
import { ParseError } from './parser/parseError.js';
import { TokenizeError } from './parser/tokenizeError.js';
import { tokenize } from './parser/tokenizer.js';
import { type CalcConfig, DEFAULT_CONFIG } from './shared/config.js';

export type CalcError = TokenizeError | ParseError | EvalError;

export type CalcOutcome =
  | { kind: 'value'; value: number; expr: ArithExpression }
  | { kind: 'invalid'; error: CalcError };

export function isCalcError(e: unknown): e is CalcError {
  return e instanceof TokenizeError || e instanceof ParseError ||
    e instanceof EvalError;
}

/**
 * Evaluates one line of input. Stage failures come back as an `invalid`
 * outcome; anything else is rethrown.
 */
export function calculate(line: string): CalcOutcome {
  try {
    const expr = parseArithmetic(tokenize(line));
    return { kind: 'value', value: evaluate(expr), expr };
  } catch (e) {
    if (isCalcError(e)) {
      return { kind: 'invalid', error: e };
    }
    throw e;
  }
}

export function formatOutcome(
  outcome: CalcOutcome,
  config: Pick<CalcConfig, 'invalidMessage'> = DEFAULT_CONFIG
): string {
  return outcome.kind === 'value'
    ? outcome.value.toString()
    : config.invalidMessage;
}

export function describeError(error: CalcError): string {
  return `${error.stage}/${error.reason}: ${error.message}`;
}
