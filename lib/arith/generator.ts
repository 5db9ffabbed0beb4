/**
 * Random arithmetic expression generation.
 *
 * Builds trees of a given number of literals from a seeded random source, so
 * that property tests are reproducible.
 *
 * @module
 */
import { type ArithExpression, binOp, num } from './expression.js';
import { Operator } from './operator.js';

/**
 * Minimal interface over a random number generator, satisfied by
 * `random-seed` instances.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

const OPERATOR_DIE: readonly Operator[] = [
  Operator.Add,
  Operator.Sub,
  Operator.Mul,
  Operator.Div
];

export const MAX_GENERATED_LITERAL = 99;

export const randExpression = (
  rs: RandomSource,
  n: number
): ArithExpression => {
  if (n <= 0) {
    throw new Error('A valid expression must contain at least one literal.');
  }

  let result: ArithExpression = randLiteral(rs);

  for (let i = 0; i < n - 1; i++) {
    result = randomInsert(rs, result, randLiteral(rs));
  }

  return result;
};

const randomInsert = (
  rs: RandomSource,
  expr: ArithExpression,
  leaf: ArithExpression
): ArithExpression => {
  const direction = rs.intBetween(0, 1) === 1;

  if (expr.kind === 'number') {
    const op = randOperator(rs);
    return direction ? binOp(op, expr, leaf) : binOp(op, leaf, expr);
  } else if (direction) {
    return binOp(expr.op, randomInsert(rs, expr.lft, leaf), expr.rgt);
  } else {
    return binOp(expr.op, expr.lft, randomInsert(rs, expr.rgt, leaf));
  }
};

export function randLiteral(rs: RandomSource): ArithExpression {
  return num(rs.intBetween(0, MAX_GENERATED_LITERAL));
}

export function randOperator(rs: RandomSource): Operator {
  const die = rs.intBetween(0, OPERATOR_DIE.length - 1);
  const op = OPERATOR_DIE[die];
  if (op === undefined) {
    throw new Error('operator die roll out of range');
  }
  return op;
}
