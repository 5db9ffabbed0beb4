import type { ArithExpression } from '../arith/expression.js';
import { Operator } from '../arith/operator.js';
import { EvalError } from './evalError.js';

/**
 * Evaluates an expression tree bottom-up.
 *
 * @throws EvalError on division by zero, or when an intermediate result
 *         leaves the safe integer range
 */
export function evaluate(expr: ArithExpression): number {
  if (expr.kind === 'number') {
    return expr.value;
  }

  const lft = evaluate(expr.lft);
  const rgt = evaluate(expr.rgt);

  return checked(expr.op, lft, rgt, apply(expr.op, lft, rgt));
}

function apply(op: Operator, lft: number, rgt: number): number {
  switch (op) {
    case Operator.Add:
      return lft + rgt;
    case Operator.Sub:
      return lft - rgt;
    case Operator.Mul:
      return lft * rgt;
    case Operator.Div:
      if (rgt === 0) {
        throw new EvalError('division-by-zero', `division by zero: ${lft} / 0`);
      }
      return Math.trunc(lft / rgt);
  }
}

function checked(op: Operator, lft: number, rgt: number, result: number) {
  if (!Number.isSafeInteger(result)) {
    throw new EvalError(
      'overflow',
      `result of ${lft} ${op} ${rgt} is out of range`
    );
  }
  // -0 from a truncated negative quotient or a negative product
  return result === 0 ? 0 : result;
}
