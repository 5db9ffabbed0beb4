/**
 * Binary operator symbols.
 *
 * @module
 */
export enum Operator {
  /** Addition. */
  Add = '+',
  /** Subtraction. */
  Sub = '-',
  /** Multiplication. */
  Mul = '*',
  /** Integer division, truncating toward zero. */
  Div = '/'
}

export const ADDITIVE_OPERATORS: readonly Operator[] = [
  Operator.Add,
  Operator.Sub
];

export const MULTIPLICATIVE_OPERATORS: readonly Operator[] = [
  Operator.Mul,
  Operator.Div
];

const OPERATORS = new Set<string>(Object.values(Operator));

export function isOperator(tok: string | null): tok is Operator {
  return tok !== null && OPERATORS.has(tok);
}

export function isAdditive(tok: string | null): tok is Operator {
  return isOperator(tok) && ADDITIVE_OPERATORS.includes(tok);
}

export function isMultiplicative(tok: string | null): tok is Operator {
  return isOperator(tok) && MULTIPLICATIVE_OPERATORS.includes(tok);
}
