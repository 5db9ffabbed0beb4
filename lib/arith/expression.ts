import { Operator } from './operator.js';

/*
 * EBNF grammar:
 *
 * addition       = multiplication, { ("+" | "-"), multiplication }
 * multiplication = parenthesis, { ("*" | "/"), parenthesis }
 * parenthesis    = "(", addition, ")" | number
 * number         = digit, { digit }
 *
 * alphabet:
 *
 * "0".."9" | "+" | "-" | "*" | "/" | "(" | ")"
 */

export interface NumberNode {
  kind: 'number';
  value: number;
}

/**
 * An interior node. Both branches are always present and never shared with
 * another node.
 */
export interface OperatorNode {
  kind: 'operator';
  op: Operator;
  lft: ArithExpression;
  rgt: ArithExpression;
}

/**
 * An arithmetic expression is either an integer literal or a binary operator
 * applied to two subexpressions.
 */
export type ArithExpression = NumberNode | OperatorNode;

export const num = (value: number): NumberNode => ({
  kind: 'number',
  value
});

/**
 * @param op the operator.
 * @param lft the left operand.
 * @param rgt the right operand.
 * @returns a new operator node.
 */
export const binOp = (
  op: Operator,
  lft: ArithExpression,
  rgt: ArithExpression
): OperatorNode => ({
  kind: 'operator',
  op,
  lft,
  rgt
});

export const add = (lft: ArithExpression, rgt: ArithExpression) =>
  binOp(Operator.Add, lft, rgt);
export const sub = (lft: ArithExpression, rgt: ArithExpression) =>
  binOp(Operator.Sub, lft, rgt);
export const mul = (lft: ArithExpression, rgt: ArithExpression) =>
  binOp(Operator.Mul, lft, rgt);
export const div = (lft: ArithExpression, rgt: ArithExpression) =>
  binOp(Operator.Div, lft, rgt);

/**
 * Renders an expression as a token stream, parenthesizing every operator
 * node. The output always parses back to a structurally equal tree.
 */
export function prettyPrint(expr: ArithExpression): string {
  if (expr.kind === 'number') {
    return expr.value.toString();
  }
  return `(${prettyPrint(expr.lft)}${expr.op}${prettyPrint(expr.rgt)})`;
}

/**
 * @returns the number of literal leaves in the expression.
 */
export const size = (expr: ArithExpression): number => {
  if (expr.kind === 'number') {
    return 1;
  }
  return size(expr.lft) + size(expr.rgt);
};

/**
 * @returns the height of the tree, where a lone literal has depth 1.
 */
export const depth = (expr: ArithExpression): number => {
  if (expr.kind === 'number') {
    return 1;
  }
  return 1 + Math.max(depth(expr.lft), depth(expr.rgt));
};

/**
 * Compare two expressions for structural equivalence.
 */
export const equivalent = (
  lft: ArithExpression,
  rgt: ArithExpression
): boolean => {
  const firstStack = [lft];
  const secondStack = [rgt];

  while (firstStack.length > 0 && secondStack.length > 0) {
    const firstItem = firstStack.pop();
    const secondItem = secondStack.pop();

    if (firstItem === undefined || secondItem === undefined) {
      throw new Error('stack underflow');
    } else if (firstItem.kind === 'number' && secondItem.kind === 'number') {
      if (firstItem.value !== secondItem.value) {
        return false;
      }
    } else if (
      firstItem.kind === 'operator' && secondItem.kind === 'operator'
    ) {
      if (firstItem.op !== secondItem.op) {
        return false;
      }
      firstStack.push(firstItem.rgt);
      firstStack.push(firstItem.lft);
      secondStack.push(secondItem.rgt);
      secondStack.push(secondItem.lft);
    } else {
      return false;
    }
  }

  return firstStack.length === secondStack.length;
};
