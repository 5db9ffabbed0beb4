import { assert, expect } from 'chai'
import { describe, it } from 'mocha'
import rsexport, { type RandomSeed } from 'random-seed'

import {
  type ArithExpression,
  equivalent,
  prettyPrint,
  size
} from '../../lib/arith/expression.js'
import {
  MAX_GENERATED_LITERAL,
  randExpression
} from '../../lib/arith/generator.js'
import { EvalError } from '../../lib/evaluator/evalError.js'
import { evaluate } from '../../lib/evaluator/evaluator.js'
import { parseArithmetic } from '../../lib/parser/arithmetic.js'
import { tokenize } from '../../lib/parser/tokenizer.js'

const { create } = rsexport

const evaluateOrReason = (expr: ArithExpression): number | string => {
  try {
    return evaluate(expr)
  } catch (e) {
    if (e instanceof EvalError) {
      return e.reason
    }
    throw e
  }
}

const literals = (expr: ArithExpression): number[] =>
  expr.kind === 'number'
    ? [expr.value]
    : [...literals(expr.lft), ...literals(expr.rgt)]

describe('randExpression', () => {
  const testSeed = '18477814418'

  it('generates a random expression with the specified size', () => {
    const rs: RandomSeed = create(testSeed)
    for (const n of [1, 2, 8, 20]) {
      assert.strictEqual(size(randExpression(rs, n)), n)
    }
  })

  it('keeps literals within range', () => {
    const rs: RandomSeed = create(testSeed)
    for (const value of literals(randExpression(rs, 40))) {
      assert.isAtLeast(value, 0)
      assert.isAtMost(value, MAX_GENERATED_LITERAL)
    }
  })

  it('is reproducible for a fixed seed', () => {
    const first = randExpression(create(testSeed), 12)
    const second = randExpression(create(testSeed), 12)
    assert.isTrue(equivalent(first, second))
  })

  it('refuses an empty expression', () => {
    expect(() => randExpression(create(testSeed), 0)).to.throw(
      Error,
      /at least one literal/
    )
  })

  it('round-trips through printing and parsing', () => {
    const rs: RandomSeed = create('round-trip')
    for (let i = 0; i < 200; i++) {
      const expr = randExpression(rs, rs.intBetween(1, 12))
      const printed = prettyPrint(expr)
      const reparsed = parseArithmetic(tokenize(printed))

      assert.isTrue(equivalent(expr, reparsed), printed)
      assert.strictEqual(
        evaluateOrReason(reparsed),
        evaluateOrReason(expr),
        printed
      )
    }
  })
})
