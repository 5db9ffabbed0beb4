import { assert, expect } from 'chai'
import { describe, it } from 'mocha'

import { helpText, parseArgs, selectMode } from '../../lib/cli/args.js'
import { ConfigError, DEFAULT_CONFIG } from '../../lib/shared/config.js'

describe('parseArgs', () => {
  it('defaults to the built-in configuration', () => {
    const options = parseArgs([])
    assert.isFalse(options.help)
    assert.isFalse(options.version)
    assert.isFalse(options.noTty)
    assert.deepStrictEqual(options.config, DEFAULT_CONFIG)
    assert.deepStrictEqual(options.expressions, [])
  })

  it('reads short and long flags', () => {
    assert.isTrue(parseArgs(['-h']).help)
    assert.isTrue(parseArgs(['--help']).help)
    assert.isTrue(parseArgs(['-v']).version)
    assert.isTrue(parseArgs(['--verbose']).config.verbose)
    assert.isTrue(parseArgs(['-V']).config.verbose)
    assert.isTrue(parseArgs(['--no-tty']).noTty)
  })

  it('reads a buffer size', () => {
    assert.strictEqual(parseArgs(['-b', '64']).config.bufferSize, 64)
    assert.strictEqual(parseArgs(['--buffer-size', '8']).config.bufferSize, 8)
  })

  it('rejects a bad buffer size', () => {
    expect(() => parseArgs(['-b'])).to.throw(ConfigError, /positive integer/)
    expect(() => parseArgs(['-b', 'ten'])).to.throw(ConfigError)
    expect(() => parseArgs(['-b', '1'])).to.throw(ConfigError, /at least 2/)
  })

  it('collects expressions from flags and positionals', () => {
    const options = parseArgs(['-e', '1+1', '2*3', '--expr', '(4)'])
    assert.deepStrictEqual(options.expressions, ['1+1', '2*3', '(4)'])
  })

  it('treats a leading minus before a digit as an expression', () => {
    assert.deepStrictEqual(parseArgs(['-1+2']).expressions, ['-1+2'])
  })

  it('rejects unknown options and a missing expression', () => {
    expect(() => parseArgs(['--frobnicate'])).to.throw(
      ConfigError,
      'Unknown option: --frobnicate'
    )
    expect(() => parseArgs(['-e'])).to.throw(ConfigError, /requires/)
  })
})

describe('selectMode', () => {
  it('prefers expressions, then a terminal, then a stream', () => {
    assert.strictEqual(selectMode(parseArgs(['1+1']), true), 'oneshot')
    assert.strictEqual(selectMode(parseArgs([]), true), 'interactive')
    assert.strictEqual(selectMode(parseArgs([]), false), 'stream')
    assert.strictEqual(selectMode(parseArgs(['--no-tty']), true), 'stream')
  })
})

describe('helpText', () => {
  it('includes the version', () => {
    assert.include(helpText('1.2.3'), 'arith-calc) v1.2.3')
  })
})
