import { assert } from 'chai'
import { describe, it } from 'mocha'

import {
  FAREWELL,
  GREETING,
  respond,
  runSession,
  type SessionSink,
  USAGE
} from '../../lib/io/session.js'
import { DEFAULT_CONFIG, resolveConfig } from '../../lib/shared/config.js'

interface Written {
  text: string
  kind: string
}

const recorder = (): [SessionSink, Written[]] => {
  const written: Written[] = []
  return [(text, kind) => written.push({ text, kind }), written]
}

describe('respond', () => {
  it('echoes the line followed by its value', () => {
    const [sink, written] = recorder()
    const outcome = respond('2 + 6 * 6 =', sink)
    assert.strictEqual(outcome?.kind, 'value')
    assert.deepStrictEqual(written, [
      { text: '2 + 6 * 6 = 38', kind: 'result' }
    ])
  })

  it('echoes the line followed by the invalid message', () => {
    const [sink, written] = recorder()
    respond('2 a 2', sink)
    assert.deepStrictEqual(written, [
      { text: '2 a 2 invalid input', kind: 'error' }
    ])
  })

  it('adds a diagnostic line in verbose mode', () => {
    const [sink, written] = recorder()
    respond('5 / 0', sink, resolveConfig({ verbose: true }))
    assert.deepStrictEqual(written.map((w) => w.text), [
      '5 / 0 invalid input',
      'evaluate/division-by-zero: division by zero: 5 / 0'
    ])
  })

  it('intercepts the exit command without evaluating it', () => {
    const [sink, written] = recorder()
    assert.isNull(respond('exit', sink))
    assert.deepStrictEqual(written, [])
  })

  it('treats exit with surrounding text as an expression', () => {
    const [sink, written] = recorder()
    assert.isNotNull(respond('exit now', sink))
    assert.deepStrictEqual(written.map((w) => w.text), [
      'exit now invalid input'
    ])
  })
})

describe('runSession', () => {
  it('processes lines until exit and reports a summary', async () => {
    const [sink, written] = recorder()
    const summary = await runSession(
      ['1-2-3', '(2 + 6) * 6', '7/2', '5/0', 'exit', '1+1'],
      sink
    )

    assert.deepStrictEqual(summary, { evaluated: 3, invalid: 1, exited: true })
    assert.deepStrictEqual(written.map((w) => w.text), [
      GREETING,
      USAGE,
      '1-2-3 -4',
      '(2 + 6) * 6 48',
      '7/2 3',
      '5/0 invalid input',
      FAREWELL
    ])
  })

  it('ends when the input runs out', async () => {
    const [sink, written] = recorder()
    async function* lines() {
      yield '10 * 10'
    }
    const summary = await runSession(lines(), sink)
    assert.deepStrictEqual(summary, {
      evaluated: 1,
      invalid: 0,
      exited: false
    })
    assert.strictEqual(written[written.length - 1].text, FAREWELL)
  })

  it('honors a custom exit command and message', async () => {
    const [sink, written] = recorder()
    const config = { ...DEFAULT_CONFIG, exitCommand: 'q', invalidMessage: '?' }
    const summary = await runSession(['exit', 'q'], sink, config)
    assert.deepStrictEqual(summary, { evaluated: 0, invalid: 1, exited: true })
    assert.strictEqual(written[2].text, 'exit ?')
  })
})
