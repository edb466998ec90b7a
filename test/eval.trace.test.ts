import { describe, expect, it } from 'vitest'
import { run, type Host, type TraceEvent } from '../src'
import { EvaluationError } from '../src/errors'
import {
  block,
  brk,
  forEach,
  host,
  lit,
  recorder,
  ref,
  stmt,
  upTo,
  whileLoop,
  type TestTypes,
  type Value,
} from './host'

const capture = () => {
  const events: TraceEvent[] = []
  return { events, trace: (event: TraceEvent) => events.push(event) }
}

describe('trace', () => {
  it('reports the run, the loop and each iteration in order', async () => {
    const { events, trace } = capture()
    await run(block(upTo('x', 1, 2, block())), host, { trace })
    expect(events.map((e) => e.event)).toEqual([
      'run_start',
      'loop_start',
      'iteration',
      'iteration',
      'loop_end',
      'run_end',
    ])
    expect(events[1]?.data).toEqual({ loop: 'range', variable: 'x', label: null })
    expect(events[3]?.data).toEqual({ index: 1 })
    expect(events[4]?.data).toEqual({ iterations: 2, exit: 'exhausted' })
    expect(events[5]?.data).toEqual({ result: 'Normal', iterations: 2 })
    expect(typeof events[0]?.timestamp).toBe('string')
  })

  it('reports consumed and propagated signals', async () => {
    const { events, trace } = capture()
    const inner = upTo('j', 1, 3, block(brk('outer')))
    await run(block(upTo('i', 1, 3, block(inner), { label: 'outer' })), host, { trace })
    const signals = events.filter((e) => e.event === 'signal').map((e) => e.data)
    expect(signals).toEqual([
      { signal: 'break outer', consumed: false },
      { signal: 'break outer', consumed: true },
    ])
    const ends = events.filter((e) => e.event === 'loop_end').map((e) => e.data)
    expect(ends).toEqual([
      { iterations: 1, exit: 'propagate' },
      { iterations: 1, exit: 'break' },
    ])
  })

  it('reports a while loop ending on its condition', async () => {
    const { events, trace } = capture()
    await run(block(whileLoop(lit(false), block())), host, { trace })
    const ends = events.filter((e) => e.event === 'loop_end').map((e) => e.data)
    expect(ends).toEqual([{ iterations: 0, exit: 'condition' }])
  })

  it('reports a skipped contradicting range', async () => {
    const { emitted, emit } = recorder()
    const { events, trace } = capture()
    await run(block(upTo('x', 3, 0, block(emit(ref('x'))))), host, {
      trace,
      directionMismatch: 'empty',
    })
    const ends = events.filter((e) => e.event === 'loop_end').map((e) => e.data)
    expect(ends).toEqual([{ iterations: 0, exit: 'empty' }])
    expect(emitted).toEqual([])
  })

  it('closes every loop a failure unwinds', async () => {
    const { events, trace } = capture()
    const failing = stmt(() => {
      throw new Error('boom')
    })
    const program = block(upTo('i', 1, 3, block(upTo('j', 1, 3, block(failing)))))
    await expect(run(program, host, { trace })).rejects.toThrow(EvaluationError)
    const ends = events.filter((e) => e.event === 'loop_end').map((e) => e.data)
    expect(ends).toEqual([
      { iterations: 1, exit: 'error', error: 'Failed to evaluate statement: boom' },
      { iterations: 1, exit: 'error', error: 'Failed to evaluate statement: boom' },
    ])
    expect(events.filter((e) => e.event === 'loop_start')).toHaveLength(2)
  })

  it('reports a while loop stopped by a limit', async () => {
    const { events, trace } = capture()
    const program = block(whileLoop(lit(true), block()))
    await expect(
      run(program, host, { trace, limits: { maxIterations: 2 } })
    ).rejects.toThrow('Iteration limit exceeded')
    const ends = events.filter((e) => e.event === 'loop_end').map((e) => e.data)
    expect(ends).toEqual([{ iterations: 2, exit: 'error', error: 'Iteration limit exceeded' }])
  })

  it('reports a close failure next to the error that ended the loop', async () => {
    const { events, trace } = capture()
    const items: Iterable<Value> = {
      [Symbol.iterator]: () => ({
        next: () => ({ done: false, value: 1 }),
        return: () => {
          throw new Error('cleanup boom')
        },
      }),
    }
    const stubborn: Host<TestTypes> = { ...host, iterate: () => items }
    const failing = stmt(() => {
      throw new Error('boom')
    })
    await expect(
      run(block(forEach('x', lit(null), block(failing))), stubborn, { trace })
    ).rejects.toThrow('Failed to evaluate statement: boom')
    const ends = events.filter((e) => e.event === 'loop_end').map((e) => e.data)
    expect(ends).toEqual([
      {
        iterations: 1,
        exit: 'error',
        error: 'Failed to evaluate statement: boom',
        cleanupError: 'Failed to evaluate collection close: cleanup boom',
      },
    ])
  })

  it('carries node spans', async () => {
    const { events, trace } = capture()
    const loop = { ...upTo('x', 1, 1, block()), span: { start: 4, end: 20 } }
    await run(block(loop), host, { trace })
    expect(events.find((e) => e.event === 'loop_start')?.span).toEqual({ start: 4, end: 20 })
  })
})
