import { describe, expect, it } from 'vitest'
import { run, runWhileLoop, NORMAL } from '../src'
import { EvaluationError } from '../src/errors'
import {
  add,
  assign,
  block,
  brk,
  cont,
  eq,
  fail,
  host,
  ifThen,
  lit,
  lt,
  recorder,
  ref,
  whileLoop,
  type Expr,
} from './host'

const increment = (name: string) => assign(name, add(ref(name), lit(1)))

describe('while', () => {
  it('emits 0 through 4 while x < 5', async () => {
    const { emitted, emit } = recorder()
    const program = block(whileLoop(lt(ref('x'), lit(5)), block(emit(ref('x')), increment('x'))))
    const result = await run(program, host, { vars: { x: 0 } })
    expect(result).toEqual({ kind: 'Normal' })
    expect(emitted).toEqual([0, 1, 2, 3, 4])
  })

  it('never runs the body when the condition starts false', async () => {
    const { emitted, emit } = recorder()
    await run(block(whileLoop(lit(false), block(emit(lit('never'))))), host)
    expect(emitted).toEqual([])
  })

  it('re-evaluates the condition before every iteration', async () => {
    let checks = 0
    const cond: Expr = async (scope) => {
      checks += 1
      return lt(ref('x'), lit(3))(scope)
    }
    await run(block(whileLoop(cond, block(increment('x')))), host, { vars: { x: 0 } })
    expect(checks).toBe(4)
  })

  it('stops on break', async () => {
    const { emitted, emit } = recorder()
    const body = block(increment('x'), ifThen(eq(ref('x'), lit(3)), block(brk())), emit(ref('x')))
    await run(block(whileLoop(lit(true), body)), host, { vars: { x: 0 } })
    expect(emitted).toEqual([1, 2])
  })

  it('skips to the next condition check on continue', async () => {
    const { emitted, emit } = recorder()
    const body = block(
      increment('x'),
      ifThen(eq(ref('x'), lit(2)), block(cont())),
      emit(ref('x'))
    )
    await run(block(whileLoop(lt(ref('x'), lit(5)), body)), host, { vars: { x: 0 } })
    expect(emitted).toEqual([1, 3, 4, 5])
  })

  it('fails when the condition cannot be evaluated', async () => {
    const { emitted, emit } = recorder()
    const program = block(whileLoop(fail('boom'), block(emit(lit(1)))))
    const err = await run(program, host).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(EvaluationError)
    expect(err).toHaveProperty('message', 'Failed to evaluate while condition: boom')
    expect(err).toHaveProperty('cause.message', 'boom')
    expect(emitted).toEqual([])
  })

  it('stops a condition that fails part-way through', async () => {
    const { emitted, emit } = recorder()
    const cond: Expr = async (scope) => {
      const x = await ref('x')(scope)
      if (x === 2) throw new Error('condition broke')
      return true
    }
    const program = block(whileLoop(cond, block(emit(ref('x')), increment('x'))))
    await expect(run(program, host, { vars: { x: 0 } })).rejects.toThrow(
      'Failed to evaluate while condition: condition broke'
    )
    expect(emitted).toEqual([0, 1])
  })
})

describe('runWhileLoop', () => {
  it('returns Normal once the condition turns false', async () => {
    const loop = whileLoop(lt(ref('x'), lit(2)), block(increment('x')))
    await expect(runWhileLoop(loop, host, { vars: { x: 0 } })).resolves.toEqual(NORMAL)
  })

  it('hands back a break aimed at an outer label', async () => {
    const loop = whileLoop(lit(true), block(brk('outer')), 'inner')
    await expect(runWhileLoop(loop, host)).resolves.toEqual({ kind: 'Break', label: 'outer' })
  })

  it('consumes a break aimed at its own label', async () => {
    const loop = whileLoop(lit(true), block(brk('self')), 'self')
    await expect(runWhileLoop(loop, host)).resolves.toEqual(NORMAL)
  })
})
