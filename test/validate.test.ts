import { describe, expect, it } from 'vitest'
import { run } from '../src'
import { validate } from '../src/validate'
import { UnboundSignalError } from '../src/errors'
import {
  block,
  brk,
  cont,
  eq,
  forEach,
  host,
  ifThen,
  lit,
  recorder,
  ref,
  ret,
  upTo,
  whileLoop,
} from './host'

describe('validate', () => {
  it('accepts signals inside loops', () => {
    const program = block(
      upTo('x', 0, 3, block(ifThen(eq(ref('x'), lit(1)), block(cont()), block(brk())))),
      whileLoop(lit(true), block(brk()))
    )
    expect(() => validate(program)).not.toThrow()
  })

  it('accepts a label carried by any enclosing loop', () => {
    const inner = forEach('y', lit([]), block(brk('outer'), cont('outer')))
    const program = block(
      upTo('x', 0, 3, block(whileLoop(lit(false), block(inner))), { label: 'outer' })
    )
    expect(() => validate(program)).not.toThrow()
  })

  it('accepts return anywhere', () => {
    expect(() => validate(block(ret(lit(1))))).not.toThrow()
  })

  it('rejects break outside of any loop', () => {
    expect(() => validate(block(brk()))).toThrow(UnboundSignalError)
    expect(() => validate(block(brk()))).toThrow('break outside of any loop')
  })

  it('rejects continue under an if outside of any loop', () => {
    expect(() => validate(block(ifThen(lit(true), block(cont()))))).toThrow(
      'continue outside of any loop'
    )
  })

  it('rejects labels no enclosing loop carries', () => {
    const program = block(upTo('x', 0, 3, block(brk('outer'))))
    expect(() => validate(program)).toThrow('break outer: no enclosing loop has that label')
  })

  it('does not let a sibling loop lend its label', () => {
    const program = block(
      upTo('x', 0, 1, block(), { label: 'first' }),
      upTo('y', 0, 1, block(cont('first')))
    )
    expect(() => validate(program)).toThrow('continue first: no enclosing loop has that label')
  })

  it('runs before anything executes', async () => {
    const { emitted, emit } = recorder()
    await expect(run(block(emit(lit(1)), brk()), host)).rejects.toThrow(UnboundSignalError)
    expect(emitted).toEqual([])
  })
})
