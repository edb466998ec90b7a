import type { HostTypes, Span } from '../ast'
import { EvaluationError, InvalidBoundError, InvalidStepError, isLoopCoreError } from '../errors'
import type { Awaitable, EnvStack, EvalContext } from './types'
import { scopeOf } from './env'

/**
 * The message of a thrown value, whatever was thrown.
 */
export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err)

/**
 * Runs a host capability, converting anything it throws into an {@link EvaluationError}.
 * Errors raised by the loop core itself pass through untouched, so a failure deep inside nested
 * loops is wrapped exactly once.
 *
 * @param what - Names the thing being evaluated, for the error message.
 */
export const callHost = async <R>(
  what: string,
  span: Span | undefined,
  action: () => Awaitable<R>
): Promise<R> => {
  try {
    return await action()
  } catch (err) {
    if (isLoopCoreError(err)) throw err
    throw new EvaluationError(`Failed to evaluate ${what}: ${errorMessage(err)}`, span, err)
  }
}

/**
 * Evaluates an expression through the host.
 */
export const evalExpr = <T extends HostTypes>(
  expr: T['expr'],
  what: string,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>,
  span?: Span
): Promise<T['value']> => callHost(what, span, () => ctx.host.evaluate(expr, scopeOf(env)))

/**
 * Evaluates a range bound and reads it as an integer.
 * Throws an InvalidBoundError for anything the host does not see as an integer.
 */
export const evalBound = async <T extends HostTypes>(
  expr: T['expr'],
  what: 'start' | 'end',
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>,
  span?: Span
): Promise<number> => {
  const value = await evalExpr(expr, `range ${what}`, env, ctx, span)
  const n = await callHost(`range ${what}`, span, () => ctx.host.toInteger(value))
  if (n === undefined) {
    throw new InvalidBoundError(`Range ${what} must be an integer`, span)
  }
  return n
}

/**
 * Evaluates a step expression and reads it as an integer; sign and size are checked by the range.
 */
export const evalStep = async <T extends HostTypes>(
  expr: T['expr'],
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>,
  span?: Span
): Promise<number> => {
  const value = await evalExpr(expr, 'range step', env, ctx, span)
  const n = await callHost('range step', span, () => ctx.host.toInteger(value))
  if (n === undefined) {
    throw new InvalidStepError('Range step must be an integer', span)
  }
  return n
}
