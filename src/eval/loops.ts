import type { ForEachNode, ForNode, ForRangeNode, HostTypes, Span, WhileNode } from '../ast'
import { checkRangeParts, contradictsDirection, makeRangeSpec, type RangeInit } from '../range'
import { NORMAL, describeSignal, targetsLoop, type ControlSignal } from '../signal'
import type { LoopExit } from '../trace'
import { callHost, errorMessage, evalBound, evalExpr, evalStep } from './common'
import { pushFrame } from './env'
import { fromCollection, fromRange, type LoopSource } from './iterators'
import type { EnvStack, EvalContext, Evaluator } from './types'

interface Stop<V> {
  result: ControlSignal<V>
  exit: LoopExit
}

/**
 * Decides what a loop does with the signal its body returned.
 * Returns `undefined` to go on with the next iteration.
 *
 * - `Normal`, or a `continue` aimed at this loop: next iteration.
 * - A `break` aimed at this loop: stop, and complete normally.
 * - Anything else (a labelled signal for an outer loop, `return`): stop, and pass it on unchanged.
 */
const settle = <T extends HostTypes>(
  signal: ControlSignal<T['value']>,
  label: string | undefined,
  ctx: EvalContext<T>,
  span?: Span
): Stop<T['value']> | undefined => {
  if (signal.kind === 'Normal') return undefined
  const consumed = targetsLoop(signal, label)
  ctx.emitTrace('signal', span, { signal: describeSignal(signal), consumed })
  if (consumed) {
    return signal.kind === 'Break' ? { result: NORMAL, exit: 'break' } : undefined
  }
  return { result: signal, exit: 'propagate' }
}

const loopStart = <T extends HostTypes>(
  kind: string,
  node: ForNode<T> | WhileNode<T>,
  ctx: EvalContext<T>
): void => {
  ctx.emitTrace('loop_start', node.span, {
    loop: kind,
    variable: node.kind === 'While' ? null : node.variable,
    label: node.label ?? null,
  })
}

const loopEnd = <T extends HostTypes>(
  node: ForNode<T> | WhileNode<T>,
  ctx: EvalContext<T>,
  iterations: number,
  exit: LoopExit
): void => {
  ctx.emitTrace('loop_end', node.span, { iterations, exit })
}

/**
 * Reports a loop left by a thrown error. `cleanupError` is a failure to close the loop's
 * source on the way out; the body's error is the one that propagates.
 */
const loopFailed = <T extends HostTypes>(
  node: ForNode<T> | WhileNode<T>,
  ctx: EvalContext<T>,
  iterations: number,
  err: unknown,
  cleanupError?: unknown
): void => {
  ctx.emitTrace('loop_end', node.span, {
    iterations,
    exit: 'error',
    error: errorMessage(err),
    ...(cleanupError === undefined ? {} : { cleanupError: errorMessage(cleanupError) }),
  })
}

/**
 * Closes a source after the loop already failed, handing back what `close` threw, if anything.
 */
const closeAfterFailure = async <V>(source: LoopSource<V>): Promise<unknown> => {
  try {
    await source.close()
    return undefined
  } catch (err) {
    return err
  }
}

/**
 * Drives one for-loop frame over its source.
 * Every pulled value is bound to the loop variable in a fresh frame that only this iteration's
 * body sees. The source is closed however the loop ends; when the loop fails, the original
 * error wins over a failing close.
 */
const runFrame = async <T extends HostTypes>(
  node: ForNode<T>,
  source: LoopSource<T['value']>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>,
  evaluate: Evaluator<T>
): Promise<ControlSignal<T['value']>> => {
  let iterations = 0
  const drive = async (): Promise<Stop<T['value']>> => {
    for (;;) {
      const pulled = await source.next()
      if (pulled.done) return { result: NORMAL, exit: 'exhausted' }
      ctx.tracker.iterate(node.span)
      ctx.emitTrace('iteration', node.span, { index: iterations })
      iterations += 1
      const iterationEnv = pushFrame(env, [[node.variable, pulled.value]])
      const signal = await evaluate(node.body, iterationEnv, ctx)
      const stop = settle(signal, node.label, ctx, node.span)
      if (stop) return stop
    }
  }

  let stop: Stop<T['value']>
  try {
    stop = await drive()
  } catch (err) {
    loopFailed(node, ctx, iterations, err, await closeAfterFailure(source))
    throw err
  }
  try {
    await source.close()
  } catch (err) {
    loopFailed(node, ctx, iterations, err)
    throw err
  }
  loopEnd(node, ctx, iterations, stop.exit)
  return stop.result
}

/**
 * Executes `for x in a..b`, `a to b`, `a downto b`, with an optional step.
 *
 * Bounds and step are evaluated once, at loop entry, and validated before the body runs.
 *
 * @param node - The ForRange node.
 * @param env - The environment.
 * @param ctx - Host, limits, options and trace.
 * @param evaluate - Recursive evaluator for the body.
 */
export const evalForRange = async <T extends HostTypes>(
  node: ForRangeNode<T>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>,
  evaluate: Evaluator<T>
): Promise<ControlSignal<T['value']>> => {
  const init: RangeInit = {
    start: await evalBound(node.start, 'start', env, ctx, node.span),
    end: await evalBound(node.end, 'end', env, ctx, node.span),
    direction: node.direction,
    step: node.step === undefined ? undefined : await evalStep(node.step, env, ctx, node.span),
    inclusive: node.inclusive,
  }
  if (ctx.options.directionMismatch === 'empty') {
    checkRangeParts(init, node.span)
    if (contradictsDirection(init)) {
      loopStart('range', node, ctx)
      loopEnd(node, ctx, 0, 'empty')
      return NORMAL
    }
  }
  const spec = makeRangeSpec(init, node.span)
  loopStart('range', node, ctx)
  const source = fromRange(spec, (n) => ctx.host.fromInteger(n), node.span)
  return runFrame(node, source, env, ctx, evaluate)
}

/**
 * Executes `for x in collection`, pulling one element per iteration from the host's iterator.
 */
export const evalForEach = async <T extends HostTypes>(
  node: ForEachNode<T>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>,
  evaluate: Evaluator<T>
): Promise<ControlSignal<T['value']>> => {
  const collection = await evalExpr(node.collection, 'collection', env, ctx, node.span)
  const iterable = await callHost('collection', node.span, () => ctx.host.iterate(collection))
  loopStart('collection', node, ctx)
  return runFrame(node, fromCollection(iterable, node.span), env, ctx, evaluate)
}

/**
 * Executes `while cond { body }`.
 * The condition is evaluated afresh before every iteration; a failing condition ends the loop
 * with an evaluation error.
 */
export const evalWhile = async <T extends HostTypes>(
  node: WhileNode<T>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>,
  evaluate: Evaluator<T>
): Promise<ControlSignal<T['value']>> => {
  loopStart('while', node, ctx)
  let iterations = 0
  try {
    for (;;) {
      const cond = await evalExpr(node.cond, 'while condition', env, ctx, node.span)
      const holds = await callHost('while condition', node.span, () => ctx.host.isTruthy(cond))
      if (!holds) {
        loopEnd(node, ctx, iterations, 'condition')
        return NORMAL
      }
      ctx.tracker.iterate(node.span)
      ctx.emitTrace('iteration', node.span, { index: iterations })
      iterations += 1
      const signal = await evaluate(node.body, env, ctx)
      const stop = settle(signal, node.label, ctx, node.span)
      if (stop) {
        loopEnd(node, ctx, iterations, stop.exit)
        return stop.result
      }
    }
  } catch (err) {
    loopFailed(node, ctx, iterations, err)
    throw err
  }
}
