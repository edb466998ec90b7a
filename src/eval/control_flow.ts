import type { BlockNode, HostNode, HostTypes, IfNode, ReturnNode } from '../ast'
import { NORMAL, returnSignal, type ControlSignal } from '../signal'
import { callHost, evalExpr } from './common'
import { pushFrame, scopeOf } from './env'
import type { EnvStack, EvalContext, Evaluator } from './types'

/**
 * Runs the statements of a block in order, in a fresh frame.
 * The first statement to finish with anything but `Normal` ends the block, and its signal becomes
 * the block's result: nothing after a `break` runs.
 *
 * @param node - The Block node.
 * @param env - The environment.
 * @param ctx - Host, limits, options and trace.
 * @param evaluate - Recursive evaluator.
 */
export const evalBlock = async <T extends HostTypes>(
  node: BlockNode<T>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>,
  evaluate: Evaluator<T>
): Promise<ControlSignal<T['value']>> => {
  const blockEnv = pushFrame(env)
  for (const stmt of node.body) {
    const signal = await evaluate(stmt, blockEnv, ctx)
    if (signal.kind !== 'Normal') return signal
  }
  return NORMAL
}

/**
 * Evaluates an `if-else` statement.
 */
export const evalIf = async <T extends HostTypes>(
  node: IfNode<T>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>,
  evaluate: Evaluator<T>
): Promise<ControlSignal<T['value']>> => {
  const cond = await evalExpr(node.cond, 'if condition', env, ctx, node.span)
  const holds = await callHost('if condition', node.span, () => ctx.host.isTruthy(cond))
  if (holds) return evaluate(node.then, env, ctx)
  if (node.else) return evaluate(node.else, env, ctx)
  return NORMAL
}

export const evalReturn = async <T extends HostTypes>(
  node: ReturnNode<T>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>
): Promise<ControlSignal<T['value']>> => {
  if (node.value === undefined) return returnSignal<T['value']>(undefined)
  return returnSignal(await evalExpr(node.value, 'return value', env, ctx, node.span))
}

/**
 * Hands a plain statement to the host. A statement that returns nothing completed normally.
 */
export const evalHost = async <T extends HostTypes>(
  node: HostNode<T>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>
): Promise<ControlSignal<T['value']>> => {
  const signal = await callHost('statement', node.span, () =>
    ctx.host.execute(node.stmt, scopeOf(env))
  )
  return signal ? signal : NORMAL
}
