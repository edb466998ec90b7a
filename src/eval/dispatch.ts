import type { ForNode, HostTypes, Node, WhileNode } from '../ast'
import { UnboundSignalError } from '../errors'
import { LimitTracker } from '../limits'
import { resolveOptions, type RunOptions } from '../options'
import { breakSignal, continueSignal, describeSignal, type ControlSignal } from '../signal'
import { makeEmitter } from '../trace'
import { validate } from '../validate'
import { rootEnv } from './env'
import type { EnvStack, EvalContext, Host } from './types'

// Sub-modules
import { evalBlock, evalHost, evalIf, evalReturn } from './control_flow'
import { evalForEach, evalForRange, evalWhile } from './loops'

/**
 * How a whole run ended.
 */
export type RunResult<V> = { kind: 'Normal' } | { kind: 'Return'; value: V | undefined }

const makeContext = <T extends HostTypes>(
  host: Host<T>,
  options: RunOptions<T['value']>
): { ctx: EvalContext<T>; env: EnvStack<T['value']> } => {
  const resolved = resolveOptions(options)
  return {
    ctx: {
      host,
      tracker: new LimitTracker(resolved.limits),
      options: resolved,
      emitTrace: makeEmitter(resolved.trace),
    },
    env: rootEnv(resolved.vars),
  }
}

/**
 * Validates and runs a node tree to completion.
 *
 * @param program - The root node, usually a Block.
 * @param host - The evaluator capabilities for expressions, statements and collections.
 * @param options - Limits, global variables, direction-mismatch policy and trace sink.
 * @returns `Normal`, or the value carried by a `return` that left the tree.
 * @throws {UnboundSignalError} If a `break`/`continue` has no loop to receive it.
 */
export const run = async <T extends HostTypes>(
  program: Node<T>,
  host: Host<T>,
  options: RunOptions<T['value']> = {}
): Promise<RunResult<T['value']>> => {
  validate(program)
  const { ctx, env } = makeContext(host, options)
  ctx.emitTrace('run_start', program.span)
  const signal = await evaluate(program, env, ctx)
  ctx.emitTrace('run_end', program.span, {
    result: signal.kind,
    iterations: ctx.tracker.iterationCount,
  })
  switch (signal.kind) {
    case 'Normal':
      return { kind: 'Normal' }
    case 'Return':
      return { kind: 'Return', value: signal.value }
    case 'Break':
    case 'Continue':
      throw new UnboundSignalError(`${describeSignal(signal)} outside of any loop`, program.span)
  }
}

/**
 * Runs a single for-loop (range or collection) and returns the signal it finished with.
 * A `break` or `continue` aimed at a label this loop does not carry comes back unconsumed.
 */
export const runForLoop = async <T extends HostTypes>(
  node: ForNode<T>,
  host: Host<T>,
  options: RunOptions<T['value']> = {}
): Promise<ControlSignal<T['value']>> => {
  const { ctx, env } = makeContext(host, options)
  return evaluate(node, env, ctx)
}

/**
 * Runs a single while-loop and returns the signal it finished with.
 */
export const runWhileLoop = async <T extends HostTypes>(
  node: WhileNode<T>,
  host: Host<T>,
  options: RunOptions<T['value']> = {}
): Promise<ControlSignal<T['value']>> => {
  const { ctx, env } = makeContext(host, options)
  return evaluate(node, env, ctx)
}

/**
 * The core evaluator.
 *
 * Dispatches execution to the handler for the node kind and returns the control signal the node
 * finished with. Handlers receive this function to evaluate their children.
 *
 * @param node - The node to execute.
 * @param env - The current environment.
 * @param ctx - Host, limits, options and trace.
 */
async function evaluate<T extends HostTypes>(
  node: Node<T>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>
): Promise<ControlSignal<T['value']>> {
  ctx.tracker.step(node.span)
  ctx.tracker.enter(node.span)
  try {
    switch (node.kind) {
      case 'Block':
        return await evalBlock(node, env, ctx, evaluate)
      case 'If':
        return await evalIf(node, env, ctx, evaluate)
      case 'ForRange':
        return await evalForRange(node, env, ctx, evaluate)
      case 'ForEach':
        return await evalForEach(node, env, ctx, evaluate)
      case 'While':
        return await evalWhile(node, env, ctx, evaluate)
      case 'Break':
        return breakSignal(node.label)
      case 'Continue':
        return continueSignal(node.label)
      case 'Return':
        return await evalReturn(node, env, ctx)
      case 'Host':
        return await evalHost(node, env, ctx)
    }
  } finally {
    ctx.tracker.exit()
  }
}
