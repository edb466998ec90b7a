import type { HostTypes, Node } from '../ast'
import type { LimitTracker } from '../limits'
import type { ResolvedOptions } from '../options'
import type { ControlSignal } from '../signal'
import type { EmitTrace } from '../trace'

export type Awaitable<R> = R | Promise<R>

/**
 * A value the host can walk once, in order.
 */
export type CollectionSource<V> = Iterable<V> | AsyncIterable<V>

/**
 * The binding view handed to the host while it evaluates expressions and statements.
 */
export interface Scope<V> {
  /** Looks a name up from the innermost frame outwards. */
  get(name: string): V | undefined
  has(name: string): boolean
  /** Reassigns the nearest binding of `name`, or binds it in the global frame if there is none. */
  set(name: string, value: V): void
  /** Binds `name` in the innermost frame, shadowing outer bindings. */
  declare(name: string, value: V): void
}

/**
 * The capabilities the loop core consumes from the surrounding evaluator.
 */
export interface Host<T extends HostTypes> {
  evaluate(expr: T['expr'], scope: Scope<T['value']>): Awaitable<T['value']>
  /** Runs a plain statement. Returning nothing means normal completion. */
  execute(
    stmt: T['stmt'],
    scope: Scope<T['value']>
  ): Awaitable<ControlSignal<T['value']> | void>
  /** Obtains a pull iterator over a collection value. */
  iterate(collection: T['value']): CollectionSource<T['value']>
  /** Reads a value as an integer, or returns `undefined` when it is not one. */
  toInteger(value: T['value']): number | undefined
  fromInteger(n: number): T['value']
  isTruthy(value: T['value']): boolean
}

/**
 * A single frame in the environment stack.
 */
export interface EnvFrame<V> {
  vars: Map<string, V>
}

/**
 * The environment stack, representing the current chain of scopes.
 * Index 0 is the global scope; the last index is the current local scope.
 */
export type EnvStack<V> = EnvFrame<V>[]

/**
 * Everything a node handler needs besides the node and its environment.
 */
export interface EvalContext<T extends HostTypes> {
  host: Host<T>
  tracker: LimitTracker
  options: ResolvedOptions<T['value']>
  emitTrace: EmitTrace
}

export type Evaluator<T extends HostTypes> = (
  node: Node<T>,
  env: EnvStack<T['value']>,
  ctx: EvalContext<T>
) => Promise<ControlSignal<T['value']>>
