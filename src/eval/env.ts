import type { EnvFrame, EnvStack, Scope } from './types'

const findFrame = <V>(env: EnvStack<V>, name: string): EnvFrame<V> | undefined => {
  for (let i = env.length - 1; i >= 0; i--) {
    const frame = env[i]
    if (frame && frame.vars.has(name)) {
      return frame
    }
  }
  return undefined
}

/**
 * Creates the root environment, seeded with the given global variables.
 */
export const rootEnv = <V>(vars: Record<string, V>): EnvStack<V> => [
  { vars: new Map<string, V>(Object.entries(vars)) },
]

/**
 * Returns a new environment with one more (optionally pre-bound) frame on top.
 * The parent stack is left untouched, so a frame never outlives the block that pushed it.
 */
export const pushFrame = <V>(env: EnvStack<V>, bindings?: [string, V][]): EnvStack<V> => [
  ...env,
  { vars: new Map<string, V>(bindings) },
]

/**
 * Retrieves a variable value from the environment stack.
 * Searches from the current (top) frame down to the global frame.
 */
export const getVar = <V>(env: EnvStack<V>, name: string): V | undefined =>
  findFrame(env, name)?.vars.get(name)

/**
 * Reassigns the nearest binding of `name`; unknown names land in the global frame.
 */
export const setVar = <V>(env: EnvStack<V>, name: string, value: V): void => {
  const frame = findFrame(env, name) ?? env[0]
  frame?.vars.set(name, value)
}

/**
 * Binds a value to a variable name in the current scope frame.
 */
export const declareVar = <V>(env: EnvStack<V>, name: string, value: V): void => {
  env[env.length - 1]?.vars.set(name, value)
}

/**
 * Wraps an environment in the {@link Scope} view the host sees.
 */
export const scopeOf = <V>(env: EnvStack<V>): Scope<V> => ({
  get: (name) => getVar(env, name),
  has: (name) => findFrame(env, name) !== undefined,
  set: (name, value) => setVar(env, name, value),
  declare: (name, value) => declareVar(env, name, value),
})
