import { z } from 'zod'
import { ConfigError } from './errors'
import { resolveLimits, type LimitsConfig, type ResolvedLimits } from './limits'
import type { TraceSink } from './trace'

/**
 * What to do when range bounds contradict the direction keyword.
 * - `error`: fail at loop entry with `DirectionMismatchError`.
 * - `empty`: run the body zero times.
 */
export type DirectionMismatchMode = 'error' | 'empty'

/**
 * Options accepted by `run`, `runForLoop` and `runWhileLoop`.
 */
export interface RunOptions<V> {
  /**
   * Limit configuration to stop runaway loops.
   */
  limits?: LimitsConfig
  /**
   * Variables to seed the global scope frame.
   */
  vars?: Record<string, V>
  /** Default: `'error'`. */
  directionMismatch?: DirectionMismatchMode
  /** Receives structured execution events. */
  trace?: TraceSink
}

export interface ResolvedOptions<V> {
  limits: ResolvedLimits
  vars: Record<string, V>
  directionMismatch: DirectionMismatchMode
  trace: TraceSink | undefined
}

const limitSchema = z
  .number({ invalid_type_error: 'limit must be a number' })
  .int('limit must be an integer')
  .positive('limit must be positive')

const limitsSchema = z
  .object({
    maxSteps: limitSchema.optional(),
    maxDepth: limitSchema.optional(),
    maxIterations: limitSchema.optional(),
  })
  .strict()

export const runOptionsSchema = z
  .object({
    limits: limitsSchema.optional(),
    vars: z.record(z.unknown()).optional(),
    directionMismatch: z.enum(['error', 'empty']).optional(),
    trace: z
      .custom<TraceSink>((value) => typeof value === 'function', {
        message: 'trace must be a function',
      })
      .optional(),
  })
  .strict()

/**
 * Validates run options and fills in defaults.
 *
 * @throws {ConfigError} If the options do not match {@link runOptionsSchema}.
 */
export const resolveOptions = <V>(options: RunOptions<V> = {}): ResolvedOptions<V> => {
  const parsed = runOptionsSchema.safeParse(options)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : 'options'
        return `${where}: ${issue.message}`
      })
      .join('; ')
    throw new ConfigError(`Invalid run options: ${detail}`)
  }
  return {
    limits: resolveLimits(options.limits),
    vars: options.vars ?? {},
    directionMismatch: options.directionMismatch ?? 'error',
    trace: options.trace,
  }
}
