import { LimitError } from './errors'
import type { Span } from './ast'

/**
 * Configuration options for execution limits.
 * All fields are optional and fall back to the defaults below.
 */
export interface LimitsConfig {
  /**
   * Maximum number of nodes to execute. Default: 1,000,000.
   * Each iteration costs one step for its body block plus one per statement inside, so the
   * default leaves `maxIterations` as the limit a plain loop meets first.
   */
  maxSteps?: number
  /** Maximum nesting depth of blocks and loops. Default: 200. */
  maxDepth?: number
  /** Maximum number of loop body executions across the whole run. Default: 100,000. */
  maxIterations?: number
}

/**
 * Fully resolved limits with defaults applied.
 */
export interface ResolvedLimits {
  maxSteps: number
  maxDepth: number
  maxIterations: number
}

const DEFAULT_LIMITS: ResolvedLimits = {
  maxSteps: 1_000_000,
  maxDepth: 200,
  maxIterations: 100_000,
}

export const resolveLimits = (config: LimitsConfig = {}): ResolvedLimits => ({
  maxSteps: config.maxSteps ?? DEFAULT_LIMITS.maxSteps,
  maxDepth: config.maxDepth ?? DEFAULT_LIMITS.maxDepth,
  maxIterations: config.maxIterations ?? DEFAULT_LIMITS.maxIterations,
})

/**
 * Tracks execution usage against defined limits.
 * Throws {@link LimitError} if any limit is exceeded.
 */
export class LimitTracker {
  private steps = 0
  private depth = 0
  private iterations = 0

  constructor(private readonly limits: ResolvedLimits) {}

  /**
   * Records the execution of one node.
   */
  step(span?: Span): void {
    this.steps += 1
    if (this.steps > this.limits.maxSteps) {
      throw new LimitError('Step limit exceeded', span)
    }
  }

  /**
   * Enters a nested block or loop.
   */
  enter(span?: Span): void {
    this.depth += 1
    if (this.depth > this.limits.maxDepth) {
      throw new LimitError('Max depth exceeded', span)
    }
  }

  exit(): void {
    this.depth = Math.max(0, this.depth - 1)
  }

  /**
   * Records one loop body execution.
   */
  iterate(span?: Span): void {
    this.iterations += 1
    if (this.iterations > this.limits.maxIterations) {
      throw new LimitError('Iteration limit exceeded', span)
    }
  }

  /** Total body executions recorded so far. */
  get iterationCount(): number {
    return this.iterations
  }
}
