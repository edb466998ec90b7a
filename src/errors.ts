import type { Span } from './ast'

/**
 * Categories of errors raised by the loop core.
 * - `direction-mismatch`: range bounds contradict the direction keyword (`5..1`).
 * - `invalid-step`: the step is not a positive integer.
 * - `invalid-bound`: a range bound is not an integer.
 * - `evaluation`: a host capability (expression, statement, iteration) failed.
 * - `unbound-signal`: `break`/`continue` with no enclosing loop to receive it.
 * - `limit`: a configured execution limit was exceeded.
 * - `config`: run options failed validation.
 */
export type ErrorKind =
  | 'direction-mismatch'
  | 'invalid-step'
  | 'invalid-bound'
  | 'evaluation'
  | 'unbound-signal'
  | 'limit'
  | 'config'

/**
 * Common interface for all errors thrown by loopcore.
 */
export interface LoopCoreError extends Error {
  /** The category of the error. */
  kind: ErrorKind
  /** The node span where the error occurred, when the node carries one. */
  span?: Span
}

class BaseError extends Error implements LoopCoreError {
  kind: ErrorKind
  span?: Span

  constructor(kind: ErrorKind, message: string, span?: Span, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.span = span
    const pascalKind = kind
      .split('-')
      .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
      .join('')
    this.name = `${pascalKind}Error`
  }
}

/**
 * Thrown at loop entry when the bounds run against the direction (`for x in 5..1`).
 */
export class DirectionMismatchError extends BaseError {
  constructor(message: string, span?: Span) {
    super('direction-mismatch', message, span)
  }
}

/**
 * Thrown when a step is zero, negative or not an integer. No iteration happens.
 */
export class InvalidStepError extends BaseError {
  constructor(message: string, span?: Span) {
    super('invalid-step', message, span)
  }
}

/**
 * Thrown when a range bound does not evaluate to a safe integer.
 */
export class InvalidBoundError extends BaseError {
  constructor(message: string, span?: Span) {
    super('invalid-bound', message, span)
  }
}

/**
 * Wraps a failure raised by the host while evaluating a bound, condition, collection or body.
 * The original error is available as `cause`.
 */
export class EvaluationError extends BaseError {
  constructor(message: string, span?: Span, cause?: unknown) {
    super('evaluation', message, span, { cause })
  }
}

/**
 * Thrown when a `break` or `continue` has no enclosing loop, or names a label that no
 * enclosing loop carries.
 */
export class UnboundSignalError extends BaseError {
  constructor(message: string, span?: Span) {
    super('unbound-signal', message, span)
  }
}

/**
 * Thrown when execution exceeds one of the configured limits.
 */
export class LimitError extends BaseError {
  constructor(message: string, span?: Span) {
    super('limit', message, span)
  }
}

/**
 * Thrown when run options are malformed.
 */
export class ConfigError extends BaseError {
  constructor(message: string) {
    super('config', message)
  }
}

/**
 * Narrows an unknown thrown value to one of the loopcore error classes.
 */
export const isLoopCoreError = (err: unknown): err is LoopCoreError => err instanceof BaseError
