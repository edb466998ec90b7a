import type { Span } from './ast'

export type TraceEventType =
  | 'run_start'
  | 'run_end'
  | 'loop_start'
  | 'loop_end'
  | 'iteration'
  | 'signal'

/**
 * Why a loop stopped.
 * - `exhausted`: the range or collection ran out.
 * - `condition`: a while condition became false.
 * - `break`: the loop consumed a `break`.
 * - `propagate`: a signal for an outer construct left the loop.
 * - `empty`: a contradicting range was skipped under `directionMismatch: 'empty'`.
 * - `error`: an error was thrown out of the loop. The event carries its message as `error`, and
 *   `cleanupError` when closing the source failed as well.
 *
 * Every `loop_start` is matched by exactly one `loop_end`.
 */
export type LoopExit = 'exhausted' | 'condition' | 'break' | 'propagate' | 'empty' | 'error'

export type TraceData = Record<string, string | number | boolean | null>

export interface TraceEvent {
  timestamp: string
  event: TraceEventType
  span?: Span
  data?: TraceData
}

export type TraceSink = (event: TraceEvent) => void

export type EmitTrace = (event: TraceEventType, span?: Span, data?: TraceData) => void

/**
 * Builds the emitter the evaluator calls. Without a sink, events are dropped.
 */
export const makeEmitter = (sink: TraceSink | undefined): EmitTrace => {
  if (!sink) return () => undefined
  return (event, span, data) => {
    sink({
      timestamp: new Date().toISOString(),
      event,
      ...(span ? { span } : {}),
      ...(data ? { data } : {}),
    })
  }
}
