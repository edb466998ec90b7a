/**
 * The result of executing a body or statement.
 *
 * `break` and `continue` travel as values rather than exceptions: every loop inspects the signal
 * its body returns and either consumes it or hands it to its caller unchanged.
 */
export type ControlSignal<V> = NormalSignal | ContinueSignal | BreakSignal | ReturnSignal<V>

export interface NormalSignal {
  kind: 'Normal'
}

export interface ContinueSignal {
  kind: 'Continue'
  label?: string
}

export interface BreakSignal {
  kind: 'Break'
  label?: string
}

export interface ReturnSignal<V> {
  kind: 'Return'
  value: V | undefined
}

export const NORMAL: NormalSignal = { kind: 'Normal' }

export const breakSignal = (label?: string): BreakSignal =>
  label === undefined ? { kind: 'Break' } : { kind: 'Break', label }

export const continueSignal = (label?: string): ContinueSignal =>
  label === undefined ? { kind: 'Continue' } : { kind: 'Continue', label }

export const returnSignal = <V>(value: V | undefined): ReturnSignal<V> => ({
  kind: 'Return',
  value,
})

/**
 * Whether a loop labelled `loopLabel` is the target of `signal`.
 * An unlabelled signal targets the innermost loop; a labelled one only the loop with that label.
 * `Normal` and `Return` never target a loop.
 */
export const targetsLoop = <V>(
  signal: ControlSignal<V>,
  loopLabel: string | undefined
): boolean => {
  if (signal.kind !== 'Break' && signal.kind !== 'Continue') return false
  return signal.label === undefined || signal.label === loopLabel
}

/**
 * Renders a signal for error messages, e.g. `break outer`.
 */
export const describeSignal = <V>(signal: ControlSignal<V>): string => {
  const keyword = signal.kind.toLowerCase()
  if ((signal.kind === 'Break' || signal.kind === 'Continue') && signal.label !== undefined) {
    return `${keyword} ${signal.label}`
  }
  return keyword
}
