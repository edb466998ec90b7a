import type { Direction, Span } from './ast'
import { DirectionMismatchError, InvalidBoundError, InvalidStepError } from './errors'

/**
 * An immutable description of a bounded integer sequence.
 */
export interface RangeSpec {
  readonly start: number
  readonly end: number
  readonly direction: Direction
  /** Always a positive integer; the direction decides whether it is added or subtracted. */
  readonly step: number
  readonly inclusive: boolean
}

/**
 * Raw range parts as evaluated at loop entry, before validation.
 */
export interface RangeInit {
  start: number
  end: number
  direction: Direction
  step?: number
  inclusive?: boolean
}

/**
 * Whether the bounds run against the stated direction (`5..1`, `1 downto 5`).
 * Equal bounds never contradict.
 */
export const contradictsDirection = (
  init: Pick<RangeInit, 'start' | 'end' | 'direction'>
): boolean =>
  init.direction === 'ascending' ? init.start > init.end : init.start < init.end

/**
 * Checks that the bounds are safe integers and the step a positive one.
 *
 * @returns The step to use, defaulted to 1.
 * @throws {InvalidBoundError} If a bound is not a safe integer.
 * @throws {InvalidStepError} If the step is not a positive safe integer.
 */
export const checkRangeParts = (init: RangeInit, span?: Span): number => {
  if (!Number.isSafeInteger(init.start)) {
    throw new InvalidBoundError(`Range start must be an integer, got ${init.start}`, span)
  }
  if (!Number.isSafeInteger(init.end)) {
    throw new InvalidBoundError(`Range end must be an integer, got ${init.end}`, span)
  }
  const step = init.step ?? 1
  if (!Number.isSafeInteger(step) || step <= 0) {
    throw new InvalidStepError(`Range step must be a positive integer, got ${step}`, span)
  }
  return step
}

/**
 * Validates range parts and freezes them into a {@link RangeSpec}.
 *
 * @throws {InvalidBoundError} If a bound is not a safe integer.
 * @throws {InvalidStepError} If the step is not a positive safe integer.
 * @throws {DirectionMismatchError} If the bounds contradict the direction.
 */
export const makeRangeSpec = (init: RangeInit, span?: Span): RangeSpec => {
  const step = checkRangeParts(init, span)
  if (contradictsDirection(init)) {
    const keyword = init.direction === 'ascending' ? 'to' : 'downto'
    throw new DirectionMismatchError(
      `Range ${init.start} ${keyword} ${init.end} runs against its ${init.direction} direction`,
      span
    )
  }
  return Object.freeze({
    start: init.start,
    end: init.end,
    direction: init.direction,
    step,
    inclusive: init.inclusive ?? true,
  })
}

const withinBound = (spec: RangeSpec, cursor: number): boolean => {
  if (spec.direction === 'ascending') {
    return spec.inclusive ? cursor <= spec.end : cursor < spec.end
  }
  return spec.inclusive ? cursor >= spec.end : cursor > spec.end
}

/**
 * Lazily produces the values of a range, one per pull.
 * Each call returns a fresh generator with its own cursor.
 *
 * @param spec - A validated range.
 * @yields The integers of the range in iteration order.
 */
export function* generate(spec: RangeSpec): Generator<number, void, undefined> {
  const delta = spec.direction === 'ascending' ? spec.step : -spec.step
  let cursor = spec.start
  while (withinBound(spec, cursor)) {
    yield cursor
    cursor += delta
  }
}
