import type { Span } from '../ast'
import { generate, type RangeSpec } from '../range'
import { callHost } from './common'
import type { CollectionSource } from './types'

/**
 * The pull interface every for-loop drives, whatever its values come from.
 * Each `next` pulls exactly one element; nothing is read ahead.
 */
export interface LoopSource<V> {
  next(): Promise<IteratorResult<V, undefined>>
  /** Discards the rest of the sequence. Safe to call more than once. */
  close(): Promise<void>
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined }

/**
 * Adapts a range to a loop source, lifting each integer into the host's value type.
 *
 * @param spec - The validated range; a fresh generator is made for this source alone.
 * @param lift - Converts an integer into a host value.
 * @param span - Blamed when `lift` fails.
 */
export const fromRange = <V>(
  spec: RangeSpec,
  lift: (n: number) => V,
  span?: Span
): LoopSource<V> => {
  const cursor = generate(spec)
  let closed = false
  return {
    next: async () => {
      if (closed) return DONE
      const step = cursor.next()
      if (step.done) {
        closed = true
        return DONE
      }
      const value = await callHost('range value', span, () => lift(step.value))
      return { done: false, value }
    },
    close: async () => {
      closed = true
      cursor.return()
    },
  }
}

const isAsyncIterable = <V>(source: CollectionSource<V>): source is AsyncIterable<V> =>
  typeof source === 'object' && source !== null && Symbol.asyncIterator in source

/**
 * Adapts a host collection (sync or async iterable) to a loop source.
 * Pulling from the collection is host code, so failures surface as evaluation errors.
 */
export const fromCollection = <V>(source: CollectionSource<V>, span?: Span): LoopSource<V> => {
  const iterator: Iterator<V> | AsyncIterator<V> = isAsyncIterable(source)
    ? source[Symbol.asyncIterator]()
    : source[Symbol.iterator]()
  let closed = false
  return {
    next: async () => {
      if (closed) return DONE
      let step: IteratorResult<V>
      try {
        step = await callHost('collection element', span, () => iterator.next())
      } catch (err) {
        // an iterator that threw from next() is already finished
        closed = true
        throw err
      }
      if (step.done) {
        closed = true
        return DONE
      }
      return { done: false, value: step.value }
    },
    close: async () => {
      if (closed) return
      closed = true
      await callHost('collection close', span, () => iterator.return?.())
    },
  }
}
