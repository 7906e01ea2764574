import type { Float, Numeric } from './types.js'
import { f64 } from './float.js'

/**
 * Arithmetic mean of a sequence, accumulated left to right in `float` precision.
 * Accepts any iterable, so a generator projecting one field out of pairs works
 * without building an intermediate array.
 * Returns undefined for an empty sequence or a count `float` cannot hold exactly.
 */
export function mean<T extends Numeric>(values: Iterable<T>, float: Float = f64): number | undefined {
  let total = float.zero
  let count = 0
  for (const value of values) {
    total = float.add(total, float.from(value))
    count++
  }
  if (count === 0) return undefined
  const n = float.fromCount(count)
  if (n === undefined) return undefined
  return float.div(total, n)
}
