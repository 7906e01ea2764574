import type { Float, Numeric, Pair } from './types.js'

/**
 * Positional pairing of two sequences, converted to `float`.
 * Stops at the shorter one; callers check lengths first.
 */
export function* zipFloat<X extends Numeric, Y extends Numeric>(xs: ArrayLike<X>, ys: ArrayLike<Y>, float: Float): Generator<Pair> {
  const n = Math.min(xs.length, ys.length)
  for (let i = 0; i < n; i++) {
    yield [float.from(xs[i]), float.from(ys[i])]
  }
}

/**
 * Pairs of `float` values read out of records through projection functions.
 * This exists to avoid copying the records into tuples.
 */
export function* projectFloat<T>(points: ArrayLike<T>, getX: (d: T) => Numeric, getY: (d: T) => Numeric, float: Float): Generator<Pair> {
  for (let i = 0; i < points.length; i++) {
    const point = points[i]
    yield [float.from(getX(point)), float.from(getY(point))]
  }
}
