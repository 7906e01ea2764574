// Element types that can be converted to a working float
export type Numeric = number | bigint

// Arrays and typed arrays: indexable, with a length, and iterable
export type Samples<T> = ArrayLike<T> & Iterable<T>

export type Pair<X extends Numeric = number, Y extends Numeric = number> = readonly [X, Y]

export interface LinearFit {
  slope: number
  intercept: number
}

/**
 * Working floating-point precision.
 * All arithmetic of a regression goes through one of these, so results carry
 * the rounding of the chosen precision.
 */
export interface Float {
  zero: number
  from(value: Numeric): number
  // Exact conversion of an element count, undefined when it would round
  fromCount(n: number): number | undefined
  add(a: number, b: number): number
  sub(a: number, b: number): number
  mul(a: number, b: number): number
  div(a: number, b: number): number
  isNaN(value: number): boolean
}
