import type { Float, Numeric } from './types.js'

// IEEE double, native JS arithmetic
export const f64: Float = {
  zero: 0,
  from: (value: Numeric) => Number(value),
  fromCount: (n: number) => Number.isSafeInteger(n) ? n : undefined,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  isNaN: (value) => Number.isNaN(value)
}

/**
 * IEEE single precision.
 * Each operation is computed in double and rounded once with Math.fround,
 * which gives the correctly rounded single-precision result for + - * /.
 */
export const f32: Float = {
  zero: 0,
  from: (value: Numeric) => Math.fround(Number(value)),
  fromCount: (n: number) => Number.isSafeInteger(n) && Math.fround(n) === n ? n : undefined,
  add: (a, b) => Math.fround(a + b),
  sub: (a, b) => Math.fround(a - b),
  mul: (a, b) => Math.fround(a * b),
  div: (a, b) => Math.fround(a / b),
  isNaN: (value) => Number.isNaN(value)
}
