import type { Float, LinearFit, Numeric, Pair, Samples } from './types.js'
import { f64 } from './float.js'
import { mean } from './mean.js'
import { projectFloat, zipFloat } from './utils.js'

/**
 * Least squares line through pairs whose means are already known.
 *
 * Returns undefined when the slope is NaN or infinite, i.e. the x values have
 * no spread (a single point, or every x equal) or the line is too steep to
 * represent. The means imply at least one pair.
 */
export function linReg(xys: Iterable<Pair>, xMean: number, yMean: number, float: Float = f64): LinearFit | undefined {
  // SUM (x - mean(x))^2
  let xxm2 = float.zero
  // SUM (x - mean(x)) (y - mean(y))
  let xmym2 = float.zero

  for (const [x, y] of xys) {
    const dx = float.sub(x, xMean)
    xxm2 = float.add(xxm2, float.mul(dx, dx))
    xmym2 = float.add(xmym2, float.mul(dx, float.sub(y, yMean)))
  }

  // divide-by-zero is checked after the fact
  const slope = float.div(xmym2, xxm2)
  if (float.isNaN(slope) || !Number.isFinite(slope)) return undefined

  const intercept = float.sub(yMean, float.mul(slope, xMean))
  return { slope, intercept }
}

/**
 * Linear regression from two sequences, one of x and one of y values.
 *
 * Returns undefined if the sequences differ in length, either is empty, the
 * count cannot be represented in `float`, or the slope is undefined.
 */
export function linearRegression<X extends Numeric, Y extends Numeric>(xs: Samples<X>, ys: Samples<Y>, float: Float = f64): LinearFit | undefined {
  if (xs.length !== ys.length) return undefined

  // an empty axis has no mean
  const xMean = mean(xs, float)
  if (xMean === undefined) return undefined
  const yMean = mean(ys, float)
  if (yMean === undefined) return undefined

  return linReg(zipFloat(xs, ys, float), xMean, yMean, float)
}

/**
 * Fused mean pass over records: both sums in one walk, so the data is
 * traversed once before the regression pass instead of once per axis.
 */
function meansOf<T>(points: ArrayLike<T>, getX: (d: T) => Numeric, getY: (d: T) => Numeric, float: Float): Pair | undefined {
  if (points.length === 0) return undefined
  const n = float.fromCount(points.length)
  if (n === undefined) return undefined

  let sumX = float.zero
  let sumY = float.zero
  for (let i = 0; i < points.length; i++) {
    const point = points[i]
    sumX = float.add(sumX, float.from(getX(point)))
    sumY = float.add(sumY, float.from(getY(point)))
  }
  return [float.div(sumX, n), float.div(sumY, n)]
}

/**
 * Linear regression from a sequence of (x, y) pairs.
 *
 * Returns undefined if `xys` is empty, the count cannot be represented in
 * `float`, or the slope is undefined.
 */
export function linearRegressionOf<X extends Numeric, Y extends Numeric>(xys: ArrayLike<Pair<X, Y>>, float: Float = f64): LinearFit | undefined {
  return linearRegressionBy(xys, (xy) => xy[0], (xy) => xy[1], float)
}

/**
 * Linear regression over arbitrary records, reading x and y through
 * projection functions. Same rules as linearRegressionOf.
 */
export function linearRegressionBy<T>(points: ArrayLike<T>, getX: (d: T) => Numeric, getY: (d: T) => Numeric, float: Float = f64): LinearFit | undefined {
  const means = meansOf(points, getX, getY, float)
  if (means === undefined) return undefined
  const [xMean, yMean] = means
  return linReg(projectFloat(points, getX, getY, float), xMean, yMean, float)
}

export function predict(fit: LinearFit, x: Numeric, float: Float = f64): number {
  return float.add(float.mul(fit.slope, float.from(x)), fit.intercept)
}
