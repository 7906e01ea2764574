export type { Float, LinearFit, Numeric, Pair, Samples } from './types.js'
export { f32, f64 } from './float.js'
export { mean } from './mean.js'
export { linReg, linearRegression, linearRegressionOf, linearRegressionBy, predict } from './regression.js'
