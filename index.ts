export { FitState } from './types';
export type {
  IndexCapability,
  InterpolationErrorCode,
  Interpolator,
  InterpolatorOptions,
  SamplePoint,
  ValueCapability,
  YieldCurveAnalysis,
  YieldCurvePoint,
} from './types';
export { dateIndex, numberIndex, numberValue } from './lib/capabilities';
export { InterpolationError, isInterpolationError } from './lib/errors';
export { SampledInterpolator } from './lib/sampled-interpolator';
export { LinearInterpolator } from './lib/linear-interpolator';
export { PolynomialInterpolator } from './lib/polynomial-interpolator';
export { analyzeYieldCurve, createYieldCurve, discountFactorAt, interpolateYield } from './lib/yield-curve';
export { logger } from './lib/logger';
