/**
 * Yield curve and discount factor lookups built on the interpolation core.
 * Pure math, no I/O. Queries outside the curve fail; nothing is extrapolated.
 */

import type { YieldCurveAnalysis, YieldCurvePoint } from '@/types';
import { LONG_TENOR_YEARS, MEDIUM_TENOR_YEARS, SHORT_TENOR_YEARS } from './constants';
import { LinearInterpolator } from './linear-interpolator';

/**
 * Build a linear yield curve keyed on period in years
 */
export function createYieldCurve(curve: YieldCurvePoint[]): LinearInterpolator<number, number> {
  const interpolator = LinearInterpolator.fromNumbers(
    curve.map(p => p.period),
    curve.map(p => p.yield),
    'yield-curve'
  );
  interpolator.fit();
  return interpolator;
}

/**
 * Interpolate yield for a given maturity using linear interpolation
 */
export function interpolateYield(curve: YieldCurvePoint[], yearsToMaturity: number): number {
  return createYieldCurve(curve).interpolate(yearsToMaturity);
}

/**
 * Analyze yield curve shape
 * Returns info about curve inversion
 */
export function analyzeYieldCurve(curve: YieldCurvePoint[]): YieldCurveAnalysis {
  const interpolator = createYieldCurve(curve);

  const shortYield = interpolator.interpolate(SHORT_TENOR_YEARS);
  const mediumYield = interpolator.interpolate(MEDIUM_TENOR_YEARS);
  const longYield = interpolator.interpolate(LONG_TENOR_YEARS);

  const spreadShortLong = longYield - shortYield;
  const isInverted = spreadShortLong < 0;
  const isLongEndInverted = longYield < mediumYield;

  return {
    isInverted,
    isLongEndInverted,
    shortYield,
    mediumYield,
    longYield,
    spreadShortLong,
  };
}

/**
 * Discount factor on a date, interpolated by day-count ratio between pillar dates
 */
export function discountFactorAt(dates: Date[], factors: number[], date: Date): number {
  return LinearInterpolator.fromDates(dates, factors, 'discount-curve').interpolate(date);
}
