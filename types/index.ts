/** A single sample on the index axis */
export interface SamplePoint<I, V> {
  index: I;
  value: V;
}

/**
 * What an index type has to supply.
 * `D` is the delta between two indices (a number for plain numbers,
 * a day count for dates); two deltas divide into a dimensionless ratio.
 */
export interface IndexCapability<I, D = number> {
  /** Negative, zero or positive; never NaN for two comparable values */
  compare(a: I, b: I): number;
  /** False for values that cannot be ordered at all (NaN, invalid Date) */
  isComparable(x: I): boolean;
  delta(from: I, to: I): D;
  ratio(numerator: D, denominator: D): number;
  /** Used in error messages and log lines */
  format(x: I): string;
  /** Copy of a mutable index; omitted for immutable ones such as numbers */
  copy?(x: I): I;
}

/** What a value type has to supply */
export interface ValueCapability<V> {
  add(a: V, b: V): V;
  subtract(a: V, b: V): V;
  scale(value: V, ratio: number): V;
}

export enum FitState {
  UNFITTED = 'UNFITTED',
  FITTED = 'FITTED', // ready for queries
}

export type InterpolationErrorCode =
  | 'UNEQUAL_LENGTH'
  | 'EMPTY_SAMPLES'
  | 'INCOMPARABLE_INDEX'
  | 'DUPLICATE_INDEX'
  | 'OUTSIDE_OF_RANGE'
  | 'NOT_FITTED'
  | 'WEIGHTS_NOT_FINITE';

/** Capabilities and label an interpolator is built with */
export interface InterpolatorOptions<I, V, D = number> {
  index: IndexCapability<I, D>;
  value: ValueCapability<V>;
  /** Label attached to log lines */
  name?: string;
}

/**
 * Operation set every interpolation strategy exposes.
 * Failures are thrown as `InterpolationError`.
 */
export interface Interpolator<I, V> {
  /** Prepare for queries. Idempotent. */
  fit(): void;
  /** Inclusive domain covered by the stored samples */
  range(): [min: I, max: I];
  /** Insert a sample keeping indices ascending */
  addPoint(index: I, value: V): void;
  interpolate(query: I): V;
  readonly size: number;
  readonly state: FitState;
  /** Copy of the stored samples in ascending index order */
  points(): SamplePoint<I, V>[];
}

/** Yield curve point */
export interface YieldCurvePoint {
  /** Period in years */
  period: number;
  /** Yield in percent */
  yield: number;
}

/** Shape summary of a yield curve */
export interface YieldCurveAnalysis {
  /** Is curve inverted (short > long) */
  isInverted: boolean;
  /** Is long end inverted (5y > 15y) */
  isLongEndInverted: boolean;
  /** Short-term yield (1y) */
  shortYield: number;
  /** Medium-term yield (5y) */
  mediumYield: number;
  /** Long-term yield (15y) */
  longYield: number;
  /** Spread between short and long */
  spreadShortLong: number;
}
