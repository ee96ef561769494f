import type { InterpolatorOptions, SamplePoint } from '@/types';
import { dateIndex, numberIndex, numberValue } from './capabilities';
import { SampledInterpolator } from './sampled-interpolator';

/**
 * Piecewise-linear interpolation between the two samples bracketing the query.
 *
 * Works for any index type with a delta/ratio (numbers, dates); only the
 * immediate neighbours take part in a query, so `fit` has nothing to compute
 * and inserted points are usable straight away.
 */
export class LinearInterpolator<I, V, D = number> extends SampledInterpolator<I, V, D> {
  /**
   * Number-indexed, number-valued interpolator
   */
  static fromNumbers(indices: readonly number[], values: readonly number[], name?: string): LinearInterpolator<number, number> {
    return new LinearInterpolator(indices, values, { index: numberIndex, value: numberValue, name });
  }

  /**
   * Date-indexed interpolator; ratios are day-count ratios
   */
  static fromDates(dates: readonly Date[], values: readonly number[], name?: string): LinearInterpolator<Date, number> {
    return new LinearInterpolator(dates, values, { index: dateIndex, value: numberValue, name });
  }

  static fromPoints<I, V, D = number>(
    points: readonly SamplePoint<I, V>[],
    options: InterpolatorOptions<I, V, D>
  ): LinearInterpolator<I, V, D> {
    return new LinearInterpolator(
      points.map(p => p.index),
      points.map(p => p.value),
      options
    );
  }

  protected interpolateBetween(query: I, right: number): V {
    const l = this.sampleAt(right - 1);
    const r = this.sampleAt(right);
    const cap = this.indexCapability;
    const values = this.valueCapability;

    const deltaValue = values.subtract(r.value, l.value);
    const ratio = cap.ratio(cap.delta(l.index, query), cap.delta(l.index, r.index));

    return values.add(l.value, values.scale(deltaValue, ratio));
  }
}
