import { FitState, type InterpolatorOptions, type SamplePoint } from '@/types';
import { dateIndex, numberIndex, numberValue } from './capabilities';
import { InterpolationError } from './errors';
import { SampledInterpolator } from './sampled-interpolator';

/**
 * Lagrange polynomial interpolation through every sample, evaluated with the
 * barycentric formula of Berrut and Trefethen ("Barycentric Lagrange Interpolation").
 *
 *   p(t) = Σ (w_i / (t - t_i)) y_i / Σ (w_i / (t - t_i)),   w_i = 1 / Π_{j≠i} (t_i - t_j)
 *
 * Indices are mapped onto [0, 1] through the index delta/ratio, so dates and
 * numbers share the same arithmetic. Weights are computed by `fit` and dropped
 * by `addPoint`; querying without a current fit fails with NOT_FITTED.
 */
export class PolynomialInterpolator<I, V, D = number> extends SampledInterpolator<I, V, D> {
  /** Normalised sample positions in [0, 1] */
  private nodes: number[] | null = null;
  /** log|w_i|; weights themselves under/overflow once there are a few hundred nodes */
  private logWeights: number[] | null = null;
  /** sign(w_i) */
  private weightSigns: number[] | null = null;

  static fromNumbers(indices: readonly number[], values: readonly number[], name?: string): PolynomialInterpolator<number, number> {
    return new PolynomialInterpolator(indices, values, { index: numberIndex, value: numberValue, name });
  }

  static fromDates(dates: readonly Date[], values: readonly number[], name?: string): PolynomialInterpolator<Date, number> {
    return new PolynomialInterpolator(dates, values, { index: dateIndex, value: numberValue, name });
  }

  static fromPoints<I, V, D = number>(
    points: readonly SamplePoint<I, V>[],
    options: InterpolatorOptions<I, V, D>
  ): PolynomialInterpolator<I, V, D> {
    return new PolynomialInterpolator(
      points.map(p => p.index),
      points.map(p => p.value),
      options
    );
  }

  /**
   * Weights of the current fit, in sample order, rescaled so the largest
   * magnitude is 1. Weights far below that round to 0 here; queries use the
   * log-magnitudes and are not affected.
   */
  weights(): number[] {
    const logWeights = this.logWeights;
    const signs = this.weightSigns;
    if (this.state !== FitState.FITTED || !logWeights || !signs) {
      throw new InterpolationError('NOT_FITTED', 'Barycentric weights are not computed, call fit() first');
    }
    const maxLog = Math.max(...logWeights);
    return logWeights.map((logW, i) => (signs[i] ?? 1) * Math.exp(logW - maxLog));
  }

  protected prepare(): void {
    const nodes = this.normalisedNodes();
    const n = nodes.length;

    const logWeights: number[] = [];
    const signs: number[] = [];
    for (let i = 0; i < n; i++) {
      const ti = nodes[i] ?? 0;
      let logSum = 0;
      let sign = 1;
      for (let j = 0; j < n; j++) {
        if (j === i) continue;
        const diff = ti - (nodes[j] ?? 0);
        if (diff < 0) sign = -sign;
        logSum += Math.log(Math.abs(diff));
      }
      logWeights.push(-logSum);
      signs.push(sign);
    }

    // Only an index axis whose deltas are not finite gets here (e.g. an infinite index)
    const badPosition = logWeights.findIndex(logW => !Number.isFinite(logW));
    if (badPosition !== -1) {
      throw new InterpolationError(
        'WEIGHTS_NOT_FINITE',
        `Barycentric weight at position ${badPosition} is not finite`,
        { position: badPosition, samples: n }
      );
    }

    this.nodes = nodes;
    this.logWeights = logWeights;
    this.weightSigns = signs;
    this.log.debug({ samples: n }, 'Barycentric weights computed');
  }

  protected invalidate(): void {
    this.nodes = null;
    this.logWeights = null;
    this.weightSigns = null;
  }

  protected interpolateBetween(query: I, _right: number): V {
    const nodes = this.nodes;
    const logWeights = this.logWeights;
    const signs = this.weightSigns;
    if (this.state !== FitState.FITTED || !nodes || !logWeights || !signs) {
      throw new InterpolationError(
        'NOT_FITTED',
        'Interpolator is not fitted for the current samples, call fit() first',
        { samples: this.size }
      );
    }

    const t = this.normalise(query);

    // log|w_i / (t - t_i)| and its sign; the largest term is factored out
    // before exp and cancels between numerator and denominator
    const logTerms: number[] = [];
    const termSigns: number[] = [];
    for (let i = 0; i < nodes.length; i++) {
      const diff = t - (nodes[i] ?? 0);
      // Distinct indices can still land on the same normalised position
      if (diff === 0) {
        return this.sampleAt(i).value;
      }
      logTerms.push((logWeights[i] ?? 0) - Math.log(Math.abs(diff)));
      termSigns.push(diff < 0 ? -(signs[i] ?? 1) : (signs[i] ?? 1));
    }
    const maxLog = Math.max(...logTerms);

    const values = this.valueCapability;
    let numerator: V | undefined;
    let denominator = 0;
    for (let i = 0; i < logTerms.length; i++) {
      const coefficient = (termSigns[i] ?? 1) * Math.exp((logTerms[i] ?? 0) - maxLog);
      const term = values.scale(this.sampleAt(i).value, coefficient);
      numerator = numerator === undefined ? term : values.add(numerator, term);
      denominator += coefficient;
    }

    if (numerator === undefined) {
      throw new RangeError('No samples to interpolate');
    }
    return values.scale(numerator, 1 / denominator);
  }

  private normalisedNodes(): number[] {
    if (this.size === 1) {
      return [0];
    }
    return this.samples.map(s => this.normalise(s.index));
  }

  private normalise(x: I): number {
    const cap = this.indexCapability;
    const min = this.sampleAt(0).index;
    const max = this.sampleAt(this.size - 1).index;
    return cap.ratio(cap.delta(min, x), cap.delta(min, max));
  }
}
