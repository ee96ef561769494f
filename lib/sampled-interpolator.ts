import type { Logger } from 'pino';
import {
  FitState,
  type IndexCapability,
  type Interpolator,
  type InterpolatorOptions,
  type SamplePoint,
  type ValueCapability,
} from '@/types';
import { InterpolationError } from './errors';
import logger from './logger';

/**
 * Shared storage for interpolators over sorted samples.
 *
 * Keeps (index, value) pairs in one array, strictly ascending by index, so an
 * index and its value always move together. Every index is validated and
 * copied when it enters the set (construction or `addPoint`), so comparisons
 * during search never see an unorderable value and callers cannot reorder
 * stored indices by mutating them.
 * Subclasses supply the arithmetic between two bracketing samples.
 */
export abstract class SampledInterpolator<I, V, D = number> implements Interpolator<I, V> {
  protected readonly samples: SamplePoint<I, V>[];
  protected readonly indexCapability: IndexCapability<I, D>;
  protected readonly valueCapability: ValueCapability<V>;
  protected readonly log: Logger;
  private fitState: FitState = FitState.UNFITTED;

  constructor(indices: readonly I[], values: readonly V[], options: InterpolatorOptions<I, V, D>) {
    this.indexCapability = options.index;
    this.valueCapability = options.value;
    this.log = logger.child({ interpolator: options.name ?? this.constructor.name });

    if (indices.length !== values.length) {
      throw new InterpolationError(
        'UNEQUAL_LENGTH',
        `Index and value sequences differ in length: ${indices.length} vs ${values.length}`,
        { indexLength: indices.length, valueLength: values.length }
      );
    }
    if (indices.length === 0) {
      throw new InterpolationError('EMPTY_SAMPLES', 'Cannot interpolate without samples');
    }

    const cap = this.indexCapability;
    const pairs: SamplePoint<I, V>[] = [];
    const valueEntries = values[Symbol.iterator]();
    for (const [position, index] of indices.entries()) {
      this.assertComparable(index, { position });
      const next = valueEntries.next();
      if (next.done) {
        throw new InterpolationError('UNEQUAL_LENGTH', `Missing value at position ${position}`, { position });
      }
      pairs.push({ index: this.copyIndex(index), value: next.value });
    }

    pairs.sort((a, b) => cap.compare(a.index, b.index));

    for (let i = 1; i < pairs.length; i++) {
      const prev = pairs[i - 1];
      const curr = pairs[i];
      if (prev && curr && cap.compare(prev.index, curr.index) === 0) {
        throw new InterpolationError(
          'DUPLICATE_INDEX',
          `Duplicate index ${this.indexCapability.format(curr.index)}`,
          { index: this.indexCapability.format(curr.index) }
        );
      }
    }

    this.samples = pairs;

    this.log.debug({ samples: this.samples.length }, 'Interpolator created');
  }

  get size(): number {
    return this.samples.length;
  }

  get state(): FitState {
    return this.fitState;
  }

  points(): SamplePoint<I, V>[] {
    return this.samples.map(s => ({ index: this.copyIndex(s.index), value: s.value }));
  }

  /**
   * Prepare for queries. Safe to call repeatedly.
   */
  fit(): void {
    this.prepare();
    this.fitState = FitState.FITTED;
    this.log.debug({ samples: this.samples.length }, 'Interpolator fitted');
  }

  range(): [min: I, max: I] {
    return [this.copyIndex(this.sampleAt(0).index), this.copyIndex(this.sampleAt(this.samples.length - 1).index)];
  }

  /**
   * Insert a sample at its ordered position.
   * Index and value go in at the same position; the fit is invalidated.
   */
  addPoint(index: I, value: V): void {
    this.assertComparable(index, {});

    const position = this.insertionPosition(index);
    const existing = this.samples[position];
    if (existing && this.indexCapability.compare(existing.index, index) === 0) {
      throw new InterpolationError(
        'DUPLICATE_INDEX',
        `Index ${this.indexCapability.format(index)} is already sampled`,
        { index: this.indexCapability.format(index), position }
      );
    }

    this.samples.splice(position, 0, { index: this.copyIndex(index), value });
    this.fitState = FitState.UNFITTED;
    this.invalidate();

    this.log.debug({ position, samples: this.samples.length }, 'Sample inserted');
  }

  interpolate(query: I): V {
    this.assertComparable(query, {});

    const cap = this.indexCapability;
    const min = this.sampleAt(0).index;
    const max = this.sampleAt(this.samples.length - 1).index;
    if (cap.compare(query, min) < 0 || cap.compare(query, max) > 0) {
      const details = { query: cap.format(query), min: cap.format(min), max: cap.format(max) };
      this.log.warn(details, 'Query outside of range');
      throw new InterpolationError(
        'OUTSIDE_OF_RANGE',
        `Query ${details.query} is outside of [${details.min}, ${details.max}]`,
        details
      );
    }

    const right = this.insertionPosition(query);
    const hit = this.sampleAt(right);
    // Exact hits return the stored value untouched
    if (cap.compare(hit.index, query) === 0) {
      return hit.value;
    }

    return this.interpolateBetween(query, right);
  }

  /**
   * Compute the value for a query strictly inside the range that is not a stored index.
   * `right` is the position of the first stored index above the query (always >= 1).
   */
  protected abstract interpolateBetween(query: I, right: number): V;

  /** Work done by `fit` before the state turns FITTED */
  protected prepare(): void {}

  /** Drop anything derived from the previous sample set */
  protected invalidate(): void {}

  protected sampleAt(position: number): SamplePoint<I, V> {
    const sample = this.samples[position];
    if (!sample) {
      throw new RangeError(`No sample at position ${position} (size ${this.samples.length})`);
    }
    return sample;
  }

  /**
   * First position whose index is not below `query` (lower bound)
   */
  protected insertionPosition(query: I): number {
    const cap = this.indexCapability;
    let lo = 0;
    let hi = this.samples.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const sample = this.samples[mid];
      if (sample && cap.compare(sample.index, query) < 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  private copyIndex(index: I): I {
    return this.indexCapability.copy ? this.indexCapability.copy(index) : index;
  }

  private assertComparable(index: I, details: Record<string, unknown>): void {
    if (!this.indexCapability.isComparable(index)) {
      throw new InterpolationError(
        'INCOMPARABLE_INDEX',
        `Index ${this.indexCapability.format(index)} cannot be ordered`,
        { ...details, index: this.indexCapability.format(index) }
      );
    }
  }
}
