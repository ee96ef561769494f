import { describe, it, expect } from 'vitest';
import { PolynomialInterpolator } from '@/lib/polynomial-interpolator';
import { isInterpolationError } from '@/lib/errors';
import { MS_PER_DAY } from '@/lib/constants';
import { FitState } from '@/types';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('PolynomialInterpolator', () => {
  it('should reproduce linear data', () => {
    const interpolator = PolynomialInterpolator.fromNumbers([1, 2, 3, 4, 5], [1, 2, 3, 4, 5]);
    interpolator.fit();

    expect(interpolator.interpolate(2.5)).toBeCloseTo(2.5, 10);
    expect(interpolator.interpolate(3.5)).toBeCloseTo(3.5, 10);
  });

  it('should reject queries outside of the range', () => {
    const interpolator = PolynomialInterpolator.fromNumbers([1, 2, 3, 4, 5], [1, 2, 3, 4, 5]);
    interpolator.fit();

    expect(isInterpolationError(thrown(() => interpolator.interpolate(6)), 'OUTSIDE_OF_RANGE')).toBe(true);
    expect(isInterpolationError(thrown(() => interpolator.interpolate(0)), 'OUTSIDE_OF_RANGE')).toBe(true);
  });

  it('should reproduce a quadratic exactly from three samples', () => {
    const interpolator = PolynomialInterpolator.fromNumbers([0, 1, 2], [0, 1, 4]);
    interpolator.fit();

    expect(interpolator.interpolate(1.5)).toBeCloseTo(2.25, 10);
    expect(interpolator.interpolate(0.5)).toBeCloseTo(0.25, 10);
  });

  it('should reproduce a cubic from unevenly spaced samples', () => {
    const cubic = (x: number): number => x * x * x - 2 * x + 1;
    const xs = [-2, -0.5, 1, 3];
    const interpolator = PolynomialInterpolator.fromNumbers(xs, xs.map(cubic));
    interpolator.fit();

    for (const q of [-1.75, 0, 0.3, 2.2]) {
      expect(interpolator.interpolate(q)).toBeCloseTo(cubic(q), 8);
    }
  });

  it('should compute the textbook weights for three equally spaced nodes', () => {
    const interpolator = PolynomialInterpolator.fromNumbers([0, 1, 2], [5, 6, 7]);
    interpolator.fit();

    // Nodes map to 0, 0.5, 1: raw weights 2, -4, 2, rescaled by the largest magnitude
    const weights = interpolator.weights();
    expect(weights).toHaveLength(3);
    expect(weights[0]).toBeCloseTo(0.5, 12);
    expect(weights[1]).toBeCloseTo(-1, 12);
    expect(weights[2]).toBeCloseTo(0.5, 12);
  });

  it('should keep weights finite for many samples', () => {
    const xs = Array.from({ length: 200 }, (_, i) => i);
    const interpolator = PolynomialInterpolator.fromNumbers(xs, xs.map(x => 2 * x + 1));
    interpolator.fit();

    const weights = interpolator.weights();
    expect(weights.every(w => Number.isFinite(w) && w !== 0)).toBe(true);
    expect(Math.max(...weights.map(Math.abs))).toBeCloseTo(1, 12);
    expect(interpolator.interpolate(0)).toBe(1);
  });

  it('should fit and query a large node set without weight underflow', () => {
    const xs = Array.from({ length: 1200 }, (_, i) => i);
    const interpolator = PolynomialInterpolator.fromNumbers(xs, xs.map(x => 2 * x + 1));
    interpolator.fit();

    expect(interpolator.state).toBe(FitState.FITTED);
    expect(interpolator.interpolate(0)).toBe(1);
    expect(interpolator.interpolate(1199)).toBe(2399);
    expect(interpolator.interpolate(599.5)).toBeCloseTo(1200, 4);
    expect(interpolator.interpolate(600.25)).toBeCloseTo(1201.5, 4);
  });

  it('should return stored values exactly on sample indices', () => {
    const xs = [0.5, 1.25, 2, 4.75];
    const ys = [1 / 3, 2 / 3, Math.E, Math.SQRT2];
    const interpolator = PolynomialInterpolator.fromNumbers(xs, ys);
    interpolator.fit();

    xs.forEach((x, i) => {
      expect(interpolator.interpolate(x)).toBe(ys[i]);
    });
  });

  it('should fail with NOT_FITTED before fit', () => {
    const interpolator = PolynomialInterpolator.fromNumbers([0, 1, 2], [0, 1, 4]);

    expect(interpolator.state).toBe(FitState.UNFITTED);
    expect(isInterpolationError(thrown(() => interpolator.interpolate(1.5)), 'NOT_FITTED')).toBe(true);
    expect(isInterpolationError(thrown(() => interpolator.weights()), 'NOT_FITTED')).toBe(true);
  });

  it('should still answer exact hits before fit', () => {
    const interpolator = PolynomialInterpolator.fromNumbers([0, 1, 2], [0, 1, 4]);

    expect(interpolator.interpolate(2)).toBe(4);
  });

  it('should invalidate the fit on addPoint and use the new sample after refit', () => {
    const interpolator = PolynomialInterpolator.fromNumbers([0, 2], [0, 4]);
    interpolator.fit();
    expect(interpolator.interpolate(1)).toBeCloseTo(2, 10);

    interpolator.addPoint(1, 1);
    expect(interpolator.state).toBe(FitState.UNFITTED);
    expect(isInterpolationError(thrown(() => interpolator.interpolate(1.5)), 'NOT_FITTED')).toBe(true);

    interpolator.fit();
    expect(interpolator.state).toBe(FitState.FITTED);
    expect(interpolator.interpolate(1.5)).toBeCloseTo(2.25, 10);
  });

  it('should give the same weights when fitted twice', () => {
    const interpolator = PolynomialInterpolator.fromNumbers([1, 3, 4, 9], [2, 0, 5, 1]);
    interpolator.fit();
    const first = interpolator.weights();
    interpolator.fit();

    expect(interpolator.weights()).toEqual(first);
  });

  it('should interpolate date-indexed samples by day count', () => {
    const start = new Date('2024-01-01T00:00:00Z');
    const days = [0, 10, 30];
    // Quadratic in days: v = 1 + d^2 / 100
    const interpolator = PolynomialInterpolator.fromDates(
      days.map(d => new Date(start.getTime() + d * MS_PER_DAY)),
      days.map(d => 1 + (d * d) / 100)
    );
    interpolator.fit();

    const query = new Date(start.getTime() + 20 * MS_PER_DAY);
    expect(interpolator.interpolate(query)).toBeCloseTo(5, 10);
  });

  it('should match linear interpolation with two date samples', () => {
    const interpolator = PolynomialInterpolator.fromDates(
      [new Date('1990-06-16'), new Date('1990-07-17')],
      [0.987, 0.9753]
    );
    interpolator.fit();

    expect(interpolator.interpolate(new Date('1990-06-20'))).toBeCloseTo(0.9855, 4);
  });
});
