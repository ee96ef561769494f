import type { IndexCapability, ValueCapability } from '@/types';
import { MS_PER_DAY } from './constants';

/** Plain numbers as index: delta is subtraction */
export const numberIndex: IndexCapability<number, number> = {
  // Relational, not subtraction: Infinity - Infinity is NaN
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  isComparable: (x) => !Number.isNaN(x),
  delta: (from, to) => to - from,
  ratio: (numerator, denominator) => numerator / denominator,
  format: (x) => String(x),
};

/**
 * Calendar dates as index.
 * Delta is a signed day count, so a ratio of deltas is a day-count ratio.
 */
export const dateIndex: IndexCapability<Date, number> = {
  compare: (a, b) => a.getTime() - b.getTime(),
  isComparable: (x) => !Number.isNaN(x.getTime()),
  delta: (from, to) => (to.getTime() - from.getTime()) / MS_PER_DAY,
  ratio: (numerator, denominator) => numerator / denominator,
  format: (x) => (Number.isNaN(x.getTime()) ? 'Invalid Date' : x.toISOString()),
  copy: (x) => new Date(x.getTime()),
};

export const numberValue: ValueCapability<number> = {
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  scale: (value, ratio) => value * ratio,
};
