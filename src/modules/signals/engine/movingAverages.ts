/**
 * Moving average calculations
 * 
 * Pure functions over plain close arrays. Each trailing window is summed
 * afresh (O(n * window)), which is plenty for a year or two of daily bars.
 * Sums are compensated so windows of different lengths agree on a flat run.
 */

import type { IndicatorSeries } from '../types';
import { assertWindow } from './parameters';

/**
 * True when values[start..end] all hold the same number
 */
export function isConstantWindow(values: readonly number[], start: number, end: number): boolean {
  const first = values[start];
  for (let j = start + 1; j <= end; j++) {
    if (values[j] !== first) {
      return false;
    }
  }
  return true;
}

/**
 * Kahan-compensated sum of values[start..end] inclusive
 */
function windowSum(values: readonly number[], start: number, end: number): number {
  let sum = 0;
  let compensation = 0;
  for (let j = start; j <= end; j++) {
    const y = values[j] - compensation;
    const t = sum + y;
    compensation = t - sum - y;
    sum = t;
  }
  return sum;
}

/**
 * Mean of values[start..end] inclusive. A run of one price averages to
 * exactly that price, whatever the window length.
 */
export function windowMean(values: readonly number[], start: number, end: number): number {
  if (isConstantWindow(values, start, end)) {
    return values[end];
  }
  return windowSum(values, start, end) / (end - start + 1);
}

/**
 * Calculate Simple Moving Average (SMA)
 * 
 * @param values Array of numeric values
 * @param window Window size (number of periods)
 * @returns Array of SMA values (same length as input, undefined for first window-1 values).
 *   A window longer than the input gives an all-undefined array.
 * @throws InvalidParameterError if window is not a positive integer
 */
export function calcSMA(values: readonly number[], window: number): IndicatorSeries {
  assertWindow(window, 'SMA window');

  const result: IndicatorSeries = [];

  for (let i = 0; i < values.length; i++) {
    if (i < window - 1) {
      result.push(undefined);
    } else {
      result.push(windowMean(values, i - window + 1, i));
    }
  }

  return result;
}
