/**
 * Rolling dispersion: standard deviation and Bollinger Bands
 * 
 * Both use the population standard deviation (divide by window), so the
 * volatility series is exactly the sigma inside the bands.
 */

import type { BollingerBands, IndicatorSeries } from '../types';
import { calcSMA, isConstantWindow } from './movingAverages';
import { assertBandMultiplier, assertWindow } from './parameters';

/**
 * Calculate rolling population standard deviation
 * 
 * @param values Array of numeric values
 * @param window Window size (number of periods)
 * @returns Array of std-dev values, undefined for first window-1 values
 */
export function calcRollingStdDev(values: readonly number[], window: number): IndicatorSeries {
  assertWindow(window, 'standard deviation window');

  return calcSMA(values, window).map((mean, i) => {
    if (mean === undefined) {
      return undefined;
    }
    if (isConstantWindow(values, i - window + 1, i)) {
      return 0;
    }
    const sumSq = values
      .slice(i - window + 1, i + 1)
      .reduce((acc, value) => acc + (value - mean) * (value - mean), 0);
    return Math.sqrt(sumSq / window);
  });
}

/**
 * Calculate Bollinger Bands: SMA +/- k standard deviations
 * 
 * @param values Array of numeric values
 * @param window Window size for both the SMA and the std-dev
 * @param k Band width in standard deviations
 */
export function calcBollingerBands(
  values: readonly number[],
  window: number,
  k: number
): BollingerBands {
  assertWindow(window, 'Bollinger window');
  assertBandMultiplier(k, 'Bollinger k');

  const middle = calcSMA(values, window);
  const sigma = calcRollingStdDev(values, window);

  const upper: IndicatorSeries = [];
  const lower: IndicatorSeries = [];

  for (let i = 0; i < values.length; i++) {
    const mean = middle[i];
    const sd = sigma[i];
    if (mean === undefined || sd === undefined) {
      upper.push(undefined);
      lower.push(undefined);
    } else {
      upper.push(mean + k * sd);
      lower.push(mean - k * sd);
    }
  }

  return { upper, lower };
}
