/**
 * Relative Strength Index (Wilder)
 * 
 * Average gain/loss are seeded with the simple mean of the first `window`
 * changes, then smoothed: avg = (prev * (window - 1) + current) / window.
 */

import type { IndicatorSeries } from '../types';
import { assertWindow } from './parameters';

/**
 * RSI from smoothed averages. No losses gives 100; a flat window gives 50.
 */
export function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Calculate RSI
 * 
 * @param values Array of closes
 * @param window Number of price changes averaged (default 14)
 * @returns Array of RSI values in [0, 100]; the first `window` positions are undefined
 */
export function calcRSI(values: readonly number[], window = 14): IndicatorSeries {
  assertWindow(window, 'RSI window');

  const result: IndicatorSeries = values.map(() => undefined);
  if (values.length <= window) {
    return result;
  }

  const changes = values.slice(1).map((value, i) => value - values[i]);

  let gainSum = 0;
  let lossSum = 0;
  for (const change of changes.slice(0, window)) {
    gainSum += Math.max(change, 0);
    lossSum += Math.max(-change, 0);
  }

  let avgGain = gainSum / window;
  let avgLoss = lossSum / window;
  result[window] = rsiFromAverages(avgGain, avgLoss);

  // changes[i - 1] is the move into bar i
  for (let i = window + 1; i < values.length; i++) {
    const change = changes[i - 1];
    avgGain = (avgGain * (window - 1) + Math.max(change, 0)) / window;
    avgLoss = (avgLoss * (window - 1) + Math.max(-change, 0)) / window;
    result[i] = rsiFromAverages(avgGain, avgLoss);
  }

  return result;
}
