/**
 * Indicator engine
 * 
 * Series-level entry points: validate the bars, pull the closes, run the
 * rolling calculations. Every output is index-aligned with the input and
 * the input is never mutated.
 */

import { validateAnalysisParams } from '../config';
import { validateSeries } from '../data/validateSeries';
import type {
  AnalysisParams,
  BollingerBands,
  IndicatorSeries,
  IndicatorSet,
  PriceSeries,
} from '../types';
import { calcSMA } from './movingAverages';
import { assertBandMultiplier, assertWindow } from './parameters';
import { calcRSI } from './rsi';
import { calcBollingerBands, calcRollingStdDev } from './volatility';

function closesOf(series: PriceSeries): number[] {
  validateSeries(series);
  return series.map((bar) => bar.close);
}

export function computeSMA(series: PriceSeries, window: number): IndicatorSeries {
  assertWindow(window, 'SMA window');
  return calcSMA(closesOf(series), window);
}

export function computeRSI(series: PriceSeries, window = 14): IndicatorSeries {
  assertWindow(window, 'RSI window');
  return calcRSI(closesOf(series), window);
}

export function computeBollingerBands(
  series: PriceSeries,
  window = 20,
  k = 2
): BollingerBands {
  assertWindow(window, 'Bollinger window');
  assertBandMultiplier(k, 'Bollinger k');
  return calcBollingerBands(closesOf(series), window, k);
}

export function computeRollingVolatility(series: PriceSeries, window = 20): IndicatorSeries {
  assertWindow(window, 'volatility window');
  return calcRollingStdDev(closesOf(series), window);
}

/**
 * Compute all six indicator series in one pass over a validated series
 */
export function computeIndicators(series: PriceSeries, params: AnalysisParams): IndicatorSet {
  validateAnalysisParams(params);

  const closes = closesOf(series);
  const bands = calcBollingerBands(closes, params.bollingerWindow, params.bollingerK);

  return {
    smaShort: calcSMA(closes, params.smaShortWindow),
    smaLong: calcSMA(closes, params.smaLongWindow),
    rsi: calcRSI(closes, params.rsiWindow),
    bbUpper: bands.upper,
    bbLower: bands.lower,
    volatility: calcRollingStdDev(closes, params.volatilityWindow),
  };
}
