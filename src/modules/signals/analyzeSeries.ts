/**
 * Series analysis pipeline
 * 
 * Validates a price series, computes indicators, classifies the latest
 * observation and lays the results out one row per bar.
 * 
 * Steps:
 * 1. Validate parameters, then bars
 * 2. Compute SMA short/long, RSI, Bollinger Bands, volatility on closes
 * 3. Take the last close and last defined indicator values
 * 4. Classify trend, momentum and band position
 * 5. Build index-aligned rows
 */

import { DEFAULT_ANALYSIS_PARAMS } from './config';
import { classifySignals, latestSignalInputs } from './engine/classifySignals';
import { computeIndicators } from './engine/indicatorEngine';
import type {
  AnalysisParams,
  IndicatorRow,
  IndicatorSet,
  PriceSeries,
  SeriesAnalysis,
} from './types';

export function buildIndicatorRows(series: PriceSeries, indicators: IndicatorSet): IndicatorRow[] {
  return series.map((bar, i) => ({
    date: bar.date,
    close: bar.close,
    smaShort: indicators.smaShort[i],
    smaLong: indicators.smaLong[i],
    rsi: indicators.rsi[i],
    bbUpper: indicators.bbUpper[i],
    bbLower: indicators.bbLower[i],
    volatility: indicators.volatility[i],
  }));
}

/**
 * Analyze a series. Nothing is cached: every call recomputes from the bars.
 * 
 * @throws InvalidInputError for an empty or malformed series
 * @throws InvalidParameterError for unusable parameters
 */
export function analyzeSeries(
  series: PriceSeries,
  overrides: Partial<AnalysisParams> = {}
): SeriesAnalysis {
  const params: AnalysisParams = { ...DEFAULT_ANALYSIS_PARAMS, ...overrides };
  const indicators = computeIndicators(series, params);
  const latest = latestSignalInputs(series, indicators);

  return {
    params,
    indicators,
    latest,
    signals: classifySignals(latest),
    rows: buildIndicatorRows(series, indicators),
  };
}
