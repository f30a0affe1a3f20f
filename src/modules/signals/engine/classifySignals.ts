/**
 * Signal classification engine
 * 
 * Pure functions that map the latest indicator values to discrete states.
 * No I/O, no state between calls - pure logic.
 */

import type {
  IndicatorSeries,
  IndicatorSet,
  MomentumState,
  PriceSeries,
  SignalInputs,
  SignalState,
  TrendState,
  VolatilityBandState,
} from '../types';

export const RSI_OVERBOUGHT = 70;
export const RSI_OVERSOLD = 30;

function isKnown(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value);
}

/**
 * Last defined value of an indicator series, or undefined if none yet
 */
export function lastDefined(series: IndicatorSeries): number | undefined {
  for (let i = series.length - 1; i >= 0; i--) {
    const value = series[i];
    if (isKnown(value)) {
      return value;
    }
  }
  return undefined;
}

/**
 * Builds the classifier snapshot from the last close and the last defined
 * value of each indicator.
 */
export function latestSignalInputs(series: PriceSeries, indicators: IndicatorSet): SignalInputs {
  const lastBar = series[series.length - 1];
  return {
    close: lastBar === undefined ? Number.NaN : lastBar.close,
    smaShort: lastDefined(indicators.smaShort),
    smaLong: lastDefined(indicators.smaLong),
    rsi: lastDefined(indicators.rsi),
    bbUpper: lastDefined(indicators.bbUpper),
    bbLower: lastDefined(indicators.bbLower),
    volatility: lastDefined(indicators.volatility),
  };
}

/**
 * Classifies trend from the short and long SMA:
 * - UPWARD: short > long
 * - DOWNWARD: short < long
 * - SIDEWAYS: equal
 * - UNDETERMINED: if either value is missing
 */
export function classifyTrend(smaShort?: number, smaLong?: number): TrendState {
  if (!isKnown(smaShort) || !isKnown(smaLong)) {
    return 'UNDETERMINED';
  }
  if (smaShort > smaLong) {
    return 'UPWARD';
  }
  if (smaShort < smaLong) {
    return 'DOWNWARD';
  }
  return 'SIDEWAYS';
}

/**
 * Classifies momentum from RSI. 70 and 30 themselves are NEUTRAL.
 */
export function classifyMomentum(rsi?: number): MomentumState {
  if (!isKnown(rsi)) {
    return 'UNDETERMINED';
  }
  if (rsi > RSI_OVERBOUGHT) {
    return 'OVERBOUGHT';
  }
  if (rsi < RSI_OVERSOLD) {
    return 'OVERSOLD';
  }
  return 'NEUTRAL';
}

/**
 * Classifies the close against the Bollinger Bands. Touching a band counts
 * as WITHIN_BANDS.
 */
export function classifyVolatilityBand(
  close: number,
  upper?: number,
  lower?: number
): VolatilityBandState {
  if (!isKnown(close) || !isKnown(upper) || !isKnown(lower)) {
    return 'UNDETERMINED';
  }
  if (close > upper) {
    return 'ABOVE_UPPER_BAND';
  }
  if (close < lower) {
    return 'BELOW_LOWER_BAND';
  }
  return 'WITHIN_BANDS';
}

export function classifySignals(inputs: SignalInputs): SignalState {
  return {
    trend: classifyTrend(inputs.smaShort, inputs.smaLong),
    momentum: classifyMomentum(inputs.rsi),
    volatilityBand: classifyVolatilityBand(inputs.close, inputs.bbUpper, inputs.bbLower),
    volatilityLevel: isKnown(inputs.volatility) ? inputs.volatility : undefined,
  };
}
