/**
 * Human-readable insights for signal states
 */

import { DEFAULT_ANALYSIS_PARAMS } from '../config';
import type { AnalysisParams, Insight, InsightTopic, SignalState } from '../types';

export const DISCLAIMER =
  'Disclaimer: This tool is intended for informational purposes only and should not be ' +
  'construed as financial advice. Investing in stocks involves risk, and past performance ' +
  'is not indicative of future results.';

export interface IndicatorNote {
  title: string;
  note: string;
}

// Fixed explanation shown next to each indicator
export const INDICATOR_NOTES: Record<InsightTopic, IndicatorNote> = {
  trend: {
    title: 'Moving Averages',
    note: 'Moving averages smooth out price data to help identify trends and potential support or resistance levels.',
  },
  momentum: {
    title: 'RSI',
    note: 'RSI indicates overbought (>70) or oversold (<30) conditions, potentially signaling price reversals.',
  },
  volatility: {
    title: 'Volatility',
    note: 'Volatility measures the rate at which the price of a security increases or decreases.',
  },
  bands: {
    title: 'Bollinger Bands',
    note: 'Bollinger Bands help identify volatility and overbought/oversold conditions.',
  },
};

type WindowParams = Pick<
  AnalysisParams,
  'smaShortWindow' | 'smaLongWindow' | 'rsiWindow' | 'bollingerWindow' | 'volatilityWindow'
>;

function describeTrend(signals: SignalState, params: WindowParams): Insight {
  const short = `${params.smaShortWindow}-day SMA`;
  const long = `${params.smaLongWindow}-day SMA`;

  switch (signals.trend) {
    case 'UPWARD':
      return {
        topic: 'trend',
        tone: 'success',
        message: `The stock is in an upward trend as the ${short} is above the ${long}.`,
      };
    case 'DOWNWARD':
      return {
        topic: 'trend',
        tone: 'warning',
        message: `The stock is in a downward trend as the ${short} is below the ${long}.`,
      };
    case 'SIDEWAYS':
      return {
        topic: 'trend',
        tone: 'info',
        message: `The stock is moving sideways as the ${short} is equal to the ${long}.`,
      };
    case 'UNDETERMINED':
      return {
        topic: 'trend',
        tone: 'info',
        message: `Not enough history to compare the ${short} with the ${long}.`,
      };
  }
}

function describeMomentum(signals: SignalState, params: WindowParams): Insight {
  switch (signals.momentum) {
    case 'OVERBOUGHT':
      return {
        topic: 'momentum',
        tone: 'warning',
        message: 'The RSI indicates that the stock is overbought (>70).',
      };
    case 'OVERSOLD':
      return {
        topic: 'momentum',
        tone: 'success',
        message: 'The RSI indicates that the stock is oversold (<30).',
      };
    case 'NEUTRAL':
      return { topic: 'momentum', tone: 'info', message: 'The RSI is in a neutral range.' };
    case 'UNDETERMINED':
      return {
        topic: 'momentum',
        tone: 'info',
        message: `Not enough history to compute the ${params.rsiWindow}-day RSI.`,
      };
  }
}

function describeVolatility(signals: SignalState, params: WindowParams): Insight {
  const label = `${params.volatilityWindow}-day standard deviation`;
  if (signals.volatilityLevel === undefined) {
    return {
      topic: 'volatility',
      tone: 'info',
      message: `Not enough history to compute the current volatility (${label}).`,
    };
  }
  return {
    topic: 'volatility',
    tone: 'info',
    message: `The current volatility (${label}) is ${signals.volatilityLevel.toFixed(2)}.`,
  };
}

function describeBands(signals: SignalState, params: WindowParams): Insight {
  switch (signals.volatilityBand) {
    case 'ABOVE_UPPER_BAND':
      return {
        topic: 'bands',
        tone: 'warning',
        message:
          'The price is above the upper Bollinger Band, indicating potential overbought conditions.',
      };
    case 'BELOW_LOWER_BAND':
      return {
        topic: 'bands',
        tone: 'success',
        message:
          'The price is below the lower Bollinger Band, indicating potential oversold conditions.',
      };
    case 'WITHIN_BANDS':
      return { topic: 'bands', tone: 'info', message: 'The price is within the Bollinger Bands.' };
    case 'UNDETERMINED':
      return {
        topic: 'bands',
        tone: 'info',
        message: `Not enough history to compute the ${params.bollingerWindow}-day Bollinger Bands.`,
      };
  }
}

/**
 * Insights in display order: trend, momentum, volatility, bands
 */
export function describeSignals(
  signals: SignalState,
  params: WindowParams = DEFAULT_ANALYSIS_PARAMS
): Insight[] {
  return [
    describeTrend(signals, params),
    describeMomentum(signals, params),
    describeVolatility(signals, params),
    describeBands(signals, params),
  ];
}
