/**
 * Signals module types
 * 
 * Core type definitions for the price indicator and signal classification module.
 */

// One trading-day observation (only date and close feed the indicators)
export interface PriceBar {
  date: string; // YYYY-MM-DD, strictly ascending within a series
  close: number;
  open?: number;
  high?: number;
  low?: number;
  volume?: number;
}

export type PriceSeries = readonly PriceBar[];

// One value per input bar; undefined until the rolling window has filled
export type IndicatorSeries = (number | undefined)[];

export interface BollingerBands {
  upper: IndicatorSeries;
  lower: IndicatorSeries;
}

export interface IndicatorSet {
  smaShort: IndicatorSeries;
  smaLong: IndicatorSeries;
  rsi: IndicatorSeries;
  bbUpper: IndicatorSeries;
  bbLower: IndicatorSeries;
  volatility: IndicatorSeries;
}

export interface AnalysisParams {
  smaShortWindow: number;
  smaLongWindow: number;
  rsiWindow: number;
  bollingerWindow: number;
  bollingerK: number;
  volatilityWindow: number;
}

// Signal states
export type TrendState = 'UPWARD' | 'DOWNWARD' | 'SIDEWAYS' | 'UNDETERMINED';

export type MomentumState = 'OVERBOUGHT' | 'OVERSOLD' | 'NEUTRAL' | 'UNDETERMINED';

export type VolatilityBandState =
  | 'ABOVE_UPPER_BAND'
  | 'BELOW_LOWER_BAND'
  | 'WITHIN_BANDS'
  | 'UNDETERMINED';

// Latest snapshot the classifier reads
export interface SignalInputs {
  close: number;
  smaShort?: number;
  smaLong?: number;
  rsi?: number;
  bbUpper?: number;
  bbLower?: number;
  volatility?: number;
}

export interface SignalState {
  trend: TrendState;
  momentum: MomentumState;
  volatilityBand: VolatilityBandState;
  volatilityLevel?: number; // undefined while the volatility window is still filling
}

// Row-per-bar view for tables and charts
export interface IndicatorRow {
  date: string;
  close: number;
  smaShort?: number;
  smaLong?: number;
  rsi?: number;
  bbUpper?: number;
  bbLower?: number;
  volatility?: number;
}

export interface SeriesAnalysis {
  params: AnalysisParams;
  indicators: IndicatorSet;
  latest: SignalInputs;
  signals: SignalState;
  rows: IndicatorRow[];
}

// Insight types
export type InsightTopic = 'trend' | 'momentum' | 'volatility' | 'bands';

export type InsightTone = 'success' | 'warning' | 'info';

export interface Insight {
  topic: InsightTopic;
  tone: InsightTone;
  message: string;
}
