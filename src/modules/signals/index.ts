/**
 * Signals module public surface
 */

export * from './engine';
export * from './data';
export { analyzeSeries, buildIndicatorRows } from './analyzeSeries';
export { describeSignals, DISCLAIMER, INDICATOR_NOTES } from './insights/describeSignals';
export type { IndicatorNote } from './insights/describeSignals';
export {
  formatCompanyInfo,
  COMPANY_INFO_FIELDS,
  COMPANY_INFO_NOTES,
} from './insights/formatCompanyInfo';
export { formatReport, formatInsight, formatIndicatorValue } from './insights/formatReport';
export {
  DEFAULT_ANALYSIS_PARAMS,
  validateAnalysisParams,
  getAnalysisParamsFromEnv,
} from './config';
export {
  SignalsError,
  InvalidInputError,
  InvalidParameterError,
  isSignalsError,
} from './errors';
export type { SignalsErrorCode } from './errors';
export type {
  PriceBar,
  PriceSeries,
  IndicatorSeries,
  IndicatorSet,
  BollingerBands,
  AnalysisParams,
  TrendState,
  MomentumState,
  VolatilityBandState,
  SignalInputs,
  SignalState,
  IndicatorRow,
  SeriesAnalysis,
  Insight,
  InsightTopic,
  InsightTone,
} from './types';
