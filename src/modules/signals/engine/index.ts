/**
 * Signals engine exports
 * 
 * Pure engine functions - no I/O, no network.
 */

export { calcSMA } from './movingAverages';
export { calcRollingStdDev, calcBollingerBands } from './volatility';
export { calcRSI, rsiFromAverages } from './rsi';
export { assertWindow, assertBandMultiplier } from './parameters';
export {
  computeSMA,
  computeRSI,
  computeBollingerBands,
  computeRollingVolatility,
  computeIndicators,
} from './indicatorEngine';
export {
  classifyTrend,
  classifyMomentum,
  classifyVolatilityBand,
  classifySignals,
  lastDefined,
  latestSignalInputs,
  RSI_OVERBOUGHT,
  RSI_OVERSOLD,
} from './classifySignals';
