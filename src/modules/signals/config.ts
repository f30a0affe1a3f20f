/**
 * Analysis configuration
 * 
 * Indicator windows with environment overrides.
 */

import { assertBandMultiplier, assertWindow } from './engine/parameters';
import type { AnalysisParams } from './types';

export const DEFAULT_ANALYSIS_PARAMS: Readonly<AnalysisParams> = {
  smaShortWindow: 50,
  smaLongWindow: 200,
  rsiWindow: 14,
  bollingerWindow: 20,
  bollingerK: 2,
  volatilityWindow: 20,
};

const ENV_KEYS: Record<keyof AnalysisParams, string> = {
  smaShortWindow: 'SIGNALS_SMA_SHORT_WINDOW',
  smaLongWindow: 'SIGNALS_SMA_LONG_WINDOW',
  rsiWindow: 'SIGNALS_RSI_WINDOW',
  bollingerWindow: 'SIGNALS_BOLLINGER_WINDOW',
  bollingerK: 'SIGNALS_BOLLINGER_K',
  volatilityWindow: 'SIGNALS_VOLATILITY_WINDOW',
};

/**
 * @throws InvalidParameterError on a non-positive or fractional window, or a negative k
 */
export function validateAnalysisParams(params: AnalysisParams): void {
  assertWindow(params.smaShortWindow, 'smaShortWindow');
  assertWindow(params.smaLongWindow, 'smaLongWindow');
  assertWindow(params.rsiWindow, 'rsiWindow');
  assertWindow(params.bollingerWindow, 'bollingerWindow');
  assertBandMultiplier(params.bollingerK, 'bollingerK');
  assertWindow(params.volatilityWindow, 'volatilityWindow');
}

function readNumber(
  env: NodeJS.ProcessEnv,
  key: keyof AnalysisParams
): number {
  const name = ENV_KEYS[key];
  const fallback = DEFAULT_ANALYSIS_PARAMS[key];
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw.trim());
  if (!Number.isFinite(parsed)) {
    console.warn(`⚠️  Invalid ${name}="${raw}". Defaulting to ${fallback}.`);
    return fallback;
  }
  return parsed;
}

/**
 * Get analysis parameters, overridden from environment.
 * 
 * - Unset or blank: default
 * - Not a number: warn, default
 * - A number the engine cannot use (0, -5, 2.5 for a window): throws
 * 
 * @throws InvalidParameterError if an override is numeric but invalid
 */
export function getAnalysisParamsFromEnv(env: NodeJS.ProcessEnv = process.env): AnalysisParams {
  const params: AnalysisParams = {
    smaShortWindow: readNumber(env, 'smaShortWindow'),
    smaLongWindow: readNumber(env, 'smaLongWindow'),
    rsiWindow: readNumber(env, 'rsiWindow'),
    bollingerWindow: readNumber(env, 'bollingerWindow'),
    bollingerK: readNumber(env, 'bollingerK'),
    volatilityWindow: readNumber(env, 'volatilityWindow'),
  };
  validateAnalysisParams(params);
  return params;
}
