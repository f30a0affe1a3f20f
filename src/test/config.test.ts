// Analysis Config Tests
import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_ANALYSIS_PARAMS,
  getAnalysisParamsFromEnv,
  validateAnalysisParams,
} from '@/modules/signals/config';
import { InvalidParameterError } from '@/modules/signals/errors';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('getAnalysisParamsFromEnv', () => {
  it('should use the defaults when nothing is set', () => {
    expect(getAnalysisParamsFromEnv({})).toEqual({
      smaShortWindow: 50,
      smaLongWindow: 200,
      rsiWindow: 14,
      bollingerWindow: 20,
      bollingerK: 2,
      volatilityWindow: 20,
    });
  });

  it('should apply numeric overrides', () => {
    const params = getAnalysisParamsFromEnv({
      SIGNALS_RSI_WINDOW: '21',
      SIGNALS_BOLLINGER_K: ' 2.5 ',
      SIGNALS_SMA_LONG_WINDOW: '',
    });
    expect(params).toEqual({ ...DEFAULT_ANALYSIS_PARAMS, rsiWindow: 21, bollingerK: 2.5 });
  });

  it('should warn and fall back on a value that is not a number', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const params = getAnalysisParamsFromEnv({ SIGNALS_RSI_WINDOW: 'abc' });
    expect(params.rsiWindow).toBe(14);
    expect(warn).toHaveBeenCalledWith('⚠️  Invalid SIGNALS_RSI_WINDOW="abc". Defaulting to 14.');
  });

  it('should throw on a number the engine cannot use', () => {
    expect(() => getAnalysisParamsFromEnv({ SIGNALS_SMA_SHORT_WINDOW: '0' })).toThrow(
      InvalidParameterError
    );
    expect(() => getAnalysisParamsFromEnv({ SIGNALS_VOLATILITY_WINDOW: '2.5' })).toThrow(
      'volatilityWindow must be a positive integer, got 2.5'
    );
    expect(() => getAnalysisParamsFromEnv({ SIGNALS_BOLLINGER_K: '-1' })).toThrow(
      'bollingerK must be a non-negative number, got -1'
    );
  });
});

describe('validateAnalysisParams', () => {
  it('should accept the defaults', () => {
    expect(() => validateAnalysisParams({ ...DEFAULT_ANALYSIS_PARAMS })).not.toThrow();
  });

  it('should accept k of 0', () => {
    expect(() => validateAnalysisParams({ ...DEFAULT_ANALYSIS_PARAMS, bollingerK: 0 })).not.toThrow();
  });
});
