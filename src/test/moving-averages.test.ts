// Moving Average Tests
import { describe, it, expect } from 'vitest';
import { calcSMA, isConstantWindow, windowMean } from '@/modules/signals/engine/movingAverages';
import { computeSMA } from '@/modules/signals/engine/indicatorEngine';
import { InvalidInputError, InvalidParameterError } from '@/modules/signals/errors';
import { makeBars, range } from './fixtures/makeBars';

describe('calcSMA', () => {
  it('should average the trailing window and leave the warm-up undefined', () => {
    const sma = calcSMA([10, 11, 12, 11, 10], 3);
    expect(sma).toHaveLength(5);
    expect(sma[0]).toBeUndefined();
    expect(sma[1]).toBeUndefined();
    expect(sma[2]).toBeCloseTo(11, 3);
    expect(sma[3]).toBeCloseTo(11.333, 3);
    expect(sma[4]).toBeCloseTo(11, 3);
  });

  it('should return the values themselves for window 1', () => {
    expect(calcSMA([3, 1, 4], 1)).toEqual([3, 1, 4]);
  });

  it('should return a flat price exactly for short and long windows alike', () => {
    const closes = range(200, () => 0.1);
    expect(calcSMA(closes, 50)[199]).toBe(0.1);
    expect(calcSMA(closes, 200)[199]).toBe(0.1);
  });

  it('should be all undefined when the window is longer than the input', () => {
    expect(calcSMA([1, 2, 3], 5)).toEqual([undefined, undefined, undefined]);
  });

  it('should reject non-positive and fractional windows', () => {
    expect(() => calcSMA([1, 2, 3], 0)).toThrow(InvalidParameterError);
    expect(() => calcSMA([1, 2, 3], -2)).toThrow(InvalidParameterError);
    expect(() => calcSMA([1, 2, 3], 2.5)).toThrow(InvalidParameterError);
  });
});

describe('computeSMA', () => {
  it('should define exactly the positions from window-1 onward', () => {
    const bars = makeBars(range(30, (i) => 50 + (i % 7)));
    for (const window of [1, 5, 20, 30]) {
      const sma = computeSMA(bars, window);
      sma.forEach((value, i) => {
        if (i < window - 1) {
          expect(value).toBeUndefined();
        } else {
          expect(value).toBeTypeOf('number');
        }
      });
    }
  });

  it('should scale with the input', () => {
    const closes = [10, 11, 12, 11, 10, 13, 15];
    const base = computeSMA(makeBars(closes), 3);
    const scaled = computeSMA(makeBars(closes.map((c) => c * 2.5)), 3);
    base.forEach((value, i) => {
      if (value === undefined) {
        expect(scaled[i]).toBeUndefined();
      } else {
        expect(scaled[i]).toBeCloseTo(value * 2.5, 9);
      }
    });
  });

  it('should fail on an empty series', () => {
    expect(() => computeSMA([], 3)).toThrow(InvalidInputError);
  });

  it('should check the window before the series', () => {
    expect(() => computeSMA([], 0)).toThrow(InvalidParameterError);
  });
});

describe('windowMean', () => {
  it('should average an inclusive slice', () => {
    expect(windowMean([1, 2, 3, 10], 0, 2)).toBe(2);
    expect(windowMean([1, 2, 3, 10], 2, 3)).toBe(6.5);
  });

  it('should return the repeated value of a constant slice', () => {
    expect(windowMean(range(50, () => 33.33), 0, 49)).toBe(33.33);
  });
});

describe('isConstantWindow', () => {
  it('should detect a single repeated value', () => {
    expect(isConstantWindow([7.7, 7.7, 7.7], 0, 2)).toBe(true);
    expect(isConstantWindow([7.7, 7.7, 7.8], 0, 2)).toBe(false);
    expect(isConstantWindow([7.8, 7.7, 7.7], 1, 2)).toBe(true);
  });
});
