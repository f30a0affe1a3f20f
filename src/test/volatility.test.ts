// Rolling Std-Dev and Bollinger Band Tests
import { describe, it, expect } from 'vitest';
import { calcBollingerBands, calcRollingStdDev } from '@/modules/signals/engine/volatility';
import {
  computeBollingerBands,
  computeRollingVolatility,
  computeSMA,
} from '@/modules/signals/engine/indicatorEngine';
import { InvalidParameterError } from '@/modules/signals/errors';
import { makeBars, range } from './fixtures/makeBars';

describe('calcRollingStdDev', () => {
  it('should use the population standard deviation', () => {
    const sd = calcRollingStdDev([2, 4, 4, 4, 5, 5, 7, 9], 8);
    expect(sd.slice(0, 7).every((v) => v === undefined)).toBe(true);
    expect(sd[7]).toBeCloseTo(2, 12);
  });

  it('should be 0 for a flat window', () => {
    expect(calcRollingStdDev([5, 5, 5], 3)[2]).toBe(0);
  });

  it('should be exactly 0 for a flat run of a non-integer price', () => {
    const sd = calcRollingStdDev(range(40, () => 0.1), 20);
    expect(sd[19]).toBe(0);
    expect(sd[39]).toBe(0);
  });

  it('should be 0 for window 1', () => {
    expect(calcRollingStdDev([5, 7, 9], 1)).toEqual([0, 0, 0]);
  });
});

describe('calcBollingerBands', () => {
  it('should place the bands k sigma around the mean', () => {
    const { upper, lower } = calcBollingerBands([2, 4, 4, 4, 5, 5, 7, 9], 8, 2);
    expect(upper[7]).toBeCloseTo(9, 12);
    expect(lower[7]).toBeCloseTo(1, 12);
    expect(upper[6]).toBeUndefined();
    expect(lower[6]).toBeUndefined();
  });

  it('should collapse onto the mean when k is 0', () => {
    const { upper, lower } = calcBollingerBands([1, 3, 2, 6], 2, 0);
    expect(upper.slice(1)).toEqual([2, 2.5, 4]);
    expect(lower.slice(1)).toEqual([2, 2.5, 4]);
  });

  it('should reject a negative k', () => {
    expect(() => calcBollingerBands([1, 2, 3], 2, -1)).toThrow(InvalidParameterError);
  });
});

describe('computeBollingerBands', () => {
  const bars = makeBars(range(120, (i) => 60 + 10 * Math.sin(i / 5) + (i % 4)));

  it('should keep upper >= SMA >= lower wherever defined', () => {
    const { upper, lower } = computeBollingerBands(bars, 20, 2);
    const sma = computeSMA(bars, 20);
    sma.forEach((mid, i) => {
      const up = upper[i];
      const low = lower[i];
      if (mid === undefined || up === undefined || low === undefined) {
        expect(mid).toBeUndefined();
        expect(up).toBeUndefined();
        expect(low).toBeUndefined();
        return;
      }
      expect(up).toBeGreaterThanOrEqual(mid);
      expect(mid).toBeGreaterThanOrEqual(low);
    });
  });

  it('should use the same sigma as the volatility series', () => {
    const { upper } = computeBollingerBands(bars, 20, 2);
    const sma = computeSMA(bars, 20);
    const volatility = computeRollingVolatility(bars, 20);
    for (let i = 19; i < bars.length; i++) {
      const up = upper[i];
      const mid = sma[i];
      const vol = volatility[i];
      expect(up).toBeDefined();
      expect(mid).toBeDefined();
      expect(vol).toBeDefined();
      if (up !== undefined && mid !== undefined && vol !== undefined) {
        expect((up - mid) / 2).toBeCloseTo(vol, 9);
      }
    }
  });

  it('should default to window 20 and k 2', () => {
    expect(computeBollingerBands(bars)).toEqual(computeBollingerBands(bars, 20, 2));
  });
});

describe('computeRollingVolatility', () => {
  it('should match the closed form for consecutive integers', () => {
    const volatility = computeRollingVolatility(makeBars(range(40, (i) => 100 + i)));
    // population variance of 20 consecutive integers is (20^2 - 1) / 12
    expect(volatility[39]).toBeCloseTo(Math.sqrt(399 / 12), 9);
    expect(volatility[18]).toBeUndefined();
  });
});
