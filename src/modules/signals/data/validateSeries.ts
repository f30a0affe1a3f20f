/**
 * Validation for price series
 * 
 * Ensures series integrity before any indicator runs.
 */

import { InvalidInputError } from '../errors';
import type { PriceSeries } from '../types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * YYYY-MM-DD naming a real calendar day (2024-02-30 is rejected, not rolled over)
 */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Validates the series meets requirements:
 * - At least 1 bar
 * - Every date is YYYY-MM-DD
 * - Dates strictly ascending (no duplicates); gaps are fine
 * - Every close is a finite number > 0
 * 
 * @throws InvalidInputError if validation fails
 */
export function validateSeries(series: PriceSeries): void {
  if (series.length === 0) {
    throw new InvalidInputError('Price series must contain at least 1 bar');
  }

  let previousDate: string | undefined;

  series.forEach((bar, i) => {
    if (typeof bar.date !== 'string' || !isIsoDate(bar.date)) {
      throw new InvalidInputError(`Bar ${i} has invalid date "${String(bar.date)}"`);
    }
    if (typeof bar.close !== 'number' || !Number.isFinite(bar.close) || bar.close <= 0) {
      throw new InvalidInputError(
        `Bar ${i} (${bar.date}) close must be a positive number, got ${String(bar.close)}`
      );
    }
    if (previousDate !== undefined && bar.date <= previousDate) {
      throw new InvalidInputError(
        `Dates must be strictly ascending: ${bar.date} follows ${previousDate} at bar ${i}`
      );
    }
    previousDate = bar.date;
  });
}
