/**
 * Indicator parameter checks
 * 
 * Bad parameters fail immediately; nothing is clamped.
 */

import { InvalidParameterError } from '../errors';

/**
 * Asserts a rolling window is a positive integer.
 * 
 * @param window Window size (number of periods)
 * @param label Name used in the error message
 * @throws InvalidParameterError if window is not a positive integer
 */
export function assertWindow(window: number, label = 'window'): void {
  if (!Number.isInteger(window) || window <= 0) {
    throw new InvalidParameterError(`${label} must be a positive integer, got ${window}`);
  }
}

/**
 * Asserts a band multiplier is a finite, non-negative number.
 * 
 * @throws InvalidParameterError if k is negative or not finite
 */
export function assertBandMultiplier(k: number, label = 'k'): void {
  if (!Number.isFinite(k) || k < 0) {
    throw new InvalidParameterError(`${label} must be a non-negative number, got ${k}`);
  }
}
