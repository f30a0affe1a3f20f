/**
 * Signals error types
 * 
 * Two failure kinds callers can tell apart. Short history is not one of them:
 * it shows up as undefined indicator values and UNDETERMINED states.
 */

export type SignalsErrorCode = 'INVALID_INPUT' | 'INVALID_PARAMETER';

export class SignalsError extends Error {
  readonly code: SignalsErrorCode;

  constructor(code: SignalsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Empty or malformed price series (or bar file)
 */
export class InvalidInputError extends SignalsError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

/**
 * Non-positive window or negative band multiplier
 */
export class InvalidParameterError extends SignalsError {
  constructor(message: string) {
    super('INVALID_PARAMETER', message);
  }
}

export function isSignalsError(value: unknown): value is SignalsError {
  return value instanceof SignalsError;
}
