/**
 * Parameter validation and the engine's error taxonomy
 *
 * Every check throws synchronously, before any output buffer exists, so a
 * generator either returns a complete signal or nothing.
 *
 * @module utils/validation
 */

/**
 * Base class for every error raised by the engine
 */
export class SynthesisError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown
  ) {
    super(`${field}: ${message}`);
    this.name = 'SynthesisError';
  }
}

/**
 * Out-of-range or contradictory numeric parameter
 */
export class InvalidParameterError extends SynthesisError {
  constructor(message: string, field: string, value: unknown) {
    super(message, field, value);
    this.name = 'InvalidParameterError';
  }
}

/**
 * Requested events cannot fit in the configured duration
 */
export class InsufficientDurationError extends InvalidParameterError {
  constructor(message: string, field: string, value: unknown) {
    super(message, field, value);
    this.name = 'InsufficientDurationError';
  }
}

/**
 * Unknown variant string (noise, artifact, condition, movement, pattern)
 */
export class UnsupportedTypeError extends SynthesisError {
  constructor(
    field: string,
    value: unknown,
    public supported: readonly string[]
  ) {
    super(`unsupported value ${JSON.stringify(value)} (expected one of: ${supported.join(', ')})`, field, value);
    this.name = 'UnsupportedTypeError';
  }
}

export function requireFinite(value: number, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidParameterError('must be a finite number', field, value);
  }
  return value;
}

export function requirePositive(value: number, field: string): number {
  requireFinite(value, field);
  if (value <= 0) {
    throw new InvalidParameterError('must be greater than 0', field, value);
  }
  return value;
}

export function requireNonNegative(value: number, field: string): number {
  requireFinite(value, field);
  if (value < 0) {
    throw new InvalidParameterError('cannot be negative', field, value);
  }
  return value;
}

/**
 * Inclusive range check
 */
export function requireInRange(value: number, field: string, min: number, max: number): number {
  requireFinite(value, field);
  if (value < min || value > max) {
    throw new InvalidParameterError(`(${value}) is outside [${min}, ${max}]`, field, value);
  }
  return value;
}

export function requireUnitInterval(value: number, field: string): number {
  return requireInRange(value, field, 0, 1);
}

export function requireInteger(value: number, field: string, min: number = 0): number {
  if (!Number.isInteger(value)) {
    throw new InvalidParameterError('must be an integer', field, value);
  }
  if (value < min) {
    throw new InvalidParameterError(`must be at least ${min}`, field, value);
  }
  return value;
}

/**
 * Narrow an arbitrary string to one of the supported variants
 */
export function requireOneOf<T extends string>(value: unknown, field: string, supported: readonly T[]): T {
  const match = supported.find(candidate => candidate === value);
  if (match === undefined) {
    throw new UnsupportedTypeError(field, value, supported);
  }
  return match;
}

/**
 * Ensure a signal handed back to the engine matches the time base length
 */
export function requireSignalLength(signal: readonly number[], expected: number, field: string = 'signal'): void {
  if (signal.length !== expected) {
    throw new InvalidParameterError(
      `has ${signal.length} samples but the time base expects ${expected}`,
      field,
      signal.length
    );
  }
}
