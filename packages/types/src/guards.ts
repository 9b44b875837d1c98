/**
 * Runtime type guards and input validation for ledger entry points.
 * Use these at the system boundary, before any state is touched.
 */

import { KoinonErrorCode, ValidationError } from './errors.js';

// ─── Type Guards ────────────────────────────────────────────────────────────────

/**
 * Check whether `value` is a non-empty string (after trimming).
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Check whether `value` is a non-negative safe integer.
 */
export function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

// ─── Validation ─────────────────────────────────────────────────────────────────

/**
 * Assert that a string value is non-empty (not only whitespace).
 *
 * @throws {ValidationError} INVALID_INPUT when the value is blank.
 */
export function validateNonEmpty(value: string, name: string): void {
  if (!isNonEmptyString(value)) {
    throw new ValidationError(
      KoinonErrorCode.INVALID_INPUT,
      `${name} must be a non-empty string`,
      name,
    );
  }
}

/**
 * Assert that an amount is strictly positive.
 *
 * @throws {ValidationError} INVALID_AMOUNT when `amount <= 0`.
 */
export function validatePositiveAmount(amount: bigint, name: string): void {
  if (typeof amount !== 'bigint' || amount <= 0n) {
    throw new ValidationError(
      KoinonErrorCode.INVALID_AMOUNT,
      `${name} must be greater than zero (got ${String(amount)})`,
      name,
    );
  }
}

/**
 * Assert that an amount is zero or positive.
 *
 * @throws {ValidationError} INVALID_AMOUNT when `amount < 0`.
 */
export function validateNonNegativeAmount(amount: bigint, name: string): void {
  if (typeof amount !== 'bigint' || amount < 0n) {
    throw new ValidationError(
      KoinonErrorCode.INVALID_AMOUNT,
      `${name} must not be negative (got ${String(amount)})`,
      name,
    );
  }
}

/**
 * Assert that a value is an integer within an inclusive range.
 *
 * @example
 * ```typescript
 * validateIntegerRange(royaltyRateBps, 0, 10_000, 'royaltyRateBps');
 * ```
 */
export function validateIntegerRange(value: number, min: number, max: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new ValidationError(
      KoinonErrorCode.OUT_OF_RANGE,
      `${name} must be an integer between ${min} and ${max} (got ${value})`,
      name,
    );
  }
}

/**
 * Assert that a value is a non-negative safe integer (durations, counts).
 */
export function validateNonNegativeInteger(value: number, name: string): void {
  if (!isNonNegativeInteger(value)) {
    throw new ValidationError(
      KoinonErrorCode.OUT_OF_RANGE,
      `${name} must be a non-negative integer (got ${value})`,
      name,
    );
  }
}

/**
 * Exhaustiveness check for switch statements over closed unions.
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(value)}`);
}
