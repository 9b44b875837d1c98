/**
 * @koinon/types — Shared error taxonomy, validation guards and structured
 * logging used by every ledger package.
 *
 * @packageDocumentation
 */

// ─── Errors ─────────────────────────────────────────────────────────────────────
export {
  KoinonErrorCode,
  KoinonError,
  ValidationError,
  AuthorizationError,
  StateError,
  InsufficientFundsError,
  ReentrancyError,
  isKoinonError,
  formatError,
} from './errors.js';
export type { KoinonErrorOptions } from './errors.js';

// ─── Guards & validation ────────────────────────────────────────────────────────
export {
  isNonEmptyString,
  isNonNegativeInteger,
  validateNonEmpty,
  validatePositiveAmount,
  validateNonNegativeAmount,
  validateIntegerRange,
  validateNonNegativeInteger,
  assertNever,
} from './guards.js';

// ─── Structured logging ─────────────────────────────────────────────────────────
export { Logger, createLogger, LogLevel, parseLogLevel, bigintReplacer } from './logger.js';
export type { LogEntry, LogOutput, LoggerOptions } from './logger.js';

// ─── Common aliases ─────────────────────────────────────────────────────────────

/** An account address (payer, owner, licensee, administrator). */
export type Address = string;

/** Identifier of a payment currency (one payment token ledger per currency). */
export type CurrencyId = string;

/** Integer seconds since the Unix epoch. */
export type UnixSeconds = number;

/** Basis points: parts per ten thousand. */
export type BasisPoints = number;

/** The denominator for {@link BasisPoints}. */
export const BPS_DENOMINATOR = 10_000;

/** The denominator for ownership percentages. */
export const PERCENT_DENOMINATOR = 100;
