/**
 * Error code system for the Koinon ledger.
 *
 * Every error carries a unique, stable code (KOINON_Exxx) that maps to one
 * failure mode, so callers and tests can assert on the cause of a failure
 * rather than on its message.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Koinon error codes. */
export enum KoinonErrorCode {
  // Validation (1xx)
  /** A required string was empty or an identifier was malformed. */
  INVALID_INPUT = 'KOINON_E100',
  /** Parallel input arrays have different lengths. */
  ARRAY_LENGTH_MISMATCH = 'KOINON_E101',
  /** An owner list was empty. */
  EMPTY_OWNER_SET = 'KOINON_E102',
  /** Ownership percentages do not sum to exactly 100. */
  PERCENTAGE_SUM_INVALID = 'KOINON_E103',
  /** An amount was zero or negative where a positive value is required. */
  INVALID_AMOUNT = 'KOINON_E104',
  /** A numeric value fell outside its permitted range. */
  OUT_OF_RANGE = 'KOINON_E105',
  /** An owner address appears more than once in the same owner list. */
  DUPLICATE_OWNER = 'KOINON_E106',
  /** A distribution amount is below the configured minimum. */
  BELOW_MINIMUM_DISTRIBUTION = 'KOINON_E107',
  /** Governance settings are internally inconsistent. */
  INVALID_SETTINGS = 'KOINON_E108',
  /** A proposal was executed through the wrong category entry point. */
  CATEGORY_MISMATCH = 'KOINON_E109',

  // Authorization (2xx)
  /** The caller does not own a share of the asset. */
  NOT_ASSET_OWNER = 'KOINON_E200',
  /** The caller is not the licensee of the license. */
  NOT_LICENSEE = 'KOINON_E201',
  /** The caller is not the proposer of the proposal. */
  NOT_PROPOSER = 'KOINON_E202',
  /** The caller is not the runtime administrator. */
  NOT_ADMINISTRATOR = 'KOINON_E203',
  /** The caller may only act on its own share. */
  NOT_SHARE_HOLDER = 'KOINON_E204',

  // State (3xx)
  /** The referenced asset has not been registered. */
  ASSET_NOT_FOUND = 'KOINON_E300',
  /** The referenced license does not exist. */
  LICENSE_NOT_FOUND = 'KOINON_E301',
  /** The referenced proposal does not exist. */
  PROPOSAL_NOT_FOUND = 'KOINON_E302',
  /** The license has not been approved. */
  LICENSE_NOT_APPROVED = 'KOINON_E303',
  /** The license is already active. */
  LICENSE_ALREADY_ACTIVE = 'KOINON_E304',
  /** The license is not active. */
  LICENSE_NOT_ACTIVE = 'KOINON_E305',
  /** The license approval does not need, or no longer accepts, a decision. */
  APPROVAL_NOT_PENDING = 'KOINON_E306',
  /** The license term has ended. */
  LICENSE_EXPIRED = 'KOINON_E307',
  /** The license is not suspended. */
  LICENSE_NOT_SUSPENDED = 'KOINON_E308',
  /** The suspension window has not elapsed yet. */
  SUSPENSION_NOT_ELAPSED = 'KOINON_E309',
  /** The license has been revoked. */
  LICENSE_REVOKED = 'KOINON_E310',
  /** Reported usage would exceed the license's usage cap. */
  USAGE_CAP_EXCEEDED = 'KOINON_E311',
  /** The license was never executed, so no royalty schedule exists. */
  ROYALTY_SCHEDULE_MISSING = 'KOINON_E312',
  /** The proposal has already been executed. */
  PROPOSAL_ALREADY_EXECUTED = 'KOINON_E313',
  /** The proposal has been cancelled. */
  PROPOSAL_CANCELLED = 'KOINON_E314',
  /** The voter has already voted on the proposal. */
  ALREADY_VOTED = 'KOINON_E315',
  /** The voting window has closed. */
  VOTING_CLOSED = 'KOINON_E316',
  /** The call is outside the proposal's execution window. */
  EXECUTION_WINDOW = 'KOINON_E317',
  /** Participation is below the proposal's quorum. */
  QUORUM_NOT_REACHED = 'KOINON_E318',
  /** Votes in favour do not outnumber votes against. */
  MAJORITY_NOT_REACHED = 'KOINON_E319',
  /** The system is paused. */
  PAUSED = 'KOINON_E320',
  /** The system is not paused. */
  NOT_PAUSED = 'KOINON_E321',
  /** No payment token is registered for the currency. */
  UNKNOWN_CURRENCY = 'KOINON_E322',

  // Funds (4xx)
  /** Accumulated revenue is lower than the requested distribution. */
  INSUFFICIENT_ACCUMULATED = 'KOINON_E400',
  /** The owner has nothing pending to withdraw. */
  NOTHING_TO_WITHDRAW = 'KOINON_E401',
  /** The payer's allowance is lower than the requested transfer. */
  INSUFFICIENT_ALLOWANCE = 'KOINON_E402',
  /** The payer's balance is lower than the requested transfer. */
  INSUFFICIENT_BALANCE = 'KOINON_E403',
  /** The sender's ownership share is lower than the requested transfer. */
  INSUFFICIENT_SHARE = 'KOINON_E404',

  // Runtime (5xx)
  /** A mutating call arrived while another one was still executing. */
  REENTRANT_CALL = 'KOINON_E500',
}

// ─── Error classes ──────────────────────────────────────────────────────────────

/** Options for constructing a KoinonError. */
export interface KoinonErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: Error;
}

/**
 * Base error class for all Koinon errors.
 *
 * @example
 * ```typescript
 * throw new KoinonError(
 *   KoinonErrorCode.ASSET_NOT_FOUND,
 *   'Asset 7 is not registered',
 *   { context: { assetId: 7 } }
 * );
 * ```
 */
export class KoinonError extends Error {
  readonly code: KoinonErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: KoinonErrorCode, message: string, options?: KoinonErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'KoinonError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /**
   * Return a structured JSON representation suitable for logging.
   */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

/** Malformed input: array lengths, percentage sums, amounts, ranges. */
export class ValidationError extends KoinonError {
  /** The name of the field or parameter that failed validation. */
  readonly field: string;

  constructor(code: KoinonErrorCode, message: string, field: string, options?: KoinonErrorOptions) {
    super(code, message, options);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** The caller lacks the role the operation requires. */
export class AuthorizationError extends KoinonError {
  /** The address that attempted the operation. */
  readonly caller: string;

  constructor(code: KoinonErrorCode, message: string, caller: string, options?: KoinonErrorOptions) {
    super(code, message, options);
    this.name = 'AuthorizationError';
    this.caller = caller;
  }
}

/** The operation is not valid for the current state of the ledger. */
export class StateError extends KoinonError {
  constructor(code: KoinonErrorCode, message: string, options?: KoinonErrorOptions) {
    super(code, message, options);
    this.name = 'StateError';
  }
}

/** Accumulated revenue, allowance, balance or share is too low. */
export class InsufficientFundsError extends KoinonError {
  /** Amount that was requested. */
  readonly requested: bigint;
  /** Amount that was available. */
  readonly available: bigint;

  constructor(
    code: KoinonErrorCode,
    message: string,
    requested: bigint,
    available: bigint,
    options?: KoinonErrorOptions,
  ) {
    super(code, message, options);
    this.name = 'InsufficientFundsError';
    this.requested = requested;
    this.available = available;
  }
}

/** A mutating call arrived while another was in flight. */
export class ReentrancyError extends KoinonError {
  /** Operation that was already executing. */
  readonly activeOperation: string;
  /** Operation that attempted to enter. */
  readonly attemptedOperation: string;

  constructor(activeOperation: string, attemptedOperation: string) {
    super(
      KoinonErrorCode.REENTRANT_CALL,
      `Reentrant call to '${attemptedOperation}' rejected while '${activeOperation}' is executing`,
      { context: { activeOperation, attemptedOperation } },
    );
    this.name = 'ReentrancyError';
    this.activeOperation = activeOperation;
    this.attemptedOperation = attemptedOperation;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Type guard for errors raised by the ledger.
 */
export function isKoinonError(value: unknown): value is KoinonError {
  return value instanceof KoinonError;
}

/**
 * Format an error for display.
 *
 * @example
 * ```typescript
 * formatError(new StateError(KoinonErrorCode.PAUSED, 'Ledger is paused', { hint: 'Ask the administrator to unpause' }));
 * // [KOINON_E320] Ledger is paused
 * // Hint: Ask the administrator to unpause
 * ```
 */
export function formatError(error: KoinonError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}
