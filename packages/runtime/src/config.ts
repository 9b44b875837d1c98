/**
 * Ledger configuration: defaults, merging and validation.
 *
 * Governance settings live here rather than in the governance package
 * because the license registry reads the license quorum from the same
 * per-asset settings.
 */

import {
  KoinonErrorCode,
  LogLevel,
  ValidationError,
  parseLogLevel,
  validateIntegerRange,
  validateNonNegativeAmount,
} from '@koinon/types';
import type { BasisPoints } from '@koinon/types';

const DAY = 86_400;

/** Shortest execution delay a proposal may be configured with. */
export const MIN_EXECUTION_DELAY = 3_600;

// ─── Governance settings ────────────────────────────────────────────────────────

/** Per-asset quorum fractions and voting windows. */
export interface GovernanceSettings {
  defaultQuorumBps: BasisPoints;
  emergencyQuorumBps: BasisPoints;
  licenseQuorumBps: BasisPoints;
  assetManagementQuorumBps: BasisPoints;
  revenuePolicyQuorumBps: BasisPoints;
  /** Voting window in seconds for non-emergency proposals. */
  defaultVotingDuration: number;
  /** Voting window in seconds for emergency proposals. */
  emergencyVotingDuration: number;
  /** Seconds after the voting deadline during which a proposal may execute. */
  executionDelay: number;
}

export const DEFAULT_GOVERNANCE_SETTINGS: Readonly<GovernanceSettings> = Object.freeze({
  defaultQuorumBps: 5_000,
  emergencyQuorumBps: 3_000,
  licenseQuorumBps: 5_000,
  assetManagementQuorumBps: 5_000,
  revenuePolicyQuorumBps: 5_000,
  defaultVotingDuration: 3 * DAY,
  emergencyVotingDuration: DAY,
  executionDelay: DAY,
});

/**
 * Check a complete set of governance settings.
 *
 * @throws {ValidationError} OUT_OF_RANGE for a quorum outside 1–10000 or a
 *   non-positive duration; INVALID_SETTINGS when the emergency quorum
 *   exceeds the default quorum or the execution delay is under an hour.
 */
export function validateGovernanceSettings(settings: GovernanceSettings): void {
  const quorums: Array<[keyof GovernanceSettings, number]> = [
    ['defaultQuorumBps', settings.defaultQuorumBps],
    ['emergencyQuorumBps', settings.emergencyQuorumBps],
    ['licenseQuorumBps', settings.licenseQuorumBps],
    ['assetManagementQuorumBps', settings.assetManagementQuorumBps],
    ['revenuePolicyQuorumBps', settings.revenuePolicyQuorumBps],
  ];
  for (const [name, value] of quorums) {
    validateIntegerRange(value, 1, 10_000, name);
  }
  validateIntegerRange(settings.defaultVotingDuration, 1, Number.MAX_SAFE_INTEGER, 'defaultVotingDuration');
  validateIntegerRange(settings.emergencyVotingDuration, 1, Number.MAX_SAFE_INTEGER, 'emergencyVotingDuration');

  if (settings.emergencyQuorumBps > settings.defaultQuorumBps) {
    throw new ValidationError(
      KoinonErrorCode.INVALID_SETTINGS,
      `emergencyQuorumBps (${settings.emergencyQuorumBps}) must not exceed defaultQuorumBps (${settings.defaultQuorumBps})`,
      'emergencyQuorumBps',
    );
  }
  if (!Number.isSafeInteger(settings.executionDelay) || settings.executionDelay < MIN_EXECUTION_DELAY) {
    throw new ValidationError(
      KoinonErrorCode.INVALID_SETTINGS,
      `executionDelay must be at least ${MIN_EXECUTION_DELAY} seconds (got ${settings.executionDelay})`,
      'executionDelay',
      { hint: 'Allow at least one hour between the end of voting and the end of execution' },
    );
  }
}

// ─── Ledger configuration ───────────────────────────────────────────────────────

export interface LedgerConfig {
  /** Nominal supply minted for an asset registered without an explicit one. */
  defaultTotalSupply: bigint;
  /** Offers with a fee above this amount require owner approval. */
  approvalFeeThreshold: bigint;
  /** Seconds between royalty due dates. */
  royaltyPaymentInterval: number;
  /** Voting window of a license proposal, in seconds. */
  licenseProposalVotingPeriod: number;
  /** Seconds after the voting deadline during which a license proposal may execute. */
  licenseProposalExecutionWindow: number;
  /** Governance settings of an asset that has none of its own. */
  governanceDefaults: GovernanceSettings;
  logLevel: LogLevel;
}

/** Partial configuration accepted by {@link resolveLedgerConfig}. */
export type LedgerConfigInput = Partial<Omit<LedgerConfig, 'governanceDefaults'>> & {
  governanceDefaults?: Partial<GovernanceSettings>;
};

export const DEFAULT_LEDGER_CONFIG: Readonly<LedgerConfig> = Object.freeze({
  defaultTotalSupply: 1_000n,
  approvalFeeThreshold: 500n,
  royaltyPaymentInterval: 30 * DAY,
  licenseProposalVotingPeriod: 7 * DAY,
  licenseProposalExecutionWindow: DAY,
  governanceDefaults: DEFAULT_GOVERNANCE_SETTINGS,
  logLevel: LogLevel.INFO,
});

/**
 * Merge `input` over the defaults and validate the result.
 *
 * @example
 * ```typescript
 * const config = resolveLedgerConfig({ approvalFeeThreshold: 1_000n });
 * config.royaltyPaymentInterval; // 2592000
 * ```
 */
export function resolveLedgerConfig(input?: LedgerConfigInput): LedgerConfig {
  const config: LedgerConfig = {
    defaultTotalSupply: input?.defaultTotalSupply ?? DEFAULT_LEDGER_CONFIG.defaultTotalSupply,
    approvalFeeThreshold: input?.approvalFeeThreshold ?? DEFAULT_LEDGER_CONFIG.approvalFeeThreshold,
    royaltyPaymentInterval: input?.royaltyPaymentInterval ?? DEFAULT_LEDGER_CONFIG.royaltyPaymentInterval,
    licenseProposalVotingPeriod:
      input?.licenseProposalVotingPeriod ?? DEFAULT_LEDGER_CONFIG.licenseProposalVotingPeriod,
    licenseProposalExecutionWindow:
      input?.licenseProposalExecutionWindow ?? DEFAULT_LEDGER_CONFIG.licenseProposalExecutionWindow,
    governanceDefaults: { ...DEFAULT_GOVERNANCE_SETTINGS, ...input?.governanceDefaults },
    logLevel: input?.logLevel ?? logLevelFromEnv() ?? DEFAULT_LEDGER_CONFIG.logLevel,
  };
  validateLedgerConfig(config);
  return config;
}

/**
 * @throws {ValidationError} when any field is out of range.
 */
export function validateLedgerConfig(config: LedgerConfig): void {
  validateNonNegativeAmount(config.approvalFeeThreshold, 'approvalFeeThreshold');
  if (config.defaultTotalSupply <= 0n) {
    throw new ValidationError(
      KoinonErrorCode.INVALID_AMOUNT,
      `defaultTotalSupply must be greater than zero (got ${config.defaultTotalSupply})`,
      'defaultTotalSupply',
    );
  }
  validateIntegerRange(config.royaltyPaymentInterval, 1, Number.MAX_SAFE_INTEGER, 'royaltyPaymentInterval');
  validateIntegerRange(
    config.licenseProposalVotingPeriod, 1, Number.MAX_SAFE_INTEGER, 'licenseProposalVotingPeriod',
  );
  validateIntegerRange(
    config.licenseProposalExecutionWindow, 1, Number.MAX_SAFE_INTEGER, 'licenseProposalExecutionWindow',
  );
  validateGovernanceSettings(config.governanceDefaults);
}

/**
 * Read the log level from `KOINON_LOG_LEVEL`. Unset or unknown values
 * yield `undefined`.
 */
export function logLevelFromEnv(env: Record<string, string | undefined> = process.env): LogLevel | undefined {
  return parseLogLevel(env['KOINON_LOG_LEVEL']);
}
