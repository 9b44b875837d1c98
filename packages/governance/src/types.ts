import type { Address, CurrencyId, UnixSeconds } from '@koinon/types';
import type { HashHex } from '@koinon/crypto';
import type { AssetUpdateResult, ComplianceStatus } from '@koinon/ownership';

// ─── Payloads ───────────────────────────────────────────────────────────────────

export type ProposalCategory = 'ASSET_MANAGEMENT' | 'REVENUE_POLICY' | 'EMERGENCY';

export type EmergencyAction =
  | { kind: 'SUSPEND_LICENSE'; licenseId: number; duration: number }
  | { kind: 'SUSPEND_ALL_LICENSES'; duration: number }
  | { kind: 'PAUSE'; reason: string };

export interface AssetManagementPayload {
  category: 'ASSET_MANAGEMENT';
  newMetadataUri?: string;
  newComplianceStatus?: ComplianceStatus;
}

export interface RevenuePolicyPayload {
  category: 'REVENUE_POLICY';
  currency: CurrencyId;
  newMinimumDistribution: bigint;
}

export interface EmergencyPayload {
  category: 'EMERGENCY';
  action: EmergencyAction;
}

export type ProposalPayload = AssetManagementPayload | RevenuePolicyPayload | EmergencyPayload;

/** The payload variant of category `C`. */
export type PayloadOf<C extends ProposalCategory> = Extract<ProposalPayload, { category: C }>;

// ─── Proposals ──────────────────────────────────────────────────────────────────

export interface Proposal {
  id: number;
  assetId: number;
  proposer: Address;
  category: ProposalCategory;
  payload: ProposalPayload;
  description: string;
  descriptionHash: HashHex;
  votesFor: bigint;
  votesAgainst: bigint;
  /** Σ governance weight of the asset's owners when the proposal was made. */
  totalVotingWeight: bigint;
  quorumRequired: bigint;
  createdAt: UnixSeconds;
  votingDeadline: UnixSeconds;
  executionDeadline: UnixSeconds;
  executed: boolean;
  cancelled: boolean;
  executedAt: UnixSeconds;
}

export interface VoteReceipt {
  inFavor: boolean;
  weight: bigint;
  castAt: UnixSeconds;
}

// ─── Outcomes ───────────────────────────────────────────────────────────────────

export interface AssetManagementOutcome extends AssetUpdateResult {
  category: 'ASSET_MANAGEMENT';
}

export interface RevenuePolicyOutcome {
  category: 'REVENUE_POLICY';
  currency: CurrencyId;
  minimumDistribution: bigint;
}

export interface EmergencyOutcome {
  category: 'EMERGENCY';
  action: EmergencyAction['kind'];
  /** Licenses suspended by the action (empty for a pause). */
  suspendedLicenses: number[];
}

export type ExecutionOutcome = AssetManagementOutcome | RevenuePolicyOutcome | EmergencyOutcome;
