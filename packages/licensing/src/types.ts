import type { Address, BasisPoints, CurrencyId, UnixSeconds } from '@koinon/types';
import type { HashHex } from '@koinon/crypto';

// ─── Licenses ───────────────────────────────────────────────────────────────────

export type LicenseType = 'EXCLUSIVE' | 'SOLE_EXCLUSIVE' | 'NON_EXCLUSIVE';

export const LICENSE_TYPES: readonly LicenseType[] = ['EXCLUSIVE', 'SOLE_EXCLUSIVE', 'NON_EXCLUSIVE'];

/** Derived lifecycle state of a license at a point in time. */
export type LicenseStatus =
  | 'NOT_FOUND'
  | 'PENDING_APPROVAL'
  | 'INACTIVE'
  | 'REJECTED'
  | 'REVOKED'
  | 'SUSPENDED'
  | 'SUSPENSION_EXPIRED'
  | 'EXPIRED'
  | 'ACTIVE';

export interface License {
  id: number;
  assetId: number;
  licensor: Address;
  licensee: Address;
  licenseType: LicenseType;
  usageRights: string;
  territory: string;
  fee: bigint;
  royaltyRateBps: BasisPoints;
  startTimestamp: UnixSeconds;
  /** 0 for a perpetual license. */
  endTimestamp: UnixSeconds;
  durationSeconds: number;
  currency: CurrencyId;
  metadataUri: string;
  metadataHash: HashHex;
  requiresApproval: boolean;
  approvalResolved: boolean;
  isApproved: boolean;
  isActive: boolean;
  isSuspended: boolean;
  suspensionEnd: UnixSeconds;
  /** When the licensee executed the license (0 until then). */
  executedAt: UnixSeconds;
  /** 0 unless revoked. */
  revokedAt: UnixSeconds;
  revocationReason: string;
  createdAt: UnixSeconds;
}

export interface LicenseTerms {
  /** 0 means unlimited. */
  maxUsageCount: number;
  currentUsageCount: number;
  attributionRequired: boolean;
  modificationAllowed: boolean;
  /** Seconds of notice required before termination. */
  terminationNoticePeriod: number;
}

export type LicenseTermsInput = Omit<LicenseTerms, 'currentUsageCount'>;

export interface RoyaltySchedule {
  licenseId: number;
  payer: Address;
  totalRevenueReported: bigint;
  totalRoyaltiesPaid: bigint;
  paymentInterval: number;
  nextPaymentDue: UnixSeconds;
  /** 0 until the first payment. */
  lastPaymentAt: UnixSeconds;
}

/** Everything needed to create a license, apart from who grants it. */
export interface LicenseBlueprint {
  licensee: Address;
  licenseType: LicenseType;
  usageRights: string;
  territory: string;
  fee: bigint;
  royaltyRateBps: BasisPoints;
  /** 0 for a perpetual license. */
  durationSeconds: number;
  currency: CurrencyId;
  metadataUri: string;
  terms?: Partial<LicenseTermsInput>;
}

export interface LicenseOffer extends LicenseBlueprint {
  assetId: number;
}

// ─── License proposals ──────────────────────────────────────────────────────────

export interface LicenseProposal {
  id: number;
  assetId: number;
  proposer: Address;
  blueprint: LicenseBlueprint;
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
  executedAt: UnixSeconds;
  /** License created on execution (0 until then). */
  licenseId: number;
}

/** Supplies the license-proposal quorum fraction of an asset. */
export interface LicenseQuorumSource {
  licenseQuorumBps(assetId: number): BasisPoints;
}
