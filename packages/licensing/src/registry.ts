/**
 * License registry: the per-license state machine and royalty accrual.
 *
 * A license is offered by an asset owner, approved by the owners when its
 * type or fee calls for it, executed (paid for) by the licensee, and can
 * then be suspended, reactivated, transferred or revoked. Its status is
 * never stored; {@link LicenseRegistry.getStatus} derives it from the
 * flags and timestamps on every read.
 */

import {
  AuthorizationError,
  BPS_DENOMINATOR,
  KoinonErrorCode,
  StateError,
  ValidationError,
  validateIntegerRange,
  validateNonEmpty,
  validateNonNegativeAmount,
  validateNonNegativeInteger,
  validatePositiveAmount,
} from '@koinon/types';
import type { Address, Logger, UnixSeconds } from '@koinon/types';
import { hashFreeText } from '@koinon/crypto';
import { Sequence, Table } from '@koinon/runtime';
import type { CallContext, Capability, ExecutionRuntime } from '@koinon/runtime';
import type { OwnershipLedger } from '@koinon/ownership';
import type { RevenuePool } from '@koinon/revenue';

import { LicenseProposals } from './proposals.js';
import { validateBlueprint } from './validation.js';
import type {
  License,
  LicenseBlueprint,
  LicenseOffer,
  LicenseProposal,
  LicenseQuorumSource,
  LicenseStatus,
  LicenseTerms,
  RoyaltySchedule,
} from './types.js';

// ─── Registry ───────────────────────────────────────────────────────────────────

export interface LicenseRegistryOptions {
  /** Where license-proposal quorums come from. Defaults to the configured governance defaults. */
  quorumSource?: LicenseQuorumSource;
}

export class LicenseRegistry {
  private readonly runtime: ExecutionRuntime;
  private readonly ownership: OwnershipLedger;
  private readonly revenue: RevenuePool;
  private readonly log: Logger;
  private readonly licenses: Table<number, License>;
  private readonly terms: Table<number, LicenseTerms>;
  private readonly schedules: Table<number, RoyaltySchedule>;
  private readonly byAsset: Table<number, number[]>;
  private readonly byLicensee: Table<Address, number[]>;
  private readonly licenseIds: Sequence;
  private readonly proposals: LicenseProposals;

  constructor(
    runtime: ExecutionRuntime,
    ownership: OwnershipLedger,
    revenue: RevenuePool,
    options: LicenseRegistryOptions = {},
  ) {
    this.runtime = runtime;
    this.ownership = ownership;
    this.revenue = revenue;
    this.log = runtime.logger.child('licensing');
    this.licenses = runtime.register(new Table<number, License>('licenses'));
    this.terms = runtime.register(new Table<number, LicenseTerms>('licenseTerms'));
    this.schedules = runtime.register(new Table<number, RoyaltySchedule>('royaltySchedules'));
    this.byAsset = runtime.register(new Table<number, number[]>('licensesByAsset'));
    this.byLicensee = runtime.register(new Table<Address, number[]>('licensesByLicensee'));
    this.licenseIds = runtime.register(new Sequence('licenseIds'));

    const defaultQuorum = runtime.config.governanceDefaults.licenseQuorumBps;
    this.proposals = new LicenseProposals(
      runtime,
      ownership,
      options.quorumSource ?? { licenseQuorumBps: () => defaultQuorum },
      (proposal, now) => this.createFromProposal(proposal, now),
    );
  }

  // ── Offers and approval ─────────────────────────────────────────────────────

  /**
   * Offer a license on an asset the caller owns. Exclusive and
   * sole-exclusive offers, and offers whose fee exceeds the approval
   * threshold, wait for owner approval; all others are approved at once.
   *
   * @returns The new license id.
   */
  createOffer(caller: Address, offer: LicenseOffer): number {
    return this.runtime.execute(
      { operation: 'createOffer', caller, requires: [this.ownership.ownerOf(offer.assetId)] },
      (call) => {
        validateBlueprint(offer);
        const requiresApproval =
          offer.licenseType !== 'NON_EXCLUSIVE' || offer.fee > this.runtime.config.approvalFeeThreshold;
        const id = this.insertLicense(offer.assetId, caller, offer, call.now, {
          requiresApproval,
          approvalResolved: false,
          isApproved: !requiresApproval,
        });
        this.log.info('license offered', { licenseId: id, assetId: offer.assetId, licensee: offer.licensee, requiresApproval });
        return id;
      },
    );
  }

  /** Resolve a pending approval. Owner only; a rejection is final. */
  approve(caller: Address, licenseId: number, approve: boolean): void {
    this.runtime.execute(
      { operation: 'approve', caller, requires: [this.licenseOwner(licenseId)] },
      () => {
        const license = this.requireLicense(licenseId);
        if (!license.requiresApproval || license.approvalResolved) {
          throw new StateError(
            KoinonErrorCode.APPROVAL_NOT_PENDING,
            `License ${licenseId} has no pending approval`,
          );
        }
        license.approvalResolved = true;
        license.isApproved = approve;
        this.log.info(approve ? 'license approved' : 'license rejected', { licenseId, by: caller });
      },
    );
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  /**
   * Activate an approved license. The licensee pays the fee, if any, which
   * is split among the owners at once; the royalty schedule starts here.
   */
  execute(caller: Address, licenseId: number): void {
    this.runtime.execute({ operation: 'execute', caller, requires: [this.licensee(licenseId)] }, (call) => {
      const license = this.requireLicense(licenseId);
      if (license.revokedAt !== 0) {
        throw new StateError(KoinonErrorCode.LICENSE_REVOKED, `License ${licenseId} has been revoked`);
      }
      if (!license.isApproved) {
        throw new StateError(KoinonErrorCode.LICENSE_NOT_APPROVED, `License ${licenseId} is not approved`, {
          context: { licenseId, requiresApproval: license.requiresApproval, approvalResolved: license.approvalResolved },
        });
      }
      if (license.isActive || license.executedAt !== 0) {
        throw new StateError(KoinonErrorCode.LICENSE_ALREADY_ACTIVE, `License ${licenseId} has already been executed`);
      }
      if (isPastEnd(license, call.now)) {
        throw new StateError(KoinonErrorCode.LICENSE_EXPIRED, `License ${licenseId} ended at ${license.endTimestamp}`);
      }
      const token = license.fee > 0n ? this.runtime.paymentToken(license.currency) : undefined;

      license.isActive = true;
      license.executedAt = call.now;
      const interval = this.runtime.config.royaltyPaymentInterval;
      this.schedules.set(licenseId, {
        licenseId,
        payer: license.licensee,
        totalRevenueReported: 0n,
        totalRoyaltiesPaid: 0n,
        paymentInterval: interval,
        nextPaymentDue: call.now + interval,
        lastPaymentAt: 0,
      });
      if (token) {
        this.revenue.routeFee(license.assetId, license.currency, license.fee);
      }
      this.log.info('license executed', { licenseId, licensee: caller, fee: license.fee });

      token?.transferFrom(caller, this.runtime.address, license.fee);
    });
  }

  /** Permanently deactivate an active license. Owner only. */
  revoke(caller: Address, licenseId: number, reason: string): void {
    this.runtime.execute(
      { operation: 'revoke', caller, requires: [this.licenseOwner(licenseId)] },
      (call) => {
        const license = this.requireActive(licenseId, call.now);
        license.isActive = false;
        license.revokedAt = call.now;
        license.revocationReason = reason;
        this.log.info('license revoked', { licenseId, by: caller, reason });
      },
    );
  }

  /** Suspend an active license for `durationSeconds`. Owner only. */
  suspend(caller: Address, licenseId: number, durationSeconds: number): void {
    this.runtime.execute(
      { operation: 'suspend', caller, requires: [this.licenseOwner(licenseId)] },
      () => {
        this.applySuspension(licenseId, durationSeconds);
      },
    );
  }

  /** Reactivate a suspended license once its suspension has elapsed. Anyone may call. */
  checkAndReactivate(caller: Address, licenseId: number): void {
    this.runtime.execute({ operation: 'checkAndReactivate', caller }, (call) => {
      const license = this.requireSuspended(licenseId);
      if (call.now < license.suspensionEnd) {
        throw new StateError(
          KoinonErrorCode.SUSPENSION_NOT_ELAPSED,
          `License ${licenseId} is suspended until ${license.suspensionEnd}`,
          { context: { licenseId, suspensionEnd: license.suspensionEnd, now: call.now } },
        );
      }
      this.reactivate(license, caller);
    });
  }

  /** Reactivate a suspended license before its suspension elapses. Owner only. */
  manualReactivate(caller: Address, licenseId: number): void {
    this.runtime.execute(
      { operation: 'manualReactivate', caller, requires: [this.licenseOwner(licenseId)] },
      () => {
        this.reactivate(this.requireSuspended(licenseId), caller);
      },
    );
  }

  /** Hand an active license, and its royalty obligations, to another licensee. */
  transfer(caller: Address, licenseId: number, newLicensee: Address): void {
    this.runtime.execute({ operation: 'transfer', caller, requires: [this.licensee(licenseId)] }, (call) => {
      validateNonEmpty(newLicensee, 'newLicensee');
      const license = this.requireActive(licenseId, call.now);
      if (newLicensee === license.licensee) {
        throw new ValidationError(
          KoinonErrorCode.INVALID_INPUT,
          'newLicensee must differ from the current licensee',
          'newLicensee',
        );
      }
      const previous = license.licensee;
      license.licensee = newLicensee;
      const schedule = this.schedules.get(licenseId);
      if (schedule) schedule.payer = newLicensee;

      this.byLicensee.set(previous, (this.byLicensee.get(previous) ?? []).filter((id) => id !== licenseId));
      this.byLicensee.set(newLicensee, [...(this.byLicensee.get(newLicensee) ?? []), licenseId]);
      this.log.info('license transferred', { licenseId, from: previous, to: newLicensee });
    });
  }

  // ── Usage and royalties ─────────────────────────────────────────────────────

  /** Record usage and the revenue it earned, against the usage cap. */
  reportUsage(caller: Address, licenseId: number, revenueAmount: bigint, usageCount: number): void {
    this.runtime.execute({ operation: 'reportUsage', caller, requires: [this.licensee(licenseId)] }, (call) => {
      validateNonNegativeAmount(revenueAmount, 'revenueAmount');
      validateNonNegativeInteger(usageCount, 'usageCount');
      this.requireActive(licenseId, call.now);
      const terms = this.requireTerms(licenseId);
      const schedule = this.requireSchedule(licenseId);

      const nextCount = terms.currentUsageCount + usageCount;
      if (terms.maxUsageCount > 0 && nextCount > terms.maxUsageCount) {
        throw new StateError(
          KoinonErrorCode.USAGE_CAP_EXCEEDED,
          `Usage of license ${licenseId} would reach ${nextCount}, above its cap of ${terms.maxUsageCount}`,
          { context: { licenseId, currentUsageCount: terms.currentUsageCount, usageCount } },
        );
      }
      terms.currentUsageCount = nextCount;
      schedule.totalRevenueReported += revenueAmount;
      this.log.info('usage reported', { licenseId, usageCount, revenueAmount });
    });
  }

  /**
   * Pay `amount` of royalties in the license currency. The payment is
   * split among the owners at once and moves the next due date forward.
   */
  payRoyalties(caller: Address, licenseId: number, amount: bigint): void {
    this.runtime.execute({ operation: 'payRoyalties', caller, requires: [this.licensee(licenseId)] }, (call) => {
      const license = this.requireLicense(licenseId);
      if (license.revokedAt !== 0) {
        throw new StateError(KoinonErrorCode.LICENSE_REVOKED, `License ${licenseId} has been revoked`);
      }
      const schedule = this.requireSchedule(licenseId);
      validatePositiveAmount(amount, 'amount');
      const token = this.runtime.paymentToken(license.currency);

      schedule.totalRoyaltiesPaid += amount;
      schedule.lastPaymentAt = call.now;
      schedule.nextPaymentDue = call.now + schedule.paymentInterval;
      this.revenue.routeFee(license.assetId, license.currency, amount);
      this.log.info('royalties paid', { licenseId, amount, totalRoyaltiesPaid: schedule.totalRoyaltiesPaid });

      token.transferFrom(caller, this.runtime.address, amount);
    });
  }

  /** `max(0, floor(reported × rate / 10000) − paid)`; 0 before execution. */
  dueRoyalties(licenseId: number): bigint {
    const license = this.requireLicense(licenseId);
    const schedule = this.schedules.get(licenseId);
    if (schedule === undefined) return 0n;
    const owed = (schedule.totalRevenueReported * BigInt(license.royaltyRateBps)) / BigInt(BPS_DENOMINATOR);
    const due = owed - schedule.totalRoyaltiesPaid;
    return due > 0n ? due : 0n;
  }

  // ── Status ──────────────────────────────────────────────────────────────────

  /**
   * Derive the status at the current time: pending approval first, then
   * the inactive states, then suspension, then expiry.
   */
  getStatus(licenseId: number): LicenseStatus {
    const license = this.licenses.get(licenseId);
    if (license === undefined) return 'NOT_FOUND';
    return deriveStatus(license, this.runtime.now());
  }

  // ── Internal routines ───────────────────────────────────────────────────────
  // Called from inside a governance operation; no entry checks.

  applySuspension(licenseId: number, durationSeconds: number): void {
    validateIntegerRange(durationSeconds, 1, Number.MAX_SAFE_INTEGER, 'durationSeconds');
    const now = this.runtime.now();
    const license = this.requireActive(licenseId, now);
    license.isActive = false;
    license.isSuspended = true;
    license.suspensionEnd = now + durationSeconds;
    this.log.info('license suspended', { licenseId, suspensionEnd: license.suspensionEnd });
  }

  /**
   * Suspend every active license of an asset.
   *
   * @returns Ids of the licenses suspended.
   */
  applySuspensionToAsset(assetId: number, durationSeconds: number): number[] {
    validateIntegerRange(durationSeconds, 1, Number.MAX_SAFE_INTEGER, 'durationSeconds');
    this.ownership.requireAsset(assetId);
    const now = this.runtime.now();
    const suspended: number[] = [];
    for (const licenseId of this.byAsset.get(assetId) ?? []) {
      const license = this.licenses.get(licenseId);
      if (license && deriveStatus(license, now) === 'ACTIVE') {
        this.applySuspension(licenseId, durationSeconds);
        suspended.push(licenseId);
      }
    }
    return suspended;
  }

  // ── License proposals ───────────────────────────────────────────────────────

  /**
   * Propose a license on the caller's asset for the owners to vote on.
   * A passed proposal creates the license already approved, with the
   * proposer as licensor.
   */
  proposeLicenseTerms(caller: Address, assetId: number, blueprint: LicenseBlueprint, description: string): number {
    return this.proposals.propose(caller, assetId, blueprint, description);
  }

  voteOnLicenseProposal(caller: Address, proposalId: number, inFavor: boolean): void {
    this.proposals.vote(caller, proposalId, inFavor);
  }

  /** @returns The id of the license created. */
  executeLicenseProposal(caller: Address, proposalId: number): number {
    return this.proposals.execute(caller, proposalId);
  }

  getLicenseProposal(proposalId: number): LicenseProposal | undefined {
    return this.proposals.get(proposalId);
  }

  hasVotedOnLicenseProposal(proposalId: number, voter: Address): boolean {
    return this.proposals.hasVoted(proposalId, voter);
  }

  // ── Queries ─────────────────────────────────────────────────────────────────

  getLicense(licenseId: number): License | undefined {
    const license = this.licenses.get(licenseId);
    return license ? { ...license } : undefined;
  }

  getTerms(licenseId: number): LicenseTerms | undefined {
    const terms = this.terms.get(licenseId);
    return terms ? { ...terms } : undefined;
  }

  getRoyaltySchedule(licenseId: number): RoyaltySchedule | undefined {
    const schedule = this.schedules.get(licenseId);
    return schedule ? { ...schedule } : undefined;
  }

  getLicensesForAsset(assetId: number): number[] {
    return [...(this.byAsset.get(assetId) ?? [])];
  }

  getLicensesForLicensee(licensee: Address): number[] {
    return [...(this.byLicensee.get(licensee) ?? [])];
  }

  getLicenseCount(): number {
    return this.licenseIds.current();
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private createFromProposal(proposal: LicenseProposal, now: UnixSeconds): number {
    const blueprint = proposal.blueprint;
    const id = this.insertLicense(proposal.assetId, proposal.proposer, blueprint, now, {
      requiresApproval: blueprint.licenseType !== 'NON_EXCLUSIVE' || blueprint.fee > this.runtime.config.approvalFeeThreshold,
      approvalResolved: true,
      isApproved: true,
    });
    this.log.info('license created from proposal', { licenseId: id, proposalId: proposal.id });
    return id;
  }

  private insertLicense(
    assetId: number,
    licensor: Address,
    blueprint: LicenseBlueprint,
    now: UnixSeconds,
    approval: Pick<License, 'requiresApproval' | 'approvalResolved' | 'isApproved'>,
  ): number {
    const id = this.licenseIds.next();
    this.licenses.set(id, {
      id,
      assetId,
      licensor,
      licensee: blueprint.licensee,
      licenseType: blueprint.licenseType,
      usageRights: blueprint.usageRights,
      territory: blueprint.territory,
      fee: blueprint.fee,
      royaltyRateBps: blueprint.royaltyRateBps,
      startTimestamp: now,
      endTimestamp: blueprint.durationSeconds === 0 ? 0 : now + blueprint.durationSeconds,
      durationSeconds: blueprint.durationSeconds,
      currency: blueprint.currency,
      metadataUri: blueprint.metadataUri,
      metadataHash: hashFreeText(blueprint.metadataUri),
      ...approval,
      isActive: false,
      isSuspended: false,
      suspensionEnd: 0,
      executedAt: 0,
      revokedAt: 0,
      revocationReason: '',
      createdAt: now,
    });
    this.terms.set(id, {
      maxUsageCount: blueprint.terms?.maxUsageCount ?? 0,
      currentUsageCount: 0,
      attributionRequired: blueprint.terms?.attributionRequired ?? false,
      modificationAllowed: blueprint.terms?.modificationAllowed ?? false,
      terminationNoticePeriod: blueprint.terms?.terminationNoticePeriod ?? 0,
    });
    this.byAsset.set(assetId, [...(this.byAsset.get(assetId) ?? []), id]);
    this.byLicensee.set(blueprint.licensee, [...(this.byLicensee.get(blueprint.licensee) ?? []), id]);
    return id;
  }

  private reactivate(license: License, caller: Address): void {
    license.isSuspended = false;
    license.suspensionEnd = 0;
    license.isActive = true;
    this.log.info('license reactivated', { licenseId: license.id, by: caller });
  }

  /** Capability: caller owns a share of the license's asset. */
  private licenseOwner(licenseId: number): Capability {
    return (call: CallContext) => {
      const license = this.requireLicense(licenseId);
      this.ownership.ownerOf(license.assetId)(call);
    };
  }

  /** Capability: caller is the license's current licensee. */
  private licensee(licenseId: number): Capability {
    return (call: CallContext) => {
      const license = this.requireLicense(licenseId);
      if (license.licensee !== call.caller) {
        throw new AuthorizationError(
          KoinonErrorCode.NOT_LICENSEE,
          `${call.operation}: ${call.caller} is not the licensee of license ${licenseId}`,
          call.caller,
        );
      }
    };
  }

  private requireLicense(licenseId: number): License {
    const license = this.licenses.get(licenseId);
    if (license === undefined) {
      throw new StateError(KoinonErrorCode.LICENSE_NOT_FOUND, `License ${licenseId} does not exist`, {
        context: { licenseId },
      });
    }
    return license;
  }

  private requireActive(licenseId: number, now: UnixSeconds): License {
    const license = this.requireLicense(licenseId);
    const status = deriveStatus(license, now);
    if (status === 'ACTIVE') return license;
    if (status === 'REVOKED') {
      throw new StateError(KoinonErrorCode.LICENSE_REVOKED, `License ${licenseId} has been revoked`);
    }
    if (status === 'EXPIRED') {
      throw new StateError(KoinonErrorCode.LICENSE_EXPIRED, `License ${licenseId} ended at ${license.endTimestamp}`);
    }
    throw new StateError(KoinonErrorCode.LICENSE_NOT_ACTIVE, `License ${licenseId} is not active (${status})`, {
      context: { licenseId, status },
    });
  }

  private requireSuspended(licenseId: number): License {
    const license = this.requireLicense(licenseId);
    if (!license.isSuspended) {
      throw new StateError(KoinonErrorCode.LICENSE_NOT_SUSPENDED, `License ${licenseId} is not suspended`);
    }
    return license;
  }

  private requireTerms(licenseId: number): LicenseTerms {
    const terms = this.terms.get(licenseId);
    if (terms === undefined) {
      throw new StateError(KoinonErrorCode.LICENSE_NOT_FOUND, `License ${licenseId} has no terms`);
    }
    return terms;
  }

  private requireSchedule(licenseId: number): RoyaltySchedule {
    const schedule = this.schedules.get(licenseId);
    if (schedule === undefined) {
      throw new StateError(
        KoinonErrorCode.ROYALTY_SCHEDULE_MISSING,
        `License ${licenseId} has not been executed`,
        { hint: 'The licensee must execute the license first' },
      );
    }
    return schedule;
  }
}

// ─── Status derivation ──────────────────────────────────────────────────────────

function isPastEnd(license: License, now: UnixSeconds): boolean {
  return license.endTimestamp !== 0 && now > license.endTimestamp;
}

function deriveStatus(license: License, now: UnixSeconds): LicenseStatus {
  if (license.requiresApproval && !license.approvalResolved) return 'PENDING_APPROVAL';
  if (!license.isActive && !license.isSuspended) {
    if (!license.isApproved) return 'REJECTED';
    if (license.revokedAt !== 0) return 'REVOKED';
    return 'INACTIVE';
  }
  if (license.isSuspended) {
    return now < license.suspensionEnd ? 'SUSPENDED' : 'SUSPENSION_EXPIRED';
  }
  if (isPastEnd(license, now)) return 'EXPIRED';
  return 'ACTIVE';
}
