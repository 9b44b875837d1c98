/**
 * Weighted, time-boxed governance over an asset.
 *
 * A proposal snapshots the asset's total governance weight when it is
 * created and derives its quorum from that snapshot. Votes, however, count
 * each voter's weight at the moment of voting, so share transfers made
 * during the vote change the weight cast but not the quorum target.
 *
 * A proposal executes when
 * `votingDeadline < now ≤ executionDeadline`, the votes cast reach the
 * quorum, and `votesFor > votesAgainst`.
 */

import {
  AuthorizationError,
  BPS_DENOMINATOR,
  KoinonErrorCode,
  StateError,
  ValidationError,
  assertNever,
  validateIntegerRange,
  validateNonEmpty,
  validateNonNegativeAmount,
} from '@koinon/types';
import type { Address, BasisPoints, Logger, UnixSeconds } from '@koinon/types';
import { hashFreeText } from '@koinon/crypto';
import { Sequence, Table, validateGovernanceSettings } from '@koinon/runtime';
import type { Capability, ExecutionRuntime, GovernanceSettings } from '@koinon/runtime';
import type { OwnershipLedger } from '@koinon/ownership';
import type { RevenuePool } from '@koinon/revenue';
import type { LicenseRegistry } from '@koinon/licensing';

import type {
  AssetManagementOutcome,
  AssetManagementPayload,
  EmergencyAction,
  EmergencyOutcome,
  ExecutionOutcome,
  PayloadOf,
  Proposal,
  ProposalCategory,
  ProposalPayload,
  RevenuePolicyOutcome,
  VoteReceipt,
} from './types.js';

function isPayloadOf<C extends ProposalCategory>(payload: ProposalPayload, category: C): payload is PayloadOf<C> {
  return payload.category === category;
}

export class GovernanceEngine {
  private readonly runtime: ExecutionRuntime;
  private readonly ownership: OwnershipLedger;
  private readonly revenue: RevenuePool;
  private readonly licensing: LicenseRegistry;
  private readonly log: Logger;
  private readonly proposals: Table<number, Proposal>;
  private readonly receipts: Table<number, Map<Address, VoteReceipt>>;
  private readonly settings: Table<number, GovernanceSettings>;
  private readonly proposalIds: Sequence;

  constructor(
    runtime: ExecutionRuntime,
    ownership: OwnershipLedger,
    revenue: RevenuePool,
    licensing: LicenseRegistry,
  ) {
    this.runtime = runtime;
    this.ownership = ownership;
    this.revenue = revenue;
    this.licensing = licensing;
    this.log = runtime.logger.child('governance');
    this.proposals = runtime.register(new Table<number, Proposal>('proposals'));
    this.receipts = runtime.register(new Table<number, Map<Address, VoteReceipt>>('voteReceipts'));
    this.settings = runtime.register(new Table<number, GovernanceSettings>('governanceSettings'));
    this.proposalIds = runtime.register(new Sequence('proposalIds'));
  }

  // ── Settings ────────────────────────────────────────────────────────────────

  /** Settings of an asset, or the configured defaults when none were set. */
  getGovernanceSettings(assetId: number): GovernanceSettings {
    return { ...(this.settings.get(assetId) ?? this.runtime.config.governanceDefaults) };
  }

  /** Override some or all settings of an asset. Owner only. */
  setGovernanceSettings(caller: Address, assetId: number, settings: Partial<GovernanceSettings>): GovernanceSettings {
    return this.runtime.execute(
      { operation: 'setGovernanceSettings', caller, requires: [this.ownership.ownerOf(assetId)] },
      () => {
        const next: GovernanceSettings = { ...this.getGovernanceSettings(assetId), ...settings };
        validateGovernanceSettings(next);
        this.settings.set(assetId, next);
        this.log.info('governance settings updated', { assetId, by: caller });
        return { ...next };
      },
    );
  }

  // ── Proposals ───────────────────────────────────────────────────────────────

  /**
   * Create a proposal on an asset the caller owns. A missing or zero
   * `votingDuration` takes the category default.
   *
   * @returns The new proposal id.
   */
  createProposal(
    caller: Address,
    assetId: number,
    payload: ProposalPayload,
    description: string,
    votingDuration?: number,
  ): number {
    return this.propose('createProposal', caller, assetId, payload, description, votingDuration);
  }

  proposeAssetManagement(
    caller: Address,
    assetId: number,
    changes: Omit<AssetManagementPayload, 'category'>,
    description: string,
    votingDuration?: number,
  ): number {
    return this.propose(
      'proposeAssetManagement',
      caller,
      assetId,
      { category: 'ASSET_MANAGEMENT', ...changes },
      description,
      votingDuration,
    );
  }

  proposeRevenuePolicy(
    caller: Address,
    assetId: number,
    currency: string,
    newMinimumDistribution: bigint,
    description: string,
    votingDuration?: number,
  ): number {
    return this.propose(
      'proposeRevenuePolicy',
      caller,
      assetId,
      { category: 'REVENUE_POLICY', currency, newMinimumDistribution },
      description,
      votingDuration,
    );
  }

  proposeEmergencyAction(
    caller: Address,
    assetId: number,
    action: EmergencyAction,
    description: string,
    votingDuration?: number,
  ): number {
    return this.propose(
      'proposeEmergencyAction',
      caller,
      assetId,
      { category: 'EMERGENCY', action },
      description,
      votingDuration,
    );
  }

  /** Cast the caller's current governance weight for or against. */
  vote(caller: Address, proposalId: number, inFavor: boolean): void {
    this.runtime.execute(
      { operation: 'vote', caller, requires: [this.assetOwner(proposalId)] },
      (call) => {
        const proposal = this.requireOpen(proposalId);
        if (call.now > proposal.votingDeadline) {
          throw new StateError(
            KoinonErrorCode.VOTING_CLOSED,
            `Voting on proposal ${proposalId} closed at ${proposal.votingDeadline}`,
            { context: { proposalId, now: call.now } },
          );
        }
        const receipts = this.receipts.get(proposalId) ?? new Map<Address, VoteReceipt>();
        if (receipts.has(caller)) {
          throw new StateError(KoinonErrorCode.ALREADY_VOTED, `${caller} has already voted on proposal ${proposalId}`);
        }

        const weight = this.ownership.getGovernanceWeight(proposal.assetId, caller);
        if (inFavor) {
          proposal.votesFor += weight;
        } else {
          proposal.votesAgainst += weight;
        }
        receipts.set(caller, { inFavor, weight, castAt: call.now });
        this.receipts.set(proposalId, receipts);
        this.log.info('vote cast', { proposalId, voter: caller, inFavor, weight });
      },
    );
  }

  /** Withdraw a proposal that has not executed. Proposer only. */
  cancelProposal(caller: Address, proposalId: number): void {
    this.runtime.execute({ operation: 'cancelProposal', caller }, () => {
      const proposal = this.require(proposalId);
      if (proposal.proposer !== caller) {
        throw new AuthorizationError(
          KoinonErrorCode.NOT_PROPOSER,
          `cancelProposal: ${caller} did not propose proposal ${proposalId}`,
          caller,
        );
      }
      this.requireOpen(proposalId);
      proposal.cancelled = true;
      this.log.info('proposal cancelled', { proposalId, by: caller });
    });
  }

  /** Whether the proposal would execute if called now. */
  canExecute(proposalId: number): boolean {
    const proposal = this.proposals.get(proposalId);
    if (proposal === undefined) return false;
    return executionBlocker(proposal, this.runtime.now()) === undefined;
  }

  // ── Execution ───────────────────────────────────────────────────────────────

  /**
   * Apply the metadata and compliance changes of a passed proposal.
   *
   * @returns Which fields actually changed.
   */
  executeAssetManagement(caller: Address, proposalId: number): AssetManagementOutcome {
    return this.runtime.execute({ operation: 'executeAssetManagement', caller }, (call) => {
      const { proposal, payload } = this.beginExecution(proposalId, 'ASSET_MANAGEMENT', call.now);
      return this.applyAssetManagement(proposal, payload);
    });
  }

  executeRevenuePolicy(caller: Address, proposalId: number): RevenuePolicyOutcome {
    return this.runtime.execute({ operation: 'executeRevenuePolicy', caller }, (call) => {
      const { proposal, payload } = this.beginExecution(proposalId, 'REVENUE_POLICY', call.now);
      return this.applyRevenuePolicy(proposal, payload);
    });
  }

  executeEmergency(caller: Address, proposalId: number): EmergencyOutcome {
    return this.runtime.execute({ operation: 'executeEmergency', caller }, (call) => {
      const { proposal, payload } = this.beginExecution(proposalId, 'EMERGENCY', call.now);
      return this.applyEmergency(proposal, payload);
    });
  }

  /** Execute a passed proposal of any category. */
  executeProposal(caller: Address, proposalId: number): ExecutionOutcome {
    return this.runtime.execute({ operation: 'executeProposal', caller }, (call) => {
      const category = this.require(proposalId).payload.category;
      switch (category) {
        case 'ASSET_MANAGEMENT': {
          const { proposal, payload } = this.beginExecution(proposalId, category, call.now);
          return this.applyAssetManagement(proposal, payload);
        }
        case 'REVENUE_POLICY': {
          const { proposal, payload } = this.beginExecution(proposalId, category, call.now);
          return this.applyRevenuePolicy(proposal, payload);
        }
        case 'EMERGENCY': {
          const { proposal, payload } = this.beginExecution(proposalId, category, call.now);
          return this.applyEmergency(proposal, payload);
        }
        default:
          return assertNever(category);
      }
    });
  }

  // ── Queries ─────────────────────────────────────────────────────────────────

  getProposal(proposalId: number): Proposal | undefined {
    const proposal = this.proposals.get(proposalId);
    return proposal ? structuredClone(proposal) : undefined;
  }

  getProposalCount(): number {
    return this.proposalIds.current();
  }

  hasVoted(proposalId: number, voter: Address): boolean {
    return this.receipts.get(proposalId)?.has(voter) ?? false;
  }

  getVoteReceipt(proposalId: number, voter: Address): VoteReceipt | undefined {
    const receipt = this.receipts.get(proposalId)?.get(voter);
    return receipt ? { ...receipt } : undefined;
  }

  /** Proposals of the asset that are neither finished nor past their execution deadline. */
  getActiveProposals(assetId: number): number[] {
    const now = this.runtime.now();
    const ids: number[] = [];
    for (const proposal of this.proposals.values()) {
      if (
        proposal.assetId === assetId &&
        !proposal.executed &&
        !proposal.cancelled &&
        now <= proposal.executionDeadline
      ) {
        ids.push(proposal.id);
      }
    }
    return ids.sort((a, b) => a - b);
  }

  getProposalsForAsset(assetId: number): number[] {
    const ids: number[] = [];
    for (const proposal of this.proposals.values()) {
      if (proposal.assetId === assetId) ids.push(proposal.id);
    }
    return ids.sort((a, b) => a - b);
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private propose(
    operation: string,
    caller: Address,
    assetId: number,
    payload: ProposalPayload,
    description: string,
    votingDuration: number | undefined,
  ): number {
    return this.runtime.execute(
      { operation, caller, requires: [this.ownership.ownerOf(assetId)] },
      (call) => {
        this.validatePayload(assetId, payload);
        const settings = this.getGovernanceSettings(assetId);
        const duration =
          votingDuration === undefined || votingDuration === 0
            ? payload.category === 'EMERGENCY'
              ? settings.emergencyVotingDuration
              : settings.defaultVotingDuration
            : votingDuration;
        validateIntegerRange(duration, 1, Number.MAX_SAFE_INTEGER, 'votingDuration');

        const totalVotingWeight = this.ownership.getTotalGovernanceWeight(assetId);
        const quorumBps = categoryQuorum(settings, payload.category);
        const votingDeadline = call.now + duration;

        const id = this.proposalIds.next();
        this.proposals.set(id, {
          id,
          assetId,
          proposer: caller,
          category: payload.category,
          payload: structuredClone(payload),
          description,
          descriptionHash: hashFreeText(description),
          votesFor: 0n,
          votesAgainst: 0n,
          totalVotingWeight,
          quorumRequired: (totalVotingWeight * BigInt(quorumBps)) / BigInt(BPS_DENOMINATOR),
          createdAt: call.now,
          votingDeadline,
          executionDeadline: votingDeadline + settings.executionDelay,
          executed: false,
          cancelled: false,
          executedAt: 0,
        });
        this.receipts.set(id, new Map<Address, VoteReceipt>());
        this.log.info('proposal created', { proposalId: id, assetId, category: payload.category, proposer: caller });
        return id;
      },
    );
  }

  private validatePayload(assetId: number, payload: ProposalPayload): void {
    switch (payload.category) {
      case 'ASSET_MANAGEMENT':
        if (payload.newMetadataUri === undefined && payload.newComplianceStatus === undefined) {
          throw new ValidationError(
            KoinonErrorCode.INVALID_INPUT,
            'An asset-management proposal must change the metadata or the compliance status',
            'payload',
          );
        }
        if (payload.newMetadataUri !== undefined) validateNonEmpty(payload.newMetadataUri, 'newMetadataUri');
        if (payload.newComplianceStatus !== undefined) {
          validateNonEmpty(payload.newComplianceStatus, 'newComplianceStatus');
        }
        return;
      case 'REVENUE_POLICY':
        validateNonEmpty(payload.currency, 'currency');
        validateNonNegativeAmount(payload.newMinimumDistribution, 'newMinimumDistribution');
        return;
      case 'EMERGENCY':
        this.validateEmergencyAction(assetId, payload.action);
        return;
      default:
        assertNever(payload);
    }
  }

  private validateEmergencyAction(assetId: number, action: EmergencyAction): void {
    switch (action.kind) {
      case 'SUSPEND_LICENSE': {
        validateIntegerRange(action.duration, 1, Number.MAX_SAFE_INTEGER, 'duration');
        const license = this.licensing.getLicense(action.licenseId);
        if (license === undefined || license.assetId !== assetId) {
          throw new ValidationError(
            KoinonErrorCode.INVALID_INPUT,
            `License ${action.licenseId} is not a license of asset ${assetId}`,
            'licenseId',
          );
        }
        return;
      }
      case 'SUSPEND_ALL_LICENSES':
        validateIntegerRange(action.duration, 1, Number.MAX_SAFE_INTEGER, 'duration');
        return;
      case 'PAUSE':
        validateNonEmpty(action.reason, 'reason');
        return;
      default:
        assertNever(action);
    }
  }

  private beginExecution<C extends ProposalCategory>(
    proposalId: number,
    category: C,
    now: UnixSeconds,
  ): { proposal: Proposal; payload: PayloadOf<C> } {
    const proposal = this.require(proposalId);
    const payload = proposal.payload;
    if (!isPayloadOf(payload, category)) {
      throw new ValidationError(
        KoinonErrorCode.CATEGORY_MISMATCH,
        `Proposal ${proposalId} is ${proposal.category}, not ${category}`,
        'proposalId',
      );
    }
    const blocker = executionBlocker(proposal, now);
    if (blocker !== undefined) {
      throw blocker;
    }
    proposal.executed = true;
    proposal.executedAt = now;
    return { proposal, payload };
  }

  private applyAssetManagement(proposal: Proposal, payload: PayloadOf<'ASSET_MANAGEMENT'>): AssetManagementOutcome {
    const changes = this.ownership.applyAssetUpdate(proposal.assetId, {
      metadataUri: payload.newMetadataUri,
      complianceStatus: payload.newComplianceStatus,
    });
    this.log.info('proposal executed', { proposalId: proposal.id, category: payload.category, ...changes });
    return { category: 'ASSET_MANAGEMENT', ...changes };
  }

  private applyRevenuePolicy(proposal: Proposal, payload: PayloadOf<'REVENUE_POLICY'>): RevenuePolicyOutcome {
    this.revenue.applyMinimumDistribution(proposal.assetId, payload.currency, payload.newMinimumDistribution);
    this.log.info('proposal executed', { proposalId: proposal.id, category: payload.category });
    return {
      category: 'REVENUE_POLICY',
      currency: payload.currency,
      minimumDistribution: payload.newMinimumDistribution,
    };
  }

  private applyEmergency(proposal: Proposal, payload: PayloadOf<'EMERGENCY'>): EmergencyOutcome {
    const action = payload.action;
    let suspendedLicenses: number[] = [];
    switch (action.kind) {
      case 'SUSPEND_LICENSE':
        this.licensing.applySuspension(action.licenseId, action.duration);
        suspendedLicenses = [action.licenseId];
        break;
      case 'SUSPEND_ALL_LICENSES':
        suspendedLicenses = this.licensing.applySuspensionToAsset(proposal.assetId, action.duration);
        break;
      case 'PAUSE':
        this.runtime.applyPause(action.reason);
        break;
      default:
        assertNever(action);
    }
    this.log.info('proposal executed', { proposalId: proposal.id, category: payload.category, action: action.kind });
    return { category: 'EMERGENCY', action: action.kind, suspendedLicenses };
  }

  private assetOwner(proposalId: number): Capability {
    return (call) => {
      this.ownership.ownerOf(this.require(proposalId).assetId)(call);
    };
  }

  private require(proposalId: number): Proposal {
    const proposal = this.proposals.get(proposalId);
    if (proposal === undefined) {
      throw new StateError(KoinonErrorCode.PROPOSAL_NOT_FOUND, `Proposal ${proposalId} does not exist`);
    }
    return proposal;
  }

  /** A proposal that is neither executed nor cancelled. */
  private requireOpen(proposalId: number): Proposal {
    const proposal = this.require(proposalId);
    const closed = closedError(proposal);
    if (closed) throw closed;
    return proposal;
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function categoryQuorum(settings: GovernanceSettings, category: ProposalCategory): BasisPoints {
  switch (category) {
    case 'ASSET_MANAGEMENT':
      return settings.assetManagementQuorumBps;
    case 'REVENUE_POLICY':
      return settings.revenuePolicyQuorumBps;
    case 'EMERGENCY':
      return settings.emergencyQuorumBps;
    default:
      return assertNever(category);
  }
}

function closedError(proposal: Proposal): StateError | undefined {
  if (proposal.executed) {
    return new StateError(KoinonErrorCode.PROPOSAL_ALREADY_EXECUTED, `Proposal ${proposal.id} was executed`);
  }
  if (proposal.cancelled) {
    return new StateError(KoinonErrorCode.PROPOSAL_CANCELLED, `Proposal ${proposal.id} was cancelled`);
  }
  return undefined;
}

/** The error that stops the proposal from executing at `now`, if any. */
function executionBlocker(proposal: Proposal, now: UnixSeconds): StateError | undefined {
  const closed = closedError(proposal);
  if (closed) return closed;
  if (now <= proposal.votingDeadline || now > proposal.executionDeadline) {
    return new StateError(
      KoinonErrorCode.EXECUTION_WINDOW,
      `Proposal ${proposal.id} can execute only after ${proposal.votingDeadline} and until ${proposal.executionDeadline}`,
      { context: { now, votingDeadline: proposal.votingDeadline, executionDeadline: proposal.executionDeadline } },
    );
  }
  const participation = proposal.votesFor + proposal.votesAgainst;
  if (participation < proposal.quorumRequired) {
    return new StateError(
      KoinonErrorCode.QUORUM_NOT_REACHED,
      `Proposal ${proposal.id} reached ${participation} of ${proposal.quorumRequired} quorum weight`,
    );
  }
  if (proposal.votesFor <= proposal.votesAgainst) {
    return new StateError(
      KoinonErrorCode.MAJORITY_NOT_REACHED,
      `Proposal ${proposal.id} has ${proposal.votesFor} for and ${proposal.votesAgainst} against`,
    );
  }
  return undefined;
}
