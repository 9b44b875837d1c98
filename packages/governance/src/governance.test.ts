import { describe, it, expect, beforeEach } from 'vitest';
import { AuthorizationError, KoinonError, KoinonErrorCode, LogLevel, StateError, createLogger } from '@koinon/types';
import { sha256String } from '@koinon/crypto';
import { ExecutionRuntime, ManualClock } from '@koinon/runtime';
import { OwnershipLedger } from '@koinon/ownership';
import { RevenuePool } from '@koinon/revenue';
import { LicenseRegistry } from '@koinon/licensing';
import type { LicenseOffer } from '@koinon/licensing';
import { GovernanceEngine } from './index';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function catchKoinon(fn: () => unknown): KoinonError {
  try {
    fn();
  } catch (err) {
    if (err instanceof KoinonError) return err;
    throw err;
  }
  throw new Error('expected the call to throw');
}

const START = 1_700_000_000;
const DAY = 86_400;

function setup() {
  const clock = new ManualClock(START);
  const runtime = new ExecutionRuntime({
    administrator: 'admin',
    clock,
    logger: createLogger({ level: LogLevel.SILENT }),
  });
  const ownership = new OwnershipLedger(runtime);
  const revenue = new RevenuePool(runtime, ownership);
  const licensing = new LicenseRegistry(runtime, ownership, revenue);
  const governance = new GovernanceEngine(runtime, ownership, revenue, licensing);
  const assetId = ownership.registerAsset('alice', {
    assetType: 'FILM',
    metadataUri: 'ipfs://film/1.json',
    owners: ['alice', 'bob', 'carol'],
    percentages: [60, 30, 10],
    weights: [600n, 300n, 100n],
  });
  return { clock, runtime, ownership, revenue, licensing, governance, assetId };
}

function exclusiveOffer(assetId: number): LicenseOffer {
  return {
    assetId,
    licensee: 'lee',
    licenseType: 'EXCLUSIVE',
    usageRights: 'BROADCAST',
    territory: 'EU',
    fee: 0n,
    royaltyRateBps: 250,
    durationSeconds: 0,
    currency: 'USD',
    metadataUri: 'ipfs://terms/broadcast',
  };
}

/** An executed fee-free exclusive license on the asset. */
function activeLicense(ctx: ReturnType<typeof setup>, assetId = ctx.assetId): number {
  const id = ctx.licensing.createOffer('alice', exclusiveOffer(assetId));
  ctx.licensing.approve('alice', id, true);
  ctx.licensing.execute('lee', id);
  return id;
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------
describe('GovernanceEngine - settings', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  it('falls back to the configured defaults', () => {
    expect(ctx.governance.getGovernanceSettings(ctx.assetId)).toEqual({
      defaultQuorumBps: 5000,
      emergencyQuorumBps: 3000,
      licenseQuorumBps: 5000,
      assetManagementQuorumBps: 5000,
      revenuePolicyQuorumBps: 5000,
      defaultVotingDuration: 3 * DAY,
      emergencyVotingDuration: DAY,
      executionDelay: DAY,
    });
  });

  it('merges a partial override', () => {
    const updated = ctx.governance.setGovernanceSettings('bob', ctx.assetId, { assetManagementQuorumBps: 6000 });
    expect(updated.assetManagementQuorumBps).toBe(6000);
    expect(updated.revenuePolicyQuorumBps).toBe(5000);
    expect(ctx.governance.getGovernanceSettings(ctx.assetId).assetManagementQuorumBps).toBe(6000);
  });

  it('rejects an emergency quorum above the default quorum', () => {
    const err = catchKoinon(() =>
      ctx.governance.setGovernanceSettings('alice', ctx.assetId, { emergencyQuorumBps: 5001 }),
    );
    expect(err.code).toBe(KoinonErrorCode.INVALID_SETTINGS);
    expect(ctx.governance.getGovernanceSettings(ctx.assetId).emergencyQuorumBps).toBe(3000);
  });

  it('rejects an execution delay under one hour', () => {
    const err = catchKoinon(() => ctx.governance.setGovernanceSettings('alice', ctx.assetId, { executionDelay: 3599 }));
    expect(err.code).toBe(KoinonErrorCode.INVALID_SETTINGS);
  });

  it('allows only owners to change settings', () => {
    const err = catchKoinon(() => ctx.governance.setGovernanceSettings('dave', ctx.assetId, { executionDelay: 7200 }));
    expect(err).toBeInstanceOf(AuthorizationError);
    expect(err.code).toBe(KoinonErrorCode.NOT_ASSET_OWNER);
  });
});

// ---------------------------------------------------------------------------
// Proposal creation
// ---------------------------------------------------------------------------
describe('GovernanceEngine - proposals', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  it('snapshots the voting weight and derives quorum and deadlines', () => {
    const id = ctx.governance.proposeAssetManagement(
      'alice',
      ctx.assetId,
      { newComplianceStatus: 'VERIFIED' },
      'Mark rights as verified',
    );
    expect(id).toBe(1);

    const proposal = ctx.governance.getProposal(id);
    expect(proposal?.proposer).toBe('alice');
    expect(proposal?.category).toBe('ASSET_MANAGEMENT');
    expect(proposal?.payload).toEqual({ category: 'ASSET_MANAGEMENT', newComplianceStatus: 'VERIFIED' });
    expect(proposal?.descriptionHash).toBe(sha256String('Mark rights as verified'));
    expect(proposal?.totalVotingWeight).toBe(1000n);
    expect(proposal?.quorumRequired).toBe(500n);
    expect(proposal?.createdAt).toBe(START);
    expect(proposal?.votingDeadline).toBe(START + 3 * DAY);
    expect(proposal?.executionDeadline).toBe(START + 4 * DAY);
    expect(ctx.governance.getProposalCount()).toBe(1);
    expect(ctx.governance.getActiveProposals(ctx.assetId)).toEqual([1]);
  });

  it('keeps weight totals, quorum and tallies exact for very large weights', () => {
    const assetId = ctx.ownership.registerAsset('dave', {
      assetType: 'FILM',
      metadataUri: 'ipfs://film/2.json',
      owners: ['dave', 'erin'],
      percentages: [50, 50],
      weights: [2n ** 60n, 2n ** 60n + 3n],
    });
    const id = ctx.governance.proposeAssetManagement('dave', assetId, { newComplianceStatus: 'VERIFIED' }, 'Verify');
    ctx.governance.vote('dave', id, true);

    const proposal = ctx.governance.getProposal(id);
    expect(proposal?.totalVotingWeight).toBe(2_305_843_009_213_693_955n);
    expect(proposal?.quorumRequired).toBe(1_152_921_504_606_846_977n);
    expect(proposal?.votesFor).toBe(1_152_921_504_606_846_976n);

    ctx.clock.advance(3 * DAY + 1);
    expect(ctx.governance.canExecute(id)).toBe(false);
  });

  it('uses the emergency quorum and voting duration for emergency proposals', () => {
    const id = ctx.governance.proposeEmergencyAction('carol', ctx.assetId, { kind: 'PAUSE', reason: 'dispute' }, 'Halt');
    const proposal = ctx.governance.getProposal(id);
    expect(proposal?.quorumRequired).toBe(300n);
    expect(proposal?.votingDeadline).toBe(START + DAY);
    expect(proposal?.executionDeadline).toBe(START + 2 * DAY);
  });

  it('honours an explicit voting duration', () => {
    const id = ctx.governance.proposeRevenuePolicy('bob', ctx.assetId, 'USD', 50n, 'Raise the floor', 600);
    expect(ctx.governance.getProposal(id)?.votingDeadline).toBe(START + 600);
  });

  it('accepts a payload through the generic entry point', () => {
    const id = ctx.governance.createProposal(
      'alice',
      ctx.assetId,
      { category: 'REVENUE_POLICY', currency: 'USD', newMinimumDistribution: 0n },
      '',
    );
    expect(ctx.governance.getProposal(id)?.descriptionHash).toBe('');
    expect(ctx.governance.getProposalsForAsset(ctx.assetId)).toEqual([id]);
  });

  it('rejects an asset-management proposal that changes nothing', () => {
    const err = catchKoinon(() => ctx.governance.proposeAssetManagement('alice', ctx.assetId, {}, 'noop'));
    expect(err.code).toBe(KoinonErrorCode.INVALID_INPUT);
    expect(ctx.governance.getProposalCount()).toBe(0);
  });

  it('rejects suspending a license of another asset', () => {
    const other = ctx.ownership.registerAsset('erin', {
      assetType: 'MUSIC',
      metadataUri: 'ipfs://music/2.json',
      owners: ['erin'],
      percentages: [100],
      weights: [1n],
    });
    const licenseId = ctx.licensing.createOffer('erin', { ...exclusiveOffer(other), licenseType: 'NON_EXCLUSIVE' });

    const err = catchKoinon(() =>
      ctx.governance.proposeEmergencyAction(
        'alice',
        ctx.assetId,
        { kind: 'SUSPEND_LICENSE', licenseId, duration: DAY },
        'Suspend',
      ),
    );
    expect(err.code).toBe(KoinonErrorCode.INVALID_INPUT);
  });

  it('allows only owners to propose', () => {
    const err = catchKoinon(() =>
      ctx.governance.proposeRevenuePolicy('dave', ctx.assetId, 'USD', 1n, 'Outsider proposal'),
    );
    expect(err.code).toBe(KoinonErrorCode.NOT_ASSET_OWNER);
  });
});

// ---------------------------------------------------------------------------
// Voting
// ---------------------------------------------------------------------------
describe('GovernanceEngine - voting', () => {
  let ctx: ReturnType<typeof setup>;
  let proposalId: number;

  beforeEach(() => {
    ctx = setup();
    proposalId = ctx.governance.proposeRevenuePolicy('alice', ctx.assetId, 'USD', 50n, 'Minimum payout');
  });

  it('records the voter weight', () => {
    ctx.clock.advance(60);
    ctx.governance.vote('bob', proposalId, false);

    expect(ctx.governance.hasVoted(proposalId, 'bob')).toBe(true);
    expect(ctx.governance.hasVoted(proposalId, 'alice')).toBe(false);
    expect(ctx.governance.getVoteReceipt(proposalId, 'bob')).toEqual({ inFavor: false, weight: 300n, castAt: START + 60 });
    expect(ctx.governance.getProposal(proposalId)?.votesAgainst).toBe(300n);
  });

  it('rejects a second vote', () => {
    ctx.governance.vote('carol', proposalId, true);
    const err = catchKoinon(() => ctx.governance.vote('carol', proposalId, false));
    expect(err.code).toBe(KoinonErrorCode.ALREADY_VOTED);
    expect(ctx.governance.getProposal(proposalId)?.votesFor).toBe(100n);
    expect(ctx.governance.getProposal(proposalId)?.votesAgainst).toBe(0n);
  });

  it('accepts a vote exactly at the voting deadline and closes one second later', () => {
    ctx.clock.set(START + 3 * DAY);
    ctx.governance.vote('alice', proposalId, true);

    ctx.clock.advance(1);
    const err = catchKoinon(() => ctx.governance.vote('bob', proposalId, true));
    expect(err.code).toBe(KoinonErrorCode.VOTING_CLOSED);
  });

  it('rejects votes from non-owners and on unknown proposals', () => {
    expect(catchKoinon(() => ctx.governance.vote('dave', proposalId, true)).code).toBe(KoinonErrorCode.NOT_ASSET_OWNER);
    expect(catchKoinon(() => ctx.governance.vote('alice', 42, true)).code).toBe(KoinonErrorCode.PROPOSAL_NOT_FOUND);
  });

  it('counts weight at vote time against the snapshot taken at creation', () => {
    ctx.governance.vote('alice', proposalId, true);
    ctx.ownership.transferShare('alice', ctx.assetId, 'alice', 'dave', 10);
    ctx.governance.vote('dave', proposalId, true);

    const proposal = ctx.governance.getProposal(proposalId);
    expect(proposal?.votesFor).toBe(700n);
    expect(proposal?.totalVotingWeight).toBe(1000n);
    expect(ctx.governance.getVoteReceipt(proposalId, 'dave')?.weight).toBe(100n);
  });
});

// ---------------------------------------------------------------------------
// Cancellation
// ---------------------------------------------------------------------------
describe('GovernanceEngine - cancellation', () => {
  let ctx: ReturnType<typeof setup>;
  let proposalId: number;

  beforeEach(() => {
    ctx = setup();
    proposalId = ctx.governance.proposeAssetManagement('alice', ctx.assetId, { newMetadataUri: 'ipfs://film/2.json' }, 'Remaster');
  });

  it('lets only the proposer cancel', () => {
    const err = catchKoinon(() => ctx.governance.cancelProposal('bob', proposalId));
    expect(err).toBeInstanceOf(AuthorizationError);
    expect(err.code).toBe(KoinonErrorCode.NOT_PROPOSER);
  });

  it('closes a cancelled proposal to votes and execution', () => {
    ctx.governance.cancelProposal('alice', proposalId);

    expect(ctx.governance.getProposal(proposalId)?.cancelled).toBe(true);
    expect(ctx.governance.getActiveProposals(ctx.assetId)).toEqual([]);
    expect(catchKoinon(() => ctx.governance.vote('bob', proposalId, true)).code).toBe(KoinonErrorCode.PROPOSAL_CANCELLED);
    expect(catchKoinon(() => ctx.governance.cancelProposal('alice', proposalId)).code).toBe(
      KoinonErrorCode.PROPOSAL_CANCELLED,
    );
    expect(ctx.governance.canExecute(proposalId)).toBe(false);
  });

  it('cannot cancel an executed proposal', () => {
    ctx.governance.vote('alice', proposalId, true);
    ctx.clock.advance(3 * DAY + 1);
    ctx.governance.executeAssetManagement('bob', proposalId);

    const err = catchKoinon(() => ctx.governance.cancelProposal('alice', proposalId));
    expect(err.code).toBe(KoinonErrorCode.PROPOSAL_ALREADY_EXECUTED);
  });
});

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------
describe('GovernanceEngine - execution', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  it('executes an asset-management proposal under a raised quorum', () => {
    ctx.governance.setGovernanceSettings('alice', ctx.assetId, { assetManagementQuorumBps: 6000 });
    const id = ctx.governance.proposeAssetManagement('alice', ctx.assetId, { newComplianceStatus: 'VERIFIED' }, 'Verify');
    expect(ctx.governance.getProposal(id)?.quorumRequired).toBe(600n);

    ctx.governance.vote('alice', id, true);
    ctx.governance.vote('bob', id, true);
    expect(ctx.governance.getProposal(id)?.votesFor).toBe(900n);

    ctx.clock.set(START + 3 * DAY);
    expect(ctx.governance.canExecute(id)).toBe(false);
    expect(catchKoinon(() => ctx.governance.executeAssetManagement('zed', id)).code).toBe(
      KoinonErrorCode.EXECUTION_WINDOW,
    );

    ctx.clock.advance(1);
    expect(ctx.governance.canExecute(id)).toBe(true);
    const outcome = ctx.governance.executeAssetManagement('zed', id);

    expect(outcome).toEqual({ category: 'ASSET_MANAGEMENT', metadataChanged: false, complianceChanged: true });
    expect(ctx.ownership.getAsset(ctx.assetId)?.complianceStatus).toBe('VERIFIED');
    expect(ctx.governance.getProposal(id)?.executed).toBe(true);
    expect(ctx.governance.getProposal(id)?.executedAt).toBe(START + 3 * DAY + 1);
    expect(catchKoinon(() => ctx.governance.executeAssetManagement('zed', id)).code).toBe(
      KoinonErrorCode.PROPOSAL_ALREADY_EXECUTED,
    );
  });

  it('executes exactly at the execution deadline but not one second later', () => {
    const first = ctx.governance.proposeRevenuePolicy('alice', ctx.assetId, 'USD', 50n, 'First');
    const second = ctx.governance.proposeRevenuePolicy('alice', ctx.assetId, 'USD', 75n, 'Second');
    ctx.governance.vote('alice', first, true);
    ctx.governance.vote('alice', second, true);

    ctx.clock.set(START + 4 * DAY);
    expect(ctx.governance.executeRevenuePolicy('bob', first)).toEqual({
      category: 'REVENUE_POLICY',
      currency: 'USD',
      minimumDistribution: 50n,
    });
    expect(ctx.revenue.getMinimumDistribution(ctx.assetId, 'USD')).toBe(50n);

    ctx.clock.advance(1);
    expect(catchKoinon(() => ctx.governance.executeRevenuePolicy('bob', second)).code).toBe(
      KoinonErrorCode.EXECUTION_WINDOW,
    );
    expect(ctx.governance.getActiveProposals(ctx.assetId)).toEqual([]);
    expect(ctx.revenue.getMinimumDistribution(ctx.assetId, 'USD')).toBe(50n);
  });

  it('fails below quorum', () => {
    const id = ctx.governance.proposeRevenuePolicy('alice', ctx.assetId, 'USD', 50n, 'Low turnout');
    ctx.governance.vote('carol', id, true);
    ctx.clock.advance(3 * DAY + 1);

    const err = catchKoinon(() => ctx.governance.executeProposal('carol', id));
    expect(err).toBeInstanceOf(StateError);
    expect(err.code).toBe(KoinonErrorCode.QUORUM_NOT_REACHED);
  });

  it('fails on a tie', () => {
    const split = ctx.ownership.registerAsset('alice', {
      assetType: 'MUSIC',
      metadataUri: 'ipfs://music/duo.json',
      owners: ['alice', 'bob'],
      percentages: [50, 50],
      weights: [500n, 500n],
    });
    const id = ctx.governance.proposeRevenuePolicy('alice', split, 'USD', 10n, 'Split decision');
    ctx.governance.vote('alice', id, true);
    ctx.governance.vote('bob', id, false);
    ctx.clock.advance(3 * DAY + 1);

    const err = catchKoinon(() => ctx.governance.executeRevenuePolicy('alice', id));
    expect(err.code).toBe(KoinonErrorCode.MAJORITY_NOT_REACHED);
    expect(ctx.governance.getProposal(id)?.executed).toBe(false);
  });

  it('rejects execution through the wrong category', () => {
    const id = ctx.governance.proposeAssetManagement('alice', ctx.assetId, { newMetadataUri: 'ipfs://film/3.json' }, 'Recut');
    ctx.governance.vote('alice', id, true);
    ctx.clock.advance(3 * DAY + 1);

    const err = catchKoinon(() => ctx.governance.executeRevenuePolicy('alice', id));
    expect(err.code).toBe(KoinonErrorCode.CATEGORY_MISMATCH);
    expect(ctx.governance.getProposal(id)?.executed).toBe(false);

    const outcome = ctx.governance.executeProposal('alice', id);
    expect(outcome).toEqual({ category: 'ASSET_MANAGEMENT', metadataChanged: true, complianceChanged: false });
    expect(ctx.ownership.getAsset(ctx.assetId)?.metadataHash).toBe(sha256String('ipfs://film/3.json'));
  });
});

// ---------------------------------------------------------------------------
// Emergency actions
// ---------------------------------------------------------------------------
describe('GovernanceEngine - emergency actions', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  it('suspends a single license', () => {
    const licenseId = activeLicense(ctx);
    const id = ctx.governance.proposeEmergencyAction(
      'alice',
      ctx.assetId,
      { kind: 'SUSPEND_LICENSE', licenseId, duration: DAY },
      'Breach of terms',
    );
    ctx.governance.vote('alice', id, true);
    ctx.clock.advance(DAY + 1);

    expect(ctx.governance.executeProposal('bob', id)).toEqual({
      category: 'EMERGENCY',
      action: 'SUSPEND_LICENSE',
      suspendedLicenses: [licenseId],
    });
    expect(ctx.licensing.getStatus(licenseId)).toBe('SUSPENDED');
  });

  it('suspends every active license of the asset', () => {
    const first = activeLicense(ctx);
    const second = activeLicense(ctx);
    const id = ctx.governance.proposeEmergencyAction(
      'bob',
      ctx.assetId,
      { kind: 'SUSPEND_ALL_LICENSES', duration: 2 * DAY },
      'Rights dispute',
    );
    ctx.governance.vote('bob', id, true);
    ctx.clock.advance(DAY + 1);

    const outcome = ctx.governance.executeEmergency('bob', id);
    expect(outcome.suspendedLicenses).toEqual([first, second]);
    expect(ctx.licensing.getStatus(first)).toBe('SUSPENDED');
    expect(ctx.licensing.getStatus(second)).toBe('SUSPENDED');
  });

  it('pauses the ledger', () => {
    const id = ctx.governance.proposeEmergencyAction('alice', ctx.assetId, { kind: 'PAUSE', reason: 'key leak' }, 'Pause');
    const pending = ctx.governance.proposeRevenuePolicy('alice', ctx.assetId, 'USD', 5n, 'Pending');
    ctx.governance.vote('alice', id, true);
    ctx.clock.advance(DAY + 1);

    expect(ctx.governance.executeEmergency('carol', id)).toEqual({
      category: 'EMERGENCY',
      action: 'PAUSE',
      suspendedLicenses: [],
    });
    expect(ctx.runtime.isPaused()).toBe(true);
    expect(ctx.runtime.getPauseState().reason).toBe('key leak');
    expect(catchKoinon(() => ctx.governance.vote('bob', pending, true)).code).toBe(KoinonErrorCode.PAUSED);
  });

  it('rolls back the execution when the action fails', () => {
    const licenseId = activeLicense(ctx);
    const id = ctx.governance.proposeEmergencyAction(
      'alice',
      ctx.assetId,
      { kind: 'SUSPEND_LICENSE', licenseId, duration: DAY },
      'Suspend',
    );
    ctx.governance.vote('alice', id, true);
    ctx.licensing.revoke('alice', licenseId, 'settled out of court');
    ctx.clock.advance(DAY + 1);

    const err = catchKoinon(() => ctx.governance.executeEmergency('alice', id));
    expect(err.code).toBe(KoinonErrorCode.LICENSE_REVOKED);
    expect(ctx.governance.getProposal(id)?.executed).toBe(false);
    expect(ctx.governance.canExecute(id)).toBe(true);
  });
});
