/**
 * End-to-end flow across all four subsystems on one ledger: ownership
 * changes, revenue distribution, a paid license with royalties, a
 * governance decision and a license approved by vote.
 */

import { describe, it, expect, beforeAll } from 'vitest';

import {
  DEFAULT_POOL_ADDRESS,
  KoinonError,
  KoinonErrorCode,
  LogLevel,
  ManualClock,
  MapPaymentTokenRegistry,
  MemoryPaymentToken,
  createCollectiveLedger,
  createLogger,
} from '@koinon/core';
import type { CollectiveLedger } from '@koinon/core';

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

const DAY = 86_400;

function pending(ledger: CollectiveLedger, owner: string): bigint {
  return ledger.revenue.getPendingRevenue(1, owner, 'USD');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('collective ledger lifecycle', () => {
  const usd = new MemoryPaymentToken('mUSD');
  const clock = new ManualClock(1_700_000_000);
  const ledger = createCollectiveLedger({
    administrator: 'admin',
    clock,
    paymentTokens: new MapPaymentTokenRegistry([['USD', usd]]),
    logger: createLogger({ level: LogLevel.SILENT }),
  });

  beforeAll(() => {
    usd.mint('fan', 1_000n);
    usd.approve('fan', DEFAULT_POOL_ADDRESS, 1_000n);
    usd.mint('lee', 5_000n);
    usd.approve('lee', DEFAULT_POOL_ADDRESS, 5_000n);
  });

  it('registers an asset and mints its supply pro rata', () => {
    const assetId = ledger.ownership.registerAsset('o1', {
      assetType: 'MUSIC',
      metadataUri: 'ipfs://album/1.json',
      owners: ['o1', 'o2', 'o3'],
      percentages: [60, 30, 10],
      weights: [600n, 300n, 100n],
    });

    expect(assetId).toBe(1);
    expect(ledger.runtime.assetToken.balanceOf('o1', 1)).toBe(600n);
    expect(ledger.runtime.assetToken.balanceOf('o2', 1)).toBe(300n);
    expect(ledger.runtime.assetToken.balanceOf('o3', 1)).toBe(100n);
    expect(ledger.ownership.getTotalGovernanceWeight(1)).toBe(1000n);
  });

  it('moves share and weight together on transfer', () => {
    ledger.ownership.transferShare('o1', 1, 'o1', 'o2', 10);

    expect(ledger.ownership.getOwners(1).map((o) => [o.owner, o.percentage, o.governanceWeight])).toEqual([
      ['o1', 50, 500n],
      ['o2', 40, 400n],
      ['o3', 10, 100n],
    ]);
  });

  it('splits received revenue exactly at 50/40/10', () => {
    ledger.revenue.receiveRevenue('fan', 1, 'USD', 1_000n);
    const result = ledger.revenue.distributeRevenue('o1', 1, 'USD', 1_000n);

    expect(result.distributed).toBe(1_000n);
    expect(result.residue).toBe(0n);
    expect([pending(ledger, 'o1'), pending(ledger, 'o2'), pending(ledger, 'o3')]).toEqual([500n, 400n, 100n]);
    expect(usd.balanceOf(DEFAULT_POOL_ADDRESS)).toBe(1_000n);
  });

  it('routes a license fee and royalties to the owners', () => {
    const licenseId = ledger.licensing.createOffer('o1', {
      assetId: 1,
      licensee: 'lee',
      licenseType: 'EXCLUSIVE',
      usageRights: 'SYNC',
      territory: 'WORLDWIDE',
      fee: 1_000n,
      royaltyRateBps: 500,
      durationSeconds: 365 * DAY,
      currency: 'USD',
      metadataUri: 'ipfs://terms/sync',
    });
    ledger.licensing.approve('o2', licenseId, true);
    ledger.licensing.execute('lee', licenseId);

    expect(ledger.licensing.getStatus(licenseId)).toBe('ACTIVE');
    expect([pending(ledger, 'o1'), pending(ledger, 'o2'), pending(ledger, 'o3')]).toEqual([1_000n, 800n, 200n]);

    ledger.licensing.reportUsage('lee', licenseId, 10_000n, 3);
    expect(ledger.licensing.dueRoyalties(licenseId)).toBe(500n);

    ledger.licensing.payRoyalties('lee', licenseId, 500n);
    expect(ledger.licensing.dueRoyalties(licenseId)).toBe(0n);
    expect([pending(ledger, 'o1'), pending(ledger, 'o2'), pending(ledger, 'o3')]).toEqual([1_250n, 1_000n, 250n]);
    expect(usd.balanceOf(DEFAULT_POOL_ADDRESS)).toBe(2_500n);
    expect(usd.balanceOf('lee')).toBe(3_500n);

    const account = ledger.revenue.getAccount(1, 'USD');
    expect(account?.totalReceived).toBe(2_500n);
    expect(account?.totalDistributed).toBe(2_500n);
    expect(account?.accumulated).toBe(0n);
    expect(account?.distributionCount).toBe(1);
  });

  it('pays out a pending balance', () => {
    expect(ledger.revenue.withdrawPendingRevenue('o3', 1, 'USD')).toBe(250n);
    expect(usd.balanceOf('o3')).toBe(250n);
    expect(usd.balanceOf(DEFAULT_POOL_ADDRESS)).toBe(2_250n);
    expect(ledger.revenue.getOwnerEarnings(1, 'o3', 'USD')).toEqual({
      pending: 0n,
      totalEarned: 250n,
      totalWithdrawn: 250n,
    });
  });

  it('executes a governance decision only inside its window', () => {
    ledger.governance.setGovernanceSettings('o1', 1, { assetManagementQuorumBps: 6000 });
    const proposalId = ledger.governance.proposeAssetManagement(
      'o1',
      1,
      { newComplianceStatus: 'CLEARED' },
      'Samples cleared',
    );
    expect(ledger.governance.getProposal(proposalId)?.quorumRequired).toBe(600n);

    ledger.governance.vote('o1', proposalId, true);
    ledger.governance.vote('o2', proposalId, true);
    expect(ledger.governance.getProposal(proposalId)?.votesFor).toBe(900n);

    clock.advance(3 * DAY);
    expect(catchKoinon(() => ledger.governance.executeProposal('o3', proposalId)).code).toBe(
      KoinonErrorCode.EXECUTION_WINDOW,
    );

    clock.advance(1);
    ledger.governance.executeProposal('o3', proposalId);
    expect(ledger.ownership.getAsset(1)?.complianceStatus).toBe('CLEARED');
    expect(ledger.ownership.getAssetsByComplianceStatus('CLEARED')).toEqual([1]);
  });

  it('creates a license the owners voted for', () => {
    const proposalId = ledger.licensing.proposeLicenseTerms(
      'o2',
      1,
      {
        licensee: 'radio',
        licenseType: 'NON_EXCLUSIVE',
        usageRights: 'BROADCAST',
        territory: 'EU',
        fee: 0n,
        royaltyRateBps: 800,
        durationSeconds: 0,
        currency: 'USD',
        metadataUri: 'ipfs://terms/radio',
      },
      'Radio play',
    );
    expect(ledger.licensing.getLicenseProposal(proposalId)?.quorumRequired).toBe(500n);

    ledger.licensing.voteOnLicenseProposal('o1', proposalId, true);
    clock.advance(7 * DAY + 1);
    const licenseId = ledger.licensing.executeLicenseProposal('o3', proposalId);

    expect(licenseId).toBe(2);
    expect(ledger.licensing.getLicense(licenseId)?.licensor).toBe('o2');
    expect(ledger.licensing.getLicense(licenseId)?.isApproved).toBe(true);
    expect(ledger.licensing.getStatus(licenseId)).toBe('INACTIVE');

    ledger.licensing.execute('radio', licenseId);
    expect(ledger.licensing.getStatus(licenseId)).toBe('ACTIVE');
    expect(ledger.licensing.getLicensesForAsset(1)).toEqual([1, 2]);
  });
});
