/**
 * License proposals: owners vote on a license blueprint, and a passed
 * proposal creates the license.
 *
 * Voting runs for a fixed period after the proposal is made; execution is
 * possible only in the window that follows. A proposal passes when the
 * votes cast reach the quorum and `votesFor > votesAgainst`.
 */

import { BPS_DENOMINATOR, KoinonErrorCode, StateError } from '@koinon/types';
import type { Address, Logger, UnixSeconds } from '@koinon/types';
import { hashFreeText } from '@koinon/crypto';
import { Sequence, Table } from '@koinon/runtime';
import type { Capability, ExecutionRuntime } from '@koinon/runtime';
import type { OwnershipLedger } from '@koinon/ownership';

import type { LicenseBlueprint, LicenseProposal, LicenseQuorumSource } from './types.js';
import { validateBlueprint } from './validation.js';

/** Creates the license for a passed proposal and returns its id. */
export type LicenseFactory = (proposal: LicenseProposal, now: UnixSeconds) => number;

export class LicenseProposals {
  private readonly runtime: ExecutionRuntime;
  private readonly ownership: OwnershipLedger;
  private readonly quorumSource: LicenseQuorumSource;
  private readonly createLicense: LicenseFactory;
  private readonly log: Logger;
  private readonly proposals: Table<number, LicenseProposal>;
  private readonly voters: Table<number, Set<Address>>;
  private readonly proposalIds: Sequence;

  constructor(
    runtime: ExecutionRuntime,
    ownership: OwnershipLedger,
    quorumSource: LicenseQuorumSource,
    createLicense: LicenseFactory,
  ) {
    this.runtime = runtime;
    this.ownership = ownership;
    this.quorumSource = quorumSource;
    this.createLicense = createLicense;
    this.log = runtime.logger.child('licensing.proposals');
    this.proposals = runtime.register(new Table<number, LicenseProposal>('licenseProposals'));
    this.voters = runtime.register(new Table<number, Set<Address>>('licenseProposalVoters'));
    this.proposalIds = runtime.register(new Sequence('licenseProposalIds'));
  }

  propose(caller: Address, assetId: number, blueprint: LicenseBlueprint, description: string): number {
    return this.runtime.execute(
      { operation: 'proposeLicenseTerms', caller, requires: [this.ownership.ownerOf(assetId)] },
      (call) => {
        validateBlueprint(blueprint);
        const totalVotingWeight = this.ownership.getTotalGovernanceWeight(assetId);
        const quorumBps = this.quorumSource.licenseQuorumBps(assetId);
        const votingDeadline = call.now + this.runtime.config.licenseProposalVotingPeriod;

        const id = this.proposalIds.next();
        this.proposals.set(id, {
          id,
          assetId,
          proposer: caller,
          blueprint: structuredClone(blueprint),
          description,
          descriptionHash: hashFreeText(description),
          votesFor: 0n,
          votesAgainst: 0n,
          totalVotingWeight,
          quorumRequired: (totalVotingWeight * BigInt(quorumBps)) / BigInt(BPS_DENOMINATOR),
          createdAt: call.now,
          votingDeadline,
          executionDeadline: votingDeadline + this.runtime.config.licenseProposalExecutionWindow,
          executed: false,
          executedAt: 0,
          licenseId: 0,
        });
        this.voters.set(id, new Set<Address>());
        this.log.info('license proposal created', { proposalId: id, assetId, proposer: caller });
        return id;
      },
    );
  }

  vote(caller: Address, proposalId: number, inFavor: boolean): void {
    this.runtime.execute(
      { operation: 'voteOnLicenseProposal', caller, requires: [this.assetOwner(proposalId)] },
      (call) => {
        const proposal = this.require(proposalId);
        if (proposal.executed) {
          throw new StateError(KoinonErrorCode.PROPOSAL_ALREADY_EXECUTED, `License proposal ${proposalId} was executed`);
        }
        if (call.now > proposal.votingDeadline) {
          throw new StateError(
            KoinonErrorCode.VOTING_CLOSED,
            `Voting on license proposal ${proposalId} closed at ${proposal.votingDeadline}`,
          );
        }
        const voters = this.voters.get(proposalId) ?? new Set<Address>();
        if (voters.has(caller)) {
          throw new StateError(KoinonErrorCode.ALREADY_VOTED, `${caller} has already voted on license proposal ${proposalId}`);
        }

        const weight = this.ownership.getGovernanceWeight(proposal.assetId, caller);
        if (inFavor) {
          proposal.votesFor += weight;
        } else {
          proposal.votesAgainst += weight;
        }
        voters.add(caller);
        this.voters.set(proposalId, voters);
        this.log.info('license proposal vote', { proposalId, voter: caller, inFavor, weight });
      },
    );
  }

  execute(caller: Address, proposalId: number): number {
    return this.runtime.execute({ operation: 'executeLicenseProposal', caller }, (call) => {
      const proposal = this.require(proposalId);
      if (proposal.executed) {
        throw new StateError(KoinonErrorCode.PROPOSAL_ALREADY_EXECUTED, `License proposal ${proposalId} was executed`);
      }
      if (call.now <= proposal.votingDeadline || call.now > proposal.executionDeadline) {
        throw new StateError(
          KoinonErrorCode.EXECUTION_WINDOW,
          `License proposal ${proposalId} can execute only after ${proposal.votingDeadline} and until ${proposal.executionDeadline}`,
          { context: { now: call.now, votingDeadline: proposal.votingDeadline, executionDeadline: proposal.executionDeadline } },
        );
      }
      const participation = proposal.votesFor + proposal.votesAgainst;
      if (participation < proposal.quorumRequired) {
        throw new StateError(
          KoinonErrorCode.QUORUM_NOT_REACHED,
          `License proposal ${proposalId} reached ${participation} of ${proposal.quorumRequired} quorum weight`,
        );
      }
      if (proposal.votesFor <= proposal.votesAgainst) {
        throw new StateError(
          KoinonErrorCode.MAJORITY_NOT_REACHED,
          `License proposal ${proposalId} has ${proposal.votesFor} for and ${proposal.votesAgainst} against`,
        );
      }

      proposal.executed = true;
      proposal.executedAt = call.now;
      proposal.licenseId = this.createLicense(proposal, call.now);
      this.log.info('license proposal executed', { proposalId, licenseId: proposal.licenseId, by: caller });
      return proposal.licenseId;
    });
  }

  get(proposalId: number): LicenseProposal | undefined {
    const proposal = this.proposals.get(proposalId);
    return proposal ? structuredClone(proposal) : undefined;
  }

  hasVoted(proposalId: number, voter: Address): boolean {
    return this.voters.get(proposalId)?.has(voter) ?? false;
  }

  private assetOwner(proposalId: number): Capability {
    return (call) => {
      this.ownership.ownerOf(this.require(proposalId).assetId)(call);
    };
  }

  private require(proposalId: number): LicenseProposal {
    const proposal = this.proposals.get(proposalId);
    if (proposal === undefined) {
      throw new StateError(KoinonErrorCode.PROPOSAL_NOT_FOUND, `License proposal ${proposalId} does not exist`);
    }
    return proposal;
  }
}
