/**
 * @koinon/governance — Weighted proposals that change asset records,
 * revenue policy and license state once the owners approve them.
 *
 * @packageDocumentation
 */

export { GovernanceEngine } from './engine.js';
export type {
  AssetManagementOutcome,
  AssetManagementPayload,
  EmergencyAction,
  EmergencyOutcome,
  EmergencyPayload,
  ExecutionOutcome,
  PayloadOf,
  Proposal,
  ProposalCategory,
  ProposalPayload,
  RevenuePolicyOutcome,
  RevenuePolicyPayload,
  VoteReceipt,
} from './types.js';
