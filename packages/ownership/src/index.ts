/**
 * @koinon/ownership — Asset registry and fractional ownership.
 *
 * Each asset has an owner set: an ordered enumeration of addresses, each
 * with an economic percentage (integer 0–100) and a governance weight.
 * The percentages of an asset always sum to exactly 100. Owners whose
 * percentage drops to zero stay in the enumeration.
 *
 * @packageDocumentation
 */

import {
  AuthorizationError,
  InsufficientFundsError,
  KoinonErrorCode,
  PERCENT_DENOMINATOR,
  StateError,
  ValidationError,
  validateIntegerRange,
  validateNonEmpty,
  validateNonNegativeAmount,
  validatePositiveAmount,
} from '@koinon/types';
import type { Address, Logger, UnixSeconds } from '@koinon/types';
import { hashFreeText } from '@koinon/crypto';
import type { HashHex } from '@koinon/crypto';
import { Sequence, Table, administratorOnly } from '@koinon/runtime';
import type { Capability, ExecutionRuntime } from '@koinon/runtime';

// ─── Types ──────────────────────────────────────────────────────────────────────

/** Compliance tag cached from the external compliance registry. */
export type ComplianceStatus = string;

export const DEFAULT_COMPLIANCE_STATUS: ComplianceStatus = 'UNVERIFIED';

export interface Asset {
  id: number;
  assetType: string;
  metadataUri: string;
  metadataHash: HashHex;
  totalSupply: bigint;
  createdAt: UnixSeconds;
  complianceStatus: ComplianceStatus;
  /** The owner list the asset was registered with. */
  creators: Address[];
}

export interface OwnerEntry {
  percentage: number;
  governanceWeight: bigint;
  isMember: boolean;
}

/** An {@link OwnerEntry} together with its address, as enumerated. */
export interface OwnerRecord extends OwnerEntry {
  owner: Address;
}

export interface RegisterAssetInput {
  assetType: string;
  metadataUri: string;
  owners: readonly Address[];
  percentages: readonly number[];
  weights: readonly bigint[];
  /** Nominal supply to mint. Defaults to the configured `defaultTotalSupply`. */
  totalSupply?: bigint;
}

/** Fields of an asset record that owners and governance may change. */
export interface AssetUpdate {
  metadataUri?: string;
  complianceStatus?: ComplianceStatus;
}

/** Which fields an {@link AssetUpdate} actually changed. */
export interface AssetUpdateResult {
  metadataChanged: boolean;
  complianceChanged: boolean;
}

interface OwnerSet {
  order: Address[];
  entries: Map<Address, OwnerEntry>;
}

// ─── Ledger ─────────────────────────────────────────────────────────────────────

export class OwnershipLedger {
  private readonly runtime: ExecutionRuntime;
  private readonly log: Logger;
  private readonly assets: Table<number, Asset>;
  private readonly ownerSets: Table<number, OwnerSet>;
  private readonly assetIds: Sequence;

  constructor(runtime: ExecutionRuntime) {
    this.runtime = runtime;
    this.log = runtime.logger.child('ownership');
    this.assets = runtime.register(new Table<number, Asset>('assets'));
    this.ownerSets = runtime.register(new Table<number, OwnerSet>('ownerSets'));
    this.assetIds = runtime.register(new Sequence('assetIds'));
  }

  // ── Capabilities ────────────────────────────────────────────────────────────

  /** Capability admitting only callers that hold a share of `assetId`. */
  ownerOf(assetId: number): Capability {
    return (call) => {
      this.requireAsset(assetId);
      if (!this.isOwner(assetId, call.caller)) {
        throw new AuthorizationError(
          KoinonErrorCode.NOT_ASSET_OWNER,
          `${call.operation}: ${call.caller} does not own a share of asset ${assetId}`,
          call.caller,
        );
      }
    };
  }

  // ── Mutations ───────────────────────────────────────────────────────────────

  /**
   * Register a new asset, write its owner set and mint its supply pro rata:
   * each owner receives `floor(totalSupply × percentage / 100)`.
   *
   * @returns The new asset id.
   */
  registerAsset(caller: Address, input: RegisterAssetInput): number {
    return this.runtime.execute({ operation: 'registerAsset', caller }, (call) => {
      validateNonEmpty(input.assetType, 'assetType');
      validateNonEmpty(input.metadataUri, 'metadataUri');
      const totalSupply = input.totalSupply ?? this.runtime.config.defaultTotalSupply;
      validatePositiveAmount(totalSupply, 'totalSupply');
      const ownerSet = buildOwnerSet(input.owners, input.percentages, input.weights);

      const id = this.assetIds.next();
      this.assets.set(id, {
        id,
        assetType: input.assetType,
        metadataUri: input.metadataUri,
        metadataHash: hashFreeText(input.metadataUri),
        totalSupply,
        createdAt: call.now,
        complianceStatus: DEFAULT_COMPLIANCE_STATUS,
        creators: [...input.owners],
      });
      this.ownerSets.set(id, ownerSet);

      this.mintProRata(id, ownerSet, totalSupply);
      this.log.info('asset registered', { assetId: id, owners: ownerSet.order.length, totalSupply });
      return id;
    });
  }

  /**
   * Replace the owner set of an existing asset. Administrator only; the
   * asset's minted supply is left as it is.
   */
  registerOwnership(
    caller: Address,
    assetId: number,
    owners: readonly Address[],
    percentages: readonly number[],
    weights: readonly bigint[],
  ): void {
    this.runtime.execute(
      { operation: 'registerOwnership', caller, requires: [administratorOnly(this.runtime.administrator)] },
      () => {
        this.requireAsset(assetId);
        const ownerSet = buildOwnerSet(owners, percentages, weights);
        this.ownerSets.set(assetId, ownerSet);
        this.log.info('ownership replaced', { assetId, owners: ownerSet.order.length });
      },
    );
  }

  /**
   * Move `percentage` points of `from`'s share to `to`, together with
   * `floor(fromWeight × percentage / fromPercentage)` governance weight.
   */
  transferShare(caller: Address, assetId: number, from: Address, to: Address, percentage: number): void {
    this.runtime.execute({ operation: 'transferShare', caller }, () => {
      const ownerSet = this.requireOwnerSet(assetId);
      if (caller !== from) {
        throw new AuthorizationError(
          KoinonErrorCode.NOT_SHARE_HOLDER,
          `transferShare: ${caller} may only transfer its own share`,
          caller,
        );
      }
      validateIntegerRange(percentage, 1, PERCENT_DENOMINATOR, 'percentage');
      validateNonEmpty(to, 'to');
      if (to === from) {
        throw new ValidationError(KoinonErrorCode.INVALID_INPUT, 'transferShare: recipient must differ from sender', 'to');
      }

      const sender = ownerSet.entries.get(from);
      const available = sender?.percentage ?? 0;
      if (sender === undefined || available < percentage) {
        throw new InsufficientFundsError(
          KoinonErrorCode.INSUFFICIENT_SHARE,
          `transferShare: ${from} holds ${available}% of asset ${assetId}, ${percentage}% requested`,
          BigInt(percentage),
          BigInt(available),
        );
      }

      const weightMoved = (sender.governanceWeight * BigInt(percentage)) / BigInt(available);
      sender.percentage -= percentage;
      sender.governanceWeight -= weightMoved;

      let recipient = ownerSet.entries.get(to);
      if (recipient === undefined) {
        recipient = { percentage: 0, governanceWeight: 0n, isMember: true };
        ownerSet.entries.set(to, recipient);
        ownerSet.order.push(to);
      }
      recipient.percentage += percentage;
      recipient.governanceWeight += weightMoved;
      recipient.isMember = true;

      this.log.info('share transferred', { assetId, from, to, percentage, weightMoved });
    });
  }

  updateAssetMetadata(caller: Address, assetId: number, metadataUri: string): AssetUpdateResult {
    return this.runtime.execute(
      { operation: 'updateAssetMetadata', caller, requires: [this.ownerOf(assetId)] },
      () => {
        validateNonEmpty(metadataUri, 'metadataUri');
        return this.applyAssetUpdate(assetId, { metadataUri });
      },
    );
  }

  setComplianceStatus(caller: Address, assetId: number, status: ComplianceStatus): AssetUpdateResult {
    return this.runtime.execute(
      { operation: 'setComplianceStatus', caller, requires: [this.ownerOf(assetId)] },
      () => {
        validateNonEmpty(status, 'status');
        return this.applyAssetUpdate(assetId, { complianceStatus: status });
      },
    );
  }

  /** Mint `amount` more nominal supply pro rata to the current owners. */
  mintAdditionalSupply(caller: Address, assetId: number, amount: bigint): void {
    this.runtime.execute(
      { operation: 'mintAdditionalSupply', caller, requires: [this.ownerOf(assetId)] },
      () => {
        validatePositiveAmount(amount, 'amount');
        const asset = this.requireAsset(assetId);
        asset.totalSupply += amount;
        this.mintProRata(assetId, this.requireOwnerSet(assetId), amount);
        this.log.info('supply minted', { assetId, amount, totalSupply: asset.totalSupply });
      },
    );
  }

  /**
   * Apply an asset-record update without entry checks. Runs inside the
   * calling operation; used by owner mutations and governance execution.
   */
  applyAssetUpdate(assetId: number, update: AssetUpdate): AssetUpdateResult {
    const asset = this.requireAsset(assetId);
    const result: AssetUpdateResult = { metadataChanged: false, complianceChanged: false };

    if (update.metadataUri !== undefined && update.metadataUri !== asset.metadataUri) {
      asset.metadataUri = update.metadataUri;
      asset.metadataHash = hashFreeText(update.metadataUri);
      result.metadataChanged = true;
    }
    if (update.complianceStatus !== undefined && update.complianceStatus !== asset.complianceStatus) {
      asset.complianceStatus = update.complianceStatus;
      result.complianceChanged = true;
    }

    if (result.metadataChanged || result.complianceChanged) {
      this.log.info('asset updated', { assetId, ...result });
    }
    return result;
  }

  // ── Queries ─────────────────────────────────────────────────────────────────

  getAsset(assetId: number): Asset | undefined {
    const asset = this.assets.get(assetId);
    return asset ? structuredClone(asset) : undefined;
  }

  getAssetCount(): number {
    return this.assetIds.current();
  }

  /** A member whose percentage is above zero. */
  isOwner(assetId: number, account: Address): boolean {
    const entry = this.ownerSets.get(assetId)?.entries.get(account);
    return entry !== undefined && entry.isMember && entry.percentage > 0;
  }

  /** A member whose governance weight is above zero. */
  hasGovernanceRights(assetId: number, account: Address): boolean {
    const entry = this.ownerSets.get(assetId)?.entries.get(account);
    return entry !== undefined && entry.isMember && entry.governanceWeight > 0n;
  }

  isMember(assetId: number, account: Address): boolean {
    return this.ownerSets.get(assetId)?.entries.get(account)?.isMember ?? false;
  }

  getPercentage(assetId: number, account: Address): number {
    return this.ownerSets.get(assetId)?.entries.get(account)?.percentage ?? 0;
  }

  getGovernanceWeight(assetId: number, account: Address): bigint {
    return this.ownerSets.get(assetId)?.entries.get(account)?.governanceWeight ?? 0n;
  }

  /** Owners in enumeration order, including members at 0%. */
  getOwners(assetId: number): OwnerRecord[] {
    const ownerSet = this.ownerSets.get(assetId);
    if (!ownerSet) return [];
    const records: OwnerRecord[] = [];
    for (const owner of ownerSet.order) {
      const entry = ownerSet.entries.get(owner);
      if (entry) records.push({ owner, ...entry });
    }
    return records;
  }

  getOwnerCount(assetId: number): number {
    return this.ownerSets.get(assetId)?.order.length ?? 0;
  }

  getTotalGovernanceWeight(assetId: number): bigint {
    let total = 0n;
    for (const entry of this.ownerSets.get(assetId)?.entries.values() ?? []) {
      total += entry.governanceWeight;
    }
    return total;
  }

  getCreators(assetId: number): Address[] {
    return [...(this.assets.get(assetId)?.creators ?? [])];
  }

  getAssetsByComplianceStatus(status: ComplianceStatus): number[] {
    const ids: number[] = [];
    for (const asset of this.assets.values()) {
      if (asset.complianceStatus === status) ids.push(asset.id);
    }
    return ids.sort((a, b) => a - b);
  }

  /**
   * Live asset record.
   *
   * @throws {StateError} ASSET_NOT_FOUND
   */
  requireAsset(assetId: number): Asset {
    const asset = this.assets.get(assetId);
    if (asset === undefined) {
      throw new StateError(KoinonErrorCode.ASSET_NOT_FOUND, `Asset ${assetId} is not registered`, {
        context: { assetId },
      });
    }
    return asset;
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private requireOwnerSet(assetId: number): OwnerSet {
    this.requireAsset(assetId);
    const ownerSet = this.ownerSets.get(assetId);
    if (ownerSet === undefined) {
      throw new StateError(KoinonErrorCode.ASSET_NOT_FOUND, `Asset ${assetId} has no owner set`, {
        context: { assetId },
      });
    }
    return ownerSet;
  }

  private mintProRata(assetId: number, ownerSet: OwnerSet, amount: bigint): void {
    for (const owner of ownerSet.order) {
      const percentage = ownerSet.entries.get(owner)?.percentage ?? 0;
      const share = (amount * BigInt(percentage)) / BigInt(PERCENT_DENOMINATOR);
      if (share > 0n) {
        this.runtime.assetToken.mint(owner, assetId, share);
      }
    }
  }
}

// ─── Validation ─────────────────────────────────────────────────────────────────

function buildOwnerSet(
  owners: readonly Address[],
  percentages: readonly number[],
  weights: readonly bigint[],
): OwnerSet {
  if (owners.length !== percentages.length || owners.length !== weights.length) {
    throw new ValidationError(
      KoinonErrorCode.ARRAY_LENGTH_MISMATCH,
      `owners, percentages and weights must have equal lengths (got ${owners.length}, ${percentages.length}, ${weights.length})`,
      'owners',
    );
  }
  if (owners.length === 0) {
    throw new ValidationError(KoinonErrorCode.EMPTY_OWNER_SET, 'At least one owner is required', 'owners');
  }

  const entries = new Map<Address, OwnerEntry>();
  let sum = 0;
  owners.forEach((owner, i) => {
    const percentage = percentages[i] ?? -1;
    const weight = weights[i] ?? -1n;
    validateNonEmpty(owner, `owners[${i}]`);
    if (entries.has(owner)) {
      throw new ValidationError(KoinonErrorCode.DUPLICATE_OWNER, `Owner ${owner} is listed more than once`, 'owners');
    }
    validateIntegerRange(percentage, 0, PERCENT_DENOMINATOR, `percentages[${i}]`);
    validateNonNegativeAmount(weight, `weights[${i}]`);
    entries.set(owner, { percentage, governanceWeight: weight, isMember: true });
    sum += percentage;
  });

  if (sum !== PERCENT_DENOMINATOR) {
    throw new ValidationError(
      KoinonErrorCode.PERCENTAGE_SUM_INVALID,
      `Ownership percentages must sum to 100 (got ${sum})`,
      'percentages',
    );
  }
  return { order: [...owners], entries };
}
