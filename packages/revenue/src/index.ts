/**
 * @koinon/revenue — Pooled multi-currency revenue and pro-rata distribution.
 *
 * Funds for an asset accumulate per currency in the pool account and are
 * split among the asset's owners by economic percentage, using floor
 * division: `share = floor(amount × percentage / 100)`. The residue left by
 * rounding is not credited to anyone; it stays in `accumulated` and is
 * included in the next distribution.
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
  validateNonEmpty,
  validateNonNegativeAmount,
  validatePositiveAmount,
} from '@koinon/types';
import type { Address, CurrencyId, Logger, UnixSeconds } from '@koinon/types';
import { Table } from '@koinon/runtime';
import type { ExecutionRuntime } from '@koinon/runtime';
import type { OwnershipLedger } from '@koinon/ownership';

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface RevenueAccount {
  assetId: number;
  currency: CurrencyId;
  totalReceived: bigint;
  totalDistributed: bigint;
  /** Funds in the pool not yet credited to any owner. */
  accumulated: bigint;
  minimumDistribution: bigint;
  distributionCount: number;
  lastDistributionAt: UnixSeconds;
}

export interface PendingBalance {
  pending: bigint;
  totalEarned: bigint;
  totalWithdrawn: bigint;
}

export interface OwnerShare {
  owner: Address;
  amount: bigint;
}

export interface DistributionResult {
  assetId: number;
  currency: CurrencyId;
  /** Amount the split was computed over. */
  amount: bigint;
  /** Σ of the credited shares. */
  distributed: bigint;
  /** `amount − distributed`, left in `accumulated`. */
  residue: bigint;
  shares: OwnerShare[];
}

const ZERO_BALANCE: Readonly<PendingBalance> = Object.freeze({ pending: 0n, totalEarned: 0n, totalWithdrawn: 0n });

function accountKey(assetId: number, currency: CurrencyId): string {
  return `${assetId}\u0000${currency}`;
}

function balanceKey(assetId: number, currency: CurrencyId, owner: Address): string {
  return `${assetId}\u0000${currency}\u0000${owner}`;
}

// ─── Pool ───────────────────────────────────────────────────────────────────────

export class RevenuePool {
  private readonly runtime: ExecutionRuntime;
  private readonly ownership: OwnershipLedger;
  private readonly log: Logger;
  private readonly accounts: Table<string, RevenueAccount>;
  private readonly balances: Table<string, PendingBalance>;

  constructor(runtime: ExecutionRuntime, ownership: OwnershipLedger) {
    this.runtime = runtime;
    this.ownership = ownership;
    this.log = runtime.logger.child('revenue');
    this.accounts = runtime.register(new Table<string, RevenueAccount>('revenueAccounts'));
    this.balances = runtime.register(new Table<string, PendingBalance>('pendingBalances'));
  }

  // ── Mutations ───────────────────────────────────────────────────────────────

  /** Pull `amount` of `currency` from the caller into the asset's pool. */
  receiveRevenue(caller: Address, assetId: number, currency: CurrencyId, amount: bigint): void {
    this.runtime.execute({ operation: 'receiveRevenue', caller }, () => {
      validatePositiveAmount(amount, 'amount');
      validateNonEmpty(currency, 'currency');
      this.ownership.requireAsset(assetId);
      if (this.ownership.getOwnerCount(assetId) === 0) {
        throw new StateError(KoinonErrorCode.ASSET_NOT_FOUND, `Asset ${assetId} has no ownership record`);
      }
      const token = this.runtime.paymentToken(currency);

      const account = this.ensureAccount(assetId, currency);
      account.totalReceived += amount;
      account.accumulated += amount;
      this.log.info('revenue received', { assetId, currency, payer: caller, amount });

      token.transferFrom(caller, this.runtime.address, amount);
    });
  }

  /**
   * Credit `amount` of the accumulated funds to the owners' pending
   * balances. Owner only.
   */
  distributeRevenue(caller: Address, assetId: number, currency: CurrencyId, amount: bigint): DistributionResult {
    return this.runtime.execute(
      { operation: 'distributeRevenue', caller, requires: [this.ownership.ownerOf(assetId)] },
      (call) => {
        validatePositiveAmount(amount, 'amount');
        return this.distributeChecked(assetId, currency, amount, call.now);
      },
    );
  }

  /**
   * Distribute everything currently accumulated. Returns an empty result,
   * and changes nothing, when nothing has accumulated.
   */
  distributeAllRevenue(caller: Address, assetId: number, currency: CurrencyId): DistributionResult {
    return this.runtime.execute(
      { operation: 'distributeAllRevenue', caller, requires: [this.ownership.ownerOf(assetId)] },
      (call) => {
        const accumulated = this.getAccumulatedRevenue(assetId, currency);
        if (accumulated === 0n) {
          return { assetId, currency, amount: 0n, distributed: 0n, residue: 0n, shares: [] };
        }
        return this.distributeChecked(assetId, currency, accumulated, call.now);
      },
    );
  }

  /**
   * Pay out the caller's whole pending balance. Holders dropped from the
   * owner set by `registerOwnership` keep the right to withdraw what they
   * were credited before.
   *
   * @returns The amount paid.
   */
  withdrawPendingRevenue(caller: Address, assetId: number, currency: CurrencyId): bigint {
    return this.runtime.execute({ operation: 'withdrawPendingRevenue', caller }, () => {
      this.ownership.requireAsset(assetId);
      const balance = this.balances.get(balanceKey(assetId, currency, caller));
      if (balance === undefined && !this.ownership.isMember(assetId, caller)) {
        throw new AuthorizationError(
          KoinonErrorCode.NOT_ASSET_OWNER,
          `withdrawPendingRevenue: ${caller} is not a member of asset ${assetId}`,
          caller,
        );
      }
      if (balance === undefined || balance.pending === 0n) {
        throw new InsufficientFundsError(
          KoinonErrorCode.NOTHING_TO_WITHDRAW,
          `${caller} has no pending ${currency} revenue for asset ${assetId}`,
          0n,
          0n,
        );
      }
      const token = this.runtime.paymentToken(currency);

      const amount = balance.pending;
      balance.pending = 0n;
      balance.totalWithdrawn += amount;
      this.log.info('revenue withdrawn', { assetId, currency, owner: caller, amount });

      token.transfer(this.runtime.address, caller, amount);
      return amount;
    });
  }

  /** Set the smallest amount `distributeRevenue` accepts. Owner only. */
  setMinimumDistribution(caller: Address, assetId: number, currency: CurrencyId, amount: bigint): void {
    this.runtime.execute(
      { operation: 'setMinimumDistribution', caller, requires: [this.ownership.ownerOf(assetId)] },
      () => {
        this.applyMinimumDistribution(assetId, currency, amount);
      },
    );
  }

  // ── Internal routines ───────────────────────────────────────────────────────
  // Called from inside another subsystem's operation; no entry checks.

  /**
   * Split funds that were already pulled into the pool (a license fee or
   * royalty) among the owners. Ignores the minimum distribution.
   */
  routeFee(assetId: number, currency: CurrencyId, amount: bigint): DistributionResult {
    validatePositiveAmount(amount, 'amount');
    const account = this.ensureAccount(assetId, currency);
    account.totalReceived += amount;
    account.accumulated += amount;
    const result = this.credit(account, amount, this.runtime.now());
    this.log.info('fee routed', { assetId, currency, amount, distributed: result.distributed });
    return result;
  }

  applyMinimumDistribution(assetId: number, currency: CurrencyId, amount: bigint): void {
    validateNonNegativeAmount(amount, 'amount');
    validateNonEmpty(currency, 'currency');
    this.ownership.requireAsset(assetId);
    const account = this.ensureAccount(assetId, currency);
    account.minimumDistribution = amount;
    this.log.info('minimum distribution set', { assetId, currency, amount });
  }

  // ── Queries ─────────────────────────────────────────────────────────────────

  getAccount(assetId: number, currency: CurrencyId): RevenueAccount | undefined {
    const account = this.accounts.get(accountKey(assetId, currency));
    return account ? { ...account } : undefined;
  }

  getAccumulatedRevenue(assetId: number, currency: CurrencyId): bigint {
    return this.accounts.get(accountKey(assetId, currency))?.accumulated ?? 0n;
  }

  getMinimumDistribution(assetId: number, currency: CurrencyId): bigint {
    return this.accounts.get(accountKey(assetId, currency))?.minimumDistribution ?? 0n;
  }

  getPendingRevenue(assetId: number, owner: Address, currency: CurrencyId): bigint {
    return this.balances.get(balanceKey(assetId, currency, owner))?.pending ?? 0n;
  }

  getOwnerEarnings(assetId: number, owner: Address, currency: CurrencyId): PendingBalance {
    const balance = this.balances.get(balanceKey(assetId, currency, owner));
    return { ...(balance ?? ZERO_BALANCE) };
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private distributeChecked(
    assetId: number,
    currency: CurrencyId,
    amount: bigint,
    now: UnixSeconds,
  ): DistributionResult {
    const account = this.accounts.get(accountKey(assetId, currency));
    const accumulated = account?.accumulated ?? 0n;
    if (account === undefined || amount > accumulated) {
      throw new InsufficientFundsError(
        KoinonErrorCode.INSUFFICIENT_ACCUMULATED,
        `Cannot distribute ${amount}: only ${accumulated} ${currency} accumulated for asset ${assetId}`,
        amount,
        accumulated,
      );
    }
    if (amount < account.minimumDistribution) {
      throw new ValidationError(
        KoinonErrorCode.BELOW_MINIMUM_DISTRIBUTION,
        `Distribution of ${amount} is below the minimum of ${account.minimumDistribution}`,
        'amount',
      );
    }

    const result = this.credit(account, amount, now);
    account.distributionCount += 1;
    this.log.info('revenue distributed', {
      assetId,
      currency,
      amount,
      distributed: result.distributed,
      residue: result.residue,
    });
    return result;
  }

  private credit(account: RevenueAccount, amount: bigint, now: UnixSeconds): DistributionResult {
    const shares: OwnerShare[] = [];
    let distributed = 0n;
    for (const { owner, percentage } of this.ownership.getOwners(account.assetId)) {
      const share = (amount * BigInt(percentage)) / BigInt(PERCENT_DENOMINATOR);
      if (share === 0n) continue;
      const key = balanceKey(account.assetId, account.currency, owner);
      const balance = this.balances.get(key) ?? { ...ZERO_BALANCE };
      balance.pending += share;
      balance.totalEarned += share;
      this.balances.set(key, balance);
      shares.push({ owner, amount: share });
      distributed += share;
    }

    account.accumulated -= distributed;
    account.totalDistributed += distributed;
    account.lastDistributionAt = now;
    return {
      assetId: account.assetId,
      currency: account.currency,
      amount,
      distributed,
      residue: amount - distributed,
      shares,
    };
  }

  private ensureAccount(assetId: number, currency: CurrencyId): RevenueAccount {
    const key = accountKey(assetId, currency);
    let account = this.accounts.get(key);
    if (account === undefined) {
      account = {
        assetId,
        currency,
        totalReceived: 0n,
        totalDistributed: 0n,
        accumulated: 0n,
        minimumDistribution: 0n,
        distributionCount: 0,
        lastDistributionAt: 0,
      };
      this.accounts.set(key, account);
    }
    return account;
  }
}
