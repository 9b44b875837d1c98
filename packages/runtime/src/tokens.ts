/**
 * Ports to the external token ledgers, with in-memory implementations.
 *
 * The ledger never holds token balances itself: asset supply lives in an
 * {@link AssetTokenLedger} and every monetary movement goes through the
 * {@link PaymentToken} registered for the currency. All calls are
 * synchronous and amounts are integers in the token's smallest unit.
 *
 * @packageDocumentation
 */

import { InsufficientFundsError, KoinonErrorCode, validateNonEmpty, validatePositiveAmount } from '@koinon/types';
import type { Address, CurrencyId } from '@koinon/types';

// ─── Ports ──────────────────────────────────────────────────────────────────────

/** Per-asset fungible supply, minted by the ledger and read-only otherwise. */
export interface AssetTokenLedger {
  mint(recipient: Address, assetId: number, amount: bigint): void;
  balanceOf(holder: Address, assetId: number): bigint;
}

/** Allowance/transfer primitives of one payment currency. */
export interface PaymentToken {
  /**
   * Move `amount` from `payer` to `recipient`, spending the allowance
   * `payer` granted to `recipient`.
   */
  transferFrom(payer: Address, recipient: Address, amount: bigint): void;
  /** Move `amount` out of `sender`'s own balance. */
  transfer(sender: Address, recipient: Address, amount: bigint): void;
}

/** Resolves a currency identifier to its payment token. */
export interface PaymentTokenRegistry {
  resolve(currency: CurrencyId): PaymentToken | undefined;
}

// ─── Registry ───────────────────────────────────────────────────────────────────

/** A {@link PaymentTokenRegistry} backed by a Map. */
export class MapPaymentTokenRegistry implements PaymentTokenRegistry {
  private readonly tokens = new Map<CurrencyId, PaymentToken>();

  constructor(entries?: Iterable<[CurrencyId, PaymentToken]>) {
    if (entries) {
      for (const [currency, token] of entries) {
        this.register(currency, token);
      }
    }
  }

  register(currency: CurrencyId, token: PaymentToken): void {
    validateNonEmpty(currency, 'currency');
    this.tokens.set(currency, token);
  }

  resolve(currency: CurrencyId): PaymentToken | undefined {
    return this.tokens.get(currency);
  }
}

// ─── In-memory payment token ────────────────────────────────────────────────────

/**
 * An ERC-20 style token kept in memory.
 *
 * ```ts
 * const usd = new MemoryPaymentToken('mUSD');
 * usd.mint('licensee', 1_000n);
 * usd.approve('licensee', ledger.address, 1_000n);
 * ```
 */
export class MemoryPaymentToken implements PaymentToken {
  readonly symbol: string;
  private readonly balances = new Map<Address, bigint>();
  private readonly allowances = new Map<string, bigint>();

  constructor(symbol: string) {
    this.symbol = symbol;
  }

  mint(recipient: Address, amount: bigint): void {
    validatePositiveAmount(amount, 'amount');
    this.balances.set(recipient, this.balanceOf(recipient) + amount);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  balanceOf(holder: Address): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  transferFrom(payer: Address, recipient: Address, amount: bigint): void {
    validatePositiveAmount(amount, 'amount');
    const allowed = this.allowance(payer, recipient);
    if (allowed < amount) {
      throw new InsufficientFundsError(
        KoinonErrorCode.INSUFFICIENT_ALLOWANCE,
        `${this.symbol}: allowance of ${payer} for ${recipient} is ${allowed}, ${amount} requested`,
        amount,
        allowed,
      );
    }
    this.move(payer, recipient, amount);
    this.allowances.set(allowanceKey(payer, recipient), allowed - amount);
  }

  transfer(sender: Address, recipient: Address, amount: bigint): void {
    validatePositiveAmount(amount, 'amount');
    this.move(sender, recipient, amount);
  }

  private move(from: Address, to: Address, amount: bigint): void {
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new InsufficientFundsError(
        KoinonErrorCode.INSUFFICIENT_BALANCE,
        `${this.symbol}: balance of ${from} is ${available}, ${amount} requested`,
        amount,
        available,
      );
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}\u0000${spender}`;
}

// ─── In-memory asset token ──────────────────────────────────────────────────────

/** A multi-asset (ERC-1155 style) supply ledger kept in memory. */
export class MemoryAssetToken implements AssetTokenLedger {
  private readonly balances = new Map<string, bigint>();
  private readonly supplies = new Map<number, bigint>();

  mint(recipient: Address, assetId: number, amount: bigint): void {
    validatePositiveAmount(amount, 'amount');
    const key = `${assetId}\u0000${recipient}`;
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
    this.supplies.set(assetId, this.totalSupply(assetId) + amount);
  }

  balanceOf(holder: Address, assetId: number): bigint {
    return this.balances.get(`${assetId}\u0000${holder}`) ?? 0n;
  }

  totalSupply(assetId: number): bigint {
    return this.supplies.get(assetId) ?? 0n;
  }
}
