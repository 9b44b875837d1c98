import { describe, it, expect, beforeEach } from 'vitest';
import { InsufficientFundsError, KoinonErrorCode, ValidationError } from '@koinon/types';
import { MapPaymentTokenRegistry, MemoryAssetToken, MemoryPaymentToken } from './tokens';

// ---------------------------------------------------------------------------
// MemoryPaymentToken
// ---------------------------------------------------------------------------
describe('MemoryPaymentToken', () => {
  let usd: MemoryPaymentToken;

  beforeEach(() => {
    usd = new MemoryPaymentToken('mUSD');
    usd.mint('payer', 1_000n);
  });

  it('transferFrom spends the allowance granted to the recipient', () => {
    usd.approve('payer', 'pool', 300n);
    usd.transferFrom('payer', 'pool', 200n);

    expect(usd.balanceOf('payer')).toBe(800n);
    expect(usd.balanceOf('pool')).toBe(200n);
    expect(usd.allowance('payer', 'pool')).toBe(100n);
  });

  it('transferFrom fails with INSUFFICIENT_ALLOWANCE', () => {
    usd.approve('payer', 'pool', 50n);
    try {
      usd.transferFrom('payer', 'pool', 51n);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientFundsError);
      if (err instanceof InsufficientFundsError) {
        expect(err.code).toBe(KoinonErrorCode.INSUFFICIENT_ALLOWANCE);
        expect(err.requested).toBe(51n);
        expect(err.available).toBe(50n);
      }
    }
    expect(usd.balanceOf('payer')).toBe(1_000n);
  });

  it('transferFrom fails with INSUFFICIENT_BALANCE and keeps the allowance', () => {
    usd.approve('payer', 'pool', 5_000n);
    try {
      usd.transferFrom('payer', 'pool', 2_000n);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientFundsError);
      if (err instanceof InsufficientFundsError) {
        expect(err.code).toBe(KoinonErrorCode.INSUFFICIENT_BALANCE);
      }
    }
    expect(usd.allowance('payer', 'pool')).toBe(5_000n);
  });

  it('transfer moves the sender balance', () => {
    usd.transfer('payer', 'owner', 250n);
    expect(usd.balanceOf('payer')).toBe(750n);
    expect(usd.balanceOf('owner')).toBe(250n);
  });

  it('rejects non-positive amounts', () => {
    expect(() => usd.transfer('payer', 'owner', 0n)).toThrow(ValidationError);
  });
});

// ---------------------------------------------------------------------------
// MemoryAssetToken
// ---------------------------------------------------------------------------
describe('MemoryAssetToken', () => {
  it('tracks balances and supply per asset', () => {
    const token = new MemoryAssetToken();
    token.mint('alice', 1, 600n);
    token.mint('bob', 1, 400n);
    token.mint('alice', 2, 10n);

    expect(token.balanceOf('alice', 1)).toBe(600n);
    expect(token.balanceOf('alice', 2)).toBe(10n);
    expect(token.balanceOf('carol', 1)).toBe(0n);
    expect(token.totalSupply(1)).toBe(1_000n);
  });
});

// ---------------------------------------------------------------------------
// MapPaymentTokenRegistry
// ---------------------------------------------------------------------------
describe('MapPaymentTokenRegistry', () => {
  it('resolves registered tokens and returns undefined otherwise', () => {
    const usd = new MemoryPaymentToken('mUSD');
    const registry = new MapPaymentTokenRegistry();
    registry.register('USD', usd);

    expect(registry.resolve('USD')).toBe(usd);
    expect(registry.resolve('EUR')).toBeUndefined();
  });

  it('rejects an empty currency id', () => {
    expect(() => new MapPaymentTokenRegistry([['', new MemoryPaymentToken('x')]])).toThrow(ValidationError);
  });
});
