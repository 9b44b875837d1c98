import { KoinonErrorCode, ValidationError } from '@koinon/types';
import type { Address, CurrencyId, Logger } from '@koinon/types';
import { MapPaymentTokenRegistry } from '@koinon/runtime';
import type { AssetTokenLedger, Clock, LedgerConfigInput, PaymentToken } from '@koinon/runtime';

import { CollectiveLedger } from './ledger.js';

/**
 * A fluent builder for {@link CollectiveLedger}.
 *
 * Every setter returns `this`, so calls can be chained in any order. Only
 * the administrator is required; everything else has a default.
 *
 * @example
 * ```typescript
 * const ledger = new CollectiveLedgerBuilder()
 *   .administrator('admin')
 *   .clock(new ManualClock())
 *   .paymentToken('USD', usd)
 *   .config({ approvalFeeThreshold: 1_000n })
 *   .build();
 * ```
 */
export class CollectiveLedgerBuilder {
  private _administrator: Address | undefined;
  private _address: Address | undefined;
  private _clock: Clock | undefined;
  private _config: LedgerConfigInput | undefined;
  private _logger: Logger | undefined;
  private _assetToken: AssetTokenLedger | undefined;
  private _paymentTokens = new Map<CurrencyId, PaymentToken>();

  administrator(value: Address): this {
    this._administrator = value;
    return this;
  }

  /** Account the revenue pool holds funds under. */
  address(value: Address): this {
    this._address = value;
    return this;
  }

  clock(value: Clock): this {
    this._clock = value;
    return this;
  }

  /**
   * Merge configuration overrides. Calling this more than once merges the
   * inputs, later values winning.
   */
  config(value: LedgerConfigInput): this {
    this._config = {
      ...this._config,
      ...value,
      governanceDefaults: { ...this._config?.governanceDefaults, ...value.governanceDefaults },
    };
    return this;
  }

  logger(value: Logger): this {
    this._logger = value;
    return this;
  }

  assetToken(value: AssetTokenLedger): this {
    this._assetToken = value;
    return this;
  }

  /** Register the token that settles payments in `currency`. */
  paymentToken(currency: CurrencyId, token: PaymentToken): this {
    this._paymentTokens.set(currency, token);
    return this;
  }

  /** Clear all fields so the builder can be reused. */
  reset(): this {
    this._administrator = undefined;
    this._address = undefined;
    this._clock = undefined;
    this._config = undefined;
    this._logger = undefined;
    this._assetToken = undefined;
    this._paymentTokens = new Map<CurrencyId, PaymentToken>();
    return this;
  }

  /**
   * @throws {ValidationError} when no administrator was set, or when the
   *   configuration is invalid.
   */
  build(): CollectiveLedger {
    if (!this._administrator) {
      throw new ValidationError(
        KoinonErrorCode.INVALID_INPUT,
        'CollectiveLedgerBuilder: administrator is required',
        'administrator',
      );
    }
    return new CollectiveLedger({
      administrator: this._administrator,
      address: this._address,
      clock: this._clock,
      config: this._config,
      logger: this._logger,
      assetToken: this._assetToken,
      paymentTokens: new MapPaymentTokenRegistry(this._paymentTokens),
    });
  }
}
