/**
 * The execution runtime shared by every ledger subsystem.
 *
 * Each mutating entry point runs through {@link ExecutionRuntime.execute},
 * which applies the same pre-call checks in a fixed order:
 *
 * 1. reject a call that arrives while another is in flight;
 * 2. reject the call while the ledger is paused;
 * 3. run the operation's capability predicates;
 * 4. open a journal on every registered table, run the body, and roll the
 *    journals back if the body throws.
 *
 * @packageDocumentation
 */

import {
  AuthorizationError,
  KoinonErrorCode,
  ReentrancyError,
  StateError,
  createLogger,
  isKoinonError,
} from '@koinon/types';
import type { Address, CurrencyId, Logger, UnixSeconds } from '@koinon/types';

import { SystemClock } from './clock.js';
import type { Clock } from './clock.js';
import { resolveLedgerConfig } from './config.js';
import type { LedgerConfig, LedgerConfigInput } from './config.js';
import { Cell } from './table.js';
import type { Journaled } from './table.js';
import { MapPaymentTokenRegistry, MemoryAssetToken } from './tokens.js';
import type { AssetTokenLedger, PaymentToken, PaymentTokenRegistry } from './tokens.js';

// ─── Types ──────────────────────────────────────────────────────────────────────

/** What a capability predicate can see about the call being made. */
export interface CallContext {
  operation: string;
  caller: Address;
  /** Runtime clock value observed once at the start of the call. */
  now: UnixSeconds;
}

/**
 * A pre-call check. Returns normally when the call may proceed and throws
 * a {@link KoinonError} when it may not.
 */
export type Capability = (call: CallContext) => void;

export interface ExecuteOptions {
  operation: string;
  caller: Address;
  requires?: readonly Capability[];
  /** Allow the call while the ledger is paused. Only `unpause` sets this. */
  whenPaused?: boolean;
}

export interface PauseState {
  paused: boolean;
  reason: string;
  /** When the current pause began (0 when not paused). */
  since: UnixSeconds;
}

export interface ExecutionRuntimeOptions {
  /** Address allowed to pause, unpause and overwrite owner sets. */
  administrator: Address;
  /** Account the pool holds funds under. Defaults to `koinon:pool`. */
  address?: Address;
  clock?: Clock;
  config?: LedgerConfigInput;
  logger?: Logger;
  paymentTokens?: PaymentTokenRegistry;
  assetToken?: AssetTokenLedger;
}

export const DEFAULT_POOL_ADDRESS: Address = 'koinon:pool';

// ─── Capabilities ───────────────────────────────────────────────────────────────

/** Capability that admits only `administrator`. */
export function administratorOnly(administrator: Address): Capability {
  return (call) => {
    if (call.caller !== administrator) {
      throw new AuthorizationError(
        KoinonErrorCode.NOT_ADMINISTRATOR,
        `${call.operation}: caller ${call.caller} is not the administrator`,
        call.caller,
      );
    }
  };
}

// ─── Runtime ────────────────────────────────────────────────────────────────────

/**
 * Owns the clock, the pause flag, the reentrancy marker and the set of
 * journaled tables for one ledger instance.
 *
 * ```ts
 * const runtime = new ExecutionRuntime({ administrator: 'admin' });
 * const balances = runtime.register(new Table<string, bigint>('balances'));
 * runtime.execute({ operation: 'credit', caller: 'alice' }, () => {
 *   balances.set('alice', 10n);
 * });
 * ```
 */
export class ExecutionRuntime {
  readonly administrator: Address;
  readonly address: Address;
  readonly clock: Clock;
  readonly config: LedgerConfig;
  readonly logger: Logger;
  readonly assetToken: AssetTokenLedger;

  private readonly paymentTokens: PaymentTokenRegistry;
  private readonly tables: Journaled[] = [];
  private readonly pauseState: Cell<PauseState>;
  private activeOperation: string | undefined;

  constructor(options: ExecutionRuntimeOptions) {
    this.administrator = options.administrator;
    this.address = options.address ?? DEFAULT_POOL_ADDRESS;
    this.clock = options.clock ?? new SystemClock();
    this.config = resolveLedgerConfig(options.config);
    this.logger = options.logger ?? createLogger({ level: this.config.logLevel, component: 'koinon' });
    this.paymentTokens = options.paymentTokens ?? new MapPaymentTokenRegistry();
    this.assetToken = options.assetToken ?? new MemoryAssetToken();
    this.pauseState = this.register(new Cell<PauseState>('pause', { paused: false, reason: '', since: 0 }));
  }

  /** Add a table to the set journaled around every operation. */
  register<T extends Journaled>(table: T): T {
    this.tables.push(table);
    return table;
  }

  now(): UnixSeconds {
    return this.clock.now();
  }

  /** Name of the operation currently executing, if any. */
  get executing(): string | undefined {
    return this.activeOperation;
  }

  /**
   * Run `body` as one all-or-nothing operation.
   *
   * @throws {ReentrancyError} when another operation is executing.
   * @throws {StateError} PAUSED when the ledger is paused.
   */
  execute<R>(options: ExecuteOptions, body: (call: CallContext) => R): R {
    if (this.activeOperation !== undefined) {
      throw new ReentrancyError(this.activeOperation, options.operation);
    }
    this.activeOperation = options.operation;
    try {
      const call: CallContext = { operation: options.operation, caller: options.caller, now: this.now() };
      const pause = this.pauseState.get();
      if (pause.paused && options.whenPaused !== true) {
        throw new StateError(KoinonErrorCode.PAUSED, `${options.operation}: ledger is paused (${pause.reason})`, {
          hint: 'The administrator must unpause the ledger first',
        });
      }
      for (const capability of options.requires ?? []) {
        capability(call);
      }

      for (const table of this.tables) table.begin();
      try {
        const result = body(call);
        for (const table of this.tables) table.commit();
        return result;
      } catch (error) {
        for (let i = this.tables.length - 1; i >= 0; i--) {
          this.tables[i]?.rollback();
        }
        throw error;
      }
    } catch (error) {
      this.logger.debug('operation rejected', {
        operation: options.operation,
        caller: options.caller,
        code: isKoinonError(error) ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.activeOperation = undefined;
    }
  }

  // ── Pause flag ──────────────────────────────────────────────────────────────

  isPaused(): boolean {
    return this.pauseState.get().paused;
  }

  getPauseState(): PauseState {
    return { ...this.pauseState.get() };
  }

  /** Trip the pause flag. Call only from inside {@link execute}. */
  applyPause(reason: string): void {
    this.pauseState.set({ paused: true, reason, since: this.now() });
    this.logger.warn('ledger paused', { reason });
  }

  /** Clear the pause flag. Call only from inside {@link execute}. */
  applyUnpause(): void {
    if (!this.isPaused()) {
      throw new StateError(KoinonErrorCode.NOT_PAUSED, 'Ledger is not paused');
    }
    this.pauseState.set({ paused: false, reason: '', since: 0 });
    this.logger.info('ledger unpaused');
  }

  // ── Collaborators ───────────────────────────────────────────────────────────

  /**
   * @throws {StateError} UNKNOWN_CURRENCY when no token is registered.
   */
  paymentToken(currency: CurrencyId): PaymentToken {
    const token = this.paymentTokens.resolve(currency);
    if (token === undefined) {
      throw new StateError(KoinonErrorCode.UNKNOWN_CURRENCY, `No payment token registered for currency '${currency}'`, {
        context: { currency },
      });
    }
    return token;
  }
}
