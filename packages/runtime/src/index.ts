/**
 * @koinon/runtime — Execution runtime, journaled state tables,
 * token ports and ledger configuration shared by all subsystems.
 *
 * @packageDocumentation
 */

// ─── Clock ──────────────────────────────────────────────────────────────────────
export { SystemClock, ManualClock } from './clock.js';
export type { Clock } from './clock.js';

// ─── State tables ───────────────────────────────────────────────────────────────
export { Table, Cell, Sequence } from './table.js';
export type { Journaled } from './table.js';

// ─── Runtime ────────────────────────────────────────────────────────────────────
export { ExecutionRuntime, administratorOnly, DEFAULT_POOL_ADDRESS } from './runtime.js';
export type {
  CallContext,
  Capability,
  ExecuteOptions,
  ExecutionRuntimeOptions,
  PauseState,
} from './runtime.js';

// ─── Tokens ─────────────────────────────────────────────────────────────────────
export { MapPaymentTokenRegistry, MemoryPaymentToken, MemoryAssetToken } from './tokens.js';
export type { AssetTokenLedger, PaymentToken, PaymentTokenRegistry } from './tokens.js';

// ─── Configuration ──────────────────────────────────────────────────────────────
export {
  DEFAULT_GOVERNANCE_SETTINGS,
  DEFAULT_LEDGER_CONFIG,
  MIN_EXECUTION_DELAY,
  resolveLedgerConfig,
  validateLedgerConfig,
  validateGovernanceSettings,
  logLevelFromEnv,
} from './config.js';
export type { GovernanceSettings, LedgerConfig, LedgerConfigInput } from './config.js';
