/**
 * @koinon/core — The collective IP ledger: ownership, revenue, licensing
 * and governance on one runtime.
 *
 * Re-exports the public surface of every subsystem so consumers only need
 * `@koinon/core`.
 *
 * @packageDocumentation
 */

export { CollectiveLedger, createCollectiveLedger } from './ledger.js';
export type { CollectiveLedgerOptions } from './ledger.js';
export { CollectiveLedgerBuilder } from './builder.js';

// ─── Subsystems ─────────────────────────────────────────────────────────────────

export * from '@koinon/types';
export * from '@koinon/runtime';
export * from '@koinon/ownership';
export * from '@koinon/revenue';
export * from '@koinon/licensing';
export * from '@koinon/governance';
