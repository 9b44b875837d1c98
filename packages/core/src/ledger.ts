import { validateNonEmpty } from '@koinon/types';
import type { Address } from '@koinon/types';
import { ExecutionRuntime, administratorOnly } from '@koinon/runtime';
import type { ExecutionRuntimeOptions, PauseState } from '@koinon/runtime';
import { OwnershipLedger } from '@koinon/ownership';
import { RevenuePool } from '@koinon/revenue';
import { LicenseRegistry } from '@koinon/licensing';
import { GovernanceEngine } from '@koinon/governance';

export type CollectiveLedgerOptions = ExecutionRuntimeOptions;

/**
 * The four subsystems of one ledger, sharing a single runtime so that
 * every operation journals and rolls back all of their state together.
 *
 * ```ts
 * const ledger = createCollectiveLedger({ administrator: 'admin' });
 * const assetId = ledger.ownership.registerAsset('alice', { ... });
 * ledger.governance.proposeAssetManagement('alice', assetId, { newComplianceStatus: 'VERIFIED' }, 'Verify');
 * ```
 */
export class CollectiveLedger {
  readonly runtime: ExecutionRuntime;
  readonly ownership: OwnershipLedger;
  readonly revenue: RevenuePool;
  readonly licensing: LicenseRegistry;
  readonly governance: GovernanceEngine;

  constructor(options: CollectiveLedgerOptions) {
    validateNonEmpty(options.administrator, 'administrator');
    this.runtime = new ExecutionRuntime(options);
    this.ownership = new OwnershipLedger(this.runtime);
    this.revenue = new RevenuePool(this.runtime, this.ownership);
    // The governance engine is built after the registry, so the quorum is
    // looked up through it lazily.
    this.licensing = new LicenseRegistry(this.runtime, this.ownership, this.revenue, {
      quorumSource: { licenseQuorumBps: (assetId) => this.governance.getGovernanceSettings(assetId).licenseQuorumBps },
    });
    this.governance = new GovernanceEngine(this.runtime, this.ownership, this.revenue, this.licensing);
    this.runtime.logger.info('ledger created', {
      administrator: this.runtime.administrator,
      address: this.runtime.address,
    });
  }

  getAdministrator(): Address {
    return this.runtime.administrator;
  }

  isPaused(): boolean {
    return this.runtime.isPaused();
  }

  getPauseState(): PauseState {
    return this.runtime.getPauseState();
  }

  /** Halt every mutating operation. Administrator only. */
  pause(caller: Address, reason: string): void {
    this.runtime.execute(
      { operation: 'pause', caller, requires: [administratorOnly(this.runtime.administrator)] },
      () => {
        validateNonEmpty(reason, 'reason');
        this.runtime.applyPause(reason);
      },
    );
  }

  /** Lift a pause. Administrator only; the one operation allowed while paused. */
  unpause(caller: Address): void {
    this.runtime.execute(
      { operation: 'unpause', caller, requires: [administratorOnly(this.runtime.administrator)], whenPaused: true },
      () => {
        this.runtime.applyUnpause();
      },
    );
  }
}

export function createCollectiveLedger(options: CollectiveLedgerOptions): CollectiveLedger {
  return new CollectiveLedger(options);
}
