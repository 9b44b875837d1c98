import {
  BPS_DENOMINATOR,
  KoinonErrorCode,
  ValidationError,
  validateIntegerRange,
  validateNonEmpty,
  validateNonNegativeAmount,
  validateNonNegativeInteger,
} from '@koinon/types';

import { LICENSE_TYPES } from './types.js';
import type { LicenseBlueprint } from './types.js';

// ─── Validation ─────────────────────────────────────────────────────────────────

/**
 * Check a blueprint's fields.
 *
 * @throws {ValidationError}
 */
export function validateBlueprint(blueprint: LicenseBlueprint): void {
  validateNonEmpty(blueprint.licensee, 'licensee');
  if (!LICENSE_TYPES.includes(blueprint.licenseType)) {
    throw new ValidationError(
      KoinonErrorCode.INVALID_INPUT,
      `licenseType must be one of ${LICENSE_TYPES.join(', ')} (got ${String(blueprint.licenseType)})`,
      'licenseType',
    );
  }
  validateNonNegativeAmount(blueprint.fee, 'fee');
  validateIntegerRange(blueprint.royaltyRateBps, 0, BPS_DENOMINATOR, 'royaltyRateBps');
  validateNonNegativeInteger(blueprint.durationSeconds, 'durationSeconds');
  validateNonEmpty(blueprint.currency, 'currency');
  validateNonNegativeInteger(blueprint.terms?.maxUsageCount ?? 0, 'terms.maxUsageCount');
  validateNonNegativeInteger(blueprint.terms?.terminationNoticePeriod ?? 0, 'terms.terminationNoticePeriod');
}
