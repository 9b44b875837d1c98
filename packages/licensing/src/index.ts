/**
 * @koinon/licensing — License lifecycle, royalties and license proposals.
 *
 * @packageDocumentation
 */

export { LicenseRegistry } from './registry.js';
export type { LicenseRegistryOptions } from './registry.js';
export { validateBlueprint } from './validation.js';
export { LICENSE_TYPES } from './types.js';
export type {
  License,
  LicenseBlueprint,
  LicenseOffer,
  LicenseProposal,
  LicenseQuorumSource,
  LicenseStatus,
  LicenseTerms,
  LicenseTermsInput,
  LicenseType,
  RoyaltySchedule,
} from './types.js';
