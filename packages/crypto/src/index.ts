/**
 * @koinon/crypto — Opaque hashing of free-text ledger fields.
 *
 * Metadata URIs, license terms references and proposal descriptions are
 * stored alongside a SHA-256 digest so that off-ledger copies can be
 * checked against what the ledger recorded.
 *
 * @packageDocumentation
 */

import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

/** Hex-encoded SHA-256 digest (64 lowercase characters). */
export type HashHex = string;

/**
 * SHA-256 hash of arbitrary bytes, returned as a lowercase hex string.
 */
export function sha256(data: Uint8Array): HashHex {
  return bytesToHex(nobleSha256(data));
}

/**
 * SHA-256 hash of a UTF-8 string.
 *
 * @example
 * ```typescript
 * sha256String('ipfs://asset/1.json');
 * ```
 */
export function sha256String(data: string): HashHex {
  return sha256(utf8ToBytes(data));
}

/**
 * Hash an optional free-text field. Empty text hashes to the empty string
 * so that "no terms" is distinguishable from any real digest.
 */
export function hashFreeText(text: string): HashHex {
  return text.length === 0 ? '' : sha256String(text);
}
