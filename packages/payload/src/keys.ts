/**
 * Key derivation for the encrypted payload.
 */

import { hkdf } from '@noble/hashes/hkdf.js';
import { hmac } from '@noble/hashes/hmac.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils.js';
import type { Secret } from './types.js';

/** AES-256 key length in bytes. */
export const KEY_LENGTH = 32;

const KEY_SALT = utf8ToBytes('sealkit/payload-key/v1');
const WATERMARK_CONTEXT = 'sealkit/watermark/v1';

export function secretBytes(secret: Secret): Uint8Array {
	return typeof secret === 'string' ? utf8ToBytes(secret) : secret;
}

/**
 * Derive the payload key for an identity. The same identity and secret always
 * give the same key. Callers own the returned buffer and should zero it.
 */
export function deriveKey(identity: string, secret: Secret): Uint8Array {
	return hkdf(sha256, secretBytes(secret), KEY_SALT, utf8ToBytes(identity), KEY_LENGTH);
}

/**
 * Output watermark for an identity: `wm_` followed by 16 hex characters.
 */
export function watermarkFor(identity: string, secret: Secret): string {
	const tag = hmac(sha256, secretBytes(secret), utf8ToBytes(`${WATERMARK_CONTEXT}:${identity}`));
	return `wm_${bytesToHex(tag.subarray(0, 8))}`;
}
