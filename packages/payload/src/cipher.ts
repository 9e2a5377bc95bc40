/**
 * Authenticated encryption of the rule set payload.
 *
 * Blob layout: nonce (12 bytes) || AES-256-GCM ciphertext || tag (16 bytes)
 */

import { gcm } from '@noble/ciphers/aes.js';
import { concatBytes, randomBytes, utf8ToBytes } from '@noble/hashes/utils.js';
import { EntitlementError } from '@sealkit/core';
import { deriveKey } from './keys.js';
import { decodeRuleSet, encodeRuleSet } from './ruleset.js';
import type { RuleSet, RuleSetDocument, Secret } from './types.js';

export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;

const utf8 = new TextDecoder('utf-8', { fatal: true });

// ============================================================================
// Sealing
// ============================================================================

/**
 * Encrypt a rule set document under `key`. Used by the build step that embeds
 * the payload; a random nonce is drawn unless one is given.
 */
export function sealRuleSet(doc: RuleSetDocument, key: Uint8Array, nonce: Uint8Array = randomBytes(NONCE_LENGTH)): Uint8Array {
	if (nonce.length !== NONCE_LENGTH) {
		throw new RangeError(`Nonce must be ${NONCE_LENGTH} bytes, got ${nonce.length}`);
	}
	const plaintext = utf8ToBytes(encodeRuleSet(doc));
	try {
		return concatBytes(nonce, gcm(key, nonce).encrypt(plaintext));
	} finally {
		plaintext.fill(0);
	}
}

// ============================================================================
// Opening
// ============================================================================

/**
 * Decrypt a blob into a rule set.
 *
 * @throws EntitlementError with kind `DecryptionFailed` if the blob is too
 * short, fails authentication, or does not decode to a rule set
 */
export function decryptRuleSet(blob: Uint8Array, key: Uint8Array): RuleSet {
	if (blob.length < NONCE_LENGTH + TAG_LENGTH) {
		throw new EntitlementError('DecryptionFailed');
	}

	const nonce = blob.subarray(0, NONCE_LENGTH);
	const ciphertext = blob.subarray(NONCE_LENGTH);

	let plaintext: Uint8Array;
	try {
		plaintext = gcm(key, nonce).decrypt(ciphertext);
	} catch (cause) {
		throw new EntitlementError('DecryptionFailed', { cause });
	}

	try {
		const ruleSet = decodeRuleSet(JSON.parse(utf8.decode(plaintext)));
		if (!ruleSet) {
			throw new EntitlementError('DecryptionFailed');
		}
		return ruleSet;
	} catch (cause) {
		if (cause instanceof EntitlementError) throw cause;
		throw new EntitlementError('DecryptionFailed', { cause });
	} finally {
		plaintext.fill(0);
	}
}

/**
 * Derive the key for `identity`, decrypt the blob, and zero the key whatever
 * the outcome.
 */
export function unlockRuleSet(blob: Uint8Array, identity: string, secret: Secret): RuleSet {
	const key = deriveKey(identity, secret);
	try {
		return decryptRuleSet(blob, key);
	} finally {
		key.fill(0);
	}
}
