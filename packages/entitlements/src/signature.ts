/**
 * Signature codec: an HMAC-SHA256 tag binding an identity, its anchor and its
 * features to the deployment signing secret.
 */

import { hmac } from '@noble/hashes/hmac.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils.js';
import type { EntitlementRecord, SignatureCodec } from './types.js';

const SIGNATURE_VERSION = 'sealkit-entitlement/v1';

/**
 * Canonical message for the tag. JSON array encoding keeps field boundaries
 * unambiguous whatever characters the identity contains.
 */
export function signingMessage(identity: string, anchor: Date, features: Iterable<string>): string {
	const sorted = [...new Set(features)].sort();
	return JSON.stringify([SIGNATURE_VERSION, identity, anchor.getTime(), sorted]);
}

/**
 * Compare two strings without returning early on the first difference.
 */
export function constantTimeEqual(a: string, b: string): boolean {
	const left = utf8ToBytes(a);
	const right = utf8ToBytes(b);
	let diff = left.length ^ right.length;
	const length = Math.max(left.length, right.length);
	for (let i = 0; i < length; i++) {
		diff |= (left[i] ?? 0) ^ (right[i] ?? 0);
	}
	return diff === 0;
}

/**
 * Create a codec keyed by `secret`.
 */
export function createSignatureCodec(secret: string | Uint8Array): SignatureCodec {
	const key = typeof secret === 'string' ? utf8ToBytes(secret) : Uint8Array.from(secret);

	function sign(identity: string, anchor: Date, features: Iterable<string>): string {
		return bytesToHex(hmac(sha256, key, utf8ToBytes(signingMessage(identity, anchor, features))));
	}

	function verify(record: EntitlementRecord): boolean {
		if (Number.isNaN(record.anchorTimestamp.getTime())) {
			return false;
		}
		const expected = sign(record.identity, record.anchorTimestamp, record.features);
		return constantTimeEqual(record.signature, expected);
	}

	return { sign, verify };
}
