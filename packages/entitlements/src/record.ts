/**
 * Entitlement record wire format and the structural check.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { authoritativeExpiration, DEFAULT_VALIDITY } from './time.js';
import type { Duration, EntitlementInput, EntitlementRecord, ParseResult, SignatureCodec } from './types.js';

// ============================================================================
// Wire Schema
// ============================================================================

const timestamp = z.string().datetime({ offset: true }).transform((value) => new Date(value));

const wireSchema = z
	.object({
		identity: z.string().min(1),
		features: z
			.array(z.string().min(1))
			.refine((list) => new Set(list).size === list.length, 'features must be unique'),
		issued_at: timestamp,
		expires_at: timestamp,
		anchor_timestamp: timestamp,
		signature: z.string().min(1),
		license_id: z.string().uuid().optional(),
		metadata: z.record(z.string(), z.string()).optional(),
	})
	.strict()
	.refine((wire) => wire.issued_at.getTime() <= wire.expires_at.getTime(), {
		message: 'issued_at must not be after expires_at',
		path: ['issued_at'],
	});

/**
 * JSON shape of an entitlement file.
 */
export type EntitlementWire = z.input<typeof wireSchema>;

// ============================================================================
// Parsing
// ============================================================================

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeInput(input: EntitlementInput): { ok: true; value: unknown } | { ok: false; explanation: string } {
	if (typeof input !== 'string' && !(input instanceof Uint8Array)) {
		return { ok: true, value: input };
	}

	let text: string;
	try {
		text = typeof input === 'string' ? input : utf8.decode(input);
	} catch {
		return { ok: false, explanation: 'entitlement bytes are not valid UTF-8' };
	}

	try {
		return { ok: true, value: JSON.parse(text) };
	} catch (error) {
		return {
			ok: false,
			explanation: `entitlement is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
		};
	}
}

/**
 * The structural check: decode and validate the wire shape. Unknown fields,
 * missing fields, duplicate features and `issued_at > expires_at` all fail.
 */
export function parseEntitlement(input: EntitlementInput): ParseResult {
	const decoded = decodeInput(input);
	if (!decoded.ok) {
		return decoded;
	}

	const parsed = wireSchema.safeParse(decoded.value);
	if (!parsed.success) {
		const explanation = parsed.error.issues
			.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
			.join('; ');
		return { ok: false, explanation };
	}

	const wire = parsed.data;
	const record: EntitlementRecord = {
		identity: wire.identity,
		features: new Set(wire.features),
		issuedAt: wire.issued_at,
		expiresAt: wire.expires_at,
		anchorTimestamp: wire.anchor_timestamp,
		signature: wire.signature,
	};
	if (wire.license_id !== undefined) record.licenseId = wire.license_id;
	if (wire.metadata !== undefined) record.metadata = wire.metadata;

	return { ok: true, record };
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Convert a record to its wire shape. Features are written sorted.
 */
export function toWire(record: EntitlementRecord): EntitlementWire {
	const wire: EntitlementWire = {
		identity: record.identity,
		features: [...record.features].sort(),
		issued_at: record.issuedAt.toISOString(),
		expires_at: record.expiresAt.toISOString(),
		anchor_timestamp: record.anchorTimestamp.toISOString(),
		signature: record.signature,
	};
	if (record.licenseId !== undefined) wire.license_id = record.licenseId;
	if (record.metadata !== undefined) wire.metadata = { ...record.metadata };
	return wire;
}

/**
 * Serialize a record to the JSON entitlement file format.
 */
export function serializeEntitlement(record: EntitlementRecord): string {
	return JSON.stringify(toWire(record), null, 2);
}

// ============================================================================
// Issuance
// ============================================================================

export interface IssueInput {
	identity: string;
	features: Iterable<string>;
	/** Issuer-fixed anchor; the authoritative expiration is measured from it. */
	anchor: Date;
	codec: SignatureCodec;
	/** Window used for the informational `expiresAt` (default 14 days). */
	validityWindow?: Duration;
	issuedAt?: Date;
	licenseId?: string;
	metadata?: Record<string, string>;
}

/**
 * Build a signed record for an identity.
 */
export function issueEntitlement(input: IssueInput): EntitlementRecord {
	const { identity, anchor, codec, validityWindow = DEFAULT_VALIDITY, issuedAt = anchor } = input;
	const features = new Set(input.features);

	const record: EntitlementRecord = {
		identity,
		features,
		issuedAt,
		expiresAt: authoritativeExpiration(anchor, validityWindow),
		anchorTimestamp: anchor,
		signature: codec.sign(identity, anchor, features),
		licenseId: input.licenseId ?? uuidv4(),
	};
	if (input.metadata !== undefined) record.metadata = { ...input.metadata };

	return record;
}
