import { createLogger, silentSink, type LogEntry } from '@sealkit/core';
import { deriveKey, sealRuleSet, type RuleSetDocument } from '@sealkit/payload';
import { issueEntitlement } from '../src/record.js';
import { createSignatureCodec } from '../src/signature.js';
import type { EntitlementRecord, ReferenceClock } from '../src/types.js';

export const SIGNING_SECRET = 'test-signing-secret';
export const PAYLOAD_SECRET = 'test-payload-secret';

export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;

/** Anchor used throughout: 2024-12-13T20:57:36Z. */
export const T0 = new Date('2024-12-13T20:57:36Z');

export const codec = createSignatureCodec(SIGNING_SECRET);

export const ruleSetDocument: RuleSetDocument = {
	patterns: {
		module: ['Chapter \\d+:', 'Module \\d+:'],
		step: ['Inspect the', 'Record the', 'Replace the'],
	},
	prompts: {
		summary: 'Summarize the following text: {text}',
	},
	confidence_thresholds: {
		module: 0.85,
		step: 0.9,
	},
};

const NONCE = new Uint8Array([9, 8, 7, 6, 5, 4, 3, 2, 1, 0, 1, 2]);

/** Payload sealed for `identity` (default cust-1). */
export function sealedPayload(identity = 'cust-1'): Uint8Array {
	return sealRuleSet(ruleSetDocument, deriveKey(identity, PAYLOAD_SECRET), NONCE);
}

export function signedRecord(overrides: Partial<{ identity: string; features: string[]; anchor: Date }> = {}): EntitlementRecord {
	return issueEntitlement({
		identity: overrides.identity ?? 'cust-1',
		features: overrides.features ?? ['module_extraction', 'step_extraction'],
		anchor: overrides.anchor ?? T0,
		codec,
		licenseId: '7d444840-9dc0-41d5-a9a8-4a6b1c0a1d11',
	});
}

/**
 * A settable clock that also serves as an agreeing reference clock.
 */
export function testClock(start: Date) {
	let current = start.getTime();
	const now = () => new Date(current);
	const reference: ReferenceClock = { now };
	return {
		now,
		reference,
		set(at: Date) {
			current = at.getTime();
		},
		advance(ms: number) {
			current += ms;
		},
	};
}

export function captureLogs() {
	const entries: LogEntry[] = [];
	const logger = createLogger({ level: 'debug', sink: (entry) => entries.push(entry) });
	return { entries, logger };
}

export const quietLogger = createLogger({ sink: silentSink });
