/**
 * Validation pipeline: an ordered, short-circuiting chain of independent layers.
 */

import { checkClockIntegrity, DEFAULT_CLOCK_TOLERANCE } from './clock.js';
import { acceptAnyEnvironment } from './environment.js';
import { parseEntitlement } from './record.js';
import { authoritativeExpiration, DEFAULT_VALIDITY } from './time.js';
import type {
	Duration,
	EntitlementInput,
	EnvironmentProbe,
	LayerResult,
	Reason,
	SignatureCodec,
	SyncValidationLayer,
	ValidationDecision,
	ValidationFacts,
	ValidationLayer,
} from './types.js';

// ============================================================================
// Result Helpers
// ============================================================================

/**
 * Create a pass result.
 */
export function pass(explanation: string): LayerResult {
	return { outcome: 'pass', explanation };
}

/**
 * Create a fail result.
 */
export function fail(explanation: string): LayerResult {
	return { outcome: 'fail', explanation };
}

// ============================================================================
// Layers
// ============================================================================

/**
 * `now < anchor + window`. The record's own `expiresAt` is not consulted.
 */
export function expirationLayer(window: Duration = DEFAULT_VALIDITY): SyncValidationLayer {
	return {
		id: 'expiration',
		description: 'Authoritative expiration measured from the anchor',
		failure: 'ExpiredEntitlement',
		evaluate: ({ record, now }) => {
			const expiration = authoritativeExpiration(record.anchorTimestamp, window);
			return now < expiration
				? pass(`valid until ${expiration.toISOString()}`)
				: fail(`expired at ${expiration.toISOString()}`);
		},
	};
}

/**
 * `anchor <= now`. An anchor in the future points at a corrupted or forged build.
 */
export function anchorLayer(): SyncValidationLayer {
	return {
		id: 'anchor',
		description: 'Anchor timestamp is not in the future',
		failure: 'InvalidAnchor',
		evaluate: ({ record, now }) =>
			record.anchorTimestamp <= now
				? pass('anchor is in the past')
				: fail(`anchor ${record.anchorTimestamp.toISOString()} is after ${now.toISOString()}`),
	};
}

/**
 * Local clock agrees with the reference clock within the tolerance.
 */
export function clockLayer(tolerance: Duration = DEFAULT_CLOCK_TOLERANCE): SyncValidationLayer {
	return {
		id: 'clock',
		description: 'Local clock agrees with the reference clock',
		failure: 'ClockIntegrityFailure',
		evaluate: ({ now, reference }) => {
			if (reference === null) {
				return fail('reference clock unavailable');
			}
			return checkClockIntegrity(now, reference, tolerance)
				? pass('clocks agree')
				: fail(`clock drift of ${Math.abs(now.getTime() - reference.getTime())}ms exceeds tolerance`);
		},
	};
}

/**
 * Signature matches the identity, anchor and features.
 */
export function signatureLayer(codec: SignatureCodec): SyncValidationLayer {
	return {
		id: 'signature',
		description: 'Signature matches the signed claims',
		failure: 'SignatureMismatch',
		evaluate: ({ record }) => (codec.verify(record) ? pass('signature verified') : fail('signature mismatch')),
	};
}

/**
 * Deployment-specific attestation. A probe that throws counts as a rejection.
 */
export function environmentLayer(probe: EnvironmentProbe = acceptAnyEnvironment): ValidationLayer {
	return {
		id: 'environment',
		description: 'Execution environment is allowed',
		failure: 'EnvironmentRejected',
		evaluate: async ({ record }) => {
			try {
				return (await probe(record)) ? pass('environment accepted') : fail('environment rejected');
			} catch (error) {
				return fail(`environment probe threw: ${error instanceof Error ? error.message : String(error)}`);
			}
		},
	};
}

// ============================================================================
// Layer Sets
// ============================================================================

export interface PipelineOptions {
	codec: SignatureCodec;
	validityWindow?: Duration;
	clockTolerance?: Duration;
	environment?: EnvironmentProbe;
}

/**
 * The layers that run after the structural check during activation, in order.
 */
export function createValidationLayers(options: PipelineOptions): ValidationLayer[] {
	return [...createRevalidationLayers(options), environmentLayer(options.environment)];
}

/**
 * The synchronous layers re-run on every liveness check.
 */
export function createRevalidationLayers(options: PipelineOptions): SyncValidationLayer[] {
	return [
		expirationLayer(options.validityWindow),
		anchorLayer(),
		clockLayer(options.clockTolerance),
		signatureLayer(options.codec),
	];
}

// ============================================================================
// Evaluation
// ============================================================================

function decide(
	facts: ValidationFacts,
	reasons: Reason[],
	failed: ValidationLayer | null,
	startTime: number,
	evaluatedAt: Date
): ValidationDecision {
	const trace = { evaluatedAt, durationMs: performance.now() - startTime };

	if (failed === null) {
		return { valid: true, record: facts.record, reasons, trace };
	}

	return {
		valid: false,
		failure: {
			layer: failed.id,
			kind: failed.failure,
			explanation: reasons[reasons.length - 1].explanation,
		},
		reasons,
		trace,
	};
}

/**
 * Evaluate layers in order, stopping at the first failure.
 */
export async function runLayers(layers: ValidationLayer[], facts: ValidationFacts): Promise<ValidationDecision> {
	const startTime = performance.now();
	const evaluatedAt = new Date();
	const reasons: Reason[] = [];

	for (const layer of layers) {
		const result = await layer.evaluate(facts);
		reasons.push({ layer: layer.id, outcome: result.outcome, explanation: result.explanation });
		if (result.outcome === 'fail') {
			return decide(facts, reasons, layer, startTime, evaluatedAt);
		}
	}

	return decide(facts, reasons, null, startTime, evaluatedAt);
}

/**
 * Synchronous counterpart of `runLayers` for liveness checks.
 */
export function runLayersSync(layers: SyncValidationLayer[], facts: ValidationFacts): ValidationDecision {
	const startTime = performance.now();
	const evaluatedAt = new Date();
	const reasons: Reason[] = [];

	for (const layer of layers) {
		const result = layer.evaluate(facts);
		reasons.push({ layer: layer.id, outcome: result.outcome, explanation: result.explanation });
		if (result.outcome === 'fail') {
			return decide(facts, reasons, layer, startTime, evaluatedAt);
		}
	}

	return decide(facts, reasons, null, startTime, evaluatedAt);
}

/**
 * Run the full pipeline over a raw entitlement: the structural check, then
 * every layer in `createValidationLayers` order.
 *
 * @param input - Raw entitlement bytes, JSON text or decoded object
 * @param options.now - Local time to validate at
 * @param options.reference - Reference clock reading (null = unavailable)
 * @returns The decision; invalid decisions name the failed layer
 */
export async function validateEntitlement(
	input: EntitlementInput,
	options: PipelineOptions & { now: Date; reference: Date | null }
): Promise<ValidationDecision> {
	const startTime = performance.now();
	const evaluatedAt = new Date();

	// Step 1: Structural check
	const parsed = parseEntitlement(input);
	if (!parsed.ok) {
		return {
			valid: false,
			failure: { layer: 'structure', kind: 'MalformedRecord', explanation: parsed.explanation },
			reasons: [{ layer: 'structure', outcome: 'fail', explanation: parsed.explanation }],
			trace: { evaluatedAt, durationMs: performance.now() - startTime },
		};
	}

	// Step 2: Remaining layers
	const decision = await runLayers(createValidationLayers(options), {
		record: parsed.record,
		now: options.now,
		reference: options.reference,
	});

	// Step 3: Merge the structural reason into the decision
	decision.reasons.unshift({ layer: 'structure', outcome: 'pass', explanation: 'record is well-formed' });
	decision.trace = { evaluatedAt, durationMs: performance.now() - startTime };
	return decision;
}
