/**
 * Core type definitions for the entitlements engine.
 */

import type { EntitlementError, Interval, ValidationFailureKind } from '@sealkit/core';
import type { RuleSetView } from '@sealkit/payload';
export type { Interval };

// ============================================================================
// Time Types
// ============================================================================

/**
 * Duration as milliseconds or a structured object.
 */
export type Duration =
	| number
	| {
			hours?: number;
			days?: number;
			weeks?: number;
	  };

/**
 * Local time source.
 */
export type Clock = () => Date;

/**
 * An independent time source to compare the local clock against.
 * Returns null when no reference can be obtained.
 */
export interface ReferenceClock {
	now(): Date | null;
}

// ============================================================================
// Record Types
// ============================================================================

/**
 * A signed claim granting an identity a feature set for a bounded time.
 */
export interface EntitlementRecord {
	identity: string;
	features: ReadonlySet<string>;
	issuedAt: Date;
	/** Informational only; access is gated on `anchorTimestamp`. */
	expiresAt: Date;
	anchorTimestamp: Date;
	signature: string;
	licenseId?: string;
	metadata?: Record<string, string>;
}

/**
 * Raw entitlement as bytes, JSON text, or an already-decoded object.
 */
export type EntitlementInput = Uint8Array | string | Record<string, unknown>;

/**
 * Result of the structural check.
 */
export type ParseResult =
	| { ok: true; record: EntitlementRecord }
	| { ok: false; explanation: string };

// ============================================================================
// Signature Types
// ============================================================================

export interface SignatureCodec {
	sign(identity: string, anchor: Date, features: Iterable<string>): string;
	verify(record: EntitlementRecord): boolean;
}

// ============================================================================
// Validation Types
// ============================================================================

export type LayerId = 'structure' | 'expiration' | 'anchor' | 'clock' | 'signature' | 'environment';

/**
 * Result of evaluating a single layer.
 */
export type LayerResult =
	| { outcome: 'pass'; explanation: string }
	| { outcome: 'fail'; explanation: string };

/**
 * Facts every layer after the structural check evaluates against.
 */
export interface ValidationFacts {
	record: EntitlementRecord;
	now: Date;
	/** Reading from the reference clock, or null when it was unavailable. */
	reference: Date | null;
}

/**
 * A single, independent check in the pipeline.
 */
export interface ValidationLayer {
	id: LayerId;
	description: string;
	/** Error kind reported when this layer fails. */
	failure: ValidationFailureKind;
	evaluate: (facts: ValidationFacts) => LayerResult | Promise<LayerResult>;
}

/**
 * A layer that never needs to await, so it can run during liveness checks.
 */
export interface SyncValidationLayer extends ValidationLayer {
	evaluate: (facts: ValidationFacts) => LayerResult;
}

/**
 * Captures what happened for a single layer.
 */
export interface Reason {
	layer: LayerId;
	outcome: 'pass' | 'fail';
	explanation: string;
}

/**
 * Trace information for diagnostics.
 */
export interface Trace {
	evaluatedAt: Date;
	durationMs: number;
}

/**
 * The outcome of running the pipeline. Operator-facing: the failed layer and
 * its explanation must not be handed to feature-gate callers.
 */
export type ValidationDecision =
	| { valid: true; record: EntitlementRecord; reasons: Reason[]; trace: Trace }
	| {
			valid: false;
			failure: { layer: LayerId; kind: ValidationFailureKind; explanation: string };
			reasons: Reason[];
			trace: Trace;
	  };

/**
 * Deployment-specific attestation invoked as the final layer.
 */
export type EnvironmentProbe = (record: EntitlementRecord) => boolean | Promise<boolean>;

// ============================================================================
// Session Types
// ============================================================================

/**
 * Opaque reference to one activation. Becomes stale when the session is torn
 * down or replaced.
 */
export interface SessionHandle {
	readonly sessionId: string;
	readonly identity: string;
	readonly startedAt: Date;
}

/**
 * The most recent rejected activation for an identity. Operator-facing only.
 */
export interface ActivationFailure {
	layer: LayerId;
	kind: ValidationFailureKind;
	explanation: string;
	at: Date;
}

export type ActivationResult =
	| { ok: true; handle: SessionHandle }
	| { ok: false; error: EntitlementError };

export type RuleSetResult =
	| { ok: true; view: RuleSetView }
	| { ok: false; error: EntitlementError };

/**
 * A consistent, read-only copy of a session's state.
 */
export interface SessionSnapshot {
	sessionId: string;
	identity: string;
	features: string[];
	startedAt: Date;
	accessCount: number;
	/** Authoritative expiration: anchor plus the validity window. */
	validUntil: Date;
}

/**
 * The state an access check evaluated, taken before the counter moved.
 */
export interface AccessRecord {
	live: boolean;
	features: ReadonlySet<string>;
	used: number;
	cap: number;
}

/**
 * Operator-facing status for one identity.
 */
export interface SessionDiagnostics {
	identity: string;
	sessionId: string;
	live: boolean;
	startedAt: Date;
	validity: Interval;
	daysRemaining: number;
	signatureValid: boolean;
	accessCount: number;
	remainingAccesses: number;
}
