/**
 * @sealkit/entitlements
 *
 * Validates signed, time-bounded entitlement records and turns them into
 * sessions that unlock the protected rule set. Answers the question:
 * "May this identity use this feature right now?"
 */

// ============================================================================
// Types
// ============================================================================

export type {
	// Time types
	Interval,
	Duration,
	Clock,
	ReferenceClock,
	// Record types
	EntitlementRecord,
	EntitlementInput,
	ParseResult,
	// Signature types
	SignatureCodec,
	// Validation types
	LayerId,
	LayerResult,
	ValidationFacts,
	ValidationLayer,
	SyncValidationLayer,
	Reason,
	Trace,
	ValidationDecision,
	EnvironmentProbe,
	// Session types
	SessionHandle,
	ActivationFailure,
	ActivationResult,
	RuleSetResult,
	SessionSnapshot,
	AccessRecord,
	SessionDiagnostics,
} from './types.js';

// ============================================================================
// Time Primitives
// ============================================================================

export {
	durationToMs,
	authoritativeExpiration,
	validityInterval,
	daysRemaining,
	describeExpiration,
	DEFAULT_VALIDITY,
} from './time.js';

// ============================================================================
// Records and Signatures
// ============================================================================

export {
	parseEntitlement,
	serializeEntitlement,
	toWire,
	issueEntitlement,
	type EntitlementWire,
	type IssueInput,
} from './record.js';

export { createSignatureCodec, signingMessage, constantTimeEqual } from './signature.js';

// ============================================================================
// Clock Integrity
// ============================================================================

export {
	checkClockIntegrity,
	createMonotonicReferenceClock,
	createHighWaterMarkClock,
	fixedReferenceClock,
	unavailableReferenceClock,
	DEFAULT_CLOCK_TOLERANCE,
	type HighWaterMarkClock,
} from './clock.js';

// ============================================================================
// Validation Pipeline
// ============================================================================

export {
	validateEntitlement,
	runLayers,
	runLayersSync,
	createValidationLayers,
	createRevalidationLayers,
	expirationLayer,
	anchorLayer,
	clockLayer,
	signatureLayer,
	environmentLayer,
	pass,
	fail,
	type PipelineOptions,
} from './pipeline.js';

export { acceptAnyEnvironment, rejectInspector, allEnvironments } from './environment.js';

// ============================================================================
// Access Cap
// ============================================================================

export { checkCap, remainingAccesses, incrementCapped, type CapCheck } from './limits.js';

// ============================================================================
// Sessions and Feature Gate
// ============================================================================

export {
	createSessionStore,
	DEFAULT_SESSION_TTL,
	DEFAULT_MAX_ACCESS_COUNT,
	type SessionStore,
	type SessionStoreOptions,
} from './session-store.js';

export { createFeatureGate, type FeatureGate, type FeatureGateOptions } from './feature-gate.js';

export { createGatekeeper, type Gatekeeper, type GatekeeperOptions } from './gatekeeper.js';
