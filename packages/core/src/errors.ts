/**
 * Error types shared across SealKit packages.
 */

// ============================================================================
// Entitlement Errors
// ============================================================================

/**
 * Why a record was rejected, as reported by the validation layer that
 * rejected it. Operator-facing: only the logger and store diagnostics see it.
 */
export type ValidationFailureKind =
	| 'MalformedRecord'
	| 'ExpiredEntitlement'
	| 'InvalidAnchor'
	| 'ClockIntegrityFailure'
	| 'SignatureMismatch'
	| 'EnvironmentRejected';

/**
 * Every way an activation or a session query can fail, as the caller sees it.
 * Rejections past the structural check all collapse into `ActivationFailed`.
 */
export type EntitlementErrorKind =
	| 'MalformedRecord'
	| 'ActivationFailed'
	| 'DecryptionFailed'
	| 'NotActivated'
	| 'SessionExpired';

const MESSAGES: Record<EntitlementErrorKind, string> = {
	MalformedRecord: 'Entitlement record is malformed',
	ActivationFailed: 'Entitlement activation failed',
	DecryptionFailed: 'Protected configuration could not be unlocked',
	NotActivated: 'No active session for this identity',
	SessionExpired: 'Session is no longer live',
};

export class EntitlementError extends Error {
	readonly kind: EntitlementErrorKind;

	constructor(kind: EntitlementErrorKind, options?: { cause?: unknown }) {
		super(MESSAGES[kind], options);
		this.name = 'EntitlementError';
		this.kind = kind;
	}
}

/**
 * The kind a caller is allowed to see for a validation failure.
 */
export function callerKind(kind: ValidationFailureKind): EntitlementErrorKind {
	return kind === 'MalformedRecord' ? 'MalformedRecord' : 'ActivationFailed';
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Raised when configuration from overrides or the environment does not validate.
 */
export class ConfigurationError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid SealKit configuration: ${issues.join('; ')}`);
		this.name = 'ConfigurationError';
		this.issues = issues;
	}
}
