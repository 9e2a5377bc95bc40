/**
 * Session store: the registry of activated entitlements, keyed by identity.
 *
 * At most one live session exists per identity. Activations for the same
 * identity run one at a time, in arrival order; everything that touches a
 * session after that (liveness, counters, teardown) is synchronous.
 */

import { v4 as uuidv4 } from 'uuid';
import {
	callerKind,
	createKeyedLock,
	createLogger,
	EntitlementError,
	type Logger,
	type ValidationFailureKind,
} from '@sealkit/core';
import {
	createRuleSetView,
	unlockRuleSet,
	watermarkFor,
	wipeRuleSet,
	type RuleSet,
	type RuleSetView,
	type Secret,
} from '@sealkit/payload';
import { createHighWaterMarkClock, DEFAULT_CLOCK_TOLERANCE } from './clock.js';
import { checkCap, incrementCapped, remainingAccesses } from './limits.js';
import { createRevalidationLayers, createValidationLayers, runLayers, runLayersSync } from './pipeline.js';
import { parseEntitlement } from './record.js';
import { daysRemaining, DEFAULT_VALIDITY, durationToMs, validityInterval } from './time.js';
import type {
	AccessRecord,
	ActivationFailure,
	ActivationResult,
	Clock,
	Duration,
	EntitlementInput,
	EntitlementRecord,
	EnvironmentProbe,
	LayerId,
	ReferenceClock,
	RuleSetResult,
	SessionDiagnostics,
	SessionHandle,
	SessionSnapshot,
	SignatureCodec,
	ValidationFacts,
} from './types.js';

// ============================================================================
// Options
// ============================================================================

/** Default maximum session age. */
export const DEFAULT_SESSION_TTL: Duration = { hours: 24 };

/** Default access cap per session. */
export const DEFAULT_MAX_ACCESS_COUNT = 1000;

export interface SessionStoreOptions {
	/** The embedded encrypted rule set: nonce || ciphertext. */
	payload: Uint8Array;
	payloadSecret: Secret;
	codec: SignatureCodec;
	validityWindow?: Duration;
	clockTolerance?: Duration;
	sessionTtl?: Duration;
	maxAccessCount?: number;
	environment?: EnvironmentProbe;
	clock?: Clock;
	/** Defaults to a high-water mark over `clock`. */
	reference?: ReferenceClock;
	logger?: Logger;
}

// ============================================================================
// Session State
// ============================================================================

interface Session {
	handle: SessionHandle;
	record: EntitlementRecord;
	ruleSet: RuleSet;
	view: RuleSetView;
	accessCount: number;
	closed: boolean;
}

type Liveness = { live: true } | { live: false; reason: string; destroy: boolean };

// ============================================================================
// Session Store
// ============================================================================

/**
 * Create an empty session store.
 */
export function createSessionStore(options: SessionStoreOptions) {
	const {
		payload,
		payloadSecret,
		codec,
		validityWindow = DEFAULT_VALIDITY,
		clockTolerance = DEFAULT_CLOCK_TOLERANCE,
		sessionTtl = DEFAULT_SESSION_TTL,
		maxAccessCount = DEFAULT_MAX_ACCESS_COUNT,
		environment,
		clock = () => new Date(),
		reference = createHighWaterMarkClock({ clock }),
	} = options;
	const log = (options.logger ?? createLogger()).child({ component: 'session-store' });

	const sessions = new Map<string, Session>();
	const failures = new Map<string, ActivationFailure>();
	const lock = createKeyedLock();
	const pipelineOptions = { codec, validityWindow, clockTolerance, environment };
	const layers = createValidationLayers(pipelineOptions);
	const revalidation = createRevalidationLayers(pipelineOptions);
	const ttlMs = durationToMs(sessionTtl);

	function factsFor(record: EntitlementRecord): ValidationFacts {
		return { record, now: clock(), reference: reference.now() };
	}

	/**
	 * The caller only learns the collapsed kind; the layer, the specific kind
	 * and the explanation go to the log and to `lastFailure`.
	 */
	function reject(
		kind: ValidationFailureKind,
		layer: LayerId,
		explanation: string,
		identity: string | null
	): ActivationResult {
		log.warn('entitlement activation rejected', { identity, layer, kind, explanation });
		if (identity !== null) {
			failures.set(identity, { layer, kind, explanation, at: clock() });
		}
		return { ok: false, error: new EntitlementError(callerKind(kind)) };
	}

	function destroy(session: Session, reason: string): void {
		if (session.closed) return;
		session.closed = true;
		wipeRuleSet(session.ruleSet);
		if (sessions.get(session.handle.identity) === session) {
			sessions.delete(session.handle.identity);
		}
		log.info('session ended', {
			identity: session.handle.identity,
			sessionId: session.handle.sessionId,
			reason,
		});
	}

	/**
	 * Re-check a session. Time-based failures mark it for destruction; an
	 * exhausted access count does not.
	 */
	function liveness(session: Session): Liveness {
		if (session.closed) {
			return { live: false, reason: 'session closed', destroy: false };
		}

		const facts = factsFor(session.record);
		const decision = runLayersSync(revalidation, facts);
		if (!decision.valid) {
			return {
				live: false,
				reason: `${decision.failure.layer}: ${decision.failure.explanation}`,
				destroy: true,
			};
		}

		if (facts.now.getTime() - session.handle.startedAt.getTime() >= ttlMs) {
			return { live: false, reason: 'session lifetime exceeded', destroy: true };
		}

		if (!checkCap({ cap: maxAccessCount, used: session.accessCount }).allowed) {
			return { live: false, reason: 'access limit reached', destroy: false };
		}

		return { live: true };
	}

	function checkSession(session: Session): boolean {
		const result = liveness(session);
		if (!result.live && result.destroy) {
			destroy(session, result.reason);
		}
		return result.live;
	}

	function sessionFor(handle: SessionHandle): Session | null {
		const session = sessions.get(handle.identity);
		return session && session.handle.sessionId === handle.sessionId ? session : null;
	}

	function openSession(record: EntitlementRecord, ruleSet: RuleSet): Session {
		const handle: SessionHandle = Object.freeze({
			sessionId: uuidv4(),
			identity: record.identity,
			startedAt: clock(),
		});
		const session: Session = {
			handle,
			record,
			ruleSet,
			accessCount: 0,
			closed: false,
			view: createRuleSetView(ruleSet, {
				watermark: watermarkFor(record.identity, payloadSecret),
				isLive: () => sessions.get(handle.identity) === session && checkSession(session),
			}),
		};
		return session;
	}

	/**
	 * Validate an entitlement and, if every layer passes, unlock the payload
	 * into a new session that replaces any existing one for the identity.
	 * Failures change nothing.
	 */
	async function activate(input: EntitlementInput): Promise<ActivationResult> {
		// Step 1: Structural check, to learn the identity
		const parsed = parseEntitlement(input);
		if (!parsed.ok) {
			return reject('MalformedRecord', 'structure', parsed.explanation, null);
		}
		const { record } = parsed;

		return lock.run(record.identity, async (): Promise<ActivationResult> => {
			// Step 2: Remaining layers
			const decision = await runLayers(layers, factsFor(record));
			if (!decision.valid) {
				const { kind, layer, explanation } = decision.failure;
				return reject(kind, layer, explanation, record.identity);
			}

			// Step 3: Unlock the rule set
			let ruleSet: RuleSet;
			try {
				ruleSet = unlockRuleSet(payload, record.identity, payloadSecret);
			} catch (error) {
				if (error instanceof EntitlementError) {
					log.error('payload unlock failed', { identity: record.identity, kind: error.kind });
					return { ok: false, error };
				}
				throw error;
			}

			// Step 4: Replace any previous session
			const previous = sessions.get(record.identity);
			if (previous) {
				destroy(previous, 'replaced by a new activation');
			}
			const session = openSession(record, ruleSet);
			sessions.set(record.identity, session);

			log.info('session activated', {
				identity: record.identity,
				sessionId: session.handle.sessionId,
				licenseId: record.licenseId,
				durationMs: decision.trace.durationMs,
			});
			return { ok: true, handle: session.handle };
		});
	}

	/**
	 * True iff the handle is the identity's current session, the record still
	 * validates, the session is within its lifetime and under its access cap.
	 */
	function isLive(handle: SessionHandle): boolean {
		const session = sessionFor(handle);
		return session !== null && checkSession(session);
	}

	/**
	 * End the session behind a handle. Stale handles are ignored.
	 */
	function teardown(handle: SessionHandle): boolean {
		const session = sessionFor(handle);
		if (!session) return false;
		destroy(session, 'teardown');
		return true;
	}

	/**
	 * Count one access against the identity's session and return the state
	 * the access was evaluated against. Null when there is no session.
	 */
	function recordAccess(identity: string): AccessRecord | null {
		const session = sessions.get(identity);
		if (!session) return null;

		const live = checkSession(session);
		const used = session.accessCount;
		session.accessCount = incrementCapped(used, maxAccessCount);

		return { live, features: session.record.features, used, cap: maxAccessCount };
	}

	/**
	 * The features of a live session, without counting an access.
	 */
	function features(identity: string): ReadonlySet<string> | null {
		const session = sessions.get(identity);
		return session && checkSession(session) ? session.record.features : null;
	}

	function ruleSet(identity: string): RuleSetResult {
		const session = sessions.get(identity);
		if (!session) {
			return { ok: false, error: new EntitlementError('NotActivated') };
		}
		if (!checkSession(session)) {
			return { ok: false, error: new EntitlementError('SessionExpired') };
		}
		return { ok: true, view: session.view };
	}

	function snapshot(identity: string): SessionSnapshot | null {
		const session = sessions.get(identity);
		if (!session) return null;
		return {
			sessionId: session.handle.sessionId,
			identity,
			features: [...session.record.features].sort(),
			startedAt: new Date(session.handle.startedAt.getTime()),
			accessCount: session.accessCount,
			validUntil: validityInterval(session.record, validityWindow).end,
		};
	}

	/**
	 * Operator-facing status. Does not end sessions it finds expired.
	 */
	function diagnose(identity: string): SessionDiagnostics | null {
		const session = sessions.get(identity);
		if (!session) return null;
		return {
			identity,
			sessionId: session.handle.sessionId,
			live: liveness(session).live,
			startedAt: new Date(session.handle.startedAt.getTime()),
			validity: validityInterval(session.record, validityWindow),
			daysRemaining: daysRemaining(session.record, clock(), validityWindow),
			signatureValid: codec.verify(session.record),
			accessCount: session.accessCount,
			remainingAccesses: remainingAccesses(maxAccessCount, session.accessCount),
		};
	}

	/**
	 * Why the identity's most recent rejected activation failed. Operator-facing.
	 */
	function lastFailure(identity: string): ActivationFailure | null {
		const failure = failures.get(identity);
		return failure ? { ...failure, at: new Date(failure.at.getTime()) } : null;
	}

	/**
	 * End every session and forget recorded failures.
	 */
	function shutdown(): void {
		for (const session of [...sessions.values()]) {
			destroy(session, 'shutdown');
		}
		failures.clear();
	}

	return {
		activate,
		isLive,
		teardown,
		recordAccess,
		features,
		ruleSet,
		snapshot,
		diagnose,
		lastFailure,
		shutdown,
		get size() {
			return sessions.size;
		},
	};
}

// ============================================================================
// Export type for the session store
// ============================================================================

export type SessionStore = ReturnType<typeof createSessionStore>;
