/**
 * Host-facing entry point: configuration, logging, store and gate wired
 * together behind the boundary operations.
 */

import { createLogger, resolveConfig, type Logger, type SealkitConfig } from '@sealkit/core';
import { createFeatureGate } from './feature-gate.js';
import { createSessionStore } from './session-store.js';
import { createSignatureCodec } from './signature.js';
import type {
	ActivationFailure,
	ActivationResult,
	Clock,
	EntitlementInput,
	EnvironmentProbe,
	ReferenceClock,
	RuleSetResult,
	SessionDiagnostics,
	SessionHandle,
} from './types.js';

export interface GatekeeperOptions {
	/** The embedded encrypted rule set. */
	payload: Uint8Array;
	/** Defaults to `resolveConfig()` over the process environment. */
	config?: SealkitConfig;
	logger?: Logger;
	environment?: EnvironmentProbe;
	clock?: Clock;
	reference?: ReferenceClock;
}

export interface Gatekeeper {
	activate(entitlement: EntitlementInput): Promise<ActivationResult>;
	isFeatureAvailable(identity: string, feature: string): boolean;
	listFeatures(identity: string): string[];
	getRuleSet(identity: string): RuleSetResult;
	isLive(handle: SessionHandle): boolean;
	teardown(handle: SessionHandle): boolean;
	diagnose(identity: string): SessionDiagnostics | null;
	/** Operator-only: which check rejected the identity's last activation. */
	lastFailure(identity: string): ActivationFailure | null;
	shutdown(): void;
}

export function createGatekeeper(options: GatekeeperOptions): Gatekeeper {
	const config = options.config ?? resolveConfig();
	const logger = options.logger ?? createLogger({ level: config.logLevel });

	if (config.usingPlaceholderSecrets) {
		logger.warn('using placeholder secrets; set SEALKIT_SIGNING_SECRET and SEALKIT_PAYLOAD_SECRET');
	}

	const store = createSessionStore({
		payload: options.payload,
		payloadSecret: config.payloadSecret,
		codec: createSignatureCodec(config.signingSecret),
		validityWindow: { days: config.validityDays },
		clockTolerance: { hours: config.clockToleranceHours },
		sessionTtl: { hours: config.sessionTtlHours },
		maxAccessCount: config.maxAccessCount,
		environment: options.environment,
		clock: options.clock,
		reference: options.reference,
		logger,
	});
	const gate = createFeatureGate({ store });

	return {
		activate: store.activate,
		isFeatureAvailable: gate.checkAccess,
		listFeatures: gate.listFeatures,
		getRuleSet: gate.getRuleSet,
		isLive: store.isLive,
		teardown: store.teardown,
		diagnose: store.diagnose,
		lastFailure: store.lastFailure,
		shutdown: store.shutdown,
	};
}
