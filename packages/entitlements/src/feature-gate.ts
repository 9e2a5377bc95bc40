/**
 * Feature gate: "can identity X use feature Y now?"
 *
 * Every unmet condition, including an identity that was never activated,
 * answers the same `false`.
 */

import { checkCap } from './limits.js';
import type { SessionStore } from './session-store.js';
import type { RuleSetResult } from './types.js';

export interface FeatureGateOptions {
	store: SessionStore;
}

/**
 * Create a feature gate over a session store.
 */
export function createFeatureGate(options: FeatureGateOptions) {
	const { store } = options;

	/**
	 * Requires a live session, the feature in its record, and an access count
	 * under the cap. Each call counts one access against an existing session.
	 */
	function checkAccess(identity: string, feature: string): boolean {
		const access = store.recordAccess(identity);
		if (!access) return false;

		return access.live && access.features.has(feature) && checkCap(access).allowed;
	}

	/**
	 * The session's features while it is live, sorted; otherwise empty.
	 */
	function listFeatures(identity: string): string[] {
		const features = store.features(identity);
		return features ? [...features].sort() : [];
	}

	/**
	 * Read-only view of the unlocked rule set, scoped to the session.
	 */
	function getRuleSet(identity: string): RuleSetResult {
		return store.ruleSet(identity);
	}

	return {
		checkAccess,
		listFeatures,
		getRuleSet,
	};
}

export type FeatureGate = ReturnType<typeof createFeatureGate>;
