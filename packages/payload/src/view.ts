/**
 * Session-scoped read access to a rule set.
 */

import { EntitlementError } from '@sealkit/core';
import type { RuleSet, RuleSetView } from './types.js';

export interface RuleSetViewOptions {
	watermark: string;
	/** Returns false once the owning session has ended. */
	isLive: () => boolean;
}

export function createRuleSetView(ruleSet: RuleSet, options: RuleSetViewOptions): RuleSetView {
	const { watermark, isLive } = options;

	function guard(): RuleSet {
		if (!isLive()) {
			throw new EntitlementError('SessionExpired');
		}
		return ruleSet;
	}

	return {
		watermark,
		categories: () => [...guard().patterns.keys()],
		patterns: (category) => Object.freeze([...(guard().patterns.get(category) ?? [])]),
		prompt: (name) => guard().prompts.get(name),
		promptNames: () => [...guard().prompts.keys()],
		threshold: (category) => guard().confidenceThresholds.get(category),
	};
}
