/**
 * Rule set decoding and disposal.
 */

import { z } from 'zod';
import type { RuleSet, RuleSetDocument } from './types.js';

const documentSchema = z
	.object({
		patterns: z.record(z.string(), z.array(z.string())),
		prompts: z.record(z.string(), z.string()),
		confidence_thresholds: z.record(z.string(), z.number().min(0).max(1)),
	})
	.strict();

/**
 * Parse a decoded plaintext value into a rule set, or null if it is not one.
 */
export function decodeRuleSet(value: unknown): RuleSet | null {
	const parsed = documentSchema.safeParse(value);
	if (!parsed.success) {
		return null;
	}

	const doc = parsed.data;
	return {
		patterns: new Map(Object.entries(doc.patterns).map(([category, list]) => [category, [...list]])),
		prompts: new Map(Object.entries(doc.prompts)),
		confidenceThresholds: new Map(Object.entries(doc.confidence_thresholds)),
	};
}

/**
 * Serialize a rule set document for encryption.
 */
export function encodeRuleSet(doc: RuleSetDocument): string {
	return JSON.stringify(documentSchema.parse(doc));
}

/**
 * Clear every pattern, prompt and threshold held by a rule set.
 */
export function wipeRuleSet(ruleSet: RuleSet): void {
	for (const list of ruleSet.patterns.values()) {
		list.fill('');
		list.length = 0;
	}
	ruleSet.patterns.clear();
	ruleSet.prompts.clear();
	ruleSet.confidenceThresholds.clear();
}
