import type { RuleSetDocument } from '../src/types.js';

export const PAYLOAD_SECRET = 'test-payload-secret';

export const NONCE = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);

export const ruleSetDocument: RuleSetDocument = {
	patterns: {
		module: ['Chapter \\d+:', 'Section \\d+\\.\\d+:'],
		step: ['Inspect the', 'Record the'],
	},
	prompts: {
		summary: 'Summarize the following text: {text}',
		steps: 'List the procedural steps in: {text}',
	},
	confidence_thresholds: {
		module: 0.85,
		step: 0.9,
	},
};
