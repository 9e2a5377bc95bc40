/**
 * Runtime configuration, resolved from explicit overrides and the environment.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Placeholders
// ============================================================================

// Stand-ins so a development build runs without provisioning. Deployments set
// SEALKIT_SIGNING_SECRET and SEALKIT_PAYLOAD_SECRET.
const PLACEHOLDER_SIGNING_SECRET = 'sealkit-placeholder-signing-secret';
const PLACEHOLDER_PAYLOAD_SECRET = 'sealkit-placeholder-payload-secret';

// ============================================================================
// Schema
// ============================================================================

const configSchema = z.object({
	signingSecret: z.string().min(16, 'signing secret must be at least 16 characters'),
	payloadSecret: z.string().min(16, 'payload secret must be at least 16 characters'),
	validityDays: z.coerce.number().int().positive().default(14),
	clockToleranceHours: z.coerce.number().positive().default(24),
	sessionTtlHours: z.coerce.number().positive().default(24),
	maxAccessCount: z.coerce.number().int().positive().default(1000),
	logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type SealkitConfigInput = z.input<typeof configSchema>;

export interface SealkitConfig extends z.output<typeof configSchema> {
	/** True when either secret fell back to its built-in placeholder. */
	usingPlaceholderSecrets: boolean;
}

/**
 * Environment variable for each configuration key.
 */
export const CONFIG_ENV: Record<keyof SealkitConfigInput, string> = {
	signingSecret: 'SEALKIT_SIGNING_SECRET',
	payloadSecret: 'SEALKIT_PAYLOAD_SECRET',
	validityDays: 'SEALKIT_VALIDITY_DAYS',
	clockToleranceHours: 'SEALKIT_CLOCK_TOLERANCE_HOURS',
	sessionTtlHours: 'SEALKIT_SESSION_TTL_HOURS',
	maxAccessCount: 'SEALKIT_MAX_ACCESS_COUNT',
	logLevel: 'SEALKIT_LOG_LEVEL',
};

// ============================================================================
// Resolution
// ============================================================================

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
	const values: Record<string, string> = {};
	for (const [key, name] of Object.entries(CONFIG_ENV)) {
		const value = env[name];
		if (value !== undefined && value !== '') {
			values[key] = value;
		}
	}
	return values;
}

/**
 * Resolve configuration. Overrides win over the environment; anything unset
 * takes its default.
 *
 * @throws ConfigurationError when a value does not validate
 */
export function resolveConfig(
	overrides: Partial<SealkitConfigInput> = {},
	env: NodeJS.ProcessEnv = process.env
): SealkitConfig {
	const merged: Record<string, unknown> = { ...fromEnv(env) };
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) merged[key] = value;
	}

	const usingPlaceholderSecrets = merged.signingSecret === undefined || merged.payloadSecret === undefined;
	merged.signingSecret ??= PLACEHOLDER_SIGNING_SECRET;
	merged.payloadSecret ??= PLACEHOLDER_PAYLOAD_SECRET;

	const parsed = configSchema.safeParse(merged);
	if (!parsed.success) {
		throw new ConfigurationError(
			parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
		);
	}

	return { ...parsed.data, usingPlaceholderSecrets };
}
