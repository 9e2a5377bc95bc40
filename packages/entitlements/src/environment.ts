/**
 * Environment probes for the final validation layer.
 */

import type { EnvironmentProbe } from './types.js';

/**
 * Accepts every environment. The default when a deployment has no attestation.
 */
export const acceptAnyEnvironment: EnvironmentProbe = () => true;

const INSPECT_FLAG = /^--inspect(-brk|-wait)?(=|$)/;

/**
 * Rejects a process started with an inspector attached, via its own flags or
 * NODE_OPTIONS.
 */
export function rejectInspector(
	source: { execArgv?: readonly string[]; env?: NodeJS.ProcessEnv } = {}
): EnvironmentProbe {
	const execArgv = source.execArgv ?? process.execArgv;
	const env = source.env ?? process.env;

	return () => {
		const flags = [...execArgv, ...(env.NODE_OPTIONS ?? '').split(/\s+/).filter(Boolean)];
		return !flags.some((flag) => INSPECT_FLAG.test(flag));
	};
}

/**
 * Passes only when every probe passes. Probes run in order and stop at the
 * first rejection.
 */
export function allEnvironments(...probes: EnvironmentProbe[]): EnvironmentProbe {
	return async (record) => {
		for (const probe of probes) {
			if (!(await probe(record))) return false;
		}
		return true;
	};
}
