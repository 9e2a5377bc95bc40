import { describe, expect, test } from 'vitest';
import { callerKind, ConfigurationError, EntitlementError } from '../src/errors.js';

describe('EntitlementError', () => {
	test('activation failures carry a generic message', () => {
		const error = new EntitlementError('ActivationFailed');

		expect(error.message).toBe('Entitlement activation failed');
		expect(error.kind).toBe('ActivationFailed');
	});

	test('is an Error with its own name', () => {
		const error = new EntitlementError('NotActivated');

		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe('EntitlementError');
		expect(error.message).toBe('No active session for this identity');
	});

	test('keeps a cause', () => {
		const cause = new Error('aes/gcm: invalid ghash tag');
		const error = new EntitlementError('DecryptionFailed', { cause });

		expect(error.cause).toBe(cause);
		expect(error.message).toBe('Protected configuration could not be unlocked');
	});

	test('callerKind collapses every layer failure past the structural check', () => {
		expect(callerKind('ExpiredEntitlement')).toBe('ActivationFailed');
		expect(callerKind('InvalidAnchor')).toBe('ActivationFailed');
		expect(callerKind('ClockIntegrityFailure')).toBe('ActivationFailed');
		expect(callerKind('SignatureMismatch')).toBe('ActivationFailed');
		expect(callerKind('EnvironmentRejected')).toBe('ActivationFailed');
		expect(callerKind('MalformedRecord')).toBe('MalformedRecord');
	});
});

describe('ConfigurationError', () => {
	test('lists every issue', () => {
		const error = new ConfigurationError(['signingSecret: too short', 'logLevel: invalid']);

		expect(error.issues).toEqual(['signingSecret: too short', 'logLevel: invalid']);
		expect(error.message).toBe('Invalid SealKit configuration: signingSecret: too short; logLevel: invalid');
	});
});
