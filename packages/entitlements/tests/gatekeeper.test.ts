import { describe, expect, test } from 'vitest';
import { resolveConfig } from '@sealkit/core';
import { createGatekeeper } from '../src/gatekeeper.js';
import { serializeEntitlement } from '../src/record.js';
import {
	captureLogs,
	DAY,
	HOUR,
	PAYLOAD_SECRET,
	quietLogger,
	sealedPayload,
	SIGNING_SECRET,
	signedRecord,
	T0,
	testClock,
} from './fixtures.js';

function setup(overrides: { maxAccessCount?: number } = {}) {
	const clock = testClock(new Date(T0.getTime() + HOUR));
	const config = resolveConfig({ signingSecret: SIGNING_SECRET, payloadSecret: PAYLOAD_SECRET, ...overrides }, {});
	const gatekeeper = createGatekeeper({
		payload: sealedPayload(),
		config,
		logger: quietLogger,
		clock: clock.now,
		reference: clock.reference,
	});
	return { clock, gatekeeper };
}

describe('Gatekeeper', () => {
	test('activates and answers feature queries', async () => {
		const { gatekeeper } = setup();
		const result = await gatekeeper.activate(serializeEntitlement(signedRecord()));

		expect(result.ok).toBe(true);
		expect(gatekeeper.isFeatureAvailable('cust-1', 'module_extraction')).toBe(true);
		expect(gatekeeper.isFeatureAvailable('cust-1', 'flow_extraction')).toBe(false);
		expect(gatekeeper.listFeatures('cust-1')).toEqual(['module_extraction', 'step_extraction']);
	});

	test('exposes the rule set for an activated identity', async () => {
		const { gatekeeper } = setup();
		await gatekeeper.activate(serializeEntitlement(signedRecord()));

		const result = gatekeeper.getRuleSet('cust-1');
		expect(result.ok && result.view.categories()).toEqual(['module', 'step']);
	});

	test('applies the configured access cap', async () => {
		const { gatekeeper } = setup({ maxAccessCount: 2 });
		await gatekeeper.activate(serializeEntitlement(signedRecord()));

		const answers = [1, 2, 3].map(() => gatekeeper.isFeatureAvailable('cust-1', 'module_extraction'));

		expect(answers).toEqual([true, true, false]);
		expect(gatekeeper.diagnose('cust-1')?.remainingAccesses).toBe(0);
	});

	test('rejections do not reveal which check failed', async () => {
		const clock = testClock(new Date(T0.getTime() + HOUR));
		let skew = 0;
		const gatekeeper = createGatekeeper({
			payload: sealedPayload(),
			config: resolveConfig({ signingSecret: SIGNING_SECRET, payloadSecret: PAYLOAD_SECRET }, {}),
			logger: quietLogger,
			clock: clock.now,
			reference: { now: () => new Date(clock.now().getTime() + skew) },
		});
		const widened = serializeEntitlement({
			...signedRecord(),
			features: new Set(['module_extraction', 'step_extraction', 'flow_extraction']),
		});

		const kinds: string[] = [];
		const operatorKinds: (string | undefined)[] = [];
		async function attempt(input: string) {
			const result = await gatekeeper.activate(input);
			kinds.push(result.ok ? 'ok' : result.error.kind);
			operatorKinds.push(gatekeeper.lastFailure('cust-1')?.kind);
		}

		await attempt(widened);
		skew = 3 * DAY;
		await attempt(serializeEntitlement(signedRecord()));
		skew = 0;
		clock.set(new Date(T0.getTime() + 20 * DAY));
		await attempt(serializeEntitlement(signedRecord()));

		expect(kinds).toEqual(['ActivationFailed', 'ActivationFailed', 'ActivationFailed']);
		expect(operatorKinds).toEqual(['SignatureMismatch', 'ClockIntegrityFailure', 'ExpiredEntitlement']);
	});

	test('teardown and shutdown end sessions', async () => {
		const { gatekeeper } = setup();
		const result = await gatekeeper.activate(serializeEntitlement(signedRecord()));
		if (!result.ok) throw result.error;

		expect(gatekeeper.isLive(result.handle)).toBe(true);
		expect(gatekeeper.teardown(result.handle)).toBe(true);
		expect(gatekeeper.isLive(result.handle)).toBe(false);

		const again = await gatekeeper.activate(serializeEntitlement(signedRecord()));
		if (!again.ok) throw again.error;
		gatekeeper.shutdown();

		expect(gatekeeper.isLive(again.handle)).toBe(false);
		expect(gatekeeper.diagnose('cust-1')).toBeNull();
	});

	test('warns when running on placeholder secrets', () => {
		const { entries, logger } = captureLogs();

		createGatekeeper({ payload: sealedPayload(), config: resolveConfig({}, {}), logger });

		expect(entries).toHaveLength(1);
		expect(entries[0]).toMatchObject({
			level: 'warn',
			message: 'using placeholder secrets; set SEALKIT_SIGNING_SECRET and SEALKIT_PAYLOAD_SECRET',
		});
	});

	test('placeholder secrets do not verify records signed for a deployment', async () => {
		const clock = testClock(new Date(T0.getTime() + HOUR));
		const gatekeeper = createGatekeeper({
			payload: sealedPayload(),
			config: resolveConfig({}, {}),
			logger: quietLogger,
			clock: clock.now,
			reference: clock.reference,
		});

		const result = await gatekeeper.activate(serializeEntitlement(signedRecord()));

		expect(result.ok ? null : result.error.kind).toBe('ActivationFailed');
		expect(gatekeeper.lastFailure('cust-1')?.kind).toBe('SignatureMismatch');
		expect(gatekeeper.isFeatureAvailable('cust-1', 'module_extraction')).toBe(false);
	});

	test('reads secrets from the environment', async () => {
		const clock = testClock(new Date(T0.getTime() + HOUR));
		const gatekeeper = createGatekeeper({
			payload: sealedPayload(),
			config: resolveConfig(
				{},
				{ SEALKIT_SIGNING_SECRET: SIGNING_SECRET, SEALKIT_PAYLOAD_SECRET: PAYLOAD_SECRET }
			),
			logger: quietLogger,
			clock: clock.now,
			reference: clock.reference,
		});

		const result = await gatekeeper.activate(serializeEntitlement(signedRecord()));
		expect(result.ok).toBe(true);
	});
});
