import { describe, expect, test, vi } from 'vitest';
import { acceptAnyEnvironment, allEnvironments, rejectInspector } from '../src/environment.js';
import { signedRecord } from './fixtures.js';

const record = signedRecord();

describe('Environment Probes', () => {
	test('acceptAnyEnvironment accepts', () => {
		expect(acceptAnyEnvironment(record)).toBe(true);
	});

	describe('rejectInspector', () => {
		test('accepts a plain process', () => {
			const probe = rejectInspector({ execArgv: ['--enable-source-maps'], env: {} });
			expect(probe(record)).toBe(true);
		});

		test.each([['--inspect'], ['--inspect=9229'], ['--inspect-brk'], ['--inspect-wait=0.0.0.0:9229']])(
			'rejects %s',
			(flag) => {
				const probe = rejectInspector({ execArgv: [flag], env: {} });
				expect(probe(record)).toBe(false);
			}
		);

		test('rejects an inspector requested through NODE_OPTIONS', () => {
			const probe = rejectInspector({ execArgv: [], env: { NODE_OPTIONS: '--max-old-space-size=512 --inspect' } });
			expect(probe(record)).toBe(false);
		});

		test('does not match unrelated flags that share the prefix', () => {
			const probe = rejectInspector({ execArgv: ['--inspector-port-hint'], env: {} });
			expect(probe(record)).toBe(true);
		});
	});

	describe('allEnvironments', () => {
		test('passes when every probe passes', async () => {
			const probe = allEnvironments(
				() => true,
				async () => true
			);
			expect(await probe(record)).toBe(true);
		});

		test('stops at the first rejection', async () => {
			const last = vi.fn(() => true);
			const probe = allEnvironments(() => true, async () => false, last);

			expect(await probe(record)).toBe(false);
			expect(last).not.toHaveBeenCalled();
		});

		test('passes the record to each probe', async () => {
			const seen = vi.fn((_record: typeof record) => true);
			await allEnvironments(seen)(record);

			expect(seen).toHaveBeenCalledWith(record);
		});
	});
});
