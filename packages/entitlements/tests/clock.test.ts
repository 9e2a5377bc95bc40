import { describe, expect, test } from 'vitest';
import {
	checkClockIntegrity,
	createHighWaterMarkClock,
	createMonotonicReferenceClock,
	fixedReferenceClock,
	unavailableReferenceClock,
} from '../src/clock.js';
import { HOUR, T0 } from './fixtures.js';

const at = (offset: number) => new Date(T0.getTime() + offset);

describe('Clock Integrity', () => {
	describe('checkClockIntegrity', () => {
		test('passes when clocks agree', () => {
			expect(checkClockIntegrity(T0, T0)).toBe(true);
		});

		test('passes just inside the 24-hour tolerance in either direction', () => {
			expect(checkClockIntegrity(at(24 * HOUR - 1), T0)).toBe(true);
			expect(checkClockIntegrity(at(-(24 * HOUR - 1)), T0)).toBe(true);
		});

		test('fails at and beyond the tolerance', () => {
			expect(checkClockIntegrity(at(24 * HOUR), T0)).toBe(false);
			expect(checkClockIntegrity(at(-30 * HOUR), T0)).toBe(false);
		});

		test('fails closed without a reference', () => {
			expect(checkClockIntegrity(T0, null)).toBe(false);
		});

		test('fails on an invalid date', () => {
			expect(checkClockIntegrity(new Date(Number.NaN), T0)).toBe(false);
		});

		test('honours a custom tolerance', () => {
			expect(checkClockIntegrity(at(2 * HOUR), T0, { hours: 1 })).toBe(false);
			expect(checkClockIntegrity(at(30 * 60 * 1000), T0, { hours: 1 })).toBe(true);
		});
	});

	describe('createMonotonicReferenceClock', () => {
		test('advances with elapsed time from its origin', () => {
			let elapsed = 500;
			const clock = createMonotonicReferenceClock({ origin: T0, elapsed: () => elapsed });

			expect(clock.now()).toEqual(T0);
			elapsed += 2 * HOUR;
			expect(clock.now()).toEqual(at(2 * HOUR));
		});

		test('exposes a rolled-back system clock', () => {
			let elapsed = 0;
			const reference = createMonotonicReferenceClock({ origin: T0, elapsed: () => elapsed });
			elapsed += HOUR;

			const rolledBack = at(-10 * 24 * HOUR);
			expect(checkClockIntegrity(rolledBack, reference.now())).toBe(false);
		});
	});

	describe('createHighWaterMarkClock', () => {
		test('tracks the latest reading', () => {
			let local = T0;
			const clock = createHighWaterMarkClock({ clock: () => local });

			expect(clock.now()).toEqual(T0);
			local = at(HOUR);
			expect(clock.now()).toEqual(at(HOUR));
			expect(clock.mark()).toEqual(at(HOUR));
		});

		test('follows a forward jump of the wall clock', () => {
			let local = T0;
			const clock = createHighWaterMarkClock({ clock: () => local });
			clock.now();

			local = at(25 * HOUR);
			expect(checkClockIntegrity(local, clock.now())).toBe(true);
		});

		test('does not move backwards', () => {
			let local = at(5 * HOUR);
			const clock = createHighWaterMarkClock({ clock: () => local });
			clock.now();

			local = T0;
			expect(clock.now()).toEqual(at(5 * HOUR));
		});

		test('a seed from a previous run catches a rollback', () => {
			const seed = at(3 * 24 * HOUR);
			const clock = createHighWaterMarkClock({ seed, clock: () => T0 });

			expect(checkClockIntegrity(T0, clock.now())).toBe(false);
		});

		test('observe only moves the mark forward', () => {
			const clock = createHighWaterMarkClock({ seed: T0, clock: () => T0 });
			clock.observe(at(-HOUR));
			expect(clock.mark()).toEqual(T0);
			clock.observe(at(HOUR));
			expect(clock.mark()).toEqual(at(HOUR));
		});
	});

	describe('fixed and unavailable references', () => {
		test('fixedReferenceClock always reads its time', () => {
			expect(fixedReferenceClock(T0).now()).toEqual(T0);
		});

		test('unavailableReferenceClock reads null', () => {
			expect(unavailableReferenceClock.now()).toBeNull();
		});
	});
});
