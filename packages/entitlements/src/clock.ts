/**
 * Clock integrity: compare the local clock against an independent reference so
 * that rolling the system clock back does not undo an expiration.
 */

import { durationToMs } from './time.js';
import type { Clock, Duration, ReferenceClock } from './types.js';

/** Default maximum divergence between the local and reference clocks. */
export const DEFAULT_CLOCK_TOLERANCE: Duration = { hours: 24 };

/**
 * Passes iff a reference reading exists and the two clocks differ by less than
 * the tolerance. A missing reference fails.
 */
export function checkClockIntegrity(
	local: Date,
	reference: Date | null,
	tolerance: Duration = DEFAULT_CLOCK_TOLERANCE
): boolean {
	if (reference === null) {
		return false;
	}
	const drift = Math.abs(local.getTime() - reference.getTime());
	if (Number.isNaN(drift)) {
		return false;
	}
	return drift < durationToMs(tolerance);
}

// ============================================================================
// Reference Clocks
// ============================================================================

/**
 * Wall time captured once, advanced by a monotonic timer. Later changes to the
 * system clock do not move it. The timer stops while the host is suspended,
 * after which an honest wall clock reads ahead of it.
 */
export function createMonotonicReferenceClock(
	options: { origin?: Date; elapsed?: () => number } = {}
): ReferenceClock {
	const elapsed = options.elapsed ?? (() => performance.now());
	const originWall = (options.origin ?? new Date()).getTime();
	const originElapsed = elapsed();

	return {
		now: () => new Date(originWall + (elapsed() - originElapsed)),
	};
}

export interface HighWaterMarkClock extends ReferenceClock {
	/** Record a trusted reading; the mark only moves forward. */
	observe(at: Date): void;
	/** Latest reading, for the host to persist and seed the next run with. */
	mark(): Date | null;
}

/**
 * The latest time observed so far, seeded from a value the host persisted on
 * a previous run. A local clock set back behind the mark diverges from it.
 */
export function createHighWaterMarkClock(options: { seed?: Date; clock?: Clock } = {}): HighWaterMarkClock {
	const clock = options.clock ?? (() => new Date());
	let highest: number | null = options.seed ? options.seed.getTime() : null;

	function observe(at: Date): void {
		const time = at.getTime();
		if (Number.isNaN(time)) return;
		if (highest === null || time > highest) {
			highest = time;
		}
	}

	return {
		observe,
		mark: () => (highest === null ? null : new Date(highest)),
		now() {
			observe(clock());
			return highest === null ? null : new Date(highest);
		},
	};
}

/**
 * A reference that always reads the given time.
 */
export function fixedReferenceClock(at: Date): ReferenceClock {
	return { now: () => new Date(at.getTime()) };
}

/**
 * A reference that can never be obtained; every clock check fails against it.
 */
export const unavailableReferenceClock: ReferenceClock = {
	now: () => null,
};
