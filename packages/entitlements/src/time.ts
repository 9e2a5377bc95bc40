/**
 * Time primitives for validity windows.
 */

import { addMilliseconds, differenceInDays, isBefore } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import type { Duration, EntitlementRecord, Interval } from './types.js';

// ============================================================================
// Duration Helpers
// ============================================================================

/**
 * Convert a Duration to milliseconds.
 */
export function durationToMs(duration: Duration): number {
	if (typeof duration === 'number') {
		return duration;
	}

	let ms = 0;
	if (duration.hours) ms += duration.hours * 60 * 60 * 1000;
	if (duration.days) ms += duration.days * 24 * 60 * 60 * 1000;
	if (duration.weeks) ms += duration.weeks * 7 * 24 * 60 * 60 * 1000;

	return ms;
}

// ============================================================================
// Validity Windows
// ============================================================================

/** Default validity window measured from the anchor. */
export const DEFAULT_VALIDITY: Duration = { days: 14 };

/**
 * The authoritative expiration: anchor plus the validity window. A record's
 * own `expiresAt` never enters this.
 */
export function authoritativeExpiration(anchor: Date, window: Duration = DEFAULT_VALIDITY): Date {
	return addMilliseconds(anchor, durationToMs(window));
}

/**
 * The half-open interval [anchor, anchor + window) in which a record is usable.
 */
export function validityInterval(record: EntitlementRecord, window: Duration = DEFAULT_VALIDITY): Interval {
	return {
		start: record.anchorTimestamp,
		end: authoritativeExpiration(record.anchorTimestamp, window),
	};
}

/**
 * Whole days left before authoritative expiration; 0 once expired.
 */
export function daysRemaining(
	record: EntitlementRecord,
	at: Date = new Date(),
	window: Duration = DEFAULT_VALIDITY
): number {
	const expiration = authoritativeExpiration(record.anchorTimestamp, window);
	if (!isBefore(at, expiration)) {
		return 0;
	}
	return differenceInDays(expiration, at);
}

/**
 * Human-readable authoritative expiration for operator output.
 *
 * @example
 * describeExpiration(new Date('2024-12-13T20:57:36Z'), { days: 14 })
 * // => '2024-12-27 20:57 UTC'
 */
export function describeExpiration(
	anchor: Date,
	window: Duration = DEFAULT_VALIDITY,
	timezone = 'UTC'
): string {
	const expiration = authoritativeExpiration(anchor, window);
	return `${formatInTimeZone(expiration, timezone, 'yyyy-MM-dd HH:mm')} ${timezone}`;
}
