/**
 * Per-session access cap.
 */

/**
 * Outcome of counting one more access against a cap.
 */
export interface CapCheck {
	allowed: boolean;
	/** Accesses left once this one is counted; 0 when denied. */
	remaining: number;
}

/**
 * Check whether one more access fits under the cap.
 *
 * @param input.cap - Maximum accesses per session
 * @param input.used - Accesses counted before this one
 */
export function checkCap(input: { cap: number; used: number }): CapCheck {
	const { cap, used } = input;

	if (used >= cap) {
		return { allowed: false, remaining: 0 };
	}

	return { allowed: true, remaining: cap - used - 1 };
}

/**
 * Accesses still available under the cap.
 */
export function remainingAccesses(cap: number, used: number): number {
	return Math.max(0, cap - used);
}

/**
 * Advance a counter by one, saturating at the cap.
 */
export function incrementCapped(count: number, cap: number): number {
	return Math.min(count + 1, cap);
}
