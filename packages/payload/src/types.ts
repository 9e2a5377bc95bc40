/**
 * Core type definitions for the payload unlock engine.
 */

// ============================================================================
// Rule Set
// ============================================================================

/**
 * The decrypted configuration that parameterizes protected functionality.
 * Owned by exactly one session and wiped when that session ends.
 */
export interface RuleSet {
	/** Category (e.g. "module", "step") to patterns; order is significant for tie-breaks. */
	patterns: Map<string, string[]>;
	/** Prompt-type name to template text. */
	prompts: Map<string, string>;
	/** Category name to a score in [0, 1]. */
	confidenceThresholds: Map<string, number>;
}

/**
 * JSON shape of the plaintext inside the encrypted blob.
 */
export interface RuleSetDocument {
	patterns: Record<string, string[]>;
	prompts: Record<string, string>;
	confidence_thresholds: Record<string, number>;
}

// ============================================================================
// View Types
// ============================================================================

/**
 * Read-only access to a session's rule set for downstream collaborators.
 * Every read throws `SessionExpired` once the owning session is gone.
 */
export interface RuleSetView {
	/** Per-identity marker for stamping extraction output. */
	readonly watermark: string;
	categories(): string[];
	patterns(category: string): readonly string[];
	prompt(name: string): string | undefined;
	promptNames(): string[];
	threshold(category: string): number | undefined;
}

// ============================================================================
// Key Types
// ============================================================================

/**
 * A deployment secret as text or raw bytes.
 */
export type Secret = string | Uint8Array;
