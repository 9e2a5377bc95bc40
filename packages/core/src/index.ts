/**
 * SealKit Core
 *
 * Shared primitives for SealKit packages.
 * All intervals are half-open: [start, end)
 */

/**
 * A half-open interval [start, end).
 * All times are UTC internally.
 */
export interface Interval {
	start: Date;
	end: Date;
}

/**
 * Duration in milliseconds.
 */
export type DurationMs = number;

export {
	EntitlementError,
	ConfigurationError,
	callerKind,
	type EntitlementErrorKind,
	type ValidationFailureKind,
} from './errors.js';

export {
	createLogger,
	consoleSink,
	silentSink,
	LOG_LEVELS,
	type Logger,
	type LoggerOptions,
	type LogEntry,
	type LogFields,
	type LogLevel,
	type LogSink,
} from './logger.js';

export {
	resolveConfig,
	CONFIG_ENV,
	type SealkitConfig,
	type SealkitConfigInput,
} from './config.js';

export { createKeyedLock, type KeyedLock } from './lock.js';
