/**
 * Structured JSON logger.
 *
 * Each entry is one JSON object per line:
 *   {"timestamp":"2025-01-15T12:00:00.000Z","level":"warn","service":"sealkit","message":"...","layer":"clock"}
 *
 * Activation diagnostics (which validation layer failed, and why) are only
 * ever written here, never returned to feature-gate callers.
 */

// ============================================================================
// Log Levels
// ============================================================================

export const LOG_LEVELS = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

// ============================================================================
// Types
// ============================================================================

export type LogFields = Record<string, unknown>;

export interface LogEntry extends LogFields {
	timestamp: string;
	level: LogLevel;
	service: string;
	message: string;
}

/**
 * Receives every entry at or above the configured level.
 */
export type LogSink = (entry: LogEntry) => void;

export interface Logger {
	debug(message: string, fields?: LogFields): void;
	info(message: string, fields?: LogFields): void;
	warn(message: string, fields?: LogFields): void;
	error(message: string, fields?: LogFields): void;
	/** A logger that adds `fields` to every entry. */
	child(fields: LogFields): Logger;
}

export interface LoggerOptions {
	level?: LogLevel;
	service?: string;
	sink?: LogSink;
	now?: () => Date;
}

// ============================================================================
// Sinks
// ============================================================================

function serializeField(value: unknown): unknown {
	if (value instanceof Error) {
		return { name: value.name, message: value.message };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	return value;
}

/**
 * Writes JSON lines to stdout, errors to stderr.
 */
export const consoleSink: LogSink = (entry) => {
	const line = JSON.stringify(entry, (_key, value: unknown) => serializeField(value));
	if (entry.level === 'error') {
		console.error(line);
	} else {
		console.log(line);
	}
};

/**
 * Discards everything.
 */
export const silentSink: LogSink = () => {};

// ============================================================================
// Logger
// ============================================================================

export function createLogger(options: LoggerOptions = {}): Logger {
	const { level = 'info', service = 'sealkit', sink = consoleSink, now = () => new Date() } = options;
	return build({}, level, service, sink, now);
}

function build(
	bound: LogFields,
	level: LogLevel,
	service: string,
	sink: LogSink,
	now: () => Date
): Logger {
	function write(entryLevel: LogLevel, message: string, fields?: LogFields): void {
		if (LOG_LEVELS[entryLevel] < LOG_LEVELS[level]) return;

		const entry: LogEntry = {
			...bound,
			...fields,
			timestamp: now().toISOString(),
			level: entryLevel,
			service,
			message,
		};
		sink(entry);
	}

	return {
		debug: (message, fields) => write('debug', message, fields),
		info: (message, fields) => write('info', message, fields),
		warn: (message, fields) => write('warn', message, fields),
		error: (message, fields) => write('error', message, fields),
		child: (fields) => build({ ...bound, ...fields }, level, service, sink, now),
	};
}
