/**
 * Logger contract: destinations for processor log entries.
 *
 * Every entry carries a phase; each phase has a fixed severity so that
 * destinations can filter without knowing the processor's internals.
 */

import type { LogEntry, LogPhase } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const PHASE_LEVELS: Record<LogPhase, LogLevel> = {
	'processor.start': 'info',
	'processor.stop': 'info',
	'bind.error': 'error',
	'statement.error': 'warn',
	'guard.error': 'warn',
	'batch.complete': 'debug',
	'batch.partial_failure': 'warn',
	'batch.rejected': 'error',
};

/** Severity of a phase. Unknown phases count as info. */
export function phaseLevel(phase: LogPhase): LogLevel {
	return PHASE_LEVELS[phase] ?? 'info';
}

export function isLogLevel(value: unknown): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * A log destination.
 *
 * `log` must not throw: a destination that fails swallows its own error
 * so statement processing is never interrupted by logging.
 */
export interface Logger {
	readonly id: string;

	init(config: Record<string, unknown>): Promise<void>;

	log(entry: LogEntry): Promise<void>;

	/** Flush buffered entries */
	flush(): Promise<void>;

	/** Flush and release resources */
	shutdown(): Promise<void>;
}

/** What a logger package exports from `register()` */
export interface LoggerRegistration {
	id: string;
	logger: new () => Logger;
	/** JSON Schema describing the logger's config block */
	configSchema?: Record<string, unknown>;
}
