/**
 * Shared types for signals, context kinds and the structured log entry.
 */

/** The three telemetry signals a batch can carry */
export type Signal = 'traces' | 'metrics' | 'logs';

/** Record kinds statements can be bound to */
export type ContextKind = 'resource' | 'span' | 'log' | 'datapoint';

/** Pipeline phases a log entry can describe */
export type LogPhase =
	| 'processor.start'
	| 'processor.stop'
	| 'bind.error'
	| 'statement.error'
	| 'guard.error'
	| 'batch.complete'
	| 'batch.partial_failure'
	| 'batch.rejected';

/** Structured log entry handed to every registered logger */
export interface LogEntry {
	/** ISO 8601 */
	timestamp: string;
	phase: LogPhase;
	/** Processor instance name */
	processor?: string;
	signal?: Signal;
	context?: ContextKind;
	/** Rendered statement the entry concerns */
	statement?: string;
	/** Position of the record within its batch */
	record_index?: number;
	error?: string;
	/** Error class name, e.g. TypeMismatchError */
	error_kind?: string;
	total_records?: number;
	failed_records?: number;
	duration_ms?: number;
	metadata?: Record<string, unknown>;
}
