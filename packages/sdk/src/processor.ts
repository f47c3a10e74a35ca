/**
 * Processor interface: the contract for components that rewrite batches.
 *
 * A processor receives a whole batch of one signal, mutates it in place and
 * reports which records had failing statements.
 */

import type { Logs, Metrics, Traces } from './telemetry.js';

/** One failing statement on one record */
export interface RecordFailure {
	/** Position of the record in the batch walk order */
	recordIndex: number;
	/** Rendered statement that failed */
	statement: string;
	/** Whether the guard or the function body failed */
	stage: 'guard' | 'invoke';
	error: Error;
}

/** Per-batch partial-failure report */
export interface BatchReport {
	totalRecords: number;
	/** Records with at least one failing statement */
	failedRecords: number;
	failures: RecordFailure[];
}

export interface ProcessResult<T> {
	/** The same batch object, mutated in place (records may be dropped) */
	batch: T;
	report: BatchReport;
}

/**
 * Processor interface.
 *
 * `init` binds configuration and must reject on any configuration error so
 * that a bad statement never reaches the first record.
 */
export interface Processor {
	readonly id: string;

	init(config: Record<string, unknown>): Promise<void>;

	processTraces(batch: Traces): Promise<ProcessResult<Traces>>;

	processMetrics(batch: Metrics): Promise<ProcessResult<Metrics>>;

	processLogs(batch: Logs): Promise<ProcessResult<Logs>>;

	/** Stop accepting batches. A batch already being evaluated completes. */
	shutdown(): Promise<void>;
}

/**
 * Processor registration: what a processor package exports.
 */
export interface ProcessorRegistration {
	id: string;
	processor: new () => Processor;
	/** JSON Schema for config validation */
	configSchema?: Record<string, unknown>;
}

/** An empty report for a batch with `totalRecords` records */
export function emptyReport(totalRecords = 0): BatchReport {
	return { totalRecords, failedRecords: 0, failures: [] };
}
