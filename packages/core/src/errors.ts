/**
 * Error taxonomy.
 *
 * BindError is raised only while statements are bound. The other three are
 * runtime errors: the evaluator records them against the current record and
 * moves on to the next statement.
 */

import type { BatchReport } from '@telemorph/sdk';

export type ErrorKind = 'bind' | 'path_not_found' | 'type_mismatch' | 'function_execution';

export class TelemorphError extends Error {
	readonly kind: ErrorKind;

	constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
		super(message, options);
		this.kind = kind;
		this.name = new.target.name;
	}
}

/** Configuration-time failure: unknown function, bad arity, bad path or literal */
export class BindError extends TelemorphError {
	constructor(message: string, options?: ErrorOptions) {
		super('bind', message, options);
	}
}

/** A selector pointed outside the record's data (e.g. slice index out of range) */
export class PathNotFoundError extends TelemorphError {
	readonly path: string;

	constructor(path: string, message: string, options?: ErrorOptions) {
		super('path_not_found', `${path}: ${message}`, options);
		this.path = path;
	}
}

/** A value's type is not accepted where it was used */
export class TypeMismatchError extends TelemorphError {
	readonly expected: string;
	readonly actual: string;

	constructor(expected: string, actual: string, where: string) {
		super('type_mismatch', `${where}: expected ${expected}, got ${actual}`);
		this.expected = expected;
		this.actual = actual;
	}
}

/** Wraps a function's own domain error */
export class FunctionExecutionError extends TelemorphError {
	readonly functionName: string;

	constructor(functionName: string, message: string, options?: ErrorOptions) {
		super('function_execution', `${functionName}: ${message}`, options);
		this.functionName = functionName;
	}
}

/** Thrown by a processor in `propagate` mode once a batch had failures */
export class PartialFailureError extends Error {
	readonly report: BatchReport;

	constructor(report: BatchReport, options?: ErrorOptions) {
		super(
			`${report.failedRecords} of ${report.totalRecords} records had failing statements`,
			options,
		);
		this.name = 'PartialFailureError';
		this.report = report;
	}

	get totalRecords(): number {
		return this.report.totalRecords;
	}

	get failedRecords(): number {
		return this.report.failedRecords;
	}
}

export function isTelemorphError(err: unknown): err is TelemorphError {
	return err instanceof TelemorphError;
}

/** Normalise anything thrown into an Error */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
