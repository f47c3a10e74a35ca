/**
 * Statement evaluator.
 *
 * Runs bound statements against one record in declared order. A failing
 * guard or invocation is recorded and the next statement runs; nothing is
 * rolled back. Errors that are not already part of the taxonomy are
 * wrapped in FunctionExecutionError with the original as `cause`.
 */

import type { BatchReport, RecordFailure } from '@telemorph/sdk';
import type { Statement } from './binder.js';
import { expectType } from './coercion.js';
import { FunctionExecutionError, type TelemorphError, isTelemorphError, toError } from './errors.js';

export interface StatementFailure {
	statement: string;
	stage: 'guard' | 'invoke';
	error: TelemorphError;
}

export interface RecordOutcome {
	failures: StatementFailure[];
	/** Statements whose guard evaluated to false */
	skipped: number;
}

function classify(err: unknown, statement: string): TelemorphError {
	if (isTelemorphError(err)) return err;
	const cause = toError(err);
	return new FunctionExecutionError(statement, cause.message, { cause });
}

/** Evaluate every statement against one context */
export function evaluateStatements<K>(
	statements: readonly Statement<K>[],
	ctx: K,
): RecordOutcome {
	const outcome: RecordOutcome = { failures: [], skipped: 0 };

	for (const statement of statements) {
		if (statement.condition) {
			let pass: boolean;
			try {
				pass = expectType(statement.condition.get(ctx), 'bool', statement.condition.text).value;
			} catch (err) {
				outcome.failures.push({
					statement: statement.text,
					stage: 'guard',
					error: classify(err, statement.text),
				});
				continue;
			}
			if (!pass) {
				outcome.skipped++;
				continue;
			}
		}

		try {
			statement.invoke(ctx);
		} catch (err) {
			outcome.failures.push({
				statement: statement.text,
				stage: 'invoke',
				error: classify(err, statement.text),
			});
		}
	}

	return outcome;
}

/**
 * Accumulates record outcomes into a batch report.
 *
 * Records are keyed by identity, so a record evaluated by several statement
 * groups keeps one index and counts once towards the failed total. Indices
 * follow first-seen order.
 */
export class BatchReportBuilder<R extends object = object> {
	private readonly indices = new Map<R, number>();
	private readonly failed = new Set<R>();
	private readonly failures: RecordFailure[] = [];

	/** Register a record, with the outcome of evaluating it if any */
	add(record: R, outcome?: RecordOutcome): number {
		let index = this.indices.get(record);
		if (index === undefined) {
			index = this.indices.size;
			this.indices.set(record, index);
		}
		if (outcome && outcome.failures.length > 0) {
			this.failed.add(record);
			for (const failure of outcome.failures) {
				this.failures.push({ recordIndex: index, ...failure });
			}
		}
		return index;
	}

	hasFailed(record: R): boolean {
		return this.failed.has(record);
	}

	build(): BatchReport {
		return {
			totalRecords: this.indices.size,
			failedRecords: this.failed.size,
			failures: [...this.failures],
		};
	}
}
