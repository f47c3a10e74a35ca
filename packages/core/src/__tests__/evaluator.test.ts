import { type LogRecord, createResource, createScope, createTestLogRecord } from '@telemorph/sdk';
import { describe, expect, it } from 'vitest';
import { type StatementNode, ast } from '../ast.js';
import { StatementBinder } from '../binder.js';
import { LogContext, logContext } from '../contexts/index.js';
import { FunctionExecutionError, PartialFailureError, TypeMismatchError } from '../errors.js';
import { BatchReportBuilder, type RecordOutcome, evaluateStatements } from '../evaluator.js';
import { standardFunctions } from '../functions/index.js';
import { type FunctionFactory, FunctionRegistry } from '../registry.js';

const { call, path, statement } = ast;

/** Editor that always fails with a plain Error */
const explode: FunctionFactory<LogContext> = {
	name: 'explode',
	params: [],
	returns: 'empty',
	create: () => () => {
		throw new Error('boom');
	},
};

const binder = new StatementBinder(
	logContext,
	new FunctionRegistry([...standardFunctions<LogContext>(), explode]).seal(),
);

function run(record: LogRecord, ...nodes: StatementNode[]): RecordOutcome {
	return evaluateStatements(
		binder.bindStatements(nodes),
		new LogContext(record, createScope(), createResource()),
	);
}

const setLevelFromAttribute = statement(call('set', path('severity_text'), path('attributes', 'level')));

describe('evaluateStatements', () => {
	it('runs statements in declared order', () => {
		const record = createTestLogRecord();
		run(
			record,
			statement(call('set', path('attributes', 'a'), ast.string('1'))),
			statement(call('set', path('attributes', 'b'), path('attributes', 'a'))),
			statement(call('delete_key', path('attributes'), ast.string('a'))),
		);
		expect(record.attributes.toPlain()).toEqual({ b: '1' });
	});

	it('records a failure and continues with the next statement', () => {
		const record = createTestLogRecord({ attributes: { level: 3 } });
		const outcome = run(
			record,
			setLevelFromAttribute,
			statement(call('set', path('attributes', 'after'), ast.bool(true))),
		);

		expect(outcome.failures).toHaveLength(1);
		const [failure] = outcome.failures;
		expect(failure.statement).toBe('set(severity_text, attributes["level"])');
		expect(failure.stage).toBe('invoke');
		expect(failure.error).toBeInstanceOf(TypeMismatchError);
		expect(record.attributes.toPlain()).toEqual({ level: 3, after: true });
	});

	it('keeps earlier effects when a later statement fails', () => {
		const record = createTestLogRecord({ attributes: { level: 3 } });
		run(record, statement(call('set', path('attributes', 'before'), ast.int(1))), setLevelFromAttribute);
		expect(record.attributes.toPlain()).toEqual({ level: 3, before: 1 });
	});

	it('wraps foreign errors with the statement text', () => {
		const outcome = run(createTestLogRecord(), statement(call('explode')));
		const { error } = outcome.failures[0];
		expect(error).toBeInstanceOf(FunctionExecutionError);
		expect(error.kind).toBe('function_execution');
		expect(error.message).toBe('explode(): boom');
		expect(error.cause).toBeInstanceOf(Error);
	});

	it('counts statements skipped by their guard', () => {
		const record = createTestLogRecord({ severityNumber: 9 });
		const outcome = run(
			record,
			statement(
				call('set', path('attributes', 'alert'), ast.bool(true)),
				ast.compare(path('severity_number'), '>=', ast.int(17)),
			),
		);
		expect(outcome).toEqual({ failures: [], skipped: 1 });
		expect(record.attributes.size).toBe(0);
	});

	it('reports guard failures separately from invocations', () => {
		const record = createTestLogRecord({ attributes: { flag: 'yes' } });
		const outcome = run(
			record,
			statement(call('set', path('attributes', 'x'), ast.bool(true)), ast.test(path('attributes', 'flag'))),
		);
		expect(outcome.failures).toHaveLength(1);
		expect(outcome.failures[0].stage).toBe('guard');
		expect(outcome.failures[0].error.message).toBe('attributes["flag"]: expected bool, got string');
		expect(record.attributes.has('x')).toBe(false);
	});

	it('gives the same result when run twice on an idempotent set', () => {
		const node = statement(call('delete_key', path('attributes'), ast.string('token')));
		const record = createTestLogRecord({ attributes: { token: 'test-secret', user: 'u1' } });
		run(record, node);
		const after = record.attributes.clone();
		run(record, node);
		expect(record.attributes.equals(after)).toBe(true);
	});
});

// ─── Batch reports ───────────────────────────────────────────────────────────

describe('BatchReportBuilder', () => {
	it('reports exactly the failing record out of many', () => {
		const records = [
			createTestLogRecord({ attributes: { level: 'info' } }),
			createTestLogRecord({ attributes: { level: 3 } }),
			createTestLogRecord({ attributes: { level: 'warn' } }),
		];
		const builder = new BatchReportBuilder<LogRecord>();
		for (const record of records) builder.add(record, run(record, setLevelFromAttribute));

		const report = builder.build();
		expect(report.totalRecords).toBe(3);
		expect(report.failedRecords).toBe(1);
		expect(report.failures).toHaveLength(1);
		expect(report.failures[0].recordIndex).toBe(1);
		expect(builder.hasFailed(records[1])).toBe(true);
		expect(builder.hasFailed(records[0])).toBe(false);
		expect(records.map((r) => r.severityText)).toEqual(['info', 'INFO', 'warn']);
	});

	it('keeps one index per record across several outcomes', () => {
		const a = { id: 'a' };
		const b = { id: 'b' };
		const failing: RecordOutcome = {
			failures: [{ statement: 'explode()', stage: 'invoke', error: new FunctionExecutionError('explode()', 'boom') }],
			skipped: 0,
		};
		const builder = new BatchReportBuilder();

		expect(builder.add(a)).toBe(0);
		expect(builder.add(b, failing)).toBe(1);
		expect(builder.add(a, failing)).toBe(0);
		expect(builder.add(b, failing)).toBe(1);

		const report = builder.build();
		expect(report.totalRecords).toBe(2);
		expect(report.failedRecords).toBe(2);
		expect(report.failures.map((f) => f.recordIndex)).toEqual([1, 0, 1]);
	});

	it('feeds PartialFailureError', () => {
		const builder = new BatchReportBuilder();
		builder.add({});
		builder.add({}, {
			failures: [{ statement: 's', stage: 'guard', error: new TypeMismatchError('bool', 'string', 'g') }],
			skipped: 0,
		});
		const error = new PartialFailureError(builder.build());
		expect(error.message).toBe('1 of 2 records had failing statements');
		expect(error.totalRecords).toBe(2);
		expect(error.failedRecords).toBe(1);
		expect(error.name).toBe('PartialFailureError');
	});

	it('builds an empty report', () => {
		expect(new BatchReportBuilder().build()).toEqual({ totalRecords: 0, failedRecords: 0, failures: [] });
	});
});
