import {
	AttributeMap,
	type LogRecord,
	boolValue,
	createResource,
	createScope,
	createTestLogRecord,
	doubleValue,
	emptyValue,
	intValue,
	mapValue,
	stringValue,
	toPlain,
} from '@telemorph/sdk';
import { describe, expect, it } from 'vitest';
import { type StatementNode, ast } from '../ast.js';
import { StatementBinder } from '../binder.js';
import { LogContext, logContext } from '../contexts/index.js';
import { TypeMismatchError } from '../errors.js';
import { type RecordOutcome, evaluateStatements } from '../evaluator.js';
import { standardFunctions, toInt } from '../functions/index.js';
import { FunctionRegistry } from '../registry.js';

const { call, path, statement } = ast;

const binder = new StatementBinder(logContext, new FunctionRegistry(standardFunctions<LogContext>()).seal());

function run(record: LogRecord, ...nodes: StatementNode[]): RecordOutcome {
	const ctx = new LogContext(record, createScope(), createResource());
	return evaluateStatements(binder.bindStatements(nodes), ctx);
}

// ─── delete_key ──────────────────────────────────────────────────────────────

describe('delete_key', () => {
	const del = (key: string) => statement(call('delete_key', path('attributes'), ast.string(key)));

	it('removes the key and keeps the others in order', () => {
		const record = createTestLogRecord({ attributes: { a: 1, secret: 'x', b: 2 } });
		const outcome = run(record, del('secret'));
		expect(outcome.failures).toEqual([]);
		expect(record.attributes.keys()).toEqual(['a', 'b']);
	});

	it('leaves the map alone when the key is absent', () => {
		const record = createTestLogRecord({ attributes: { a: 1 } });
		run(record, del('missing'));
		expect(record.attributes.toPlain()).toEqual({ a: 1 });
	});

	it('is idempotent', () => {
		const once = createTestLogRecord({ attributes: { a: 1, b: 2 } });
		const twice = createTestLogRecord({ attributes: { a: 1, b: 2 } });
		run(once, del('a'));
		run(twice, del('a'), del('a'));
		expect(twice.attributes.equals(once.attributes)).toBe(true);
	});

	it('does nothing to a target that is not a map', () => {
		const record = createTestLogRecord({ body: stringValue('plain') });
		const outcome = run(record, statement(call('delete_key', path('body'), ast.string('k'))));
		expect(outcome.failures).toEqual([]);
		expect(record.body).toEqual(stringValue('plain'));
	});

	it('passes a target resolution error through unchanged', () => {
		const record = createTestLogRecord({ body: mapValue(AttributeMap.from({ k: 'v' })) });
		const outcome = run(record, statement(call('delete_key', path('body', 0), ast.string('k'))));

		expect(outcome.failures).toHaveLength(1);
		const [failure] = outcome.failures;
		expect(failure.statement).toBe('delete_key(body[0], "k")');
		expect(failure.stage).toBe('invoke');
		expect(failure.error).toBeInstanceOf(TypeMismatchError);
		expect(failure.error.message).toBe('body[0]: expected slice, got map');
		expect(toPlain(record.body)).toEqual({ k: 'v' });
	});

	it('edits nested maps in place', () => {
		const record = createTestLogRecord({ body: mapValue(AttributeMap.from({ user: { id: 7, email: 'a@b' } })) });
		run(record, statement(call('delete_key', path('body', 'user'), ast.string('email'))));
		expect(toPlain(record.body)).toEqual({ user: { id: 7 } });
	});
});

// ─── Other map editors ───────────────────────────────────────────────────────

describe('map editors', () => {
	it('delete_matching_keys removes every matching key', () => {
		const record = createTestLogRecord({ attributes: { 'http.method': 'GET', 'http.url': '/', 'net.port': 80 } });
		run(record, statement(call('delete_matching_keys', path('attributes'), ast.string('^http\\.'))));
		expect(record.attributes.keys()).toEqual(['net.port']);
	});

	it('keep_keys keeps only the listed keys', () => {
		const record = createTestLogRecord({ attributes: { a: 1, b: 2, c: 3 } });
		run(record, statement(call('keep_keys', path('attributes'), ast.list(ast.string('c'), ast.string('a')))));
		expect(record.attributes.keys()).toEqual(['a', 'c']);
	});

	it('truncate_all shortens string values only', () => {
		const record = createTestLogRecord({ attributes: { s: 'abcdef', n: 12345, t: 'ab' } });
		run(record, statement(call('truncate_all', path('attributes'), ast.int(3))));
		expect(record.attributes.toPlain()).toEqual({ s: 'abc', n: 12345, t: 'ab' });
	});

	it('truncate_all counts characters, not UTF-16 units', () => {
		const record = createTestLogRecord({ attributes: { e: 'a😀b', f: '😀😀' } });
		run(record, statement(call('truncate_all', path('attributes'), ast.int(2))));
		expect(record.attributes.toPlain()).toEqual({ e: 'a😀', f: '😀😀' });
	});

	it('truncate_all rejects a negative limit at bind time', () => {
		expect(() => binder.bindStatement(statement(call('truncate_all', path('attributes'), ast.int(-1))))).toThrow(
			/truncate_all: limit must be non-negative, got -1$/,
		);
	});

	it('limit keeps priority keys first, then insertion order', () => {
		const record = createTestLogRecord({ attributes: { a: 1, b: 2, c: 3, d: 4 } });
		run(record, statement(call('limit', path('attributes'), ast.int(2), ast.list(ast.string('c')))));
		expect(record.attributes.keys()).toEqual(['a', 'c']);
	});

	it('limit leaves small maps untouched', () => {
		const record = createTestLogRecord({ attributes: { a: 1 } });
		run(record, statement(call('limit', path('attributes'), ast.int(5))));
		expect(record.attributes.keys()).toEqual(['a']);
	});

	it('limit rejects more priority keys than room', () => {
		expect(() =>
			binder.bindStatement(
				statement(call('limit', path('attributes'), ast.int(1), ast.list(ast.string('a'), ast.string('b')))),
			),
		).toThrow(/limit: 2 priority keys do not fit in a limit of 1$/);
	});
});

// ─── set ─────────────────────────────────────────────────────────────────────

describe('set', () => {
	it('stores a copy that later edits of the source do not reach', () => {
		const record = createTestLogRecord({ attributes: { orig: { k: 'v' } } });
		run(record, statement(call('set', path('attributes', 'copy'), path('attributes', 'orig'))));

		const orig = record.attributes.get('orig');
		if (orig?.type !== 'map') throw new Error('expected a map');
		orig.value.putString('k', 'changed');
		expect(record.attributes.toPlain()).toEqual({ orig: { k: 'changed' }, copy: { k: 'v' } });
	});

	it('skips nil writes into the body', () => {
		const record = createTestLogRecord({ body: stringValue('kept') });
		const outcome = run(record, statement(call('set', path('body'), ast.nil())));
		expect(outcome.failures).toEqual([]);
		expect(record.body).toEqual(stringValue('kept'));
	});

	it('reports a runtime type mismatch', () => {
		const record = createTestLogRecord({ attributes: { level: 3 } });
		const outcome = run(record, statement(call('set', path('severity_text'), path('attributes', 'level'))));
		expect(outcome.failures).toHaveLength(1);
		expect(outcome.failures[0].error.message).toBe('severity_text: expected string, got int');
		expect(record.severityText).toBe('INFO');
	});
});

// ─── Strings and converters ──────────────────────────────────────────────────

describe('string functions', () => {
	it('replace_pattern rewrites every match', () => {
		const record = createTestLogRecord({ attributes: { url: '/a?token=abc123&b=1&token=zz' } });
		run(
			record,
			statement(
				call('replace_pattern', path('attributes', 'url'), ast.string('token=\\w+'), ast.string('token=***')),
			),
		);
		expect(record.attributes.get('url')).toEqual(stringValue('/a?token=***&b=1&token=***'));
	});

	it('replace_pattern ignores non-string values', () => {
		const record = createTestLogRecord({ attributes: { n: 5 } });
		const outcome = run(
			record,
			statement(call('replace_pattern', path('attributes', 'n'), ast.string('5'), ast.string('6'))),
		);
		expect(outcome.failures).toEqual([]);
		expect(record.attributes.get('n')).toEqual(intValue(5));
	});

	it('Concat joins rendered values', () => {
		const record = createTestLogRecord({ severityText: 'WARN', attributes: { code: 7 } });
		run(
			record,
			statement(
				call(
					'set',
					path('attributes', 'joined'),
					call('Concat', ast.list(path('severity_text'), path('attributes', 'code'), ast.nil()), ast.string('-')),
				),
			),
		);
		expect(record.attributes.get('joined')).toEqual(stringValue('WARN-7-'));
	});

	it('IsMatch guards a statement', () => {
		const matching = createTestLogRecord({ body: stringValue('GET /health') });
		const other = createTestLogRecord({ body: stringValue('POST /orders') });
		const node = statement(
			call('set', path('attributes', 'probe'), ast.bool(true)),
			ast.test(call('IsMatch', path('body'), ast.string('^GET /health'))),
		);
		expect(run(matching, node).skipped).toBe(0);
		expect(run(other, node).skipped).toBe(1);
		expect(matching.attributes.get('probe')).toEqual(boolValue(true));
		expect(other.attributes.has('probe')).toBe(false);
	});

	it('Split breaks a string into a slice', () => {
		const record = createTestLogRecord({ attributes: { csv: 'a,b' } });
		run(
			record,
			statement(call('set', path('attributes', 'parts'), call('Split', path('attributes', 'csv'), ast.string(',')))),
		);
		expect(record.attributes.toPlain()).toEqual({ csv: 'a,b', parts: ['a', 'b'] });
	});

	it('Int converts strings and skips unreadable input', () => {
		const record = createTestLogRecord({ attributes: { good: ' 42 ', bad: 'abc' } });
		run(
			record,
			statement(call('set', path('attributes', 'n'), call('Int', path('attributes', 'good')))),
			statement(call('set', path('attributes', 'm'), call('Int', path('attributes', 'bad')))),
		);
		expect(record.attributes.get('n')).toEqual(intValue(42));
		expect(record.attributes.has('m')).toBe(false);
	});
});

describe('toInt', () => {
	it('truncates doubles toward zero', () => {
		expect(toInt(doubleValue(3.7))).toEqual(intValue(3));
		expect(toInt(doubleValue(-3.7))).toEqual(intValue(-3));
		expect(toInt(doubleValue(Number.NaN))).toEqual(emptyValue());
	});

	it('reads booleans and integer strings', () => {
		expect(toInt(boolValue(true))).toEqual(intValue(1));
		expect(toInt(stringValue('+5'))).toEqual(intValue(5));
		expect(toInt(stringValue('1.5'))).toEqual(emptyValue());
	});

	it('has no reading for maps', () => {
		expect(toInt(mapValue(new AttributeMap()))).toEqual(emptyValue());
	});
});
