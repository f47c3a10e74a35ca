import {
	type LogRecord,
	createResource,
	createScope,
	createTestGauge,
	createTestLogRecord,
} from '@telemorph/sdk';
import { beforeEach, describe, expect, it } from 'vitest';
import { type StatementNode, ast } from '../ast.js';
import { StatementBinder } from '../binder.js';
import { DataPointContext, LogContext, dataPointContext, logContext } from '../contexts/index.js';
import { BindError } from '../errors.js';
import { evaluateStatements } from '../evaluator.js';
import { concat, deleteKey, limit, replacePattern, set, standardFunctions } from '../functions/index.js';
import { Arguments, type BoundArgument, FunctionRegistry, formatSignature } from '../registry.js';

const { call, path, statement } = ast;

function contextFor(record: LogRecord): LogContext {
	return new LogContext(record, createScope(), createResource());
}

// ─── Registry ────────────────────────────────────────────────────────────────

describe('FunctionRegistry', () => {
	it('lists names in sorted order', () => {
		const registry = new FunctionRegistry(standardFunctions<LogContext>());
		expect(registry.names()).toEqual([
			'Concat',
			'Int',
			'IsMatch',
			'Split',
			'delete_key',
			'delete_matching_keys',
			'keep_keys',
			'limit',
			'replace_pattern',
			'set',
			'truncate_all',
		]);
		expect(registry.list().map((f) => f.name)).toEqual(registry.names());
	});

	it('rejects a duplicate name', () => {
		const registry = new FunctionRegistry([set<LogContext>()]);
		expect(() => registry.register(set<LogContext>())).toThrow('function "set" is already registered');
	});

	it('is read-only once sealed', () => {
		const registry = new FunctionRegistry<LogContext>().seal();
		expect(registry.isSealed).toBe(true);
		expect(() => registry.register(deleteKey<LogContext>())).toThrow(
			'cannot register "delete_key": registry is sealed',
		);
		expect(registry.get('delete_key')).toBeUndefined();
	});

	it('formats signatures', () => {
		expect(formatSignature(deleteKey())).toBe('delete_key(target, key: string)');
		expect(formatSignature(set())).toBe('set(target: setter, value)');
		expect(formatSignature(limit())).toBe('limit(target, limit: int, priority_keys?: strings)');
		expect(formatSignature(concat())).toBe('Concat(values: getters, delimiter: string) -> string');
		expect(formatSignature(replacePattern())).toBe(
			'replace_pattern(target: setter, regex: string, replacement: string)',
		);
	});
});

describe('Arguments', () => {
	const bound = new Map<string, BoundArgument<LogContext>>([
		['key', { kind: 'string', value: 'k' }],
		['keys', { kind: 'absent' }],
	]);
	const args = new Arguments('fn', bound);

	it('returns values of the declared kind', () => {
		expect(args.string('key')).toBe('k');
		expect(args.has('key')).toBe(true);
		expect(args.has('keys')).toBe(false);
	});

	it('falls back for an absent optional list', () => {
		expect(args.strings('keys', ['x'])).toEqual(['x']);
	});

	it('raises a bind error for the wrong kind or an unknown name', () => {
		expect(() => args.int('key')).toThrow(new BindError('fn: parameter "key" is not a int'));
		expect(() => args.string('other')).toThrow('fn: no parameter named "other"');
	});
});

// ─── Binder ──────────────────────────────────────────────────────────────────

describe('StatementBinder', () => {
	let binder: StatementBinder<LogContext>;

	beforeEach(() => {
		binder = new StatementBinder(logContext, new FunctionRegistry(standardFunctions<LogContext>()).seal());
	});

	const bindError = (node: StatementNode): string => {
		try {
			binder.bindStatement(node);
		} catch (err) {
			expect(err).toBeInstanceOf(BindError);
			return err instanceof Error ? err.message : String(err);
		}
		throw new Error('statement bound');
	};

	it('binds an editor call with its canonical text', () => {
		const bound = binder.bindStatement(statement(call('delete_key', path('attributes'), ast.string('x'))));
		expect(bound.text).toBe('delete_key(attributes, "x")');
		expect(bound.condition).toBeUndefined();
	});

	it('renders the guard into the statement text', () => {
		const bound = binder.bindStatement(
			statement(
				call('set', path('attributes', 'flag'), ast.bool(true)),
				ast.and(ast.compare(path('severity_number'), '>=', ast.int(17)), ast.not(ast.test(ast.bool(false)))),
			),
		);
		expect(bound.text).toBe('set(attributes["flag"], true) where severity_number >= 17 and not false');
		expect(bound.condition?.type).toBe('bool');
	});

	it('names the context kind on an unknown function', () => {
		expect(bindError(statement(call('nope')))).toBe(
			'log statement "nope()": unknown function "nope" in log context',
		);
	});

	it('checks arity', () => {
		expect(bindError(statement(call('delete_key', path('attributes'))))).toBe(
			'log statement "delete_key(attributes)": delete_key(attributes): expected 2 arguments, got 1',
		);
		expect(bindError(statement(call('limit', path('attributes'))))).toBe(
			'log statement "limit(attributes)": limit(attributes): expected 2 to 3 arguments, got 1',
		);
	});

	it('accepts a missing optional argument', () => {
		expect(() => binder.bindStatement(statement(call('limit', path('attributes'), ast.int(2))))).not.toThrow();
	});

	it('refuses converters as statements', () => {
		expect(bindError(statement(call('Concat', ast.list(), ast.string(''))))).toBe(
			'log statement "Concat([], "")": Concat returns a value and cannot be used as a statement',
		);
	});

	it('refuses editors as values', () => {
		const node = statement(
			call('set', path('attributes', 'x'), call('delete_key', path('attributes'), ast.string('y'))),
		);
		expect(bindError(node)).toMatch(/: delete_key does not return a value$/);
	});

	it('requires literals where the parameter kind demands one', () => {
		expect(bindError(statement(call('delete_key', path('attributes'), ast.int(1))))).toMatch(
			/delete_key: argument "key" must be a string, got 1$/,
		);
		expect(bindError(statement(call('set', ast.string('x'), ast.string('y'))))).toMatch(
			/set: argument "target" must be a path, got "x"$/,
		);
	});

	it('rejects writes that can never succeed', () => {
		expect(bindError(statement(call('set', path('severity_number'), ast.string('high'))))).toMatch(
			/set: cannot write string value "high" to int field severity_number$/,
		);
		expect(bindError(statement(call('set', path('severity_text'), ast.nil())))).toMatch(
			/set: cannot write empty value nil to string field severity_text$/,
		);
		expect(
			bindError(statement(call('replace_pattern', path('severity_number'), ast.string('a'), ast.string('b')))),
		).toMatch(/replace_pattern: argument "target": severity_number holds int and cannot take string$/);
	});

	it('rejects read-only targets', () => {
		const points = new StatementBinder(
			dataPointContext,
			new FunctionRegistry(standardFunctions<DataPointContext>()),
		);
		expect(() => points.bindStatement(statement(call('set', path('metric.type'), ast.int(1))))).toThrow(
			/set: argument "target": metric.type is read-only$/,
		);
	});

	it('rejects bad literals', () => {
		expect(bindError(statement(call('set', path('severity_number'), ast.int('12a'))))).toMatch(
			/invalid int literal 12a$/,
		);
		expect(bindError(statement(call('set', path('attributes', 'x'), ast.float(Number.NaN))))).toMatch(
			/invalid float literal NaN$/,
		);
		expect(bindError(statement(call('set', path('attributes', 'x'), ast.bytes('abc'))))).toMatch(
			/invalid bytes literal 0xabc$/,
		);
		expect(bindError(statement(call('delete_matching_keys', path('attributes'), ast.string('('))))).toMatch(
			/delete_matching_keys: invalid pattern "\("$/,
		);
	});

	it('resolves enum symbols of its own context only', () => {
		expect(bindError(statement(call('set', path('severity_number'), ast.enum('SPAN_KIND_SERVER'))))).toMatch(
			/unknown enum symbol SPAN_KIND_SERVER for log context$/,
		);

		const record = createTestLogRecord();
		const bound = binder.bindStatement(
			statement(call('set', path('severity_number'), ast.enum('SEVERITY_NUMBER_ERROR'))),
		);
		evaluateStatements([bound], contextFor(record));
		expect(record.severityNumber).toBe(17);
	});

	it('rejects non-boolean guards', () => {
		expect(
			bindError(statement(call('delete_key', path('attributes'), ast.string('x')), ast.test(path('severity_text')))),
		).toMatch(/condition severity_text is of type string, not bool$/);
	});

	it('keeps the original error as the cause', () => {
		try {
			binder.bindStatement(statement(call('nope')));
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(BindError);
			if (!(err instanceof BindError)) return;
			expect(err.cause).toBeInstanceOf(BindError);
			expect(err.kind).toBe('bind');
		}
	});

	it('binds the same node to statements that behave the same', () => {
		const node = statement(call('set', path('attributes', 'env'), ast.string('prod')));
		const first = binder.bindStatement(node);
		const second = binder.bindStatement(node);
		expect(second.text).toBe(first.text);

		const a = createTestLogRecord();
		const b = createTestLogRecord();
		evaluateStatements([first], contextFor(a));
		evaluateStatements([second], contextFor(b));
		expect(a.attributes.equals(b.attributes)).toBe(true);
		expect(a.attributes.toPlain()).toEqual({ env: 'prod' });
	});

	it('evaluates list literals to fresh slices', () => {
		const record = createTestLogRecord({ attributes: { a: 'x' } });
		const bound = binder.bindStatement(
			statement(call('set', path('attributes', 'list'), ast.list(path('attributes', 'a'), ast.int(2), ast.nil()))),
		);
		evaluateStatements([bound], contextFor(record));
		expect(record.attributes.toPlain()).toEqual({ a: 'x', list: ['x', 2, null] });
	});

	it('binds against the datapoint context', () => {
		const metric = createTestGauge('g', [1n]);
		if (metric.data.type !== 'gauge') throw new Error('expected a gauge');
		const point = metric.data.dataPoints[0];
		const points = new StatementBinder(
			dataPointContext,
			new FunctionRegistry(standardFunctions<DataPointContext>()),
		);
		const bound = points.bindStatement(statement(call('set', path('attributes', 'unit'), path('metric.name'))));
		const outcome = evaluateStatements([bound], new DataPointContext(point, metric, createScope(), createResource()));
		expect(outcome.failures).toEqual([]);
		expect(point.attributes.toPlain()).toEqual({ unit: 'g' });
		expect(points.kind).toBe('datapoint');
	});
});
