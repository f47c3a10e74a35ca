import {
	AttributeMap,
	type LogRecord,
	createResource,
	createScope,
	createTestLogRecord,
	emptyValue,
	intValue,
	mapValue,
	sliceValue,
	stringValue,
	toPlain,
} from '@telemorph/sdk';
import { describe, expect, it } from 'vitest';
import { type PathNode, ast } from '../ast.js';
import { LogContext, logContext } from '../contexts/index.js';
import { BindError, PathNotFoundError, TypeMismatchError } from '../errors.js';
import { type GetSetter, type Getter, isGetSetter } from '../expression.js';
import { resolvePath } from '../path.js';

function contextFor(record: LogRecord): LogContext {
	return new LogContext(record, createScope('lib', '1.0.0'), createResource({ 'service.name': 'api' }));
}

function resolve(node: PathNode): Getter<LogContext> {
	return resolvePath(logContext.fields, node);
}

function writable(node: PathNode): GetSetter<LogContext> {
	const getter = resolve(node);
	if (!isGetSetter(getter)) throw new Error(`${getter.text} is read-only`);
	return getter;
}

describe('resolvePath', () => {
	it('returns the record attributes map itself', () => {
		const record = createTestLogRecord({ attributes: { a: 1 } });
		const value = resolve(ast.path('attributes')).get(contextFor(record));
		expect(value.type).toBe('map');
		if (value.type !== 'map') return;
		expect(value.value).toBe(record.attributes);
	});

	it('reads map keys and reports a missing key as empty', () => {
		const record = createTestLogRecord({ attributes: { 'http.method': 'GET' } });
		const ctx = contextFor(record);
		expect(resolve(ast.path('attributes', 'http.method')).get(ctx)).toEqual(stringValue('GET'));
		expect(resolve(ast.path('attributes', 'missing')).get(ctx)).toEqual(emptyValue());
		expect(resolve(ast.path('attributes', 'missing', 'deeper')).get(ctx)).toEqual(emptyValue());
	});

	it('reads through enclosing resource and scope fields', () => {
		const ctx = contextFor(createTestLogRecord());
		expect(resolve(ast.path('resource.attributes', 'service.name')).get(ctx)).toEqual(stringValue('api'));
		expect(resolve(ast.path('instrumentation_scope.version')).get(ctx)).toEqual(stringValue('1.0.0'));
	});

	it('types keyed paths as any', () => {
		const getter = writable(ast.path('attributes', 'x'));
		expect(getter.type).toBe('any');
		expect(getter.fieldType).toBe('any');
		expect(getter.text).toBe('attributes["x"]');
	});

	it('creates intermediate maps on nested writes', () => {
		const record = createTestLogRecord();
		writable(ast.path('attributes', 'a', 'b')).set(contextFor(record), stringValue('x'));
		expect(record.attributes.toPlain()).toEqual({ a: { b: 'x' } });
	});

	it('turns an empty body into a map on the first keyed write', () => {
		const record = createTestLogRecord({ body: emptyValue() });
		writable(ast.path('body', 'k')).set(contextFor(record), stringValue('v'));
		expect(toPlain(record.body)).toEqual({ k: 'v' });
	});

	it('refuses to key into a string body', () => {
		const record = createTestLogRecord({ body: stringValue('plain') });
		expect(() => writable(ast.path('body', 'k')).set(contextFor(record), stringValue('v'))).toThrow(
			TypeMismatchError,
		);
		expect(record.body).toEqual(stringValue('plain'));
	});

	it('reports slice indices out of range', () => {
		const record = createTestLogRecord();
		record.attributes.put('list', sliceValue([stringValue('a'), stringValue('b')]));
		const ctx = contextFor(record);

		expect(resolve(ast.path('attributes', 'list', 1)).get(ctx)).toEqual(stringValue('b'));
		expect(() => resolve(ast.path('attributes', 'list', 5)).get(ctx)).toThrow(
			new PathNotFoundError('attributes["list"][5]', 'index 5 out of range for slice of length 2'),
		);
	});

	it('writes into an existing slice element', () => {
		const record = createTestLogRecord();
		record.attributes.put('list', sliceValue([intValue(1), intValue(2)]));
		writable(ast.path('attributes', 'list', 0)).set(contextFor(record), intValue(9));
		expect(record.attributes.toPlain()).toEqual({ list: [9, 2] });
	});

	it('replaces attribute contents on a whole-map write', () => {
		const record = createTestLogRecord({ attributes: { stale: true } });
		const before = record.attributes;
		writable(ast.path('attributes')).set(contextFor(record), mapValue(AttributeMap.from({ fresh: 1 })));
		expect(record.attributes).toBe(before);
		expect(record.attributes.toPlain()).toEqual({ fresh: 1 });
	});

	it('coerces on write to typed fields', () => {
		const record = createTestLogRecord();
		const severity = writable(ast.path('severity_number'));
		severity.set(contextFor(record), intValue(17));
		expect(record.severityNumber).toBe(17);
		expect(() => severity.set(contextFor(record), stringValue('high'))).toThrow(
			'severity_number: expected int, got string',
		);
	});
});

describe('resolvePath bind errors', () => {
	it('rejects unknown fields and lists the alternatives', () => {
		expect(() => resolve(ast.path('nope'))).toThrow(BindError);
		expect(() => resolve(ast.path('nope'))).toThrow(/^invalid path "nope": unknown field "nope"; expected one of: /);
		expect(() => resolve(ast.path('resource.nope'))).toThrow(
			'invalid path "resource.nope": unknown field "resource.nope"; expected one of: attributes, dropped_attributes_count',
		);
	});

	it('rejects a path that stops at a group', () => {
		expect(() => resolve(ast.path('resource'))).toThrow(
			'invalid path "resource": a field is required after it; one of: attributes, dropped_attributes_count',
		);
	});

	it('rejects selectors on scalar fields', () => {
		expect(() => resolve(ast.path('severity_number', 'x'))).toThrow(
			'invalid path "severity_number["x"]": field of type int cannot be indexed',
		);
	});

	it('rejects an index as a map key', () => {
		expect(() => resolve(ast.path('attributes', 0))).toThrow(
			'invalid path "attributes[0]": map fields take a string key',
		);
	});

	it('rejects selectors before the last field', () => {
		const node: PathNode = {
			type: 'path',
			fields: [{ name: 'resource', keys: ['x'] }, { name: 'attributes' }],
		};
		expect(() => resolve(node)).toThrow(
			'invalid path "resource["x"].attributes": selectors are only allowed on the last field',
		);
	});

	it('rejects an empty path', () => {
		expect(() => resolve({ type: 'path', fields: [] })).toThrow('empty path');
	});
});
