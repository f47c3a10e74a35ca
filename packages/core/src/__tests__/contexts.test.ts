import {
	AggregationTemporality,
	createResource,
	createScope,
	createTestGauge,
	createTestSpan,
	doubleValue,
	emptyValue,
	intValue,
	stringValue,
} from '@telemorph/sdk';
import { describe, expect, it } from 'vitest';
import { type PathNode, ast } from '../ast.js';
import {
	DataPointContext,
	ResourceContext,
	SpanContext,
	dataPointContext,
	logContext,
	resourceContext,
	spanContext,
} from '../contexts/index.js';
import { PathNotFoundError, TypeMismatchError } from '../errors.js';
import { type GetSetter, type Getter, isGetSetter } from '../expression.js';
import { type FieldTable, resolvePath } from '../path.js';

function writable<K>(getter: Getter<K>): GetSetter<K> {
	if (!isGetSetter(getter)) throw new Error(`${getter.text} is read-only`);
	return getter;
}

function field<K>(table: FieldTable<K>, node: PathNode): Getter<K> {
	return resolvePath(table, node);
}

// ─── Span ────────────────────────────────────────────────────────────────────

describe('span context', () => {
	const make = () => {
		const span = createTestSpan({ name: 'GET /orders', kind: 2 });
		return { span, ctx: new SpanContext(span, createScope('http', '0.1.0'), createResource()) };
	};

	it('reads span fields', () => {
		const { ctx } = make();
		expect(field(spanContext.fields, ast.path('name')).get(ctx)).toEqual(stringValue('GET /orders'));
		expect(field(spanContext.fields, ast.path('kind')).get(ctx)).toEqual(intValue(2));
		expect(field(spanContext.fields, ast.path('trace_id.string')).get(ctx)).toEqual(
			stringValue('01'.repeat(16)),
		);
		expect(field(spanContext.fields, ast.path('parent_span_id.string')).get(ctx)).toEqual(stringValue(''));
	});

	it('writes status and name', () => {
		const { span, ctx } = make();
		writable(field(spanContext.fields, ast.path('status.code'))).set(ctx, intValue(2));
		writable(field(spanContext.fields, ast.path('status.message'))).set(ctx, stringValue('timeout'));
		writable(field(spanContext.fields, ast.path('name'))).set(ctx, stringValue('GET /orders/{id}'));
		expect(span.status).toEqual({ code: 2, message: 'timeout' });
		expect(span.name).toBe('GET /orders/{id}');
	});

	it('checks id length on write', () => {
		const { span, ctx } = make();
		const traceId = writable(field(spanContext.fields, ast.path('trace_id.string')));
		expect(() => traceId.set(ctx, stringValue('ab'))).toThrow('trace_id.string: expected 16 bytes, got 1 bytes');
		expect(() => traceId.set(ctx, stringValue('zz'))).toThrow('trace_id.string: expected hex string, got "zz"');

		traceId.set(ctx, stringValue('ff'.repeat(16)));
		expect(span.traceId).toEqual(new Uint8Array(16).fill(255));
	});

	it('keeps counts and enum codes within uint32', () => {
		const { span, ctx } = make();
		const dropped = writable(field(spanContext.fields, ast.path('dropped_attributes_count')));
		const kind = writable(field(spanContext.fields, ast.path('kind')));

		expect(() => dropped.set(ctx, intValue(-5))).toThrow(TypeMismatchError);
		expect(() => dropped.set(ctx, intValue(-5))).toThrow('dropped_attributes_count: expected uint32, got int -5');
		expect(() => kind.set(ctx, intValue(9007199254740993n))).toThrow(
			'kind: expected uint32, got int 9007199254740993',
		);
		expect(span.droppedAttributesCount).toBe(0);
		expect(span.kind).toBe(2);

		dropped.set(ctx, intValue(4294967295n));
		expect(span.droppedAttributesCount).toBe(4294967295);
	});

	it('keeps timestamps within uint64', () => {
		const { span, ctx } = make();
		const start = writable(field(spanContext.fields, ast.path('start_time_unix_nano')));

		expect(() => start.set(ctx, intValue(-1))).toThrow('start_time_unix_nano: expected uint64, got int -1');
		expect(() => start.set(ctx, intValue(2n ** 64n))).toThrow(
			'start_time_unix_nano: expected uint64, got int 18446744073709551616',
		);
		expect(span.startTimeUnixNano).toBe(1_000_000_000n);
	});

	it('publishes kind and status enums', () => {
		expect(spanContext.enums.SPAN_KIND_CLIENT).toBe(3n);
		expect(spanContext.enums.STATUS_CODE_ERROR).toBe(2n);
	});
});

// ─── Data points ─────────────────────────────────────────────────────────────

describe('datapoint context', () => {
	const make = () => {
		const metric = createTestGauge('queue.depth', [1.5, 2n]);
		if (metric.data.type !== 'gauge') throw new Error('expected a gauge');
		const [first, second] = metric.data.dataPoints;
		const scope = createScope();
		const resource = createResource();
		return {
			metric,
			first,
			ctxFirst: new DataPointContext(first, metric, scope, resource),
			ctxSecond: new DataPointContext(second, metric, scope, resource),
		};
	};

	it('reads values by number type', () => {
		const { ctxFirst, ctxSecond } = make();
		const valueInt = field(dataPointContext.fields, ast.path('value_int'));
		const valueDouble = field(dataPointContext.fields, ast.path('value_double'));
		expect(valueDouble.get(ctxFirst)).toEqual(doubleValue(1.5));
		expect(valueInt.get(ctxFirst)).toEqual(emptyValue());
		expect(valueInt.get(ctxSecond)).toEqual(intValue(2));
	});

	it('widens int writes to value_double', () => {
		const { first, ctxFirst } = make();
		writable(field(dataPointContext.fields, ast.path('value_double'))).set(ctxFirst, intValue(4));
		expect(first.value).toEqual({ type: 'double', value: 4 });
	});

	it('exposes the owning metric', () => {
		const { metric, ctxFirst } = make();
		expect(field(dataPointContext.fields, ast.path('metric.type')).get(ctxFirst)).toEqual(intValue(1));
		writable(field(dataPointContext.fields, ast.path('metric.name'))).set(ctxFirst, stringValue('depth'));
		expect(metric.name).toBe('depth');
	});

	it('keeps metric.type read-only', () => {
		expect(isGetSetter(field(dataPointContext.fields, ast.path('metric.type')))).toBe(false);
	});

	it('reads sum-only fields as empty on a gauge and rejects writes', () => {
		const { ctxFirst } = make();
		const temporality = writable(field(dataPointContext.fields, ast.path('metric.aggregation_temporality')));
		expect(temporality.get(ctxFirst)).toEqual(emptyValue());
		expect(() => temporality.set(ctxFirst, intValue(AggregationTemporality.DELTA))).toThrow(
			new PathNotFoundError('metric.aggregation_temporality', 'not present on gauge metrics'),
		);
	});

	it('reads histogram fields as empty on number points', () => {
		const { ctxFirst } = make();
		expect(field(dataPointContext.fields, ast.path('bucket_counts')).get(ctxFirst)).toEqual(emptyValue());
		expect(field(dataPointContext.fields, ast.path('count')).get(ctxFirst)).toEqual(emptyValue());
	});

	it('publishes temporality and metric type enums', () => {
		expect(dataPointContext.enums.AGGREGATION_TEMPORALITY_CUMULATIVE).toBe(2n);
		expect(dataPointContext.enums.METRIC_DATA_TYPE_SUMMARY).toBe(5n);
	});
});

// ─── Resource & log enums ────────────────────────────────────────────────────

describe('resource context', () => {
	it('addresses resource fields without a prefix', () => {
		const resource = createResource({ 'host.name': 'node-1' });
		const ctx = new ResourceContext(resource);
		expect(field(resourceContext.fields, ast.path('attributes', 'host.name')).get(ctx)).toEqual(
			stringValue('node-1'),
		);
		writable(field(resourceContext.fields, ast.path('dropped_attributes_count'))).set(ctx, intValue(3));
		expect(resource.droppedAttributesCount).toBe(3);
		expect(ctx.getScope()).toBeUndefined();
	});

	it('has no record-level fields', () => {
		expect(() => field(resourceContext.fields, ast.path('resource.attributes'))).toThrow(/unknown field "resource"/);
	});
});

describe('log severity enums', () => {
	it('numbers the four steps of every severity group', () => {
		expect(logContext.enums.SEVERITY_NUMBER_UNSPECIFIED).toBe(0n);
		expect(logContext.enums.SEVERITY_NUMBER_TRACE).toBe(1n);
		expect(logContext.enums.SEVERITY_NUMBER_INFO).toBe(9n);
		expect(logContext.enums.SEVERITY_NUMBER_WARN).toBe(13n);
		expect(logContext.enums.SEVERITY_NUMBER_ERROR).toBe(17n);
		expect(logContext.enums.SEVERITY_NUMBER_FATAL4).toBe(24n);
	});
});
