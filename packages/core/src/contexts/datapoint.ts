/**
 * Metric data point context.
 *
 * Wraps one data point together with the metric that owns it, so statements
 * can read and rewrite the metric (`metric.*`) as well as the point. Fields
 * that exist only on some point shapes (`value_int` on number points,
 * `bucket_counts` on histogram points, …) read as empty on the others and
 * reject writes with PathNotFound.
 */

import {
	type AnyValue,
	type DataPoint,
	type InstrumentationScope,
	type Metric,
	type MetricType,
	type Resource,
	boolValue,
	doubleValue,
	emptyValue,
	intValue,
	isHistogramDataPoint,
	isNumberDataPoint,
	sliceValue,
} from '@telemorph/sdk';
import { expectType } from '../coercion.js';
import { PathNotFoundError, TypeMismatchError } from '../errors.js';
import type { FieldAccessor, FieldTable } from '../path.js';
import type { ContextDefinition } from './definition.js';
import {
	type TelemetryContext,
	attributesField,
	bigintField,
	enclosingFields,
	numberField,
	stringField,
} from './fields.js';

export class DataPointContext implements TelemetryContext {
	constructor(
		private readonly dataPoint: DataPoint,
		private readonly metric: Metric,
		private readonly scope: InstrumentationScope,
		private readonly resource: Resource,
	) {}

	getDataPoint(): DataPoint {
		return this.dataPoint;
	}

	getMetric(): Metric {
		return this.metric;
	}

	getScope(): InstrumentationScope {
		return this.scope;
	}

	getResource(): Resource {
		return this.resource;
	}
}

// ─── Metric fields ────────────────────────────────────────────────────────────

/** Numeric codes exposed by `metric.type` */
export const METRIC_TYPE_CODES: Record<MetricType, number> = {
	empty: 0,
	gauge: 1,
	sum: 2,
	histogram: 3,
	summary: 5,
};

function shapeError(path: string, what: string): PathNotFoundError {
	return new PathNotFoundError(path, `not present on ${what}`);
}

const metricType: FieldAccessor<DataPointContext> = {
	type: 'int',
	get: (ctx) => intValue(METRIC_TYPE_CODES[ctx.getMetric().data.type]),
};

const aggregationTemporality: FieldAccessor<DataPointContext> = {
	type: 'int',
	get: (ctx) => {
		const data = ctx.getMetric().data;
		return data.type === 'sum' || data.type === 'histogram'
			? intValue(data.aggregationTemporality)
			: emptyValue();
	},
	set: (ctx, value, path) => {
		const data = ctx.getMetric().data;
		if (data.type !== 'sum' && data.type !== 'histogram') throw shapeError(path, `${data.type} metrics`);
		data.aggregationTemporality = Number(expectType(value, 'int', path).value);
	},
};

const isMonotonic: FieldAccessor<DataPointContext> = {
	type: 'bool',
	get: (ctx) => {
		const data = ctx.getMetric().data;
		return data.type === 'sum' ? boolValue(data.isMonotonic) : emptyValue();
	},
	set: (ctx, value, path) => {
		const data = ctx.getMetric().data;
		if (data.type !== 'sum') throw shapeError(path, `${data.type} metrics`);
		data.isMonotonic = expectType(value, 'bool', path).value;
	},
};

// ─── Point fields ─────────────────────────────────────────────────────────────

function pointKind(point: DataPoint): string {
	if (isNumberDataPoint(point)) return 'number data points';
	return isHistogramDataPoint(point) ? 'histogram data points' : 'summary data points';
}

const valueInt: FieldAccessor<DataPointContext> = {
	type: 'int',
	get: (ctx) => {
		const point = ctx.getDataPoint();
		return isNumberDataPoint(point) && point.value.type === 'int'
			? intValue(point.value.value)
			: emptyValue();
	},
	set: (ctx, value, path) => {
		const point = ctx.getDataPoint();
		if (!isNumberDataPoint(point)) throw shapeError(path, pointKind(point));
		point.value = { type: 'int', value: expectType(value, 'int', path).value };
	},
};

const valueDouble: FieldAccessor<DataPointContext> = {
	type: 'double',
	get: (ctx) => {
		const point = ctx.getDataPoint();
		return isNumberDataPoint(point) && point.value.type === 'double'
			? doubleValue(point.value.value)
			: emptyValue();
	},
	set: (ctx, value, path) => {
		const point = ctx.getDataPoint();
		if (!isNumberDataPoint(point)) throw shapeError(path, pointKind(point));
		point.value = { type: 'double', value: expectType(value, 'double', path).value };
	},
};

const count: FieldAccessor<DataPointContext> = {
	type: 'int',
	get: (ctx) => {
		const point = ctx.getDataPoint();
		return isNumberDataPoint(point) ? emptyValue() : intValue(point.count);
	},
	set: (ctx, value, path) => {
		const point = ctx.getDataPoint();
		if (isNumberDataPoint(point)) throw shapeError(path, pointKind(point));
		point.count = expectType(value, 'int', path).value;
	},
};

const sum: FieldAccessor<DataPointContext> = {
	type: 'double',
	get: (ctx) => {
		const point = ctx.getDataPoint();
		if (isNumberDataPoint(point) || point.sum === undefined) return emptyValue();
		return doubleValue(point.sum);
	},
	set: (ctx, value, path) => {
		const point = ctx.getDataPoint();
		if (isNumberDataPoint(point)) throw shapeError(path, pointKind(point));
		point.sum = expectType(value, 'double', path).value;
	},
};

function numbersFrom(value: AnyValue, path: string): number[] {
	return expectType(value, 'slice', path).value.map((item, i) => {
		if (item.type === 'double') return item.value;
		if (item.type === 'int') return Number(item.value);
		throw new TypeMismatchError('double', item.type, `${path}[${i}]`);
	});
}

const bucketCounts: FieldAccessor<DataPointContext> = {
	type: 'slice',
	get: (ctx) => {
		const point = ctx.getDataPoint();
		return isHistogramDataPoint(point) ? sliceValue(point.bucketCounts.map(intValue)) : emptyValue();
	},
	set: (ctx, value, path) => {
		const point = ctx.getDataPoint();
		if (!isHistogramDataPoint(point)) throw shapeError(path, pointKind(point));
		point.bucketCounts = expectType(value, 'slice', path).value.map(
			(item, i) => expectType(item, 'int', `${path}[${i}]`).value,
		);
	},
};

const explicitBounds: FieldAccessor<DataPointContext> = {
	type: 'slice',
	get: (ctx) => {
		const point = ctx.getDataPoint();
		return isHistogramDataPoint(point)
			? sliceValue(point.explicitBounds.map(doubleValue))
			: emptyValue();
	},
	set: (ctx, value, path) => {
		const point = ctx.getDataPoint();
		if (!isHistogramDataPoint(point)) throw shapeError(path, pointKind(point));
		point.explicitBounds = numbersFrom(value, path);
	},
};

const fields: FieldTable<DataPointContext> = {
	...enclosingFields<DataPointContext>(),
	metric: {
		children: {
			name: stringField(
				(ctx) => ctx.getMetric().name,
				(ctx, v) => {
					ctx.getMetric().name = v;
				},
			),
			description: stringField(
				(ctx) => ctx.getMetric().description,
				(ctx, v) => {
					ctx.getMetric().description = v;
				},
			),
			unit: stringField(
				(ctx) => ctx.getMetric().unit,
				(ctx, v) => {
					ctx.getMetric().unit = v;
				},
			),
			type: { accessor: metricType },
			aggregation_temporality: { accessor: aggregationTemporality },
			is_monotonic: { accessor: isMonotonic },
		},
	},
	attributes: attributesField((ctx) => ctx.getDataPoint().attributes),
	start_time_unix_nano: bigintField(
		(ctx) => ctx.getDataPoint().startTimeUnixNano,
		(ctx, v) => {
			ctx.getDataPoint().startTimeUnixNano = v;
		},
	),
	time_unix_nano: bigintField(
		(ctx) => ctx.getDataPoint().timeUnixNano,
		(ctx, v) => {
			ctx.getDataPoint().timeUnixNano = v;
		},
	),
	flags: numberField(
		(ctx) => ctx.getDataPoint().flags,
		(ctx, v) => {
			ctx.getDataPoint().flags = v;
		},
	),
	value_int: { accessor: valueInt },
	value_double: { accessor: valueDouble },
	count: { accessor: count },
	sum: { accessor: sum },
	bucket_counts: { accessor: bucketCounts },
	explicit_bounds: { accessor: explicitBounds },
};

export const dataPointContext: ContextDefinition<DataPointContext> = {
	kind: 'datapoint',
	fields,
	enums: {
		AGGREGATION_TEMPORALITY_UNSPECIFIED: 0n,
		AGGREGATION_TEMPORALITY_DELTA: 1n,
		AGGREGATION_TEMPORALITY_CUMULATIVE: 2n,
		METRIC_DATA_TYPE_NONE: 0n,
		METRIC_DATA_TYPE_GAUGE: 1n,
		METRIC_DATA_TYPE_SUM: 2n,
		METRIC_DATA_TYPE_HISTOGRAM: 3n,
		METRIC_DATA_TYPE_EXPONENTIAL_HISTOGRAM: 4n,
		METRIC_DATA_TYPE_SUMMARY: 5n,
	},
};
