/**
 * Telemetry data model: resources, scopes, spans, metrics and log records.
 *
 * Plain mutable structures grouped the way OTLP batches them:
 * resource → scope → records. Transform statements mutate them in place.
 */

import { AttributeMap } from './value.js';
import type { AnyValue } from './value.js';

// ─── Shared ───────────────────────────────────────────────────────────────────

export interface Resource {
	attributes: AttributeMap;
	droppedAttributesCount: number;
}

export interface InstrumentationScope {
	name: string;
	version: string;
	attributes: AttributeMap;
	droppedAttributesCount: number;
}

// ─── Traces ───────────────────────────────────────────────────────────────────

export const SpanKind = {
	UNSPECIFIED: 0,
	INTERNAL: 1,
	SERVER: 2,
	CLIENT: 3,
	PRODUCER: 4,
	CONSUMER: 5,
} as const;

export const StatusCode = {
	UNSET: 0,
	OK: 1,
	ERROR: 2,
} as const;

export interface SpanStatus {
	code: number;
	message: string;
}

export interface Span {
	/** 16 bytes; all zero when absent */
	traceId: Uint8Array;
	/** 8 bytes; all zero when absent */
	spanId: Uint8Array;
	parentSpanId: Uint8Array;
	traceState: string;
	name: string;
	kind: number;
	startTimeUnixNano: bigint;
	endTimeUnixNano: bigint;
	attributes: AttributeMap;
	droppedAttributesCount: number;
	droppedEventsCount: number;
	droppedLinksCount: number;
	status: SpanStatus;
}

export interface ScopeSpans {
	scope: InstrumentationScope;
	spans: Span[];
}

export interface ResourceSpans {
	resource: Resource;
	scopeSpans: ScopeSpans[];
}

export interface Traces {
	resourceSpans: ResourceSpans[];
}

// ─── Metrics ──────────────────────────────────────────────────────────────────

export const AggregationTemporality = {
	UNSPECIFIED: 0,
	DELTA: 1,
	CUMULATIVE: 2,
} as const;

export type NumberValue =
	| { type: 'empty' }
	| { type: 'int'; value: bigint }
	| { type: 'double'; value: number };

export interface NumberDataPoint {
	attributes: AttributeMap;
	startTimeUnixNano: bigint;
	timeUnixNano: bigint;
	value: NumberValue;
	flags: number;
}

export interface HistogramDataPoint {
	attributes: AttributeMap;
	startTimeUnixNano: bigint;
	timeUnixNano: bigint;
	count: bigint;
	/** Undefined when the producer did not record a sum */
	sum: number | undefined;
	bucketCounts: bigint[];
	explicitBounds: number[];
	flags: number;
}

export interface ValueAtQuantile {
	quantile: number;
	value: number;
}

export interface SummaryDataPoint {
	attributes: AttributeMap;
	startTimeUnixNano: bigint;
	timeUnixNano: bigint;
	count: bigint;
	sum: number;
	quantileValues: ValueAtQuantile[];
	flags: number;
}

export type DataPoint = NumberDataPoint | HistogramDataPoint | SummaryDataPoint;

export type MetricData =
	| { type: 'empty' }
	| { type: 'gauge'; dataPoints: NumberDataPoint[] }
	| {
			type: 'sum';
			aggregationTemporality: number;
			isMonotonic: boolean;
			dataPoints: NumberDataPoint[];
	  }
	| { type: 'histogram'; aggregationTemporality: number; dataPoints: HistogramDataPoint[] }
	| { type: 'summary'; dataPoints: SummaryDataPoint[] };

export type MetricType = MetricData['type'];

export const METRIC_TYPES: readonly MetricType[] = ['empty', 'gauge', 'sum', 'histogram', 'summary'];

export interface Metric {
	name: string;
	description: string;
	unit: string;
	data: MetricData;
}

export interface ScopeMetrics {
	scope: InstrumentationScope;
	metrics: Metric[];
}

export interface ResourceMetrics {
	resource: Resource;
	scopeMetrics: ScopeMetrics[];
}

export interface Metrics {
	resourceMetrics: ResourceMetrics[];
}

/** The data points of a metric, whatever its current shape. */
export function dataPointsOf(metric: Metric): readonly DataPoint[] {
	return metric.data.type === 'empty' ? [] : metric.data.dataPoints;
}

/** Narrow a data point to the number variant (gauge/sum points). */
export function isNumberDataPoint(point: DataPoint): point is NumberDataPoint {
	return 'value' in point;
}

export function isHistogramDataPoint(point: DataPoint): point is HistogramDataPoint {
	return 'bucketCounts' in point;
}

// ─── Logs ─────────────────────────────────────────────────────────────────────

export interface LogRecord {
	timeUnixNano: bigint;
	observedTimeUnixNano: bigint;
	severityNumber: number;
	severityText: string;
	body: AnyValue;
	attributes: AttributeMap;
	droppedAttributesCount: number;
	flags: number;
	traceId: Uint8Array;
	spanId: Uint8Array;
}

export interface ScopeLogs {
	scope: InstrumentationScope;
	logRecords: LogRecord[];
}

export interface ResourceLogs {
	resource: Resource;
	scopeLogs: ScopeLogs[];
}

export interface Logs {
	resourceLogs: ResourceLogs[];
}

// ─── Constructors ─────────────────────────────────────────────────────────────

export function createResource(attributes?: Record<string, unknown>): Resource {
	return {
		attributes: AttributeMap.from(attributes ?? {}),
		droppedAttributesCount: 0,
	};
}

export function createScope(name = '', version = ''): InstrumentationScope {
	return { name, version, attributes: new AttributeMap(), droppedAttributesCount: 0 };
}
