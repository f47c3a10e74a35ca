/**
 * Test harness for processor and function authors.
 *
 * Provides a recording logger and builders for records and batches with
 * sensible defaults.
 */

import type { Logger } from './logger.js';
import {
	AggregationTemporality,
	type LogRecord,
	type Logs,
	type Metric,
	type Metrics,
	type NumberDataPoint,
	type Resource,
	type Span,
	SpanKind,
	type Traces,
	createResource,
	createScope,
} from './telemetry.js';
import type { LogEntry } from './types.js';
import { AttributeMap, type AnyValue, stringValue } from './value.js';

// ─── Mock Logger ──────────────────────────────────────────────────────────────

/**
 * Mock logger for testing.
 * Records all log entries for assertion.
 */
export class MockLogger implements Logger {
	readonly id: string;
	readonly entries: LogEntry[] = [];
	initialized = false;
	flushed = false;
	shutdownCalled = false;

	constructor(id = 'mock-logger') {
		this.id = id;
	}

	async init(_config: Record<string, unknown>): Promise<void> {
		this.initialized = true;
	}

	async log(entry: LogEntry): Promise<void> {
		this.entries.push(entry);
	}

	async flush(): Promise<void> {
		this.flushed = true;
	}

	async shutdown(): Promise<void> {
		this.flushed = true;
		this.shutdownCalled = true;
	}

	/** Get entries for a specific phase */
	entriesForPhase(phase: LogEntry['phase']): LogEntry[] {
		return this.entries.filter((e) => e.phase === phase);
	}
}

// ─── Record builders ──────────────────────────────────────────────────────────

export interface TestSpanOptions {
	name?: string;
	kind?: number;
	attributes?: Record<string, unknown>;
	traceId?: Uint8Array;
	spanId?: Uint8Array;
}

export function createTestSpan(options: TestSpanOptions = {}): Span {
	return {
		traceId: options.traceId ?? new Uint8Array(16).fill(1),
		spanId: options.spanId ?? new Uint8Array(8).fill(2),
		parentSpanId: new Uint8Array(8),
		traceState: '',
		name: options.name ?? 'test-span',
		kind: options.kind ?? SpanKind.INTERNAL,
		startTimeUnixNano: 1_000_000_000n,
		endTimeUnixNano: 2_000_000_000n,
		attributes: AttributeMap.from(options.attributes ?? {}),
		droppedAttributesCount: 0,
		droppedEventsCount: 0,
		droppedLinksCount: 0,
		status: { code: 0, message: '' },
	};
}

export interface TestLogRecordOptions {
	body?: AnyValue;
	severityNumber?: number;
	severityText?: string;
	attributes?: Record<string, unknown>;
}

export function createTestLogRecord(options: TestLogRecordOptions = {}): LogRecord {
	return {
		timeUnixNano: 1_000_000_000n,
		observedTimeUnixNano: 1_000_000_000n,
		severityNumber: options.severityNumber ?? 9,
		severityText: options.severityText ?? 'INFO',
		body: options.body ?? stringValue('test log'),
		attributes: AttributeMap.from(options.attributes ?? {}),
		droppedAttributesCount: 0,
		flags: 0,
		traceId: new Uint8Array(16),
		spanId: new Uint8Array(8),
	};
}

/** A number data point; bigint values become ints, numbers doubles */
export function createTestNumberPoint(
	value: number | bigint,
	attributes: Record<string, unknown> = {},
): NumberDataPoint {
	return {
		attributes: AttributeMap.from(attributes),
		startTimeUnixNano: 0n,
		timeUnixNano: 1_000_000_000n,
		value: typeof value === 'bigint' ? { type: 'int', value } : { type: 'double', value },
		flags: 0,
	};
}

export function createTestGauge(name: string, values: Array<number | bigint>): Metric {
	return {
		name,
		description: '',
		unit: '',
		data: { type: 'gauge', dataPoints: values.map((v) => createTestNumberPoint(v)) },
	};
}

export function createTestSum(
	name: string,
	values: Array<number | bigint>,
	temporality: number = AggregationTemporality.CUMULATIVE,
	isMonotonic = true,
): Metric {
	return {
		name,
		description: '',
		unit: '',
		data: {
			type: 'sum',
			aggregationTemporality: temporality,
			isMonotonic,
			dataPoints: values.map((v) => createTestNumberPoint(v)),
		},
	};
}

// ─── Batch builders ───────────────────────────────────────────────────────────

export function createTestTraces(spans: Span[], resource: Resource = createResource()): Traces {
	return {
		resourceSpans: [{ resource, scopeSpans: [{ scope: createScope('test-scope', '1.0.0'), spans }] }],
	};
}

export function createTestMetrics(metrics: Metric[], resource: Resource = createResource()): Metrics {
	return {
		resourceMetrics: [
			{ resource, scopeMetrics: [{ scope: createScope('test-scope', '1.0.0'), metrics }] },
		],
	};
}

export function createTestLogs(records: LogRecord[], resource: Resource = createResource()): Logs {
	return {
		resourceLogs: [
			{ resource, scopeLogs: [{ scope: createScope('test-scope', '1.0.0'), logRecords: records }] },
		],
	};
}
