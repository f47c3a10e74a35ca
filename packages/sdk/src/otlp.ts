/**
 * OTLP/JSON codec: decode and encode traces, metrics and logs.
 *
 * Follows the OTLP JSON mapping: ids are hex strings, 64-bit integers may
 * arrive as strings or numbers and are written back as strings, bytes values
 * are base64.
 */

import {
	AggregationTemporality,
	type HistogramDataPoint,
	type InstrumentationScope,
	type LogRecord,
	type Logs,
	type Metric,
	type MetricData,
	type Metrics,
	type NumberDataPoint,
	type NumberValue,
	type Resource,
	type Span,
	type SummaryDataPoint,
	type Traces,
} from './telemetry.js';
import {
	type AnyValue,
	AttributeMap,
	boolValue,
	bytesToHex,
	bytesValue,
	doubleValue,
	emptyValue,
	hexToBytes,
	intValue,
	mapValue,
	sliceValue,
	stringValue,
} from './value.js';

export class OtlpDecodeError extends Error {
	constructor(
		public readonly field: string,
		message: string,
	) {
		super(`${field}: ${message}`);
		this.name = 'OtlpDecodeError';
	}
}

export type JsonObject = Record<string, unknown>;

// ─── Readers ──────────────────────────────────────────────────────────────────

function isObject(raw: unknown): raw is JsonObject {
	return raw !== null && typeof raw === 'object' && !Array.isArray(raw);
}

function objectAt(raw: unknown, field: string): JsonObject {
	if (!isObject(raw)) throw new OtlpDecodeError(field, 'expected an object');
	return raw;
}

function optObject(raw: unknown, field: string): JsonObject {
	return raw === undefined || raw === null ? {} : objectAt(raw, field);
}

function arrayAt(raw: unknown, field: string): unknown[] {
	if (raw === undefined || raw === null) return [];
	if (!Array.isArray(raw)) throw new OtlpDecodeError(field, 'expected an array');
	return raw;
}

function stringAt(raw: unknown, field: string): string {
	if (raw === undefined || raw === null) return '';
	if (typeof raw !== 'string') throw new OtlpDecodeError(field, 'expected a string');
	return raw;
}

function numberAt(raw: unknown, field: string): number {
	if (raw === undefined || raw === null) return 0;
	if (typeof raw === 'number') return raw;
	if (typeof raw === 'string' && raw.trim() !== '' && !Number.isNaN(Number(raw))) {
		return Number(raw);
	}
	throw new OtlpDecodeError(field, 'expected a number');
}

const UINT32_MAX = 0xffff_ffff;

/** Counts, flags and enum codes */
function uint32At(raw: unknown, field: string): number {
	const value = numberAt(raw, field);
	if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
		throw new OtlpDecodeError(field, 'expected an unsigned 32-bit integer');
	}
	return value;
}

function bigintAt(raw: unknown, field: string): bigint {
	if (raw === undefined || raw === null) return 0n;
	if (typeof raw === 'number' && Number.isInteger(raw)) return BigInt(raw);
	if (typeof raw === 'string' && /^-?\d+$/.test(raw)) return BigInt(raw);
	throw new OtlpDecodeError(field, 'expected an integer');
}

function idAt(raw: unknown, field: string, length: number): Uint8Array {
	const hex = stringAt(raw, field);
	if (hex === '') return new Uint8Array(length);
	const bytes = hexToBytes(hex);
	if (!bytes || bytes.length !== length) {
		throw new OtlpDecodeError(field, `expected ${length * 2} hex characters`);
	}
	return bytes;
}

// ─── Common ───────────────────────────────────────────────────────────────────

function decodeAnyValue(raw: unknown, field: string): AnyValue {
	if (raw === undefined || raw === null) return emptyValue();
	const v = objectAt(raw, field);
	if ('stringValue' in v) return stringValue(stringAt(v.stringValue, `${field}.stringValue`));
	if ('boolValue' in v) return boolValue(v.boolValue === true);
	if ('intValue' in v) return intValue(bigintAt(v.intValue, `${field}.intValue`));
	if ('doubleValue' in v) return doubleValue(numberAt(v.doubleValue, `${field}.doubleValue`));
	if ('bytesValue' in v) {
		return bytesValue(new Uint8Array(Buffer.from(stringAt(v.bytesValue, field), 'base64')));
	}
	if ('arrayValue' in v) {
		const values = arrayAt(optObject(v.arrayValue, field).values, `${field}.arrayValue.values`);
		return sliceValue(values.map((item, i) => decodeAnyValue(item, `${field}.arrayValue[${i}]`)));
	}
	if ('kvlistValue' in v) {
		const values = optObject(v.kvlistValue, field).values;
		return mapValue(decodeAttributes(values, `${field}.kvlistValue.values`));
	}
	return emptyValue();
}

function decodeAttributes(raw: unknown, field: string): AttributeMap {
	const map = new AttributeMap();
	arrayAt(raw, field).forEach((item, i) => {
		const kv = objectAt(item, `${field}[${i}]`);
		map.put(stringAt(kv.key, `${field}[${i}].key`), decodeAnyValue(kv.value, `${field}[${i}].value`));
	});
	return map;
}

function decodeResource(raw: unknown, field: string): Resource {
	const r = optObject(raw, field);
	return {
		attributes: decodeAttributes(r.attributes, `${field}.attributes`),
		droppedAttributesCount: uint32At(r.droppedAttributesCount, `${field}.droppedAttributesCount`),
	};
}

function decodeScope(raw: unknown, field: string): InstrumentationScope {
	const s = optObject(raw, field);
	return {
		name: stringAt(s.name, `${field}.name`),
		version: stringAt(s.version, `${field}.version`),
		attributes: decodeAttributes(s.attributes, `${field}.attributes`),
		droppedAttributesCount: uint32At(s.droppedAttributesCount, `${field}.droppedAttributesCount`),
	};
}

function encodeAnyValue(value: AnyValue): JsonObject {
	switch (value.type) {
		case 'empty':
			return {};
		case 'string':
			return { stringValue: value.value };
		case 'bool':
			return { boolValue: value.value };
		case 'int':
			return { intValue: value.value.toString() };
		case 'double':
			return { doubleValue: value.value };
		case 'bytes':
			return { bytesValue: Buffer.from(value.value).toString('base64') };
		case 'slice':
			return { arrayValue: { values: value.value.map(encodeAnyValue) } };
		case 'map':
			return { kvlistValue: { values: encodeAttributes(value.value) } };
	}
}

function encodeAttributes(map: AttributeMap): JsonObject[] {
	return [...map.entries()].map(([key, value]) => ({ key, value: encodeAnyValue(value) }));
}

function encodeResource(resource: Resource): JsonObject {
	return {
		attributes: encodeAttributes(resource.attributes),
		droppedAttributesCount: resource.droppedAttributesCount,
	};
}

function encodeScope(scope: InstrumentationScope): JsonObject {
	return {
		name: scope.name,
		version: scope.version,
		attributes: encodeAttributes(scope.attributes),
		droppedAttributesCount: scope.droppedAttributesCount,
	};
}

function encodeId(id: Uint8Array): string {
	return id.every((b) => b === 0) ? '' : bytesToHex(id);
}

// ─── Traces ───────────────────────────────────────────────────────────────────

function decodeSpan(raw: unknown, field: string): Span {
	const s = objectAt(raw, field);
	const status = optObject(s.status, `${field}.status`);
	return {
		traceId: idAt(s.traceId, `${field}.traceId`, 16),
		spanId: idAt(s.spanId, `${field}.spanId`, 8),
		parentSpanId: idAt(s.parentSpanId, `${field}.parentSpanId`, 8),
		traceState: stringAt(s.traceState, `${field}.traceState`),
		name: stringAt(s.name, `${field}.name`),
		kind: uint32At(s.kind, `${field}.kind`),
		startTimeUnixNano: bigintAt(s.startTimeUnixNano, `${field}.startTimeUnixNano`),
		endTimeUnixNano: bigintAt(s.endTimeUnixNano, `${field}.endTimeUnixNano`),
		attributes: decodeAttributes(s.attributes, `${field}.attributes`),
		droppedAttributesCount: uint32At(s.droppedAttributesCount, `${field}.droppedAttributesCount`),
		droppedEventsCount: uint32At(s.droppedEventsCount, `${field}.droppedEventsCount`),
		droppedLinksCount: uint32At(s.droppedLinksCount, `${field}.droppedLinksCount`),
		status: {
			code: uint32At(status.code, `${field}.status.code`),
			message: stringAt(status.message, `${field}.status.message`),
		},
	};
}

export function decodeTraces(raw: unknown): Traces {
	const root = objectAt(raw, '$');
	return {
		resourceSpans: arrayAt(root.resourceSpans, 'resourceSpans').map((rs, i) => {
			const field = `resourceSpans[${i}]`;
			const r = objectAt(rs, field);
			return {
				resource: decodeResource(r.resource, `${field}.resource`),
				scopeSpans: arrayAt(r.scopeSpans, `${field}.scopeSpans`).map((ss, j) => {
					const sfield = `${field}.scopeSpans[${j}]`;
					const s = objectAt(ss, sfield);
					return {
						scope: decodeScope(s.scope, `${sfield}.scope`),
						spans: arrayAt(s.spans, `${sfield}.spans`).map((span, k) =>
							decodeSpan(span, `${sfield}.spans[${k}]`),
						),
					};
				}),
			};
		}),
	};
}

export function encodeTraces(traces: Traces): JsonObject {
	return {
		resourceSpans: traces.resourceSpans.map((rs) => ({
			resource: encodeResource(rs.resource),
			scopeSpans: rs.scopeSpans.map((ss) => ({
				scope: encodeScope(ss.scope),
				spans: ss.spans.map((span) => ({
					traceId: encodeId(span.traceId),
					spanId: encodeId(span.spanId),
					parentSpanId: encodeId(span.parentSpanId),
					traceState: span.traceState,
					name: span.name,
					kind: span.kind,
					startTimeUnixNano: span.startTimeUnixNano.toString(),
					endTimeUnixNano: span.endTimeUnixNano.toString(),
					attributes: encodeAttributes(span.attributes),
					droppedAttributesCount: span.droppedAttributesCount,
					droppedEventsCount: span.droppedEventsCount,
					droppedLinksCount: span.droppedLinksCount,
					status: { code: span.status.code, message: span.status.message },
				})),
			})),
		})),
	};
}

// ─── Metrics ──────────────────────────────────────────────────────────────────

function decodeNumberPoint(raw: unknown, field: string): NumberDataPoint {
	const p = objectAt(raw, field);
	let value: NumberValue = { type: 'empty' };
	if (p.asInt !== undefined) value = { type: 'int', value: bigintAt(p.asInt, `${field}.asInt`) };
	else if (p.asDouble !== undefined) {
		value = { type: 'double', value: numberAt(p.asDouble, `${field}.asDouble`) };
	}
	return {
		attributes: decodeAttributes(p.attributes, `${field}.attributes`),
		startTimeUnixNano: bigintAt(p.startTimeUnixNano, `${field}.startTimeUnixNano`),
		timeUnixNano: bigintAt(p.timeUnixNano, `${field}.timeUnixNano`),
		value,
		flags: uint32At(p.flags, `${field}.flags`),
	};
}

function decodeHistogramPoint(raw: unknown, field: string): HistogramDataPoint {
	const p = objectAt(raw, field);
	return {
		attributes: decodeAttributes(p.attributes, `${field}.attributes`),
		startTimeUnixNano: bigintAt(p.startTimeUnixNano, `${field}.startTimeUnixNano`),
		timeUnixNano: bigintAt(p.timeUnixNano, `${field}.timeUnixNano`),
		count: bigintAt(p.count, `${field}.count`),
		sum: p.sum === undefined || p.sum === null ? undefined : numberAt(p.sum, `${field}.sum`),
		bucketCounts: arrayAt(p.bucketCounts, `${field}.bucketCounts`).map((c, i) =>
			bigintAt(c, `${field}.bucketCounts[${i}]`),
		),
		explicitBounds: arrayAt(p.explicitBounds, `${field}.explicitBounds`).map((b, i) =>
			numberAt(b, `${field}.explicitBounds[${i}]`),
		),
		flags: uint32At(p.flags, `${field}.flags`),
	};
}

function decodeSummaryPoint(raw: unknown, field: string): SummaryDataPoint {
	const p = objectAt(raw, field);
	return {
		attributes: decodeAttributes(p.attributes, `${field}.attributes`),
		startTimeUnixNano: bigintAt(p.startTimeUnixNano, `${field}.startTimeUnixNano`),
		timeUnixNano: bigintAt(p.timeUnixNano, `${field}.timeUnixNano`),
		count: bigintAt(p.count, `${field}.count`),
		sum: numberAt(p.sum, `${field}.sum`),
		quantileValues: arrayAt(p.quantileValues, `${field}.quantileValues`).map((q, i) => {
			const qv = objectAt(q, `${field}.quantileValues[${i}]`);
			return {
				quantile: numberAt(qv.quantile, `${field}.quantileValues[${i}].quantile`),
				value: numberAt(qv.value, `${field}.quantileValues[${i}].value`),
			};
		}),
		flags: uint32At(p.flags, `${field}.flags`),
	};
}

function decodeMetricData(m: JsonObject, field: string): MetricData {
	if (m.gauge !== undefined) {
		const g = optObject(m.gauge, `${field}.gauge`);
		return {
			type: 'gauge',
			dataPoints: arrayAt(g.dataPoints, `${field}.gauge.dataPoints`).map((p, i) =>
				decodeNumberPoint(p, `${field}.gauge.dataPoints[${i}]`),
			),
		};
	}
	if (m.sum !== undefined) {
		const s = optObject(m.sum, `${field}.sum`);
		return {
			type: 'sum',
			aggregationTemporality: uint32At(
				s.aggregationTemporality ?? AggregationTemporality.UNSPECIFIED,
				`${field}.sum.aggregationTemporality`,
			),
			isMonotonic: s.isMonotonic === true,
			dataPoints: arrayAt(s.dataPoints, `${field}.sum.dataPoints`).map((p, i) =>
				decodeNumberPoint(p, `${field}.sum.dataPoints[${i}]`),
			),
		};
	}
	if (m.histogram !== undefined) {
		const h = optObject(m.histogram, `${field}.histogram`);
		return {
			type: 'histogram',
			aggregationTemporality: uint32At(
				h.aggregationTemporality,
				`${field}.histogram.aggregationTemporality`,
			),
			dataPoints: arrayAt(h.dataPoints, `${field}.histogram.dataPoints`).map((p, i) =>
				decodeHistogramPoint(p, `${field}.histogram.dataPoints[${i}]`),
			),
		};
	}
	if (m.summary !== undefined) {
		const s = optObject(m.summary, `${field}.summary`);
		return {
			type: 'summary',
			dataPoints: arrayAt(s.dataPoints, `${field}.summary.dataPoints`).map((p, i) =>
				decodeSummaryPoint(p, `${field}.summary.dataPoints[${i}]`),
			),
		};
	}
	return { type: 'empty' };
}

function decodeMetric(raw: unknown, field: string): Metric {
	const m = objectAt(raw, field);
	return {
		name: stringAt(m.name, `${field}.name`),
		description: stringAt(m.description, `${field}.description`),
		unit: stringAt(m.unit, `${field}.unit`),
		data: decodeMetricData(m, field),
	};
}

export function decodeMetrics(raw: unknown): Metrics {
	const root = objectAt(raw, '$');
	return {
		resourceMetrics: arrayAt(root.resourceMetrics, 'resourceMetrics').map((rm, i) => {
			const field = `resourceMetrics[${i}]`;
			const r = objectAt(rm, field);
			return {
				resource: decodeResource(r.resource, `${field}.resource`),
				scopeMetrics: arrayAt(r.scopeMetrics, `${field}.scopeMetrics`).map((sm, j) => {
					const sfield = `${field}.scopeMetrics[${j}]`;
					const s = objectAt(sm, sfield);
					return {
						scope: decodeScope(s.scope, `${sfield}.scope`),
						metrics: arrayAt(s.metrics, `${sfield}.metrics`).map((metric, k) =>
							decodeMetric(metric, `${sfield}.metrics[${k}]`),
						),
					};
				}),
			};
		}),
	};
}

function encodeNumberPoint(point: NumberDataPoint): JsonObject {
	const value: JsonObject = {};
	if (point.value.type === 'int') value.asInt = point.value.value.toString();
	else if (point.value.type === 'double') value.asDouble = point.value.value;
	return {
		attributes: encodeAttributes(point.attributes),
		startTimeUnixNano: point.startTimeUnixNano.toString(),
		timeUnixNano: point.timeUnixNano.toString(),
		...value,
		flags: point.flags,
	};
}

function encodeMetricData(data: MetricData): JsonObject {
	switch (data.type) {
		case 'empty':
			return {};
		case 'gauge':
			return { gauge: { dataPoints: data.dataPoints.map(encodeNumberPoint) } };
		case 'sum':
			return {
				sum: {
					aggregationTemporality: data.aggregationTemporality,
					isMonotonic: data.isMonotonic,
					dataPoints: data.dataPoints.map(encodeNumberPoint),
				},
			};
		case 'histogram':
			return {
				histogram: {
					aggregationTemporality: data.aggregationTemporality,
					dataPoints: data.dataPoints.map((p) => ({
						attributes: encodeAttributes(p.attributes),
						startTimeUnixNano: p.startTimeUnixNano.toString(),
						timeUnixNano: p.timeUnixNano.toString(),
						count: p.count.toString(),
						...(p.sum === undefined ? {} : { sum: p.sum }),
						bucketCounts: p.bucketCounts.map((c) => c.toString()),
						explicitBounds: p.explicitBounds,
						flags: p.flags,
					})),
				},
			};
		case 'summary':
			return {
				summary: {
					dataPoints: data.dataPoints.map((p) => ({
						attributes: encodeAttributes(p.attributes),
						startTimeUnixNano: p.startTimeUnixNano.toString(),
						timeUnixNano: p.timeUnixNano.toString(),
						count: p.count.toString(),
						sum: p.sum,
						quantileValues: p.quantileValues.map((q) => ({ ...q })),
						flags: p.flags,
					})),
				},
			};
	}
}

export function encodeMetrics(metrics: Metrics): JsonObject {
	return {
		resourceMetrics: metrics.resourceMetrics.map((rm) => ({
			resource: encodeResource(rm.resource),
			scopeMetrics: rm.scopeMetrics.map((sm) => ({
				scope: encodeScope(sm.scope),
				metrics: sm.metrics.map((m) => ({
					name: m.name,
					description: m.description,
					unit: m.unit,
					...encodeMetricData(m.data),
				})),
			})),
		})),
	};
}

// ─── Logs ─────────────────────────────────────────────────────────────────────

function decodeLogRecord(raw: unknown, field: string): LogRecord {
	const l = objectAt(raw, field);
	return {
		timeUnixNano: bigintAt(l.timeUnixNano, `${field}.timeUnixNano`),
		observedTimeUnixNano: bigintAt(l.observedTimeUnixNano, `${field}.observedTimeUnixNano`),
		severityNumber: uint32At(l.severityNumber, `${field}.severityNumber`),
		severityText: stringAt(l.severityText, `${field}.severityText`),
		body: decodeAnyValue(l.body, `${field}.body`),
		attributes: decodeAttributes(l.attributes, `${field}.attributes`),
		droppedAttributesCount: uint32At(l.droppedAttributesCount, `${field}.droppedAttributesCount`),
		flags: uint32At(l.flags, `${field}.flags`),
		traceId: idAt(l.traceId, `${field}.traceId`, 16),
		spanId: idAt(l.spanId, `${field}.spanId`, 8),
	};
}

export function decodeLogs(raw: unknown): Logs {
	const root = objectAt(raw, '$');
	return {
		resourceLogs: arrayAt(root.resourceLogs, 'resourceLogs').map((rl, i) => {
			const field = `resourceLogs[${i}]`;
			const r = objectAt(rl, field);
			return {
				resource: decodeResource(r.resource, `${field}.resource`),
				scopeLogs: arrayAt(r.scopeLogs, `${field}.scopeLogs`).map((sl, j) => {
					const sfield = `${field}.scopeLogs[${j}]`;
					const s = objectAt(sl, sfield);
					return {
						scope: decodeScope(s.scope, `${sfield}.scope`),
						logRecords: arrayAt(s.logRecords, `${sfield}.logRecords`).map((record, k) =>
							decodeLogRecord(record, `${sfield}.logRecords[${k}]`),
						),
					};
				}),
			};
		}),
	};
}

export function encodeLogs(logs: Logs): JsonObject {
	return {
		resourceLogs: logs.resourceLogs.map((rl) => ({
			resource: encodeResource(rl.resource),
			scopeLogs: rl.scopeLogs.map((sl) => ({
				scope: encodeScope(sl.scope),
				logRecords: sl.logRecords.map((l) => ({
					timeUnixNano: l.timeUnixNano.toString(),
					observedTimeUnixNano: l.observedTimeUnixNano.toString(),
					severityNumber: l.severityNumber,
					severityText: l.severityText,
					body: encodeAnyValue(l.body),
					attributes: encodeAttributes(l.attributes),
					droppedAttributesCount: l.droppedAttributesCount,
					flags: l.flags,
					traceId: encodeId(l.traceId),
					spanId: encodeId(l.spanId),
				})),
			})),
		})),
	};
}
