/**
 * Log record context.
 */

import type { InstrumentationScope, LogRecord, Resource } from '@telemorph/sdk';
import type { FieldTable } from '../path.js';
import type { ContextDefinition } from './definition.js';
import {
	type TelemetryContext,
	anyField,
	attributesField,
	bigintField,
	enclosingFields,
	idField,
	numberField,
	stringField,
} from './fields.js';

export class LogContext implements TelemetryContext {
	constructor(
		private readonly logRecord: LogRecord,
		private readonly scope: InstrumentationScope,
		private readonly resource: Resource,
	) {}

	getLogRecord(): LogRecord {
		return this.logRecord;
	}

	getScope(): InstrumentationScope {
		return this.scope;
	}

	getResource(): Resource {
		return this.resource;
	}
}

const fields: FieldTable<LogContext> = {
	...enclosingFields<LogContext>(),
	time_unix_nano: bigintField(
		(ctx) => ctx.getLogRecord().timeUnixNano,
		(ctx, v) => {
			ctx.getLogRecord().timeUnixNano = v;
		},
	),
	observed_time_unix_nano: bigintField(
		(ctx) => ctx.getLogRecord().observedTimeUnixNano,
		(ctx, v) => {
			ctx.getLogRecord().observedTimeUnixNano = v;
		},
	),
	severity_number: numberField(
		(ctx) => ctx.getLogRecord().severityNumber,
		(ctx, v) => {
			ctx.getLogRecord().severityNumber = v;
		},
	),
	severity_text: stringField(
		(ctx) => ctx.getLogRecord().severityText,
		(ctx, v) => {
			ctx.getLogRecord().severityText = v;
		},
	),
	body: anyField(
		(ctx) => ctx.getLogRecord().body,
		(ctx, v) => {
			ctx.getLogRecord().body = v;
		},
	),
	attributes: attributesField((ctx) => ctx.getLogRecord().attributes),
	dropped_attributes_count: numberField(
		(ctx) => ctx.getLogRecord().droppedAttributesCount,
		(ctx, v) => {
			ctx.getLogRecord().droppedAttributesCount = v;
		},
	),
	flags: numberField(
		(ctx) => ctx.getLogRecord().flags,
		(ctx, v) => {
			ctx.getLogRecord().flags = v;
		},
	),
	trace_id: idField(
		16,
		(ctx) => ctx.getLogRecord().traceId,
		(ctx, v) => {
			ctx.getLogRecord().traceId = v;
		},
	),
	span_id: idField(
		8,
		(ctx) => ctx.getLogRecord().spanId,
		(ctx, v) => {
			ctx.getLogRecord().spanId = v;
		},
	),
};

const SEVERITY_GROUPS = ['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'];

function severityEnums(): Record<string, bigint> {
	const enums: Record<string, bigint> = { SEVERITY_NUMBER_UNSPECIFIED: 0n };
	SEVERITY_GROUPS.forEach((group, g) => {
		for (let step = 0; step < 4; step++) {
			const suffix = step === 0 ? '' : String(step + 1);
			enums[`SEVERITY_NUMBER_${group}${suffix}`] = BigInt(g * 4 + step + 1);
		}
	});
	return enums;
}

export const logContext: ContextDefinition<LogContext> = {
	kind: 'log',
	fields,
	enums: severityEnums(),
};
