/**
 * Span context.
 */

import type { InstrumentationScope, Resource, Span } from '@telemorph/sdk';
import type { FieldTable } from '../path.js';
import type { ContextDefinition } from './definition.js';
import {
	type TelemetryContext,
	attributesField,
	bigintField,
	enclosingFields,
	idField,
	numberField,
	stringField,
} from './fields.js';

export class SpanContext implements TelemetryContext {
	constructor(
		private readonly span: Span,
		private readonly scope: InstrumentationScope,
		private readonly resource: Resource,
	) {}

	getSpan(): Span {
		return this.span;
	}

	getScope(): InstrumentationScope {
		return this.scope;
	}

	getResource(): Resource {
		return this.resource;
	}
}

const fields: FieldTable<SpanContext> = {
	...enclosingFields<SpanContext>(),
	trace_id: idField(
		16,
		(ctx) => ctx.getSpan().traceId,
		(ctx, v) => {
			ctx.getSpan().traceId = v;
		},
	),
	span_id: idField(
		8,
		(ctx) => ctx.getSpan().spanId,
		(ctx, v) => {
			ctx.getSpan().spanId = v;
		},
	),
	parent_span_id: idField(
		8,
		(ctx) => ctx.getSpan().parentSpanId,
		(ctx, v) => {
			ctx.getSpan().parentSpanId = v;
		},
	),
	trace_state: stringField(
		(ctx) => ctx.getSpan().traceState,
		(ctx, v) => {
			ctx.getSpan().traceState = v;
		},
	),
	name: stringField(
		(ctx) => ctx.getSpan().name,
		(ctx, v) => {
			ctx.getSpan().name = v;
		},
	),
	kind: numberField(
		(ctx) => ctx.getSpan().kind,
		(ctx, v) => {
			ctx.getSpan().kind = v;
		},
	),
	start_time_unix_nano: bigintField(
		(ctx) => ctx.getSpan().startTimeUnixNano,
		(ctx, v) => {
			ctx.getSpan().startTimeUnixNano = v;
		},
	),
	end_time_unix_nano: bigintField(
		(ctx) => ctx.getSpan().endTimeUnixNano,
		(ctx, v) => {
			ctx.getSpan().endTimeUnixNano = v;
		},
	),
	attributes: attributesField((ctx) => ctx.getSpan().attributes),
	dropped_attributes_count: numberField(
		(ctx) => ctx.getSpan().droppedAttributesCount,
		(ctx, v) => {
			ctx.getSpan().droppedAttributesCount = v;
		},
	),
	dropped_events_count: numberField(
		(ctx) => ctx.getSpan().droppedEventsCount,
		(ctx, v) => {
			ctx.getSpan().droppedEventsCount = v;
		},
	),
	dropped_links_count: numberField(
		(ctx) => ctx.getSpan().droppedLinksCount,
		(ctx, v) => {
			ctx.getSpan().droppedLinksCount = v;
		},
	),
	status: {
		children: {
			code: numberField(
				(ctx) => ctx.getSpan().status.code,
				(ctx, v) => {
					ctx.getSpan().status.code = v;
				},
			),
			message: stringField(
				(ctx) => ctx.getSpan().status.message,
				(ctx, v) => {
					ctx.getSpan().status.message = v;
				},
			),
		},
	},
};

export const spanContext: ContextDefinition<SpanContext> = {
	kind: 'span',
	fields,
	enums: {
		SPAN_KIND_UNSPECIFIED: 0n,
		SPAN_KIND_INTERNAL: 1n,
		SPAN_KIND_SERVER: 2n,
		SPAN_KIND_CLIENT: 3n,
		SPAN_KIND_PRODUCER: 4n,
		SPAN_KIND_CONSUMER: 5n,
		STATUS_CODE_UNSET: 0n,
		STATUS_CODE_OK: 1n,
		STATUS_CODE_ERROR: 2n,
	},
};
