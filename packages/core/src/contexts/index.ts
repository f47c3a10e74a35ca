export type { ContextDefinition } from './definition.js';
export type { TelemetryContext } from './fields.js';
export { DataPointContext, METRIC_TYPE_CODES, dataPointContext } from './datapoint.js';
export { LogContext, logContext } from './log.js';
export { ResourceContext, resourceContext } from './resource.js';
export { SpanContext, spanContext } from './span.js';
