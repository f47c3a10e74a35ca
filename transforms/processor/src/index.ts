/**
 * @telemorph/transform-processor: registration entry point.
 */

import type { ProcessorRegistration } from '@telemorph/sdk';
import { TransformProcessor } from './processor.js';

const statementGroups = (contexts: string[]) => ({
	type: 'array',
	items: {
		type: 'object',
		properties: {
			context: { type: 'string', enum: contexts },
			statements: {
				type: 'array',
				description: 'Statement ASTs: { call: { name, args }, where? }',
				items: { type: 'object', required: ['call'] },
			},
		},
		required: ['context', 'statements'],
		additionalProperties: false,
	},
});

export function register(): ProcessorRegistration {
	return {
		id: 'transform',
		processor: TransformProcessor,
		configSchema: {
			type: 'object',
			properties: {
				error_mode: {
					type: 'string',
					enum: ['ignore', 'propagate', 'drop'],
					description: 'What happens to records with failing statements (default: propagate).',
				},
				trace_statements: statementGroups(['span', 'resource']),
				metric_statements: statementGroups(['datapoint', 'resource']),
				log_statements: statementGroups(['log', 'resource']),
			},
			additionalProperties: false,
		},
	};
}

export {
	ConfigError,
	ERROR_MODES,
	parseConfig,
	validateConfig,
} from './config.js';
export type {
	ContextStatements,
	ErrorMode,
	LogContextKind,
	MetricContextKind,
	TraceContextKind,
	TransformConfig,
	ValidationError,
} from './config.js';
export { convertGaugeToSum, convertSumToGauge, dataPointFunctions } from './metrics.js';
export { createRegistries, describeFunctions } from './registries.js';
export type { ContextRegistries } from './registries.js';
export { TransformProcessor } from './processor.js';
export type { TransformProcessorOptions } from './processor.js';
