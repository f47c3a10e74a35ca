/**
 * The function set each context kind binds against.
 */

import {
	type DataPointContext,
	FunctionRegistry,
	type LogContext,
	type ResourceContext,
	type SpanContext,
	formatSignature,
	standardFunctions,
} from '@telemorph/core';
import type { ContextKind } from '@telemorph/sdk';
import { dataPointFunctions } from './metrics.js';

export interface ContextRegistries {
	span: FunctionRegistry<SpanContext>;
	log: FunctionRegistry<LogContext>;
	datapoint: FunctionRegistry<DataPointContext>;
	resource: FunctionRegistry<ResourceContext>;
}

/** Fresh, sealed registries for every context kind */
export function createRegistries(): ContextRegistries {
	return {
		span: new FunctionRegistry(standardFunctions<SpanContext>()).seal(),
		log: new FunctionRegistry(standardFunctions<LogContext>()).seal(),
		datapoint: new FunctionRegistry(dataPointFunctions()).seal(),
		resource: new FunctionRegistry(standardFunctions<ResourceContext>()).seal(),
	};
}

/** Signatures of the functions a context offers, sorted by name */
export function describeFunctions(kind: ContextKind): string[] {
	const registries = createRegistries();
	switch (kind) {
		case 'span':
			return registries.span.list().map(formatSignature);
		case 'log':
			return registries.log.list().map(formatSignature);
		case 'datapoint':
			return registries.datapoint.list().map(formatSignature);
		case 'resource':
			return registries.resource.list().map(formatSignature);
	}
}
