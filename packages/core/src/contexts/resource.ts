/**
 * Resource context: statements that run once per resource, above the
 * scope level. Its paths are the resource's own fields, without prefix.
 */

import type { InstrumentationScope, Resource } from '@telemorph/sdk';
import type { ContextDefinition } from './definition.js';
import { type TelemetryContext, resourceFields } from './fields.js';

export class ResourceContext implements TelemetryContext {
	constructor(private readonly resource: Resource) {}

	getResource(): Resource {
		return this.resource;
	}

	getScope(): InstrumentationScope | undefined {
		return undefined;
	}
}

export const resourceContext: ContextDefinition<ResourceContext> = {
	kind: 'resource',
	fields: resourceFields<ResourceContext>(),
	enums: {},
};
