import type { ContextKind } from '@telemorph/sdk';
import type { FieldTable } from '../path.js';
import type { TelemetryContext } from './fields.js';

/**
 * Everything the binder needs to know about one record kind: the fields a
 * path may name and the enum symbols literals may use.
 */
export interface ContextDefinition<K extends TelemetryContext> {
	readonly kind: ContextKind;
	readonly fields: FieldTable<K>;
	readonly enums: Readonly<Record<string, bigint>>;
}
