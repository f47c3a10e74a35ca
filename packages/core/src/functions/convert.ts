import { type AnyValue, emptyValue, intValue } from '@telemorph/sdk';
import type { FunctionFactory } from '../registry.js';

const INTEGER = /^[+-]?\d+$/;

/** Convert to int; returns empty when the value has no integer reading */
export function toInt(value: AnyValue): AnyValue {
	switch (value.type) {
		case 'int':
			return value;
		case 'double':
			return Number.isFinite(value.value) ? intValue(BigInt(Math.trunc(value.value))) : emptyValue();
		case 'bool':
			return intValue(value.value ? 1n : 0n);
		case 'string': {
			const text = value.value.trim();
			return INTEGER.test(text) ? intValue(BigInt(text)) : emptyValue();
		}
		default:
			return emptyValue();
	}
}

export function int<K>(): FunctionFactory<K> {
	return {
		name: 'Int',
		params: [{ name: 'value', kind: 'getter' }],
		returns: 'int',
		create(args) {
			const value = args.getter('value');
			return (ctx) => toInt(value.get(ctx));
		},
	};
}
