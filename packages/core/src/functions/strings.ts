/**
 * String editors and converters.
 *
 * Converters (capitalised names) return a value and leave the record alone;
 * on an input they cannot handle they return empty rather than failing.
 */

import {
	type AnyValue,
	boolValue,
	emptyValue,
	sliceValue,
	stringValue,
	valueToString,
} from '@telemorph/sdk';
import type { FunctionFactory } from '../registry.js';
import { compilePattern } from './pattern.js';

export function replacePattern<K>(): FunctionFactory<K> {
	return {
		name: 'replace_pattern',
		params: [
			{ name: 'target', kind: 'setter', type: 'string' },
			{ name: 'regex', kind: 'string' },
			{ name: 'replacement', kind: 'string' },
		],
		returns: 'empty',
		create(args) {
			const target = args.setter('target');
			const regex = compilePattern('replace_pattern', args.string('regex'), 'g');
			const replacement = args.string('replacement');
			return (ctx) => {
				const value = target.get(ctx);
				if (value.type !== 'string') return emptyValue();
				const replaced = value.value.replace(regex, replacement);
				if (replaced !== value.value) target.set(ctx, stringValue(replaced));
				return emptyValue();
			};
		},
	};
}

/** Join values with a delimiter. Maps and slices render as JSON, empty as "". */
export function concat<K>(): FunctionFactory<K> {
	return {
		name: 'Concat',
		params: [
			{ name: 'values', kind: 'getters' },
			{ name: 'delimiter', kind: 'string' },
		],
		returns: 'string',
		create(args) {
			const values = args.getters('values');
			const delimiter = args.string('delimiter');
			return (ctx) =>
				stringValue(values.map((getter) => valueToString(getter.get(ctx))).join(delimiter));
		},
	};
}

export function isMatch<K>(): FunctionFactory<K> {
	return {
		name: 'IsMatch',
		params: [
			{ name: 'target', kind: 'getter' },
			{ name: 'pattern', kind: 'string' },
		],
		returns: 'bool',
		create(args) {
			const target = args.getter('target');
			const pattern = compilePattern('IsMatch', args.string('pattern'));
			return (ctx) => {
				const value = target.get(ctx);
				return boolValue(value.type === 'string' && pattern.test(value.value));
			};
		},
	};
}

export function split<K>(): FunctionFactory<K> {
	return {
		name: 'Split',
		params: [
			{ name: 'target', kind: 'getter' },
			{ name: 'delimiter', kind: 'string' },
		],
		returns: 'slice',
		create(args) {
			const target = args.getter('target');
			const delimiter = args.string('delimiter');
			return (ctx): AnyValue => {
				const value = target.get(ctx);
				if (value.type !== 'string') return emptyValue();
				return sliceValue(value.value.split(delimiter).map(stringValue));
			};
		},
	};
}
