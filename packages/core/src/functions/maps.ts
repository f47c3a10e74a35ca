/**
 * Editors that operate on map-valued targets. A target that is not a map
 * when the statement runs is left alone; an error resolving the target
 * itself propagates to the evaluator.
 */

import { emptyValue, stringValue } from '@telemorph/sdk';
import { BindError } from '../errors.js';
import type { FunctionFactory } from '../registry.js';
import { compilePattern } from './pattern.js';

export function deleteKey<K>(): FunctionFactory<K> {
	return {
		name: 'delete_key',
		params: [
			{ name: 'target', kind: 'getter' },
			{ name: 'key', kind: 'string' },
		],
		returns: 'empty',
		create(args) {
			const target = args.getter('target');
			const key = args.string('key');
			return (ctx) => {
				const value = target.get(ctx);
				if (value.type === 'map') value.value.remove(key);
				return emptyValue();
			};
		},
	};
}

export function deleteMatchingKeys<K>(): FunctionFactory<K> {
	return {
		name: 'delete_matching_keys',
		params: [
			{ name: 'target', kind: 'getter' },
			{ name: 'pattern', kind: 'string' },
		],
		returns: 'empty',
		create(args) {
			const target = args.getter('target');
			const pattern = compilePattern('delete_matching_keys', args.string('pattern'));
			return (ctx) => {
				const value = target.get(ctx);
				if (value.type === 'map') value.value.removeIf((key) => pattern.test(key));
				return emptyValue();
			};
		},
	};
}

export function keepKeys<K>(): FunctionFactory<K> {
	return {
		name: 'keep_keys',
		params: [
			{ name: 'target', kind: 'getter' },
			{ name: 'keys', kind: 'strings' },
		],
		returns: 'empty',
		create(args) {
			const target = args.getter('target');
			const keep = new Set(args.strings('keys'));
			return (ctx) => {
				const value = target.get(ctx);
				if (value.type === 'map') value.value.removeIf((key) => !keep.has(key));
				return emptyValue();
			};
		},
	};
}

export function truncateAll<K>(): FunctionFactory<K> {
	return {
		name: 'truncate_all',
		params: [
			{ name: 'target', kind: 'getter' },
			{ name: 'limit', kind: 'int' },
		],
		returns: 'empty',
		create(args) {
			const target = args.getter('target');
			const limit = args.int('limit');
			if (limit < 0n) {
				throw new BindError(`truncate_all: limit must be non-negative, got ${limit}`);
			}
			const max = Number(limit);
			return (ctx) => {
				const value = target.get(ctx);
				if (value.type !== 'map') return emptyValue();
				for (const [key, item] of [...value.value.entries()]) {
					if (item.type !== 'string' || item.value.length <= max) continue;
					// The limit counts code points
					const chars = Array.from(item.value);
					if (chars.length > max) value.value.put(key, stringValue(chars.slice(0, max).join('')));
				}
				return emptyValue();
			};
		},
	};
}

/**
 * Cap a map at `limit` entries. Priority keys that are present survive
 * first; the remaining room goes to other keys in insertion order.
 */
export function limit<K>(): FunctionFactory<K> {
	return {
		name: 'limit',
		params: [
			{ name: 'target', kind: 'getter' },
			{ name: 'limit', kind: 'int' },
			{ name: 'priority_keys', kind: 'strings', optional: true },
		],
		returns: 'empty',
		create(args) {
			const target = args.getter('target');
			const limit = args.int('limit');
			const priority = [...new Set(args.strings('priority_keys'))];
			if (limit < 0n) {
				throw new BindError(`limit: limit must be non-negative, got ${limit}`);
			}
			if (BigInt(priority.length) > limit) {
				throw new BindError(
					`limit: ${priority.length} priority keys do not fit in a limit of ${limit}`,
				);
			}
			const max = Number(limit);
			return (ctx) => {
				const value = target.get(ctx);
				if (value.type !== 'map' || value.value.size <= max) return emptyValue();

				const map = value.value;
				const kept = new Set(priority.filter((key) => map.has(key)));
				for (const key of map.keys()) {
					if (kept.size >= max) break;
					kept.add(key);
				}
				map.removeIf((key) => !kept.has(key));
				return emptyValue();
			};
		},
	};
}
