import type { FunctionFactory } from '../registry.js';
import { int } from './convert.js';
import { deleteKey, deleteMatchingKeys, keepKeys, limit, truncateAll } from './maps.js';
import { set } from './set.js';
import { concat, isMatch, replacePattern, split } from './strings.js';

export { toInt } from './convert.js';
export { compilePattern } from './pattern.js';
export {
	concat,
	deleteKey,
	deleteMatchingKeys,
	int,
	isMatch,
	keepKeys,
	limit,
	replacePattern,
	set,
	split,
	truncateAll,
};

/** The functions available in every context */
export function standardFunctions<K>(): FunctionFactory<K>[] {
	return [
		set<K>(),
		deleteKey<K>(),
		deleteMatchingKeys<K>(),
		keepKeys<K>(),
		truncateAll<K>(),
		limit<K>(),
		replacePattern<K>(),
		concat<K>(),
		isMatch<K>(),
		int<K>(),
		split<K>(),
	];
}
