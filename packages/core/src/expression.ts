/**
 * Getter / Setter primitives.
 *
 * A Getter evaluates a literal, a resolved path or a nested function call
 * against a context. A GetSetter additionally writes through a path. Both are
 * built once at bind time and shared across records.
 */

import type { AnyValue } from '@telemorph/sdk';
import type { FieldType, StaticType } from './coercion.js';

/** A bound function node: statement body or nested value expression */
export type ExprFunc<K> = (ctx: K) => AnyValue;

export interface Getter<K> {
	/** Static type of the produced value */
	readonly type: StaticType;
	/** Canonical text, used in error messages */
	readonly text: string;
	get(ctx: K): AnyValue;
}

export interface GetSetter<K> extends Getter<K> {
	/** Type the location accepts; values are coerced to it on write */
	readonly fieldType: FieldType;
	set(ctx: K, value: AnyValue): void;
}

export function isGetSetter<K>(getter: Getter<K>): getter is GetSetter<K> {
	return 'set' in getter && typeof getter.set === 'function';
}

/** A constant. The value is shared across records, so it must never be mutated. */
export function literalGetter<K>(value: AnyValue, text: string): Getter<K> {
	return {
		type: value.type,
		text,
		get: () => value,
	};
}

/** A nested call, invoked lazily each time the value is needed */
export function callGetter<K>(fn: ExprFunc<K>, type: StaticType, text: string): Getter<K> {
	return {
		type,
		text,
		get: (ctx) => fn(ctx),
	};
}
