/**
 * Coercion table: which values a field of a given type accepts.
 *
 * The table is exhaustive over field type × value type; adding a value type
 * to the SDK union fails compilation here until every row says what to do
 * with it. The binder consults the same table with static types, so a write
 * that can never succeed is rejected before the first record.
 */

import { type AnyValue, type ValueType, cloneValue, doubleValue } from '@telemorph/sdk';
import { TypeMismatchError } from './errors.js';

/** Declared type of a writable location. `any` holds every value type. */
export type FieldType = Exclude<ValueType, 'empty'> | 'any';

/**
 * Static type of an expression. `empty` marks expressions that never produce
 * a value (nil literals, editor functions); `any` means known only at run time.
 */
export type StaticType = ValueType | 'any';

/**
 * accept: store a deep copy of the value
 * widen: int → double
 * skip: leave the location untouched, no error
 * reject: TypeMismatch
 */
type Rule = 'accept' | 'widen' | 'skip' | 'reject';

const COERCIONS: Record<FieldType, Record<ValueType, Rule>> = {
	string: {
		empty: 'reject',
		string: 'accept',
		int: 'reject',
		double: 'reject',
		bool: 'reject',
		bytes: 'reject',
		map: 'reject',
		slice: 'reject',
	},
	int: {
		empty: 'reject',
		string: 'reject',
		int: 'accept',
		double: 'reject',
		bool: 'reject',
		bytes: 'reject',
		map: 'reject',
		slice: 'reject',
	},
	double: {
		empty: 'reject',
		string: 'reject',
		int: 'widen',
		double: 'accept',
		bool: 'reject',
		bytes: 'reject',
		map: 'reject',
		slice: 'reject',
	},
	bool: {
		empty: 'reject',
		string: 'reject',
		int: 'reject',
		double: 'reject',
		bool: 'accept',
		bytes: 'reject',
		map: 'reject',
		slice: 'reject',
	},
	bytes: {
		empty: 'reject',
		string: 'reject',
		int: 'reject',
		double: 'reject',
		bool: 'reject',
		bytes: 'accept',
		map: 'reject',
		slice: 'reject',
	},
	map: {
		empty: 'reject',
		string: 'reject',
		int: 'reject',
		double: 'reject',
		bool: 'reject',
		bytes: 'reject',
		map: 'accept',
		slice: 'reject',
	},
	slice: {
		empty: 'reject',
		string: 'reject',
		int: 'reject',
		double: 'reject',
		bool: 'reject',
		bytes: 'reject',
		map: 'reject',
		slice: 'accept',
	},
	any: {
		empty: 'skip',
		string: 'accept',
		int: 'accept',
		double: 'accept',
		bool: 'accept',
		bytes: 'accept',
		map: 'accept',
		slice: 'accept',
	},
};

/**
 * Coerce a value for a write into a `target` location.
 * Returns undefined when the write should be skipped.
 */
export function coerce(value: AnyValue, target: FieldType, where: string): AnyValue | undefined {
	switch (COERCIONS[target][value.type]) {
		case 'accept':
			return cloneValue(value);
		case 'widen':
			return value.type === 'int' ? doubleValue(Number(value.value)) : cloneValue(value);
		case 'skip':
			return undefined;
		case 'reject':
			throw new TypeMismatchError(target, value.type, where);
	}
}

/**
 * Bind-time check. False only when both types are known and the table
 * rejects the pair.
 */
export function isAssignable(target: FieldType, source: StaticType): boolean {
	if (source === 'any') return true;
	return COERCIONS[target][source] !== 'reject';
}

/** Narrow a value to a type, raising TypeMismatch otherwise */
export function expectType<T extends ValueType>(
	value: AnyValue,
	type: T,
	where: string,
): Extract<AnyValue, { type: T }> {
	if (isOfType(value, type)) return value;
	throw new TypeMismatchError(type, value.type, where);
}

function isOfType<T extends ValueType>(
	value: AnyValue,
	type: T,
): value is Extract<AnyValue, { type: T }> {
	return value.type === type;
}
