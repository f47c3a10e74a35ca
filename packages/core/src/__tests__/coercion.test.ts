import {
	AttributeMap,
	doubleValue,
	emptyValue,
	intValue,
	mapValue,
	stringValue,
} from '@telemorph/sdk';
import { describe, expect, it } from 'vitest';
import { coerce, expectType, isAssignable } from '../coercion.js';
import { TypeMismatchError } from '../errors.js';

describe('coerce', () => {
	it('widens int to double', () => {
		expect(coerce(intValue(3), 'double', 'value_double')).toEqual(doubleValue(3));
	});

	it('does not narrow double to int', () => {
		expect(() => coerce(doubleValue(3), 'int', 'value_int')).toThrow(
			'value_int: expected int, got double',
		);
	});

	it('rejects with a TypeMismatchError naming the location', () => {
		try {
			coerce(stringValue('high'), 'int', 'severity_number');
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(TypeMismatchError);
			if (!(err instanceof TypeMismatchError)) return;
			expect(err.kind).toBe('type_mismatch');
			expect(err.expected).toBe('int');
			expect(err.actual).toBe('string');
			expect(err.message).toBe('severity_number: expected int, got string');
		}
	});

	it('skips empty writes into any-typed locations', () => {
		expect(coerce(emptyValue(), 'any', 'body')).toBeUndefined();
	});

	it('rejects empty writes into typed locations', () => {
		expect(() => coerce(emptyValue(), 'string', 'name')).toThrow('name: expected string, got empty');
	});

	it('stores a copy of maps', () => {
		const original = AttributeMap.from({ k: 'v' });
		const coerced = coerce(mapValue(original), 'any', 'attributes["m"]');
		if (coerced?.type !== 'map') throw new Error('expected a map');
		expect(coerced.value).not.toBe(original);
		expect(coerced.value.equals(original)).toBe(true);
	});
});

describe('isAssignable', () => {
	it('follows the coercion table for known types', () => {
		expect(isAssignable('string', 'int')).toBe(false);
		expect(isAssignable('double', 'int')).toBe(true);
		expect(isAssignable('int', 'double')).toBe(false);
		expect(isAssignable('map', 'map')).toBe(true);
	});

	it('defers runtime-typed sources', () => {
		expect(isAssignable('int', 'any')).toBe(true);
	});

	it('allows nil only where writes are skipped', () => {
		expect(isAssignable('any', 'empty')).toBe(true);
		expect(isAssignable('string', 'empty')).toBe(false);
	});
});

describe('expectType', () => {
	it('narrows matching values', () => {
		expect(expectType(stringValue('x'), 'string', 'w').value).toBe('x');
	});

	it('throws on other types', () => {
		expect(() => expectType(intValue(1), 'bool', 'guard')).toThrow('guard: expected bool, got int');
	});
});
