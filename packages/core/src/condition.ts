/**
 * Guard conditions.
 *
 * A bound condition is a Getter of static type `bool`. Comparisons never
 * fail at run time: values of kinds that have no ordering simply compare
 * false. Only a value test on a non-boolean raises TypeMismatch.
 */

import { type AnyValue, boolValue, valuesEqual } from '@telemorph/sdk';
import type { CompareOp, ConditionNode, ValueNode } from './ast.js';
import { formatCondition } from './ast.js';
import { expectType } from './coercion.js';
import { BindError } from './errors.js';
import type { Getter } from './expression.js';

type Numeric = Extract<AnyValue, { type: 'int' | 'double' }>;

function isNumeric(value: AnyValue): value is Numeric {
	return value.type === 'int' || value.type === 'double';
}

/** -1, 0 or 1; ints compare exactly, mixed pairs as doubles */
function compareNumbers(a: Numeric, b: Numeric): number {
	if (a.type === 'int' && b.type === 'int') {
		return a.value === b.value ? 0 : a.value < b.value ? -1 : 1;
	}
	const x = Number(a.value);
	const y = Number(b.value);
	return x === y ? 0 : x < y ? -1 : 1;
}

function equal(a: AnyValue, b: AnyValue): boolean {
	if (isNumeric(a) && isNumeric(b)) return compareNumbers(a, b) === 0;
	return valuesEqual(a, b);
}

/** Ordering of two values, or undefined when they cannot be ordered */
function order(a: AnyValue, b: AnyValue): number | undefined {
	if (isNumeric(a) && isNumeric(b)) {
		// NaN has no ordering
		if (Number.isNaN(Number(a.value)) || Number.isNaN(Number(b.value))) return undefined;
		return compareNumbers(a, b);
	}
	if (a.type === 'string' && b.type === 'string') {
		return a.value === b.value ? 0 : a.value < b.value ? -1 : 1;
	}
	return undefined;
}

export function compareValues(a: AnyValue, op: CompareOp, b: AnyValue): boolean {
	switch (op) {
		case '==':
			return equal(a, b);
		case '!=':
			return !equal(a, b);
		default: {
			const cmp = order(a, b);
			if (cmp === undefined) return false;
			if (op === '<') return cmp < 0;
			if (op === '<=') return cmp <= 0;
			if (op === '>') return cmp > 0;
			return cmp >= 0;
		}
	}
}

type Test<K> = (ctx: K) => boolean;

function compile<K>(node: ConditionNode, bindValue: (node: ValueNode) => Getter<K>): Test<K> {
	if ((node.type === 'and' || node.type === 'or') && node.terms.length === 0) {
		throw new BindError(`"${node.type}" needs at least one term`);
	}
	switch (node.type) {
		case 'and': {
			const terms = node.terms.map((t) => compile(t, bindValue));
			return (ctx) => terms.every((term) => term(ctx));
		}
		case 'or': {
			const terms = node.terms.map((t) => compile(t, bindValue));
			return (ctx) => terms.some((term) => term(ctx));
		}
		case 'not': {
			const term = compile(node.term, bindValue);
			return (ctx) => !term(ctx);
		}
		case 'compare': {
			const left = bindValue(node.left);
			const right = bindValue(node.right);
			const op = node.op;
			return (ctx) => compareValues(left.get(ctx), op, right.get(ctx));
		}
		case 'test': {
			const value = bindValue(node.value);
			if (value.type !== 'bool' && value.type !== 'any') {
				throw new BindError(`condition ${value.text} is of type ${value.type}, not bool`);
			}
			return (ctx) => expectType(value.get(ctx), 'bool', value.text).value;
		}
	}
}

/** Bind a guard, using `bindValue` for the operands */
export function bindCondition<K>(
	node: ConditionNode,
	bindValue: (node: ValueNode) => Getter<K>,
): Getter<K> {
	const test = compile(node, bindValue);
	return {
		type: 'bool',
		text: formatCondition(node),
		get: (ctx) => boolValue(test(ctx)),
	};
}
