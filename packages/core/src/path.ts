/**
 * Path resolver: turns a path node into typed accessors for one context.
 *
 * Each context publishes a field table: a tree of named entries, some of
 * which carry an accessor. Resolution walks the table by field name and
 * wraps the final accessor with map-key / slice-index selectors. Every
 * structural problem is reported here, at bind time; the accessors it
 * returns only fail on data that does not have the shape the path expects.
 */

import {
	type AnyValue,
	AttributeMap,
	emptyValue,
	mapValue,
} from '@telemorph/sdk';
import type { PathNode } from './ast.js';
import { formatPath } from './ast.js';
import { type FieldType, coerce } from './coercion.js';
import { BindError, PathNotFoundError, TypeMismatchError } from './errors.js';
import type { GetSetter, Getter } from './expression.js';

// ─── Field tables ─────────────────────────────────────────────────────────────

/**
 * Raw accessor for one field. `set` receives a value already coerced to
 * `type`; read-only fields leave it out.
 */
export interface FieldAccessor<K> {
	readonly type: FieldType;
	get(ctx: K): AnyValue;
	set?(ctx: K, value: AnyValue, path: string): void;
}

export interface FieldEntry<K> {
	accessor?: FieldAccessor<K>;
	children?: FieldTable<K>;
}

export type FieldTable<K> = Readonly<Record<string, FieldEntry<K>>>;

export type Selector = string | number;

// ─── Resolution ───────────────────────────────────────────────────────────────

/**
 * Resolve a path against a field table.
 * Returns a GetSetter when the field is writable, a Getter otherwise.
 */
export function resolvePath<K>(table: FieldTable<K>, node: PathNode): Getter<K> | GetSetter<K> {
	const text = formatPath(node);
	if (node.fields.length === 0) throw new BindError('empty path');

	let entries: FieldTable<K> | undefined = table;
	let entry: FieldEntry<K> | undefined;
	let scope = '';

	for (let i = 0; i < node.fields.length; i++) {
		const field = node.fields[i];
		if (!entries || !Object.hasOwn(entries, field.name)) {
			const known = entries ? Object.keys(entries).sort().join(', ') : '';
			throw new BindError(
				`invalid path "${text}": unknown field "${scope}${field.name}"` +
					(known ? `; expected one of: ${known}` : ''),
			);
		}
		if (field.keys && field.keys.length > 0 && i < node.fields.length - 1) {
			throw new BindError(`invalid path "${text}": selectors are only allowed on the last field`);
		}
		entry = entries[field.name];
		entries = entry.children;
		scope = `${scope}${field.name}.`;
	}

	const accessor = entry?.accessor;
	if (!accessor) {
		const known = entries ? Object.keys(entries).sort().join(', ') : '';
		throw new BindError(`invalid path "${text}": a field is required after it; one of: ${known}`);
	}

	const keys = node.fields[node.fields.length - 1].keys ?? [];
	if (keys.length === 0) return plainAccessor(accessor, text);
	return selectorAccessor(accessor, validateSelectors(accessor.type, keys, text), text);
}

function validateSelectors(type: FieldType, keys: Selector[], text: string): Selector[] {
	if (type !== 'map' && type !== 'slice' && type !== 'any') {
		throw new BindError(`invalid path "${text}": field of type ${type} cannot be indexed`);
	}
	for (const key of keys) {
		if (typeof key === 'number' && !Number.isInteger(key)) {
			throw new BindError(`invalid path "${text}": index ${key} is not an integer`);
		}
	}
	if (type === 'map' && typeof keys[0] !== 'string') {
		throw new BindError(`invalid path "${text}": map fields take a string key`);
	}
	if (type === 'slice' && typeof keys[0] !== 'number') {
		throw new BindError(`invalid path "${text}": slice fields take an integer index`);
	}
	return keys;
}

function plainAccessor<K>(accessor: FieldAccessor<K>, text: string): Getter<K> | GetSetter<K> {
	const set = accessor.set;
	const get = (ctx: K) => accessor.get(ctx);
	if (!set) return { type: accessor.type, text, get };
	return {
		type: accessor.type,
		fieldType: accessor.type,
		text,
		get,
		set(ctx: K, value: AnyValue) {
			const coerced = coerce(value, accessor.type, text);
			if (coerced !== undefined) set.call(accessor, ctx, coerced, text);
		},
	};
}

// ─── Selectors ────────────────────────────────────────────────────────────────

function child(container: AnyValue, key: Selector, text: string): AnyValue {
	if (container.type === 'map' && typeof key === 'string') {
		return container.value.get(key) ?? emptyValue();
	}
	if (container.type === 'slice' && typeof key === 'number') {
		if (key < 0 || key >= container.value.length) {
			throw new PathNotFoundError(
				text,
				`index ${key} out of range for slice of length ${container.value.length}`,
			);
		}
		return container.value[key];
	}
	if (container.type === 'empty') return container;
	throw new TypeMismatchError(typeof key === 'string' ? 'map' : 'slice', container.type, text);
}

function assign(container: AnyValue, key: Selector, value: AnyValue, text: string): void {
	if (container.type === 'map' && typeof key === 'string') {
		container.value.put(key, value);
		return;
	}
	if (container.type === 'slice' && typeof key === 'number') {
		if (key < 0 || key >= container.value.length) {
			throw new PathNotFoundError(
				text,
				`index ${key} out of range for slice of length ${container.value.length}`,
			);
		}
		container.value[key] = value;
		return;
	}
	throw new TypeMismatchError(typeof key === 'string' ? 'map' : 'slice', container.type, text);
}

/**
 * Return the child at `key`, creating an empty map in its place when it is
 * missing and the next selector is a map key.
 */
function descend(container: AnyValue, key: Selector, next: Selector, text: string): AnyValue {
	const current = child(container, key, text);
	if (current.type !== 'empty' || typeof next !== 'string') return current;
	const created = mapValue(new AttributeMap());
	assign(container, key, created, text);
	return created;
}

function selectorAccessor<K>(
	accessor: FieldAccessor<K>,
	keys: Selector[],
	text: string,
): Getter<K> | GetSetter<K> {
	const get = (ctx: K): AnyValue => {
		let current = accessor.get(ctx);
		for (const key of keys) {
			if (current.type === 'empty') return current;
			current = child(current, key, text);
		}
		return current;
	};

	const rootSet = accessor.set;

	return {
		type: 'any',
		fieldType: 'any',
		text,
		get,
		set(ctx: K, value: AnyValue) {
			const coerced = coerce(value, 'any', text);
			if (coerced === undefined) return;

			let container = accessor.get(ctx);
			if (container.type === 'empty') {
				// An empty `any` root (e.g. a log body) becomes a map on first keyed write
				if (!rootSet || typeof keys[0] !== 'string') {
					throw new PathNotFoundError(text, 'cannot index an empty value');
				}
				container = mapValue(new AttributeMap());
				rootSet.call(accessor, ctx, container, text);
			}
			for (let i = 0; i < keys.length - 1; i++) {
				container = descend(container, keys[i], keys[i + 1], text);
				if (container.type === 'empty') {
					throw new PathNotFoundError(text, `no value at selector ${i + 1}`);
				}
			}
			assign(container, keys[keys.length - 1], coerced, text);
		},
	};
}
