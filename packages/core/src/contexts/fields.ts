/**
 * Field accessor builders shared by every context, plus the `resource` and
 * `instrumentation_scope` sub-tables.
 */

import {
	type AnyValue,
	type AttributeMap,
	type InstrumentationScope,
	type Resource,
	boolValue,
	bytesToHex,
	bytesValue,
	doubleValue,
	hexToBytes,
	intValue,
	mapValue,
	stringValue,
} from '@telemorph/sdk';
import { expectType } from '../coercion.js';
import { TypeMismatchError } from '../errors.js';
import type { FieldAccessor, FieldEntry, FieldTable } from '../path.js';

// ─── Context contract ─────────────────────────────────────────────────────────

/**
 * What every context offers, whatever record it wraps. Contexts borrow the
 * record for a single evaluation and never copy it.
 */
export interface TelemetryContext {
	getResource(): Resource;
	/** Undefined for contexts that sit above the scope level */
	getScope(): InstrumentationScope | undefined;
}

// ─── Scalar builders ──────────────────────────────────────────────────────────

type Read<K, T> = (ctx: K) => T;
type Write<K, T> = (ctx: K, value: T) => void;

export function stringField<K>(read: Read<K, string>, write?: Write<K, string>): FieldEntry<K> {
	return {
		accessor: {
			type: 'string',
			get: (ctx) => stringValue(read(ctx)),
			...(write && {
				set: (ctx: K, value: AnyValue, path: string) =>
					write(ctx, expectType(value, 'string', path).value),
			}),
		},
	};
}

const UINT32_MAX = 2n ** 32n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

/** The int in `value`, which must lie in 0..max */
function unsignedInt(value: AnyValue, max: bigint, type: string, path: string): bigint {
	const n = expectType(value, 'int', path).value;
	if (n < 0n || n > max) throw new TypeMismatchError(type, `int ${n}`, path);
	return n;
}

/** A uint32 field stored as a JS number (counts, flags, enums) */
export function numberField<K>(read: Read<K, number>, write?: Write<K, number>): FieldEntry<K> {
	return {
		accessor: {
			type: 'int',
			get: (ctx) => intValue(read(ctx)),
			...(write && {
				set: (ctx: K, value: AnyValue, path: string) =>
					write(ctx, Number(unsignedInt(value, UINT32_MAX, 'uint32', path))),
			}),
		},
	};
}

/** A uint64 field (timestamps) */
export function bigintField<K>(read: Read<K, bigint>, write?: Write<K, bigint>): FieldEntry<K> {
	return {
		accessor: {
			type: 'int',
			get: (ctx) => intValue(read(ctx)),
			...(write && {
				set: (ctx: K, value: AnyValue, path: string) =>
					write(ctx, unsignedInt(value, UINT64_MAX, 'uint64', path)),
			}),
		},
	};
}

export function doubleField<K>(read: Read<K, number>, write?: Write<K, number>): FieldEntry<K> {
	return {
		accessor: {
			type: 'double',
			get: (ctx) => doubleValue(read(ctx)),
			...(write && {
				set: (ctx: K, value: AnyValue, path: string) =>
					write(ctx, expectType(value, 'double', path).value),
			}),
		},
	};
}

export function boolField<K>(read: Read<K, boolean>, write?: Write<K, boolean>): FieldEntry<K> {
	return {
		accessor: {
			type: 'bool',
			get: (ctx) => boolValue(read(ctx)),
			...(write && {
				set: (ctx: K, value: AnyValue, path: string) =>
					write(ctx, expectType(value, 'bool', path).value),
			}),
		},
	};
}

/** An attribute map. Writes replace the contents, never the map itself. */
export function attributesField<K>(read: Read<K, AttributeMap>): FieldEntry<K> {
	return {
		accessor: {
			type: 'map',
			get: (ctx) => mapValue(read(ctx)),
			set: (ctx, value, path) => expectType(value, 'map', path).value.copyTo(read(ctx)),
		},
	};
}

/** A field holding any value (log body) */
export function anyField<K>(read: Read<K, AnyValue>, write: Write<K, AnyValue>): FieldEntry<K> {
	return { accessor: { type: 'any', get: read, set: (ctx, value) => write(ctx, value) } };
}

/**
 * A fixed-length id (trace/span id) with a `.string` child holding its hex
 * form. All-zero ids read as empty bytes / empty string.
 */
export function idField<K>(
	length: number,
	read: Read<K, Uint8Array>,
	write: Write<K, Uint8Array>,
): FieldEntry<K> {
	const checkedWrite = (ctx: K, bytes: Uint8Array, path: string) => {
		if (bytes.length !== length) {
			throw new TypeMismatchError(`${length} bytes`, `${bytes.length} bytes`, path);
		}
		write(ctx, bytes);
	};
	const bytesAccessor: FieldAccessor<K> = {
		type: 'bytes',
		get: (ctx) => bytesValue(read(ctx)),
		set: (ctx, value, path) => checkedWrite(ctx, expectType(value, 'bytes', path).value, path),
	};
	const hexAccessor: FieldAccessor<K> = {
		type: 'string',
		get: (ctx) => {
			const id = read(ctx);
			return stringValue(id.every((b) => b === 0) ? '' : bytesToHex(id));
		},
		set: (ctx, value, path) => {
			const hex = expectType(value, 'string', path).value;
			const bytes = hexToBytes(hex);
			if (!bytes) throw new TypeMismatchError('hex string', JSON.stringify(hex), path);
			checkedWrite(ctx, bytes, path);
		},
	};
	return { accessor: bytesAccessor, children: { string: { accessor: hexAccessor } } };
}

// ─── Resource & scope ─────────────────────────────────────────────────────────

export function resourceFields<K extends TelemetryContext>(): FieldTable<K> {
	return {
		attributes: attributesField((ctx) => ctx.getResource().attributes),
		dropped_attributes_count: numberField(
			(ctx) => ctx.getResource().droppedAttributesCount,
			(ctx, v) => {
				ctx.getResource().droppedAttributesCount = v;
			},
		),
	};
}

function scopeOf(ctx: TelemetryContext): InstrumentationScope {
	const scope = ctx.getScope();
	if (!scope) throw new TypeError('context has no instrumentation scope');
	return scope;
}

/** Only for contexts whose getScope() always returns a scope */
export function scopeFields<K extends TelemetryContext>(): FieldTable<K> {
	return {
		name: stringField(
			(ctx) => scopeOf(ctx).name,
			(ctx, v) => {
				scopeOf(ctx).name = v;
			},
		),
		version: stringField(
			(ctx) => scopeOf(ctx).version,
			(ctx, v) => {
				scopeOf(ctx).version = v;
			},
		),
		attributes: attributesField((ctx) => scopeOf(ctx).attributes),
		dropped_attributes_count: numberField(
			(ctx) => scopeOf(ctx).droppedAttributesCount,
			(ctx, v) => {
				scopeOf(ctx).droppedAttributesCount = v;
			},
		),
	};
}

/** `resource.*` and `instrumentation_scope.*` for record-level contexts */
export function enclosingFields<K extends TelemetryContext>(): FieldTable<K> {
	return {
		resource: { children: resourceFields<K>() },
		instrumentation_scope: { children: scopeFields<K>() },
	};
}
