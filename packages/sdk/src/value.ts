/**
 * Dynamic values: the attribute value type of every telemetry record.
 *
 * AnyValue is a tagged union. It is stored in attribute maps, log bodies and
 * slices, and it is also the value type flowing through statement getters.
 * `empty` doubles as the nil value.
 */

// ─── AnyValue ─────────────────────────────────────────────────────────────────

export type AnyValue =
	| { readonly type: 'empty' }
	| { readonly type: 'string'; readonly value: string }
	| { readonly type: 'int'; readonly value: bigint }
	| { readonly type: 'double'; readonly value: number }
	| { readonly type: 'bool'; readonly value: boolean }
	| { readonly type: 'bytes'; readonly value: Uint8Array }
	| { readonly type: 'map'; readonly value: AttributeMap }
	| { readonly type: 'slice'; readonly value: AnyValue[] };

export type ValueType = AnyValue['type'];

export const VALUE_TYPES: readonly ValueType[] = [
	'empty',
	'string',
	'int',
	'double',
	'bool',
	'bytes',
	'map',
	'slice',
];

const EMPTY: AnyValue = { type: 'empty' };

export function emptyValue(): AnyValue {
	return EMPTY;
}

export function stringValue(value: string): AnyValue {
	return { type: 'string', value };
}

export function intValue(value: bigint | number): AnyValue {
	return { type: 'int', value: typeof value === 'bigint' ? value : BigInt(Math.trunc(value)) };
}

export function doubleValue(value: number): AnyValue {
	return { type: 'double', value };
}

export function boolValue(value: boolean): AnyValue {
	return { type: 'bool', value };
}

export function bytesValue(value: Uint8Array): AnyValue {
	return { type: 'bytes', value };
}

export function mapValue(value: AttributeMap): AnyValue {
	return { type: 'map', value };
}

export function sliceValue(value: AnyValue[]): AnyValue {
	return { type: 'slice', value };
}

export function isEmpty(value: AnyValue): boolean {
	return value.type === 'empty';
}

/**
 * Deep copy. Maps and slices are rebuilt so the copy shares no mutable
 * structure with the original; bytes are copied as well.
 */
export function cloneValue(value: AnyValue): AnyValue {
	switch (value.type) {
		case 'map':
			return mapValue(value.value.clone());
		case 'slice':
			return sliceValue(value.value.map(cloneValue));
		case 'bytes':
			return bytesValue(new Uint8Array(value.value));
		default:
			return value;
	}
}

/** Structural equality (int and double are distinct types here). */
export function valuesEqual(a: AnyValue, b: AnyValue): boolean {
	switch (a.type) {
		case 'empty':
			return b.type === 'empty';
		case 'string':
			return b.type === 'string' && a.value === b.value;
		case 'int':
			return b.type === 'int' && a.value === b.value;
		case 'double':
			return b.type === 'double' && a.value === b.value;
		case 'bool':
			return b.type === 'bool' && a.value === b.value;
		case 'bytes':
			return b.type === 'bytes' && bytesToHex(a.value) === bytesToHex(b.value);
		case 'map':
			return b.type === 'map' && a.value.equals(b.value);
		case 'slice':
			return (
				b.type === 'slice' &&
				a.value.length === b.value.length &&
				a.value.every((item, i) => valuesEqual(item, b.value[i]))
			);
	}
}

/** Render a value as a string the way converters and log messages show it. */
export function valueToString(value: AnyValue): string {
	switch (value.type) {
		case 'empty':
			return '';
		case 'string':
			return value.value;
		case 'int':
			return value.value.toString();
		case 'double':
			return String(value.value);
		case 'bool':
			return value.value ? 'true' : 'false';
		case 'bytes':
			return bytesToHex(value.value);
		case 'map':
		case 'slice':
			return JSON.stringify(toPlain(value));
	}
}

/** Convert to plain JSON-friendly data (ints become strings when unsafe). */
export function toPlain(value: AnyValue): unknown {
	switch (value.type) {
		case 'empty':
			return null;
		case 'int':
			return value.value >= BigInt(Number.MIN_SAFE_INTEGER) &&
				value.value <= BigInt(Number.MAX_SAFE_INTEGER)
				? Number(value.value)
				: value.value.toString();
		case 'bytes':
			return bytesToHex(value.value);
		case 'map':
			return Object.fromEntries(
				[...value.value.entries()].map(([k, v]) => [k, toPlain(v)] as const),
			);
		case 'slice':
			return value.value.map(toPlain);
		default:
			return value.value;
	}
}

// ─── Hex helpers ──────────────────────────────────────────────────────────────

export function bytesToHex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('hex');
}

/** Decode a hex string. Returns undefined for odd length or non-hex input. */
export function hexToBytes(hex: string): Uint8Array | undefined {
	if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) return undefined;
	return new Uint8Array(Buffer.from(hex, 'hex'));
}

// ─── AttributeMap ─────────────────────────────────────────────────────────────

/**
 * Insertion-ordered string → AnyValue map.
 *
 * Records own their maps; getters hand out the map itself so editors
 * mutate the record in place.
 */
export class AttributeMap {
	private readonly entriesByKey: Map<string, AnyValue>;

	constructor(entries?: Iterable<readonly [string, AnyValue]>) {
		this.entriesByKey = new Map(entries ?? []);
	}

	/** Build from plain data: strings, numbers, booleans, arrays, nested objects. */
	static from(data: Record<string, unknown>): AttributeMap {
		const map = new AttributeMap();
		for (const [key, raw] of Object.entries(data)) {
			map.put(key, fromPlain(raw));
		}
		return map;
	}

	get size(): number {
		return this.entriesByKey.size;
	}

	has(key: string): boolean {
		return this.entriesByKey.has(key);
	}

	/** Returns undefined when the key is absent. */
	get(key: string): AnyValue | undefined {
		return this.entriesByKey.get(key);
	}

	put(key: string, value: AnyValue): void {
		this.entriesByKey.set(key, value);
	}

	putString(key: string, value: string): void {
		this.put(key, stringValue(value));
	}

	putInt(key: string, value: bigint | number): void {
		this.put(key, intValue(value));
	}

	putDouble(key: string, value: number): void {
		this.put(key, doubleValue(value));
	}

	putBool(key: string, value: boolean): void {
		this.put(key, boolValue(value));
	}

	/** Returns true when the key existed. */
	remove(key: string): boolean {
		return this.entriesByKey.delete(key);
	}

	/** Remove every entry the predicate selects. Returns the number removed. */
	removeIf(predicate: (key: string, value: AnyValue) => boolean): number {
		let removed = 0;
		for (const [key, value] of [...this.entriesByKey]) {
			if (predicate(key, value)) {
				this.entriesByKey.delete(key);
				removed++;
			}
		}
		return removed;
	}

	clear(): void {
		this.entriesByKey.clear();
	}

	keys(): string[] {
		return [...this.entriesByKey.keys()];
	}

	entries(): IterableIterator<[string, AnyValue]> {
		return this.entriesByKey.entries();
	}

	/** Replace the contents of `dest` with a deep copy of this map. */
	copyTo(dest: AttributeMap): void {
		const snapshot = [...this.entriesByKey].map(([k, v]) => [k, cloneValue(v)] as const);
		dest.clear();
		for (const [k, v] of snapshot) dest.put(k, v);
	}

	clone(): AttributeMap {
		const copy = new AttributeMap();
		this.copyTo(copy);
		return copy;
	}

	equals(other: AttributeMap): boolean {
		if (other.size !== this.size) return false;
		for (const [key, value] of this.entriesByKey) {
			const theirs = other.get(key);
			if (!theirs || !valuesEqual(value, theirs)) return false;
		}
		return true;
	}

	toPlain(): Record<string, unknown> {
		const out: Record<string, unknown> = {};
		for (const [key, value] of this.entriesByKey) out[key] = toPlain(value);
		return out;
	}
}

/** Convert plain data to an AnyValue. Integral numbers become `int`. */
export function fromPlain(raw: unknown): AnyValue {
	if (raw === null || raw === undefined) return emptyValue();
	if (typeof raw === 'string') return stringValue(raw);
	if (typeof raw === 'boolean') return boolValue(raw);
	if (typeof raw === 'bigint') return intValue(raw);
	if (typeof raw === 'number') return Number.isInteger(raw) ? intValue(raw) : doubleValue(raw);
	if (raw instanceof Uint8Array) return bytesValue(raw);
	if (Array.isArray(raw)) return sliceValue(raw.map(fromPlain));
	if (typeof raw === 'object') {
		const map = new AttributeMap();
		for (const [key, value] of Object.entries(raw)) map.put(key, fromPlain(value));
		return mapValue(map);
	}
	return stringValue(String(raw));
}
