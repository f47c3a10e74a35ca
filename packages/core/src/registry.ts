/**
 * Function registry: the single place function identity is resolved.
 *
 * A factory declares its parameters; the binder turns argument nodes into
 * bound arguments of the declared kinds (checking arity and shapes) and
 * hands them to `create`, which may still reject literal values with a
 * BindError. The registry is sealed once the owning component has started
 * and is read-only from then on.
 */

import type { FieldType, StaticType } from './coercion.js';
import { BindError } from './errors.js';
import type { ExprFunc, GetSetter, Getter } from './expression.js';

// ─── Parameters ───────────────────────────────────────────────────────────────

/**
 * getter : any value expression (literal, path, nested call)
 * setter : a writable path
 * string / int / float / bool: a literal of that type
 * strings: a list of string literals
 * getters: a list of value expressions
 */
export type ParamKind = 'getter' | 'setter' | 'string' | 'int' | 'float' | 'bool' | 'strings' | 'getters';

export interface ParamSpec {
	name: string;
	kind: ParamKind;
	/**
	 * getter: the value must be assignable to this type.
	 * setter: the location must accept values of this type.
	 */
	type?: FieldType;
	/** Trailing optional parameter */
	optional?: boolean;
}

export type BoundArgument<K> =
	| { kind: 'getter'; getter: Getter<K> }
	| { kind: 'setter'; setter: GetSetter<K> }
	| { kind: 'string'; value: string }
	| { kind: 'int'; value: bigint }
	| { kind: 'float'; value: number }
	| { kind: 'bool'; value: boolean }
	| { kind: 'strings'; values: string[] }
	| { kind: 'getters'; getters: Getter<K>[] }
	| { kind: 'absent' };

/** Named access to a call's bound arguments */
export class Arguments<K> {
	constructor(
		private readonly functionName: string,
		private readonly bound: ReadonlyMap<string, BoundArgument<K>>,
	) {}

	private take(name: string): BoundArgument<K> {
		const arg = this.bound.get(name);
		if (!arg) throw new BindError(`${this.functionName}: no parameter named "${name}"`);
		return arg;
	}

	private wrongKind(name: string, expected: ParamKind): BindError {
		return new BindError(`${this.functionName}: parameter "${name}" is not a ${expected}`);
	}

	has(name: string): boolean {
		const arg = this.bound.get(name);
		return arg !== undefined && arg.kind !== 'absent';
	}

	getter(name: string): Getter<K> {
		const arg = this.take(name);
		if (arg.kind === 'getter') return arg.getter;
		if (arg.kind === 'setter') return arg.setter;
		throw this.wrongKind(name, 'getter');
	}

	setter(name: string): GetSetter<K> {
		const arg = this.take(name);
		if (arg.kind !== 'setter') throw this.wrongKind(name, 'setter');
		return arg.setter;
	}

	string(name: string): string {
		const arg = this.take(name);
		if (arg.kind !== 'string') throw this.wrongKind(name, 'string');
		return arg.value;
	}

	int(name: string): bigint {
		const arg = this.take(name);
		if (arg.kind !== 'int') throw this.wrongKind(name, 'int');
		return arg.value;
	}

	float(name: string): number {
		const arg = this.take(name);
		if (arg.kind !== 'float') throw this.wrongKind(name, 'float');
		return arg.value;
	}

	bool(name: string): boolean {
		const arg = this.take(name);
		if (arg.kind !== 'bool') throw this.wrongKind(name, 'bool');
		return arg.value;
	}

	strings(name: string, fallback: string[] = []): string[] {
		const arg = this.take(name);
		if (arg.kind === 'absent') return fallback;
		if (arg.kind !== 'strings') throw this.wrongKind(name, 'strings');
		return arg.values;
	}

	getters(name: string): Getter<K>[] {
		const arg = this.take(name);
		if (arg.kind !== 'getters') throw this.wrongKind(name, 'getters');
		return arg.getters;
	}
}

// ─── Factories ────────────────────────────────────────────────────────────────

export interface FunctionFactory<K> {
	readonly name: string;
	readonly params: readonly ParamSpec[];
	/** Static type of the produced value; `empty` for editors */
	readonly returns: StaticType;
	create(args: Arguments<K>): ExprFunc<K>;
}

export class FunctionRegistry<K> {
	private readonly factories = new Map<string, FunctionFactory<K>>();
	private sealed = false;

	constructor(factories: Iterable<FunctionFactory<K>> = []) {
		for (const factory of factories) this.register(factory);
	}

	register(factory: FunctionFactory<K>): this {
		if (this.sealed) {
			throw new Error(`cannot register "${factory.name}": registry is sealed`);
		}
		if (this.factories.has(factory.name)) {
			throw new Error(`function "${factory.name}" is already registered`);
		}
		this.factories.set(factory.name, factory);
		return this;
	}

	get(name: string): FunctionFactory<K> | undefined {
		return this.factories.get(name);
	}

	names(): string[] {
		return [...this.factories.keys()].sort();
	}

	list(): FunctionFactory<K>[] {
		return this.names().flatMap((name) => this.factories.get(name) ?? []);
	}

	/** Make the registry read-only */
	seal(): this {
		this.sealed = true;
		return this;
	}

	get isSealed(): boolean {
		return this.sealed;
	}
}

/** Render a factory's signature, e.g. `delete_key(target, key: string)` */
export function formatSignature<K>(factory: FunctionFactory<K>): string {
	const params = factory.params.map((p) => {
		const kind = p.kind === 'getter' ? '' : `: ${p.kind}`;
		return `${p.name}${p.optional ? '?' : ''}${kind}`;
	});
	const returns = factory.returns === 'empty' ? '' : ` -> ${factory.returns}`;
	return `${factory.name}(${params.join(', ')})${returns}`;
}
