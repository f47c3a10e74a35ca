/**
 * Statement binder.
 *
 * Turns statement ASTs into executable Statements for one context kind.
 * Binding is pure: the same node bound twice yields two statements that
 * behave identically, and nothing about a record is consulted. Every
 * failure here is a BindError, so a bad statement stops the owning
 * component before it sees its first record.
 */

import {
	type AnyValue,
	boolValue,
	bytesValue,
	cloneValue,
	doubleValue,
	emptyValue,
	hexToBytes,
	intValue,
	sliceValue,
	stringValue,
} from '@telemorph/sdk';
import {
	type CallNode,
	type StatementNode,
	type ValueNode,
	formatCall,
	formatStatement,
	formatValue,
} from './ast.js';
import { type StaticType, isAssignable } from './coercion.js';
import { bindCondition } from './condition.js';
import type { ContextDefinition, TelemetryContext } from './contexts/index.js';
import { BindError, isTelemorphError, toError } from './errors.js';
import {
	type ExprFunc,
	type GetSetter,
	type Getter,
	callGetter,
	isGetSetter,
	literalGetter,
} from './expression.js';
import { resolvePath } from './path.js';
import { Arguments, type BoundArgument, type FunctionRegistry, type ParamSpec } from './registry.js';

/** A bound statement: an editor invocation plus an optional guard */
export interface Statement<K> {
	/** Canonical text of the statement */
	readonly text: string;
	readonly invoke: ExprFunc<K>;
	readonly condition?: Getter<K>;
}

const INTEGER = /^[+-]?\d+$/;

export class StatementBinder<K extends TelemetryContext> {
	constructor(
		private readonly context: ContextDefinition<K>,
		private readonly functions: FunctionRegistry<K>,
	) {}

	get kind(): ContextDefinition<K>['kind'] {
		return this.context.kind;
	}

	bindStatements(nodes: readonly StatementNode[]): Statement<K>[] {
		return nodes.map((node) => this.bindStatement(node));
	}

	bindStatement(node: StatementNode): Statement<K> {
		const text = formatStatement(node);
		try {
			const { fn, returns } = this.bindCall(node.call);
			if (returns !== 'empty') {
				throw new BindError(`${node.call.name} returns a value and cannot be used as a statement`);
			}
			const condition = node.where
				? bindCondition(node.where, (value) => this.bindValue(value))
				: undefined;
			return condition ? { text, invoke: fn, condition } : { text, invoke: fn };
		} catch (err) {
			const cause = toError(err);
			throw new BindError(`${this.context.kind} statement "${text}": ${cause.message}`, { cause });
		}
	}

	// ─── Values ─────────────────────────────────────────────────────────────────

	bindValue(node: ValueNode): Getter<K> {
		const text = formatValue(node);
		switch (node.type) {
			case 'string':
				return literalGetter(stringValue(node.value), text);
			case 'int':
				return literalGetter(intValue(parseInteger(node.value, text)), text);
			case 'float':
				if (!Number.isFinite(node.value)) throw new BindError(`invalid float literal ${text}`);
				return literalGetter(doubleValue(node.value), text);
			case 'bool':
				return literalGetter(boolValue(node.value), text);
			case 'bytes': {
				const bytes = hexToBytes(node.value);
				if (!bytes) throw new BindError(`invalid bytes literal ${text}`);
				return literalGetter(bytesValue(bytes), text);
			}
			case 'nil':
				return literalGetter(emptyValue(), text);
			case 'enum':
				return literalGetter(intValue(this.enumValue(node.name)), text);
			case 'list': {
				const items = node.items.map((item) => this.bindValue(item));
				return callGetter(
					(ctx): AnyValue => sliceValue(items.map((item) => cloneValue(item.get(ctx)))),
					'slice',
					text,
				);
			}
			case 'path':
				return resolvePath(this.context.fields, node);
			case 'call': {
				const { fn, returns } = this.bindCall(node);
				if (returns === 'empty') {
					throw new BindError(`${node.name} does not return a value`);
				}
				return callGetter(fn, returns, text);
			}
		}
	}

	private enumValue(name: string): bigint {
		if (!Object.hasOwn(this.context.enums, name)) {
			throw new BindError(`unknown enum symbol ${name} for ${this.context.kind} context`);
		}
		return this.context.enums[name];
	}

	// ─── Calls ──────────────────────────────────────────────────────────────────

	private bindCall(node: CallNode): { fn: ExprFunc<K>; returns: StaticType } {
		const factory = this.functions.get(node.name);
		if (!factory) {
			throw new BindError(`unknown function "${node.name}" in ${this.context.kind} context`);
		}

		const required = factory.params.filter((p) => !p.optional).length;
		if (node.args.length < required || node.args.length > factory.params.length) {
			const expected =
				required === factory.params.length
					? String(required)
					: `${required} to ${factory.params.length}`;
			throw new BindError(
				`${formatCall(node)}: expected ${expected} arguments, got ${node.args.length}`,
			);
		}

		const bound = new Map<string, BoundArgument<K>>();
		factory.params.forEach((param, i) => {
			const arg = node.args[i];
			bound.set(param.name, arg ? this.bindArgument(node.name, param, arg) : { kind: 'absent' });
		});

		let fn: ExprFunc<K>;
		try {
			fn = factory.create(new Arguments(node.name, bound));
		} catch (err) {
			if (isTelemorphError(err) && err.kind === 'bind') throw err;
			const cause = toError(err);
			throw new BindError(`${node.name}: ${cause.message}`, { cause });
		}
		return { fn, returns: factory.returns };
	}

	private bindArgument(fnName: string, param: ParamSpec, node: ValueNode): BoundArgument<K> {
		const where = `${fnName}: argument "${param.name}"`;
		switch (param.kind) {
			case 'getter': {
				const getter = this.bindValue(node);
				if (param.type && !isAssignable(param.type, getter.type)) {
					throw new BindError(`${where} must be ${param.type}, got ${getter.type} (${getter.text})`);
				}
				return { kind: 'getter', getter };
			}
			case 'setter':
				return { kind: 'setter', setter: this.bindSetter(where, param, node) };
			case 'string':
				if (node.type !== 'string') throw literalExpected(where, 'a string', node);
				return { kind: 'string', value: node.value };
			case 'int':
				if (node.type === 'enum') return { kind: 'int', value: this.enumValue(node.name) };
				if (node.type !== 'int') throw literalExpected(where, 'an int', node);
				return { kind: 'int', value: parseInteger(node.value, formatValue(node)) };
			case 'float':
				if (node.type === 'int') {
					return { kind: 'float', value: Number(parseInteger(node.value, formatValue(node))) };
				}
				if (node.type !== 'float') throw literalExpected(where, 'a float', node);
				return { kind: 'float', value: node.value };
			case 'bool':
				if (node.type !== 'bool') throw literalExpected(where, 'a bool', node);
				return { kind: 'bool', value: node.value };
			case 'strings': {
				if (node.type !== 'list') throw literalExpected(where, 'a list of strings', node);
				const values: string[] = [];
				for (const item of node.items) {
					if (item.type !== 'string') throw literalExpected(where, 'a list of strings', node);
					values.push(item.value);
				}
				return { kind: 'strings', values };
			}
			case 'getters':
				if (node.type !== 'list') throw literalExpected(where, 'a list', node);
				return { kind: 'getters', getters: node.items.map((item) => this.bindValue(item)) };
		}
	}

	private bindSetter(where: string, param: ParamSpec, node: ValueNode): GetSetter<K> {
		if (node.type !== 'path') throw literalExpected(where, 'a path', node);
		const target = resolvePath(this.context.fields, node);
		if (!isGetSetter(target)) {
			throw new BindError(`${where}: ${target.text} is read-only`);
		}
		if (param.type && !isAssignable(target.fieldType, param.type)) {
			throw new BindError(
				`${where}: ${target.text} holds ${target.fieldType} and cannot take ${param.type}`,
			);
		}
		return target;
	}
}

function literalExpected(where: string, what: string, node: ValueNode): BindError {
	return new BindError(`${where} must be ${what}, got ${formatValue(node)}`);
}

function parseInteger(value: number | string, text: string): bigint {
	if (typeof value === 'number') {
		if (!Number.isSafeInteger(value)) throw new BindError(`invalid int literal ${text}`);
		return BigInt(value);
	}
	if (!INTEGER.test(value)) throw new BindError(`invalid int literal ${text}`);
	return BigInt(value);
}
