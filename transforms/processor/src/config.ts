/**
 * Transform processor configuration.
 *
 * The config arrives as plain data (parsed YAML or JSON). `validateConfig`
 * walks it and reports every problem with the dotted location it was found
 * at; `parseConfig` returns the typed config or throws a ConfigError
 * carrying the full list.
 *
 * Statements are written as AST objects:
 *
 *   trace_statements:
 *     - context: span
 *       statements:
 *         - call:
 *             name: delete_key
 *             args:
 *               - { type: path, fields: [{ name: attributes }] }
 *               - { type: string, value: http.user_agent }
 */

import type {
	CallNode,
	CompareOp,
	ConditionNode,
	FieldNode,
	PathNode,
	StatementNode,
	ValueNode,
} from '@telemorph/core';
import { COMPARE_OPS } from '@telemorph/core';

// ─── Types ────────────────────────────────────────────────────────────────────

export type ErrorMode = 'ignore' | 'propagate' | 'drop';

export const ERROR_MODES: readonly ErrorMode[] = ['ignore', 'propagate', 'drop'];

export interface ContextStatements<C extends string> {
	context: C;
	statements: StatementNode[];
}

export type TraceContextKind = 'span' | 'resource';
export type MetricContextKind = 'datapoint' | 'resource';
export type LogContextKind = 'log' | 'resource';

export interface TransformConfig {
	error_mode: ErrorMode;
	trace_statements: ContextStatements<TraceContextKind>[];
	metric_statements: ContextStatements<MetricContextKind>[];
	log_statements: ContextStatements<LogContextKind>[];
}

export interface ValidationError {
	field: string;
	message: string;
}

export class ConfigError extends Error {
	readonly errors: ValidationError[];

	constructor(errors: ValidationError[]) {
		const lines = errors.map((e) => (e.field ? `${e.field}: ${e.message}` : e.message));
		super(`invalid transform config:\n  ${lines.join('\n  ')}`);
		this.name = 'ConfigError';
		this.errors = errors;
	}
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

type Errors = ValidationError[];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(options: readonly T[], value: unknown): value is T {
	return options.some((option) => option === value);
}

function at(field: string, key: string | number): string {
	return typeof key === 'number' ? `${field}[${key}]` : field ? `${field}.${key}` : key;
}

// ─── AST nodes ────────────────────────────────────────────────────────────────

function parsePath(raw: Record<string, unknown>, field: string, errors: Errors): PathNode | undefined {
	if (!Array.isArray(raw.fields) || raw.fields.length === 0) {
		errors.push({ field: at(field, 'fields'), message: 'must be a non-empty list' });
		return undefined;
	}
	const fields: FieldNode[] = [];
	raw.fields.forEach((item: unknown, i) => {
		const where = at(at(field, 'fields'), i);
		if (!isRecord(item) || typeof item.name !== 'string' || item.name === '') {
			errors.push({ field: where, message: 'must be an object with a non-empty "name"' });
			return;
		}
		const node: FieldNode = { name: item.name };
		if (item.keys !== undefined) {
			if (!Array.isArray(item.keys)) {
				errors.push({ field: at(where, 'keys'), message: 'must be a list of strings or integers' });
				return;
			}
			const keys: Array<string | number> = [];
			for (const key of item.keys) {
				if (typeof key === 'string' || (typeof key === 'number' && Number.isInteger(key))) {
					keys.push(key);
				} else {
					errors.push({ field: at(where, 'keys'), message: 'must be a list of strings or integers' });
					return;
				}
			}
			node.keys = keys;
		}
		fields.push(node);
	});
	return { type: 'path', fields };
}

function parseCall(raw: unknown, field: string, errors: Errors): CallNode | undefined {
	if (!isRecord(raw)) {
		errors.push({ field, message: 'must be a call object' });
		return undefined;
	}
	if (raw.type !== undefined && raw.type !== 'call') {
		errors.push({ field: at(field, 'type'), message: 'must be "call"' });
		return undefined;
	}
	if (typeof raw.name !== 'string' || raw.name === '') {
		errors.push({ field: at(field, 'name'), message: 'must be a non-empty string' });
		return undefined;
	}
	const rawArgs = raw.args ?? [];
	if (!Array.isArray(rawArgs)) {
		errors.push({ field: at(field, 'args'), message: 'must be a list' });
		return undefined;
	}
	const args = parseValues(rawArgs, at(field, 'args'), errors);
	return args && { type: 'call', name: raw.name, args };
}

function parseValues(raw: unknown[], field: string, errors: Errors): ValueNode[] | undefined {
	const before = errors.length;
	const values = raw.flatMap((item, i) => parseValue(item, at(field, i), errors) ?? []);
	return errors.length === before ? values : undefined;
}

function parseValue(raw: unknown, field: string, errors: Errors): ValueNode | undefined {
	if (!isRecord(raw) || typeof raw.type !== 'string') {
		errors.push({ field, message: 'must be an object with a "type"' });
		return undefined;
	}
	const fail = (message: string): undefined => {
		errors.push({ field, message });
		return undefined;
	};
	const value = raw.value;
	switch (raw.type) {
		case 'string':
			return typeof value === 'string' ? { type: 'string', value } : fail('string value required');
		case 'int':
			return (typeof value === 'number' && Number.isInteger(value)) || typeof value === 'string'
				? { type: 'int', value }
				: fail('integer value required');
		case 'float':
			return typeof value === 'number' ? { type: 'float', value } : fail('numeric value required');
		case 'bool':
			return typeof value === 'boolean' ? { type: 'bool', value } : fail('boolean value required');
		case 'bytes':
			return typeof value === 'string' ? { type: 'bytes', value } : fail('hex string value required');
		case 'nil':
			return { type: 'nil' };
		case 'enum':
			return typeof raw.name === 'string' ? { type: 'enum', name: raw.name } : fail('"name" required');
		case 'list': {
			if (!Array.isArray(raw.items)) return fail('"items" must be a list');
			const items = parseValues(raw.items, at(field, 'items'), errors);
			return items && { type: 'list', items };
		}
		case 'path':
			return parsePath(raw, field, errors);
		case 'call':
			return parseCall(raw, field, errors);
		default:
			return fail(`unknown value type "${raw.type}"`);
	}
}

function parseCondition(raw: unknown, field: string, errors: Errors): ConditionNode | undefined {
	if (!isRecord(raw) || typeof raw.type !== 'string') {
		errors.push({ field, message: 'must be an object with a "type"' });
		return undefined;
	}
	switch (raw.type) {
		case 'and':
		case 'or': {
			if (!Array.isArray(raw.terms) || raw.terms.length === 0) {
				errors.push({ field: at(field, 'terms'), message: 'must be a non-empty list' });
				return undefined;
			}
			const before = errors.length;
			const terms = raw.terms.flatMap(
				(term: unknown, i) => parseCondition(term, at(at(field, 'terms'), i), errors) ?? [],
			);
			if (errors.length !== before) return undefined;
			return raw.type === 'and' ? { type: 'and', terms } : { type: 'or', terms };
		}
		case 'not': {
			const term = parseCondition(raw.term, at(field, 'term'), errors);
			return term && { type: 'not', term };
		}
		case 'compare': {
			const op: unknown = raw.op;
			if (!oneOf<CompareOp>(COMPARE_OPS, op)) {
				errors.push({ field: at(field, 'op'), message: `must be one of: ${COMPARE_OPS.join(', ')}` });
				return undefined;
			}
			const left = parseValue(raw.left, at(field, 'left'), errors);
			const right = parseValue(raw.right, at(field, 'right'), errors);
			return left && right && { type: 'compare', left, op, right };
		}
		case 'test': {
			const value = parseValue(raw.value, at(field, 'value'), errors);
			return value && { type: 'test', value };
		}
		default:
			errors.push({ field: at(field, 'type'), message: `unknown condition type "${raw.type}"` });
			return undefined;
	}
}

function parseStatement(raw: unknown, field: string, errors: Errors): StatementNode | undefined {
	if (!isRecord(raw)) {
		errors.push({ field, message: 'must be an object with a "call"' });
		return undefined;
	}
	const call = parseCall(raw.call, at(field, 'call'), errors);
	if (raw.where === undefined) return call && { call };
	const where = parseCondition(raw.where, at(field, 'where'), errors);
	return call && where && { call, where };
}

// ─── Groups ───────────────────────────────────────────────────────────────────

function parseGroups<C extends string>(
	raw: unknown,
	field: string,
	contexts: readonly C[],
	errors: Errors,
): ContextStatements<C>[] {
	if (raw === undefined || raw === null) return [];
	if (!Array.isArray(raw)) {
		errors.push({ field, message: 'must be a list of statement groups' });
		return [];
	}
	const groups: ContextStatements<C>[] = [];
	raw.forEach((item: unknown, i) => {
		const where = at(field, i);
		if (!isRecord(item)) {
			errors.push({ field: where, message: 'must be an object with "context" and "statements"' });
			return;
		}
		const context: unknown = item.context;
		if (!oneOf(contexts, context)) {
			errors.push({ field: at(where, 'context'), message: `must be one of: ${contexts.join(', ')}` });
			return;
		}
		if (!Array.isArray(item.statements)) {
			errors.push({ field: at(where, 'statements'), message: 'must be a list' });
			return;
		}
		const statements = item.statements.flatMap(
			(statement: unknown, j) => parseStatement(statement, at(at(where, 'statements'), j), errors) ?? [],
		);
		groups.push({ context, statements });
	});
	return groups;
}

const TOP_LEVEL_KEYS = new Set(['error_mode', 'trace_statements', 'metric_statements', 'log_statements']);

function parse(raw: unknown, errors: Errors): TransformConfig {
	const config: TransformConfig = {
		error_mode: 'propagate',
		trace_statements: [],
		metric_statements: [],
		log_statements: [],
	};
	if (raw === undefined || raw === null) return config;
	if (!isRecord(raw)) {
		errors.push({ field: '', message: 'config must be an object' });
		return config;
	}

	for (const key of Object.keys(raw)) {
		if (!TOP_LEVEL_KEYS.has(key)) errors.push({ field: key, message: 'unknown option' });
	}

	const mode: unknown = raw.error_mode;
	if (mode !== undefined) {
		if (oneOf(ERROR_MODES, mode)) config.error_mode = mode;
		else errors.push({ field: 'error_mode', message: `must be one of: ${ERROR_MODES.join(', ')}` });
	}

	config.trace_statements = parseGroups(raw.trace_statements, 'trace_statements', ['span', 'resource'], errors);
	config.metric_statements = parseGroups(
		raw.metric_statements,
		'metric_statements',
		['datapoint', 'resource'],
		errors,
	);
	config.log_statements = parseGroups(raw.log_statements, 'log_statements', ['log', 'resource'], errors);
	return config;
}

/** Structural problems in a raw config (empty when valid) */
export function validateConfig(raw: unknown): ValidationError[] {
	const errors: ValidationError[] = [];
	parse(raw, errors);
	return errors;
}

export function parseConfig(raw: unknown): TransformConfig {
	const errors: ValidationError[] = [];
	const config = parse(raw, errors);
	if (errors.length > 0) throw new ConfigError(errors);
	return config;
}
