/**
 * Statement AST: the input the binder consumes.
 *
 * The textual grammar lives elsewhere; these are the plain objects a parser
 * (or a YAML/JSON config) produces. `format*` renders nodes back to a
 * canonical text used in log entries and reports.
 */

// ─── Nodes ────────────────────────────────────────────────────────────────────

/** One path segment: a field name plus optional map keys / slice indices */
export interface FieldNode {
	name: string;
	keys?: Array<string | number>;
}

export interface PathNode {
	type: 'path';
	fields: FieldNode[];
}

export interface CallNode {
	type: 'call';
	name: string;
	args: ValueNode[];
}

export type ValueNode =
	| { type: 'string'; value: string }
	| { type: 'int'; value: number | string }
	| { type: 'float'; value: number }
	| { type: 'bool'; value: boolean }
	| { type: 'bytes'; value: string }
	| { type: 'nil' }
	| { type: 'enum'; name: string }
	| { type: 'list'; items: ValueNode[] }
	| PathNode
	| CallNode;

export type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=';

export const COMPARE_OPS: readonly CompareOp[] = ['==', '!=', '<', '<=', '>', '>='];

export type ConditionNode =
	| { type: 'and'; terms: ConditionNode[] }
	| { type: 'or'; terms: ConditionNode[] }
	| { type: 'not'; term: ConditionNode }
	| { type: 'compare'; left: ValueNode; op: CompareOp; right: ValueNode }
	| { type: 'test'; value: ValueNode };

export interface StatementNode {
	call: CallNode;
	where?: ConditionNode;
}

// ─── Builders ─────────────────────────────────────────────────────────────────

/**
 * Path builder. Dotted names become fields; trailing keys attach to the
 * last field: `path('resource.attributes', 'service.name')`.
 */
function path(dotted: string, ...keys: Array<string | number>): PathNode {
	const fields: FieldNode[] = dotted.split('.').map((name) => ({ name }));
	if (keys.length > 0) fields[fields.length - 1].keys = keys;
	return { type: 'path', fields };
}

export const ast = {
	path,
	string: (value: string): ValueNode => ({ type: 'string', value }),
	int: (value: number | string): ValueNode => ({ type: 'int', value }),
	float: (value: number): ValueNode => ({ type: 'float', value }),
	bool: (value: boolean): ValueNode => ({ type: 'bool', value }),
	bytes: (hex: string): ValueNode => ({ type: 'bytes', value: hex }),
	nil: (): ValueNode => ({ type: 'nil' }),
	enum: (name: string): ValueNode => ({ type: 'enum', name }),
	list: (...items: ValueNode[]): ValueNode => ({ type: 'list', items }),
	call: (name: string, ...args: ValueNode[]): CallNode => ({ type: 'call', name, args }),
	compare: (left: ValueNode, op: CompareOp, right: ValueNode): ConditionNode => ({
		type: 'compare',
		left,
		op,
		right,
	}),
	and: (...terms: ConditionNode[]): ConditionNode => ({ type: 'and', terms }),
	or: (...terms: ConditionNode[]): ConditionNode => ({ type: 'or', terms }),
	not: (term: ConditionNode): ConditionNode => ({ type: 'not', term }),
	test: (value: ValueNode): ConditionNode => ({ type: 'test', value }),
	statement: (call: CallNode, where?: ConditionNode): StatementNode =>
		where ? { call, where } : { call },
};

// ─── Formatting ───────────────────────────────────────────────────────────────

export function formatPath(node: PathNode): string {
	return node.fields
		.map((f) => f.name + (f.keys ?? []).map((k) => `[${JSON.stringify(k)}]`).join(''))
		.join('.');
}

export function formatValue(node: ValueNode): string {
	switch (node.type) {
		case 'string':
			return JSON.stringify(node.value);
		case 'int':
			return String(node.value);
		case 'float':
			return Number.isInteger(node.value) ? node.value.toFixed(1) : String(node.value);
		case 'bool':
			return node.value ? 'true' : 'false';
		case 'bytes':
			return `0x${node.value}`;
		case 'nil':
			return 'nil';
		case 'enum':
			return node.name;
		case 'list':
			return `[${node.items.map(formatValue).join(', ')}]`;
		case 'path':
			return formatPath(node);
		case 'call':
			return formatCall(node);
	}
}

export function formatCall(node: CallNode): string {
	return `${node.name}(${node.args.map(formatValue).join(', ')})`;
}

export function formatCondition(node: ConditionNode): string {
	switch (node.type) {
		case 'and':
			return node.terms.map((t) => wrap(t, 'and')).join(' and ');
		case 'or':
			return node.terms.map((t) => wrap(t, 'or')).join(' or ');
		case 'not':
			return `not ${wrap(node.term, 'not')}`;
		case 'compare':
			return `${formatValue(node.left)} ${node.op} ${formatValue(node.right)}`;
		case 'test':
			return formatValue(node.value);
	}
}

function wrap(node: ConditionNode, parent: 'and' | 'or' | 'not'): string {
	const needsParens =
		(node.type === 'or' && parent !== 'or') || (node.type === 'and' && parent === 'not');
	const text = formatCondition(node);
	return needsParens ? `(${text})` : text;
}

export function formatStatement(node: StatementNode): string {
	const call = formatCall(node.call);
	return node.where ? `${call} where ${formatCondition(node.where)}` : call;
}
