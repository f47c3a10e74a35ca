/**
 * @telemorph/core: statement binding and evaluation.
 *
 *   const functions = new FunctionRegistry(standardFunctions<SpanContext>()).seal();
 *   const binder = new StatementBinder(spanContext, functions);
 *   const statements = binder.bindStatements(nodes);
 *   const outcome = evaluateStatements(statements, new SpanContext(span, scope, resource));
 */

export * from './ast.js';
export { StatementBinder } from './binder.js';
export type { Statement } from './binder.js';
export { coerce, expectType, isAssignable } from './coercion.js';
export type { FieldType, StaticType } from './coercion.js';
export { bindCondition, compareValues } from './condition.js';
export * from './contexts/index.js';
export {
	BindError,
	FunctionExecutionError,
	PartialFailureError,
	PathNotFoundError,
	TelemorphError,
	TypeMismatchError,
	isTelemorphError,
	toError,
} from './errors.js';
export type { ErrorKind } from './errors.js';
export { BatchReportBuilder, evaluateStatements } from './evaluator.js';
export type { RecordOutcome, StatementFailure } from './evaluator.js';
export { callGetter, isGetSetter, literalGetter } from './expression.js';
export type { ExprFunc, GetSetter, Getter } from './expression.js';
export * from './functions/index.js';
export { LoggerManager } from './logger.js';
export { resolvePath } from './path.js';
export type { FieldAccessor, FieldEntry, FieldTable, Selector } from './path.js';
export { Arguments, FunctionRegistry, formatSignature } from './registry.js';
export type { BoundArgument, FunctionFactory, ParamKind, ParamSpec } from './registry.js';
