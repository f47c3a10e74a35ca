import { emptyValue } from '@telemorph/sdk';
import { isAssignable } from '../coercion.js';
import { BindError } from '../errors.js';
import type { FunctionFactory } from '../registry.js';

export function set<K>(): FunctionFactory<K> {
	return {
		name: 'set',
		params: [
			{ name: 'target', kind: 'setter' },
			{ name: 'value', kind: 'getter' },
		],
		returns: 'empty',
		create(args) {
			const target = args.setter('target');
			const value = args.getter('value');
			if (!isAssignable(target.fieldType, value.type)) {
				throw new BindError(
					`set: cannot write ${value.type} value ${value.text} to ${target.fieldType} field ${target.text}`,
				);
			}
			return (ctx) => {
				target.set(ctx, value.get(ctx));
				return emptyValue();
			};
		},
	};
}
