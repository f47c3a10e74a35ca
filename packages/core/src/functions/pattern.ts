import { BindError } from '../errors.js';

/** Compile a regular expression literal, reporting a bad pattern as a bind error */
export function compilePattern(functionName: string, pattern: string, flags = ''): RegExp {
	try {
		return new RegExp(pattern, flags);
	} catch (err) {
		throw new BindError(`${functionName}: invalid pattern ${JSON.stringify(pattern)}`, {
			cause: err,
		});
	}
}
