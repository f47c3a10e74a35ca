/**
 * telemorph functions: List the functions each context offers.
 */

import type { ContextKind } from '@telemorph/sdk';
import { describeFunctions } from '@telemorph/transform-processor';
import type { Command } from 'commander';
import * as output from '../output.js';

const CONTEXTS: readonly ContextKind[] = ['span', 'log', 'datapoint', 'resource'];

function isContextKind(value: unknown): value is ContextKind {
	return CONTEXTS.some((kind) => kind === value);
}

export function registerFunctionsCommand(program: Command): void {
	program
		.command('functions')
		.description('List available functions and their signatures')
		.option('--context <kind>', `Only one context (${CONTEXTS.join(', ')})`)
		.action((opts: { context?: string }) => {
			if (opts.context !== undefined && !isContextKind(opts.context)) {
				output.error(`Unknown context "${opts.context}" (${CONTEXTS.join(', ')})`);
				process.exitCode = 1;
				return;
			}
			const kinds = opts.context === undefined ? CONTEXTS : CONTEXTS.filter((kind) => kind === opts.context);
			const rows = kinds.flatMap((kind) =>
				describeFunctions(kind).map((signature) => ({ context: kind, signature })),
			);
			output.table(
				[
					{ header: 'CONTEXT', key: 'context' },
					{ header: 'SIGNATURE', key: 'signature' },
				],
				rows,
			);
		});
}
