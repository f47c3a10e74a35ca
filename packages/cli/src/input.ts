/**
 * Batch input for `telemorph run`: OTLP/JSON from a file or stdin.
 */

import type { Signal } from '@telemorph/sdk';
import { readText } from './config.js';

export const SIGNALS: readonly Signal[] = ['traces', 'metrics', 'logs'];

const ROOT_KEYS: ReadonlyArray<[string, Signal]> = [
	['resourceSpans', 'traces'],
	['resourceMetrics', 'metrics'],
	['resourceLogs', 'logs'],
];

export function isSignal(value: unknown): value is Signal {
	return SIGNALS.some((signal) => signal === value);
}

async function readStdin(): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of process.stdin) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks).toString('utf-8');
}

/** Read and parse a JSON batch; "-" reads stdin */
export async function readBatch(path: string): Promise<unknown> {
	const text = path === '-' ? await readStdin() : await readText(path);
	try {
		return JSON.parse(text);
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new Error(`${path === '-' ? 'stdin' : path}: invalid JSON: ${reason}`, { cause: err });
	}
}

/**
 * The signal an OTLP/JSON document carries, from its root key.
 * Undefined when the document has none or more than one.
 */
export function detectSignal(doc: unknown): Signal | undefined {
	if (typeof doc !== 'object' || doc === null || Array.isArray(doc)) return undefined;
	const found = ROOT_KEYS.filter(([key]) => key in doc).map(([, signal]) => signal);
	return found.length === 1 ? found[0] : undefined;
}
