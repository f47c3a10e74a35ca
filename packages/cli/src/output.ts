/**
 * Output formatting utilities for the CLI.
 *
 * Status lines go to stderr so that stdout carries only command results
 * (processed batches, JSON documents). Supports JSON and quiet modes.
 */

import chalk from 'chalk';

// ─── Global output state ─────────────────────────────────────────────────────

let jsonMode = false;
let quietMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

// ─── Basic output ────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (quietMode || jsonMode) return;
	console.error(message);
}

export function success(message: string): void {
	if (quietMode || jsonMode) return;
	console.error(chalk.green(`  ✓ ${message}`));
}

export function error(message: string): void {
	if (jsonMode) return;
	console.error(chalk.red(`  ✗ ${message}`));
}

export function warn(message: string): void {
	if (quietMode || jsonMode) return;
	console.error(chalk.yellow(`  ! ${message}`));
}

export function heading(text: string): void {
	if (quietMode || jsonMode) return;
	console.error(chalk.bold(text));
}

// ─── Results ─────────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

/** A command's primary output, printed even in quiet mode */
export function result(text: string): void {
	console.log(text);
}

// ─── Table formatting ────────────────────────────────────────────────────────

export interface TableColumn {
	header: string;
	key: string;
	width?: number;
	align?: 'left' | 'right';
}

export function table(columns: TableColumn[], rows: Record<string, string>[]): void {
	if (jsonMode) {
		json(rows);
		return;
	}

	const widths = columns.map((col) => {
		const maxDataLen = rows.reduce((max, row) => Math.max(max, (row[col.key] ?? '').length), 0);
		return col.width ?? Math.max(col.header.length, maxDataLen) + 2;
	});

	const headerLine = columns.map((col, i) => col.header.padEnd(widths[i])).join('');
	console.log(chalk.dim(`  ${headerLine}`.trimEnd()));

	for (const row of rows) {
		const line = columns
			.map((col, i) => {
				const val = row[col.key] ?? '';
				return col.align === 'right' ? val.padStart(widths[i]) : val.padEnd(widths[i]);
			})
			.join('');
		console.log(`  ${line}`.trimEnd());
	}
}

// ─── Validation output ───────────────────────────────────────────────────────

export function validPass(file: string, description: string): void {
	if (quietMode || jsonMode) return;
	console.error(`${chalk.green('✓')} ${file} — ${description}`);
}

export function validFail(file: string, description: string): void {
	if (jsonMode) return;
	console.error(`${chalk.red('✗')} ${file} — ${description}`);
}
