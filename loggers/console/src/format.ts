/**
 * Formatting helpers for the console logger.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { LOG_LEVELS, type LogEntry, type LogPhase, isLogLevel, phaseLevel } from '@telemorph/sdk';

const ICONS: Record<LogPhase, string> = {
	'processor.start': '\u25cf', // ●
	'processor.stop': '\u25cf', // ●
	'bind.error': '\u2717', // ✗
	'statement.error': '\u26a0', // ⚠
	'guard.error': '\u26a0', // ⚠
	'batch.complete': '\u2713', // ✓
	'batch.partial_failure': '\u25d0', // ◐
	'batch.rejected': '\u2717', // ✗
};

/** Whether an entry of `phase` passes a `level` threshold. Unknown levels pass everything. */
export function shouldLog(phase: LogPhase, level: string): boolean {
	if (!isLogLevel(level)) return true;
	return LOG_LEVELS.indexOf(phaseLevel(phase)) >= LOG_LEVELS.indexOf(level);
}

function palette(useColor: boolean): ChalkInstance {
	return new Chalk({ level: useColor ? 1 : 0 });
}

function phaseStyle(chalk: ChalkInstance, phase: LogPhase): ChalkInstance {
	if (phase === 'batch.complete') return chalk.green;
	switch (phaseLevel(phase)) {
		case 'debug':
			return chalk.gray;
		case 'info':
			return chalk.cyan;
		case 'warn':
			return chalk.yellow;
		case 'error':
			return chalk.red;
	}
}

/** HH:MM:SS.mmm in local time */
function formatTime(timestamp: string): string {
	const d = new Date(timestamp);
	if (Number.isNaN(d.getTime())) return timestamp;
	const pad = (n: number, width = 2) => String(n).padStart(width, '0');
	return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
}

/** One line per entry */
export function formatCompact(entry: LogEntry, useColor: boolean): string {
	const chalk = palette(useColor);
	const icon = ICONS[entry.phase] ?? '\u00b7';
	const parts = [
		chalk.dim(formatTime(entry.timestamp)),
		phaseStyle(chalk, entry.phase)(`${icon} ${entry.phase}`),
	];

	if (entry.processor) parts.push(`[${entry.processor}]`);
	if (entry.signal) parts.push(`signal=${entry.signal}`);
	if (entry.context) parts.push(`ctx=${entry.context}`);
	if (entry.record_index !== undefined) parts.push(`record=${entry.record_index}`);
	if (entry.total_records !== undefined) {
		parts.push(`failed=${entry.failed_records ?? 0}/${entry.total_records}`);
	}
	if (entry.duration_ms !== undefined) parts.push(`${entry.duration_ms}ms`);
	if (entry.statement) parts.push(`stmt=${entry.statement}`);
	if (entry.error) {
		const kind = entry.error_kind ? `${entry.error_kind}: ` : '';
		parts.push(chalk.red(`err=${kind}${entry.error}`));
	}

	return parts.join(' ');
}

/** Compact line, followed by the entry's metadata when asked for */
export function formatVerbose(entry: LogEntry, useColor: boolean, showMetadata: boolean): string {
	const line = formatCompact(entry, useColor);
	if (!showMetadata || !entry.metadata || Object.keys(entry.metadata).length === 0) return line;

	const body = JSON.stringify(entry.metadata, null, 2).split('\n').join('\n  ');
	return `${line}\n  ${palette(useColor).dim(`metadata: ${body}`)}`;
}
