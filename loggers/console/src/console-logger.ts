/**
 * Console logger: human-readable output for processor log entries.
 *
 * Writes to process.stderr so stdout stays free for processed batches.
 */

import { type LogEntry, type LogLevel, type Logger, isLogLevel } from '@telemorph/sdk';
import { formatCompact, formatVerbose, shouldLog } from './format.js';

export class ConsoleLogger implements Logger {
	readonly id = 'console';
	private level: LogLevel = 'info';
	private useColor = true;
	private compact = true;
	private showMetadata = false;

	async init(config: Record<string, unknown>): Promise<void> {
		const { level, color, compact, show_metadata } = config;
		if (isLogLevel(level)) this.level = level;
		if (typeof color === 'boolean') this.useColor = color;
		if (typeof compact === 'boolean') this.compact = compact;
		if (typeof show_metadata === 'boolean') this.showMetadata = show_metadata;
	}

	async log(entry: LogEntry): Promise<void> {
		try {
			if (!shouldLog(entry.phase, this.level)) return;

			const formatted = this.compact
				? formatCompact(entry, this.useColor)
				: formatVerbose(entry, this.useColor, this.showMetadata);

			process.stderr.write(`${formatted}\n`);
		} catch {
			// Loggers must not throw
		}
	}

	async flush(): Promise<void> {
		// Unbuffered
	}

	async shutdown(): Promise<void> {
		// Nothing to release
	}
}
