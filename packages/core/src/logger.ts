/**
 * Fans log entries out to every registered logger.
 *
 * A logger that rejects does not stop delivery to the others, and the
 * caller never sees the failure.
 */

import type { LogEntry, Logger } from '@telemorph/sdk';

export class LoggerManager {
	private readonly loggers: Logger[] = [];

	addLogger(logger: Logger): void {
		this.loggers.push(logger);
	}

	removeLogger(id: string): void {
		const index = this.loggers.findIndex((l) => l.id === id);
		if (index >= 0) this.loggers.splice(index, 1);
	}

	get size(): number {
		return this.loggers.length;
	}

	async log(entry: LogEntry): Promise<void> {
		await Promise.allSettled(this.loggers.map((logger) => logger.log(entry)));
	}

	async flush(): Promise<void> {
		await Promise.allSettled(this.loggers.map((logger) => logger.flush()));
	}

	async shutdown(): Promise<void> {
		await Promise.allSettled(this.loggers.map((logger) => logger.shutdown()));
	}
}
