/**
 * telemorph run: Transform one OTLP/JSON batch.
 *
 * The processed batch goes to stdout (or --output); status and the
 * partial-failure report go to stderr. Exits 1 when any record had a
 * failing statement.
 */

import { writeFile } from 'node:fs/promises';
import { PartialFailureError } from '@telemorph/core';
import { ConsoleLogger } from '@telemorph/logger-console';
import {
	type BatchReport,
	type JsonObject,
	type Signal,
	decodeLogs,
	decodeMetrics,
	decodeTraces,
	encodeLogs,
	encodeMetrics,
	encodeTraces,
} from '@telemorph/sdk';
import { TransformProcessor } from '@telemorph/transform-processor';
import type { Command } from 'commander';
import { loadCliConfig, resolveLogLevel } from '../config.js';
import { detectSignal, isSignal, readBatch, SIGNALS } from '../input.js';
import * as output from '../output.js';

interface RunOptions {
	signal?: string;
	output?: string;
}

async function processBatch(processor: TransformProcessor, signal: Signal, doc: unknown): Promise<{
	encoded: JsonObject;
	report: BatchReport;
}> {
	switch (signal) {
		case 'traces': {
			const { batch, report } = await processor.processTraces(decodeTraces(doc));
			return { encoded: encodeTraces(batch), report };
		}
		case 'metrics': {
			const { batch, report } = await processor.processMetrics(decodeMetrics(doc));
			return { encoded: encodeMetrics(batch), report };
		}
		case 'logs': {
			const { batch, report } = await processor.processLogs(decodeLogs(doc));
			return { encoded: encodeLogs(batch), report };
		}
	}
}

function printReport(report: BatchReport): void {
	if (output.isJsonMode()) return;
	const summary = `${report.totalRecords} records, ${report.failedRecords} failed`;
	if (report.failedRecords === 0) {
		output.success(summary);
		return;
	}
	output.warn(summary);
	for (const failure of report.failures) {
		output.info(`    record ${failure.recordIndex} [${failure.stage}] ${failure.statement}: ${failure.error.message}`);
	}
}

export async function runTransform(
	configPath: string,
	inputPath: string,
	opts: RunOptions,
	globalOpts: Record<string, unknown>,
): Promise<void> {
	const config = await loadCliConfig({ configPath });
	const flag = typeof globalOpts.logLevel === 'string' ? globalOpts.logLevel : undefined;
	const level = resolveLogLevel(flag, process.env, config.logger.level);

	const doc = await readBatch(inputPath);
	const signal = opts.signal ?? detectSignal(doc);
	if (!isSignal(signal)) {
		output.error(
			opts.signal !== undefined
				? `Unknown signal "${opts.signal}" (${SIGNALS.join(', ')})`
				: 'Cannot tell the signal from the input; pass --signal',
		);
		process.exitCode = 1;
		return;
	}

	const logger = new ConsoleLogger();
	await logger.init({ ...config.logger, level, color: process.stderr.isTTY === true });
	const processor = new TransformProcessor({ name: config.name, loggers: [logger] });
	await processor.init(config.transform);

	try {
		const { encoded, report } = await processBatch(processor, signal, doc);
		const text = JSON.stringify(encoded, null, 2);
		if (opts.output) {
			await writeFile(opts.output, `${text}\n`, 'utf-8');
		} else {
			output.result(text);
		}
		printReport(report);
		if (report.failedRecords > 0) process.exitCode = 1;
	} catch (err) {
		if (!(err instanceof PartialFailureError)) throw err;
		output.error(`${err.message}; batch rejected (error_mode: propagate)`);
		printReport(err.report);
		process.exitCode = 1;
	} finally {
		await processor.shutdown();
	}
}

export function registerRunCommand(program: Command): void {
	program
		.command('run <config> <input>')
		.description('Transform an OTLP/JSON batch ("-" reads stdin)')
		.option('--signal <signal>', `Signal of the input (${SIGNALS.join(', ')}); detected when omitted`)
		.option('-o, --output <file>', 'Write the processed batch to a file instead of stdout')
		.action(async (configPath: string, inputPath: string, opts: RunOptions, cmd: Command) => {
			try {
				await runTransform(configPath, inputPath, opts, cmd.parent?.opts() ?? {});
			} catch (err) {
				output.error(err instanceof Error ? err.message : String(err));
				process.exitCode = 1;
			}
		});
}
