/**
 * Transform processor: runs configured statements over whole batches.
 *
 * Statements are bound once in `init`; a bind error rejects init and the
 * processor never accepts a batch. Each batch is walked in place, one
 * statement group at a time in config order. Failures never stop the walk:
 * they are collected into the batch report and then handled according to
 * the error mode.
 */

import {
	BatchReportBuilder,
	DataPointContext,
	LogContext,
	LoggerManager,
	PartialFailureError,
	ResourceContext,
	SpanContext,
	type Statement,
	StatementBinder,
	dataPointContext,
	evaluateStatements,
	logContext,
	resourceContext,
	spanContext,
	toError,
} from '@telemorph/core';
import {
	type ContextKind,
	type LogEntry,
	type Logger,
	type Logs,
	type Metric,
	type Metrics,
	type ProcessResult,
	type Processor,
	type Resource,
	type Signal,
	type Traces,
	dataPointsOf,
} from '@telemorph/sdk';
import {
	type ContextStatements,
	type ErrorMode,
	type LogContextKind,
	type MetricContextKind,
	type TraceContextKind,
	type TransformConfig,
	parseConfig,
} from './config.js';
import { type ContextRegistries, createRegistries } from './registries.js';

// ─── Bound groups ─────────────────────────────────────────────────────────────

interface ResourceGroup {
	context: 'resource';
	statements: Statement<ResourceContext>[];
}

type TraceGroup = { context: 'span'; statements: Statement<SpanContext>[] } | ResourceGroup;
type MetricGroup = { context: 'datapoint'; statements: Statement<DataPointContext>[] } | ResourceGroup;
type LogGroup = { context: 'log'; statements: Statement<LogContext>[] } | ResourceGroup;

type EntryFields = Omit<LogEntry, 'timestamp' | 'processor'>;

/** State of one batch walk */
class BatchRun {
	readonly report = new BatchReportBuilder();
	readonly entries: EntryFields[] = [];
	readonly started = Date.now();
	skipped = 0;

	constructor(readonly signal: Signal) {}

	register(record: object): void {
		this.report.add(record);
	}

	evaluate<K>(context: ContextKind, statements: readonly Statement<K>[], record: object, ctx: K): void {
		const outcome = evaluateStatements(statements, ctx);
		const index = this.report.add(record, outcome);
		this.skipped += outcome.skipped;
		for (const failure of outcome.failures) {
			this.entries.push({
				phase: failure.stage === 'guard' ? 'guard.error' : 'statement.error',
				signal: this.signal,
				context,
				statement: failure.statement,
				record_index: index,
				error: failure.error.message,
				error_kind: failure.error.name,
			});
		}
	}

	resources(group: ResourceGroup, resources: readonly Resource[]): void {
		for (const resource of resources) {
			this.evaluate('resource', group.statements, resource, new ResourceContext(resource));
		}
	}
}

/** Remove failing points from a metric in place, whatever its shape */
function dropPoints(metric: Metric, failed: (record: object) => boolean): void {
	if (metric.data.type === 'empty') return;
	const points: object[] = metric.data.dataPoints;
	for (let i = points.length - 1; i >= 0; i--) {
		if (failed(points[i])) points.splice(i, 1);
	}
}

// ─── Processor ────────────────────────────────────────────────────────────────

export interface TransformProcessorOptions {
	/** Instance name used in log entries (default: "transform") */
	name?: string;
	loggers?: Logger[];
}

export class TransformProcessor implements Processor {
	readonly id = 'transform';
	readonly name: string;
	private readonly loggerManager = new LoggerManager();
	private state: 'created' | 'running' | 'stopped' = 'created';
	private mode: ErrorMode = 'propagate';
	private traceGroups: TraceGroup[] = [];
	private metricGroups: MetricGroup[] = [];
	private logGroups: LogGroup[] = [];

	constructor(options: TransformProcessorOptions = {}) {
		this.name = options.name ?? 'transform';
		for (const logger of options.loggers ?? []) this.loggerManager.addLogger(logger);
	}

	/** Loggers receiving this processor's entries */
	get loggers(): LoggerManager {
		return this.loggerManager;
	}

	get errorMode(): ErrorMode {
		return this.mode;
	}

	get running(): boolean {
		return this.state === 'running';
	}

	async init(config: Record<string, unknown>): Promise<void> {
		if (this.state !== 'created') throw new Error(`processor "${this.name}" is already initialized`);
		const parsed = parseConfig(config);
		try {
			this.bind(parsed, createRegistries());
		} catch (err) {
			const error = toError(err);
			await this.emit({ phase: 'bind.error', error: error.message, error_kind: error.name });
			throw err;
		}
		this.mode = parsed.error_mode;
		this.state = 'running';
		await this.emit({
			phase: 'processor.start',
			metadata: {
				error_mode: this.mode,
				groups: this.traceGroups.length + this.metricGroups.length + this.logGroups.length,
			},
		});
	}

	private bind(config: TransformConfig, registries: ContextRegistries): void {
		const resource = new StatementBinder(resourceContext, registries.resource);
		const bindResource = (group: ContextStatements<string>): ResourceGroup => ({
			context: 'resource',
			statements: resource.bindStatements(group.statements),
		});

		const spans = new StatementBinder(spanContext, registries.span);
		this.traceGroups = config.trace_statements.map(
			(group: ContextStatements<TraceContextKind>): TraceGroup =>
				group.context === 'span'
					? { context: 'span', statements: spans.bindStatements(group.statements) }
					: bindResource(group),
		);

		const points = new StatementBinder(dataPointContext, registries.datapoint);
		this.metricGroups = config.metric_statements.map(
			(group: ContextStatements<MetricContextKind>): MetricGroup =>
				group.context === 'datapoint'
					? { context: 'datapoint', statements: points.bindStatements(group.statements) }
					: bindResource(group),
		);

		const logs = new StatementBinder(logContext, registries.log);
		this.logGroups = config.log_statements.map(
			(group: ContextStatements<LogContextKind>): LogGroup =>
				group.context === 'log'
					? { context: 'log', statements: logs.bindStatements(group.statements) }
					: bindResource(group),
		);
	}

	// ─── Signals ────────────────────────────────────────────────────────────────

	async processTraces(batch: Traces): Promise<ProcessResult<Traces>> {
		const run = await this.begin('traces');

		for (const rs of batch.resourceSpans) {
			for (const ss of rs.scopeSpans) ss.spans.forEach((span) => run.register(span));
		}
		for (const group of this.traceGroups) {
			if (group.context === 'resource') {
				run.resources(group, batch.resourceSpans.map((rs) => rs.resource));
				continue;
			}
			for (const rs of batch.resourceSpans) {
				for (const ss of rs.scopeSpans) {
					for (const span of ss.spans) {
						run.evaluate('span', group.statements, span, new SpanContext(span, ss.scope, rs.resource));
					}
				}
			}
		}

		return this.finish(run, batch, (failed) => {
			batch.resourceSpans = batch.resourceSpans.filter((rs) => !failed(rs.resource));
			for (const rs of batch.resourceSpans) {
				for (const ss of rs.scopeSpans) ss.spans = ss.spans.filter((span) => !failed(span));
			}
		});
	}

	async processMetrics(batch: Metrics): Promise<ProcessResult<Metrics>> {
		const run = await this.begin('metrics');

		for (const rm of batch.resourceMetrics) {
			for (const sm of rm.scopeMetrics) {
				for (const metric of sm.metrics) dataPointsOf(metric).forEach((point) => run.register(point));
			}
		}
		for (const group of this.metricGroups) {
			if (group.context === 'resource') {
				run.resources(group, batch.resourceMetrics.map((rm) => rm.resource));
				continue;
			}
			for (const rm of batch.resourceMetrics) {
				for (const sm of rm.scopeMetrics) {
					for (const metric of sm.metrics) {
						// Re-read the points on every step: a statement may have reshaped the metric
						for (let i = 0; i < dataPointsOf(metric).length; i++) {
							const point = dataPointsOf(metric)[i];
							const ctx = new DataPointContext(point, metric, sm.scope, rm.resource);
							run.evaluate('datapoint', group.statements, point, ctx);
						}
					}
				}
			}
		}

		return this.finish(run, batch, (failed) => {
			batch.resourceMetrics = batch.resourceMetrics.filter((rm) => !failed(rm.resource));
			for (const rm of batch.resourceMetrics) {
				for (const sm of rm.scopeMetrics) {
					for (const metric of sm.metrics) dropPoints(metric, failed);
				}
			}
		});
	}

	async processLogs(batch: Logs): Promise<ProcessResult<Logs>> {
		const run = await this.begin('logs');

		for (const rl of batch.resourceLogs) {
			for (const sl of rl.scopeLogs) sl.logRecords.forEach((record) => run.register(record));
		}
		for (const group of this.logGroups) {
			if (group.context === 'resource') {
				run.resources(group, batch.resourceLogs.map((rl) => rl.resource));
				continue;
			}
			for (const rl of batch.resourceLogs) {
				for (const sl of rl.scopeLogs) {
					for (const record of sl.logRecords) {
						run.evaluate('log', group.statements, record, new LogContext(record, sl.scope, rl.resource));
					}
				}
			}
		}

		return this.finish(run, batch, (failed) => {
			batch.resourceLogs = batch.resourceLogs.filter((rl) => !failed(rl.resource));
			for (const rl of batch.resourceLogs) {
				for (const sl of rl.scopeLogs) sl.logRecords = sl.logRecords.filter((r) => !failed(r));
			}
		});
	}

	async shutdown(): Promise<void> {
		if (this.state === 'stopped') return;
		this.state = 'stopped';
		await this.emit({ phase: 'processor.stop' });
		await this.loggerManager.flush();
		await this.loggerManager.shutdown();
	}

	// ─── Internals ──────────────────────────────────────────────────────────────

	private async begin(signal: Signal): Promise<BatchRun> {
		if (this.state !== 'running') {
			const reason = this.state === 'stopped' ? 'shut down' : 'not initialized';
			await this.emit({ phase: 'batch.rejected', signal, error: `processor is ${reason}` });
			throw new Error(`processor "${this.name}" is ${reason}`);
		}
		return new BatchRun(signal);
	}

	private async finish<T>(
		run: BatchRun,
		batch: T,
		drop: (failed: (record: object) => boolean) => void,
	): Promise<ProcessResult<T>> {
		const report = run.report.build();

		for (const entry of run.entries) await this.emit(entry);
		await this.emit({
			phase: report.failedRecords > 0 ? 'batch.partial_failure' : 'batch.complete',
			signal: run.signal,
			total_records: report.totalRecords,
			failed_records: report.failedRecords,
			duration_ms: Date.now() - run.started,
			metadata: { error_mode: this.mode, skipped_statements: run.skipped },
		});

		if (report.failedRecords > 0) {
			if (this.mode === 'propagate') throw new PartialFailureError(report);
			if (this.mode === 'drop') drop((record) => run.report.hasFailed(record));
		}
		return { batch, report };
	}

	private async emit(fields: EntryFields): Promise<void> {
		await this.loggerManager.log({
			timestamp: new Date().toISOString(),
			processor: this.name,
			...fields,
		});
	}
}
