/**
 * CLI configuration loading.
 *
 * A config file is YAML (or JSON, which YAML reads too):
 *
 *   name: edge-transform          # instance name in log output
 *   logger:                       # console logger options
 *     level: info
 *     compact: true
 *   transform:                    # transform processor config
 *     error_mode: drop
 *     log_statements: [...]
 *
 * A file without a `transform` key is read as the processor config itself.
 */

import { readFile } from 'node:fs/promises';
import { type LogLevel, isLogLevel } from '@telemorph/sdk';
import yaml from 'js-yaml';

export interface CliConfig {
	path: string;
	name: string;
	logger: Record<string, unknown>;
	transform: Record<string, unknown>;
}

export class CliConfigError extends Error {
	constructor(
		readonly path: string,
		message: string,
		options?: ErrorOptions,
	) {
		super(`${path}: ${message}`, options);
		this.name = 'CliConfigError';
	}
}

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export const LOG_LEVEL_ENV = 'TELEMORPH_LOG_LEVEL';

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissing(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function readText(path: string): Promise<string> {
	try {
		return await readFile(path, 'utf-8');
	} catch (err) {
		if (isMissing(err)) throw new CliConfigError(path, 'file not found', { cause: err });
		throw err;
	}
}

/** Parse YAML or JSON text into plain data */
export function parseDocument(path: string, text: string): unknown {
	try {
		return yaml.load(text);
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new CliConfigError(path, `invalid YAML: ${reason}`, { cause: err });
	}
}

const TOP_LEVEL_KEYS = new Set(['name', 'logger', 'transform']);

export function toCliConfig(path: string, doc: unknown): CliConfig {
	if (doc === undefined || doc === null) {
		return { path, name: 'transform', logger: {}, transform: {} };
	}
	if (!isRecord(doc)) throw new CliConfigError(path, 'config must be a mapping');

	if (!('transform' in doc)) {
		return { path, name: 'transform', logger: {}, transform: doc };
	}

	const unknown = Object.keys(doc).filter((key) => !TOP_LEVEL_KEYS.has(key));
	if (unknown.length > 0) {
		throw new CliConfigError(path, `unknown top-level keys: ${unknown.join(', ')}`);
	}
	const { name, logger, transform } = doc;
	if (name !== undefined && typeof name !== 'string') {
		throw new CliConfigError(path, '"name" must be a string');
	}
	if (logger !== undefined && !isRecord(logger)) {
		throw new CliConfigError(path, '"logger" must be a mapping');
	}
	if (transform !== null && !isRecord(transform)) {
		throw new CliConfigError(path, '"transform" must be a mapping');
	}
	return {
		path,
		name: name ?? 'transform',
		logger: logger ?? {},
		transform: transform ?? {},
	};
}

export async function loadCliConfig(options: { configPath: string }): Promise<CliConfig> {
	const text = await readText(options.configPath);
	return toCliConfig(options.configPath, parseDocument(options.configPath, text));
}

/**
 * Effective processor log level: the command-line flag, then the
 * environment, then the config file's logger block, then the default.
 */
export function resolveLogLevel(
	flag: string | undefined,
	env: NodeJS.ProcessEnv,
	configured: unknown,
): LogLevel {
	const candidates: Array<[string, unknown]> = [
		['--log-level', flag],
		[LOG_LEVEL_ENV, env[LOG_LEVEL_ENV]],
		['logger.level', configured],
	];
	for (const [source, value] of candidates) {
		if (value === undefined || value === '') continue;
		if (!isLogLevel(value)) {
			throw new Error(`${source}: invalid log level "${String(value)}" (debug, info, warn, error)`);
		}
		return value;
	}
	return DEFAULT_LOG_LEVEL;
}
