/**
 * telemorph validate: Check a config without processing anything.
 *
 * Runs the structural checks first, then binds every statement against its
 * context so unknown paths, functions and type mismatches surface here.
 */

import { TransformProcessor, validateConfig } from '@telemorph/transform-processor';
import type { Command } from 'commander';
import { loadCliConfig } from '../config.js';
import * as output from '../output.js';

export interface ValidationResult {
	valid: boolean;
	errors: string[];
}

export async function validateFile(configPath: string): Promise<ValidationResult> {
	const config = await loadCliConfig({ configPath });

	const structural = validateConfig(config.transform);
	if (structural.length > 0) {
		return {
			valid: false,
			errors: structural.map((e) => (e.field ? `${e.field}: ${e.message}` : e.message)),
		};
	}

	const processor = new TransformProcessor({ name: config.name });
	try {
		await processor.init(config.transform);
	} catch (err) {
		return { valid: false, errors: [err instanceof Error ? err.message : String(err)] };
	} finally {
		await processor.shutdown();
	}
	return { valid: true, errors: [] };
}

export function registerValidateCommand(program: Command): void {
	program
		.command('validate <config>')
		.description('Validate a transform config and bind its statements')
		.action(async (configPath: string) => {
			try {
				const result = await validateFile(configPath);
				if (output.isJsonMode()) {
					output.json({ file: configPath, ...result });
				} else if (result.valid) {
					output.validPass(configPath, 'valid transform config');
				} else {
					for (const message of result.errors) output.validFail(configPath, message);
				}
				if (!result.valid) process.exitCode = 1;
			} catch (err) {
				output.error(err instanceof Error ? err.message : String(err));
				process.exitCode = 1;
			}
		});
}
