/**
 * Command-line program definition.
 */

import { Command } from 'commander';
import { registerFunctionsCommand } from './commands/functions.js';
import { registerRunCommand } from './commands/run.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerVersionCommand } from './commands/version.js';
import * as output from './output.js';

export function createProgram(): Command {
	const program = new Command();

	program
		.name('telemorph')
		.description('Run transformation statements over OTLP/JSON telemetry')
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only print results and errors')
		.option('--log-level <level>', 'Processor log level (debug, info, warn, error)')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts();
			output.setJsonMode(opts.json === true);
			output.setQuietMode(opts.quiet === true);
		});

	registerRunCommand(program);
	registerValidateCommand(program);
	registerFunctionsCommand(program);
	registerVersionCommand(program);

	return program;
}
