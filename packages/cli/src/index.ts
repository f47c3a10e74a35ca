/**
 * @telemorph/cli: programmatic entry points behind the `telemorph` command.
 */

export { CliConfigError, DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV, loadCliConfig, resolveLogLevel, toCliConfig } from './config.js';
export type { CliConfig } from './config.js';
export { detectSignal, isSignal, readBatch } from './input.js';
export { createProgram } from './program.js';
export { runTransform } from './commands/run.js';
export { validateFile } from './commands/validate.js';
export type { ValidationResult } from './commands/validate.js';
