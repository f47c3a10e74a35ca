/**
 * @telemorph/sdk: telemetry data model, OTLP/JSON codec and plugin contracts.
 */

export * from './types.js';
export * from './value.js';
export * from './telemetry.js';
export * from './otlp.js';
export * from './logger.js';
export * from './processor.js';
export * from './testing.js';
