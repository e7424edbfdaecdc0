/**
 * gifstream - stream video frames into animated GIFs
 *
 * Exports all components for programmatic use.
 */

export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './options.js';
export * from './compositor.js';
export * from './plan.js';
export * from './process-pipeline.js';
export * from './stream-writer.js';
export * from './shutdown.js';
export * from './write-gif.js';
export * from './library-writer.js';
export * from './gif-info.js';
export * from './test-pattern.js';
export { logger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
