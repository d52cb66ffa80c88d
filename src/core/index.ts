/**
 * Core modules for axwarm
 */

export * from './errors.js';
export * from './reporter.js';
export * from './binding.js';
export * from './attribute.js';
export * from './permission.js';
export * from './directory.js';
export * from './selector.js';
export * from './warmup.js';
export * from './summary.js';
export * from './runner.js';
export * from './logger.js';
