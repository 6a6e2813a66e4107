/**
 * Utility Exports
 *
 * Re-exports all utility modules for convenient imports.
 */

export * from './logger.js';
export * from './retry.js';
export * from './fileWriter.js';
export * from './concurrency.js';
