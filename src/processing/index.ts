/**
 * Processing Module
 *
 * Exports post normalization and URL helpers.
 */

export * from './normalize.js';
export * from './urls.js';
