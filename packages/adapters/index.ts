/**
 * Adapters
 *
 * Infrastructure implementations of the core ports.
 *
 * @module packages/adapters
 */

export * from './storage/index.js';
export * from './resolver/index.js';
