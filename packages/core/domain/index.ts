/**
 * Core Domain Types
 *
 * Flow, interface and lifecycle models shared by the engine and adapters.
 * Domain types carry no infrastructure concerns.
 */

// Flow & interface records
export * from './flow.js';

// Lifecycle state machine
export * from './flow-lifecycle.js';

// Expected-vs-actual status policy
export * from './status-policy.js';

// Error taxonomy
export * from './errors.js';
