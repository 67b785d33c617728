/**
 * Core Ports
 *
 * Port interfaces (contracts) between the engine and its collaborators.
 */

// Table persistence
export * from './flow-table-storage.js';

// Device polling & physical interface lookup
export * from './device-collaborators.js';
