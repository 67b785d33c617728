/**
 * @flowmesh/engine
 *
 * Reconciles polled device state and provisioning messages into the
 * interfaces, incoming and outgoing flow tables.
 *
 * @module packages/engine
 */

export * from './services/index.js';

export {
  parseSnapshot,
  extractInstance,
  describeIssues,
  FlowObservationSchema,
  InterfaceObservationSchema,
  TransportTypeSchema,
  type FlowObservation,
  type InterfaceObservation,
  type ParsedSnapshot,
  type RejectedEntry,
} from './schemas/device-snapshot.js';

export {
  ProvisioningMessageSchema,
  ProvisioningActionSchema,
  ProvisionedFlowSchema,
  ProvisionedFlowRemovalSchema,
  type FlowEndpoints,
  type ProvisionedFlow,
  type ProvisionedFlowRemoval,
  type ProvisioningAction,
  type ProvisioningMessage,
} from './schemas/provisioning-message.js';

export {
  loadConfig,
  getConfig,
  resetConfig,
  type Config,
  type ReconcileOptions,
} from './config.js';

export { createLogger, type Logger } from './logger.js';

export {
  flowEngineRegistry,
  collectFlowEngineMetrics,
} from './metrics.js';
