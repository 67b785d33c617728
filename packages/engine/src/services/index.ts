/**
 * Engine Services
 *
 * @module packages/engine/services
 */

export { FlowEntityStore } from './flow-entity-store.js';

export {
  ReconciliationMerger,
  type ReconciliationMergerConfig,
  type FlowMergeResult,
} from './reconciliation-merger.js';

export {
  AggregateCalculator,
  computeAggregates,
  type AggregateCalculatorConfig,
  type AggregateOptions,
  type AggregateResult,
  type UnresolvedFlow,
} from './aggregate-calculator.js';

export {
  ProvisioningMessageHandler,
  linkChangedFlows,
  type FlowsByDirection,
  type ProvisioningHandlerConfig,
  type ProvisioningOptions,
  type ProvisioningResult,
  type RejectedProvisioningEntry,
} from './provisioning-handler.js';

export {
  TableSynchronizer,
  toFlowRow,
  toInterfaceRow,
  type SyncResult,
  type TableSynchronizerConfig,
} from './table-synchronizer.js';

export { DeviceSerialQueue } from './device-serial-queue.js';

export {
  DeviceFlowEngine,
  type DeviceFlowEngineConfig,
  type InterfaceCycleResult,
  type ProvisioningCycleResult,
  type SnapshotCycleResult,
} from './device-flow-engine.js';

export {
  FlowEngineRegistry,
  createFlowEngineRegistry,
  type FlowEngineRegistryConfig,
} from './flow-engine-registry.js';
