/**
 * Flow Engine Metrics
 *
 * Prometheus-compatible metrics for reconciliation cycles and table writes.
 *
 * @module packages/engine/metrics
 */

import { Counter, Histogram, Gauge, Registry } from 'prom-client';
import type { FlowLifecycleState, TableName } from '@flowmesh/core/domain';

// =============================================================================
// Registry
// =============================================================================

/**
 * Engine metrics registry
 *
 * Can be merged with the host application registry:
 * ```typescript
 * import { register } from 'prom-client';
 * import { flowEngineRegistry } from '@flowmesh/engine';
 * register.merge(flowEngineRegistry);
 * ```
 */
export const flowEngineRegistry = new Registry();

// =============================================================================
// Cycle Metrics
// =============================================================================

export const reconciliationCycles = new Counter({
  name: 'flow_reconciliation_cycles_total',
  help: 'Total reconciliation cycles executed',
  labelNames: ['kind', 'status'] as const,
  registers: [flowEngineRegistry],
});

export const reconciliationCycleDuration = new Histogram({
  name: 'flow_reconciliation_cycle_duration_seconds',
  help: 'Reconciliation cycle duration in seconds',
  labelNames: ['kind'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [flowEngineRegistry],
});

export const rejectedEntries = new Counter({
  name: 'flow_rejected_entries_total',
  help: 'Snapshot or provisioning entries rejected as malformed',
  labelNames: ['source'] as const,
  registers: [flowEngineRegistry],
});

// =============================================================================
// Table Write Metrics
// =============================================================================

export const tableWrites = new Counter({
  name: 'flow_table_writes_total',
  help: 'Rows written to external tables',
  labelNames: ['table', 'operation', 'status'] as const,
  registers: [flowEngineRegistry],
});

// =============================================================================
// State Metrics
// =============================================================================

export const flowsByState = new Gauge({
  name: 'flow_lifecycle_flows',
  help: 'Flows per lifecycle state',
  labelNames: ['device_id', 'direction', 'state'] as const,
  registers: [flowEngineRegistry],
});

export const unresolvedFlows = new Gauge({
  name: 'flow_unresolved_interface_flows',
  help: 'Flows referencing an unknown interface',
  labelNames: ['device_id'] as const,
  registers: [flowEngineRegistry],
});

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Record a completed reconciliation cycle
 */
export function recordCycle(
  kind: 'poll' | 'provisioning' | 'interfaces',
  status: 'success' | 'failure',
  durationSeconds: number
): void {
  reconciliationCycles.labels(kind, status).inc();
  reconciliationCycleDuration.labels(kind).observe(durationSeconds);
}

/**
 * Record rejected input entries
 */
export function recordRejected(source: 'snapshot' | 'provisioning', count: number): void {
  if (count > 0) rejectedEntries.labels(source).inc(count);
}

/**
 * Record a single table write
 */
export function recordTableWrite(
  table: TableName,
  operation: 'upsert' | 'delete' | 'replace',
  status: 'success' | 'failure'
): void {
  tableWrites.labels(table, operation, status).inc();
}

/**
 * Update per-state flow gauges for a device
 */
export function updateFlowStateCounts(
  deviceId: string,
  direction: 'incoming' | 'outgoing',
  counts: Record<Exclude<FlowLifecycleState, 'NoRow'>, number>
): void {
  for (const [state, count] of Object.entries(counts)) {
    flowsByState.labels(deviceId, direction, state).set(count);
  }
}

/**
 * Update unresolved flow gauge for a device
 */
export function updateUnresolvedFlows(deviceId: string, count: number): void {
  unresolvedFlows.labels(deviceId).set(count);
}

/**
 * Collect all engine metrics
 */
export async function collectFlowEngineMetrics(): Promise<string> {
  return flowEngineRegistry.metrics();
}
