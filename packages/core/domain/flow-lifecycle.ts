/**
 * Flow Lifecycle State Machine
 *
 * A flow's state is derived from its (owner, present) pair:
 *
 * | owner           | present | state              |
 * |-----------------|---------|--------------------|
 * | (no row)        |         | NoRow              |
 * | FlowEngineering | false   | ProvisionedAbsent  |
 * | FlowEngineering | true    | ProvisionedPresent |
 * | LocalSystem     | true    | ObservedPresent    |
 *
 * LocalSystem + absent is never persisted; it collapses to NoRow.
 *
 * @module packages/core/domain/flow-lifecycle
 */

import { FlowEngineError, FlowEngineErrorCode } from './errors.js';
import type { FlowBase, FlowOwner } from './flow.js';

// =============================================================================
// States & Events
// =============================================================================

export type FlowLifecycleState =
  | 'NoRow'
  | 'ProvisionedAbsent'
  | 'ProvisionedPresent'
  | 'ObservedPresent';

export type FlowLifecycleEvent =
  | 'provisioning_add'
  | 'provisioning_remove'
  | 'device_observed'
  | 'device_lost';

/**
 * Valid transitions. Events missing from a state's map are rejected.
 * Repeats that leave the state unchanged (observing an already present
 * flow, re-provisioning a provisioned one) are listed explicitly.
 */
export const FLOW_TRANSITIONS: Record<
  FlowLifecycleState,
  Partial<Record<FlowLifecycleEvent, FlowLifecycleState>>
> = {
  NoRow: {
    provisioning_add: 'ProvisionedAbsent',
    device_observed: 'ObservedPresent',
  },
  ProvisionedAbsent: {
    provisioning_add: 'ProvisionedAbsent',
    provisioning_remove: 'NoRow',
    device_observed: 'ProvisionedPresent',
    device_lost: 'ProvisionedAbsent',
  },
  ProvisionedPresent: {
    provisioning_add: 'ProvisionedPresent',
    provisioning_remove: 'ObservedPresent',
    device_observed: 'ProvisionedPresent',
    device_lost: 'ProvisionedAbsent',
  },
  ObservedPresent: {
    provisioning_add: 'ProvisionedPresent',
    device_observed: 'ObservedPresent',
    device_lost: 'NoRow',
  },
};

// =============================================================================
// Functions
// =============================================================================

export function flowState(flow: Pick<FlowBase, 'owner' | 'present'> | undefined): FlowLifecycleState {
  if (!flow) return 'NoRow';
  if (flow.owner === 'FlowEngineering') {
    return flow.present ? 'ProvisionedPresent' : 'ProvisionedAbsent';
  }
  return flow.present ? 'ObservedPresent' : 'NoRow';
}

/**
 * Next state for an event.
 *
 * @throws FlowEngineError INVALID_TRANSITION when the event is not allowed
 */
export function applyFlowEvent(
  state: FlowLifecycleState,
  event: FlowLifecycleEvent
): FlowLifecycleState {
  const next = FLOW_TRANSITIONS[state][event];
  if (next === undefined) {
    throw new FlowEngineError(
      FlowEngineErrorCode.INVALID_TRANSITION,
      `Event ${event} is not valid from state ${state}`,
      { state, event }
    );
  }
  return next;
}

/**
 * (owner, present) pair for a persisted state, or null for NoRow.
 */
export function stateAttributes(
  state: FlowLifecycleState
): { owner: FlowOwner; present: boolean } | null {
  switch (state) {
    case 'NoRow':
      return null;
    case 'ProvisionedAbsent':
      return { owner: 'FlowEngineering', present: false };
    case 'ProvisionedPresent':
      return { owner: 'FlowEngineering', present: true };
    case 'ObservedPresent':
      return { owner: 'LocalSystem', present: true };
  }
}
