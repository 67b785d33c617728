/**
 * Flow engine error codes and error type.
 *
 * @module packages/core/domain/errors
 */

export enum FlowEngineErrorCode {
  /** Snapshot or provisioning entry failed validation */
  MALFORMED_INPUT = 'FLOW_001',
  /** Flow references an interface that does not exist */
  UNRESOLVED_INTERFACE = 'FLOW_002',
  /** Table storage rejected a write */
  WRITE_FAILED = 'FLOW_003',
  /** Lifecycle event not allowed from the current state */
  INVALID_TRANSITION = 'FLOW_004',
  /** Provisioning message could not be decoded at all */
  INVALID_MESSAGE = 'FLOW_005',
  /** Engine was closed by a registry reset */
  ENGINE_CLOSED = 'FLOW_006',
}

export class FlowEngineError extends Error {
  constructor(
    public readonly code: FlowEngineErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FlowEngineError';
  }
}
