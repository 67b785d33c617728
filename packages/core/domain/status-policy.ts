/**
 * Actual-versus-expected comparison used for interface rollups and
 * per-flow expected bitrate status.
 *
 * @module packages/core/domain/status-policy
 */

import type { ExpectationStatus } from './flow.js';

export const DEFAULT_BITRATE_TOLERANCE_PERCENT = 10;

/**
 * Compare an actual value to its expected value.
 *
 * Nothing expected (null, zero or negative) is always Normal. Otherwise
 * the value is Normal inside `expected ± tolerancePercent%`, Low below
 * and High above.
 */
export function compareToExpected(
  actual: number,
  expected: number | null,
  tolerancePercent: number = DEFAULT_BITRATE_TOLERANCE_PERCENT
): ExpectationStatus {
  if (expected === null || expected <= 0) return 'Normal';

  const margin = (expected * tolerancePercent) / 100;
  if (actual < expected - margin) return 'Low';
  if (actual > expected + margin) return 'High';
  return 'Normal';
}
