/**
 * Device snapshot entry schemas.
 *
 * Pollers hand over raw entries; each one is validated on its own so a
 * single bad entry never fails the whole snapshot.
 *
 * Flow entry contract:
 *   instance        : stable identity across polls
 *   transportType   : IP | SDI | ASI
 *   destinationIp   : required for IP, dropped for SDI/ASI
 *   destinationPort : optional (some devices do not report it)
 *   sourceIp        : optional for IP (any-source multicast)
 *   interfaceKey    : interface index the flow is seen on
 *   bitrate         : latest sample in bps
 */

import { z } from 'zod';
import { FlowEngineErrorCode } from '@flowmesh/core/domain';

export const TransportTypeSchema = z.enum(['IP', 'SDI', 'ASI']);

export const FlowObservationSchema = z
  .object({
    instance: z.string().min(1).max(512),
    transportType: TransportTypeSchema,
    destinationIp: z.string().ip().nullish(),
    destinationPort: z.number().int().min(0).max(65535).nullish(),
    sourceIp: z.string().ip().nullish(),
    interfaceKey: z.string().min(1).max(256),
    bitrate: z.number().finite().nonnegative(),
    label: z.string().max(256).nullish(),
  })
  .superRefine((value, ctx) => {
    if (value.transportType === 'IP' && !value.destinationIp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['destinationIp'],
        message: 'IP flows require a destination IP',
      });
    }
  })
  .transform((value) => {
    const ip = value.transportType === 'IP';
    return {
      instance: value.instance,
      transportType: value.transportType,
      destinationIp: ip ? value.destinationIp ?? null : null,
      destinationPort: ip ? value.destinationPort ?? null : null,
      sourceIp: ip ? value.sourceIp ?? null : null,
      interfaceKey: value.interfaceKey,
      bitrate: value.bitrate,
      label: value.label ?? null,
    };
  });

export type FlowObservation = z.output<typeof FlowObservationSchema>;

export const InterfaceObservationSchema = z
  .object({
    instance: z.string().min(1).max(256),
    description: z.string().max(512).default(''),
    displayKey: z.string().max(512).optional(),
    type: z.enum(['Ethernet', 'SDI', 'ASI']),
    adminStatus: z.enum(['Up', 'Down', 'Testing']),
    operationalStatus: z.enum([
      'Up',
      'Down',
      'Testing',
      'Unknown',
      'Dormant',
      'NotPresent',
      'LowerLayerDown',
    ]),
    physicalInterfaceId: z.string().min(1).nullish(),
  })
  .transform((value) => ({
    instance: value.instance,
    description: value.description,
    displayKey: value.displayKey ?? value.instance,
    type: value.type,
    adminStatus: value.adminStatus,
    operationalStatus: value.operationalStatus,
    physicalInterfaceId: value.physicalInterfaceId ?? null,
  }));

export type InterfaceObservation = z.output<typeof InterfaceObservationSchema>;

/**
 * Best-effort instance key of an entry that failed validation, so the
 * merger can still treat it as observed.
 */
export function extractInstance(entry: unknown): string | null {
  if (typeof entry !== 'object' || entry === null || !('instance' in entry)) return null;
  const { instance } = entry;
  return typeof instance === 'string' && instance.length > 0 ? instance : null;
}

// --------------------------------------------------------------------------
// Snapshot parsing
// --------------------------------------------------------------------------

export interface RejectedEntry {
  code: FlowEngineErrorCode.MALFORMED_INPUT;
  table: 'interfaces' | 'incoming' | 'outgoing';
  index: number;
  instance: string | null;
  reason: string;
}

export interface ParsedSnapshot {
  /** Null when the snapshot carried no interface list */
  interfaces: InterfaceObservation[] | null;
  incoming: FlowObservation[];
  outgoing: FlowObservation[];
  /** Instances of rejected flow entries that still named themselves */
  unparsedInstances: { incoming: string[]; outgoing: string[] };
  rejected: RejectedEntry[];
}

/**
 * Flatten zod issues into a single reason string.
 */
export function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join('; ');
}

/**
 * Validate every entry of a raw snapshot, keeping the good ones.
 */
export function parseSnapshot(raw: {
  interfaces?: readonly unknown[];
  incoming?: readonly unknown[];
  outgoing?: readonly unknown[];
}): ParsedSnapshot {
  const parsed: ParsedSnapshot = {
    interfaces: raw.interfaces ? [] : null,
    incoming: [],
    outgoing: [],
    unparsedInstances: { incoming: [], outgoing: [] },
    rejected: [],
  };

  raw.interfaces?.forEach((entry, index) => {
    const result = InterfaceObservationSchema.safeParse(entry);
    if (result.success) {
      parsed.interfaces?.push(result.data);
    } else {
      parsed.rejected.push({
        code: FlowEngineErrorCode.MALFORMED_INPUT,
        table: 'interfaces',
        index,
        instance: extractInstance(entry),
        reason: describeIssues(result.error),
      });
    }
  });

  for (const direction of ['incoming', 'outgoing'] as const) {
    raw[direction]?.forEach((entry, index) => {
      const result = FlowObservationSchema.safeParse(entry);
      if (result.success) {
        parsed[direction].push(result.data);
        return;
      }
      const instance = extractInstance(entry);
      if (instance) parsed.unparsedInstances[direction].push(instance);
      parsed.rejected.push({
        code: FlowEngineErrorCode.MALFORMED_INPUT,
        table: direction,
        index,
        instance,
        reason: describeIssues(result.error),
      });
    });
  }

  return parsed;
}
