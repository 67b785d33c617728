/**
 * Provisioning message wire format.
 *
 * Delivered by the inter-application transport when the flow-engineering
 * authority adds or removes provisioning intent. The envelope is decoded
 * as a whole; the flow entries are decoded one by one so that a single
 * malformed entry is rejected without failing its siblings.
 *
 * Envelope:
 *   action                  : "add" | "remove"
 *   ignore_destination_port : match existing rows without comparing ports
 *   flows                   : one or more flow entries (opaque at this level)
 *
 * Flow entry:
 *   direction           : "incoming" | "outgoing"
 *   instance            : optional explicit instance key
 *   transport_type      : IP | SDI | ASI
 *   destination_ip      : required for IP
 *   destination_port    : optional
 *   source_ip           : optional
 *   interface_key       : interface index
 *   expected_bitrate    : provisioned bitrate in bps
 *   label               : display label
 *   provisioned_flow_id : cross-device correlation id
 */

import { z } from 'zod';
import { TransportTypeSchema } from './device-snapshot.js';

// --------------------------------------------------------------------------
// Envelope
// --------------------------------------------------------------------------

export const ProvisioningActionSchema = z.enum(['add', 'remove']);

export type ProvisioningAction = z.infer<typeof ProvisioningActionSchema>;

export const ProvisioningMessageSchema = z.object({
  action: ProvisioningActionSchema,
  ignore_destination_port: z.boolean().optional(),
  flows: z.array(z.unknown()).min(1),
});

export type ProvisioningMessage = z.infer<typeof ProvisioningMessageSchema>;

// --------------------------------------------------------------------------
// Flow entries
// --------------------------------------------------------------------------

const FlowDirectionSchema = z.enum(['incoming', 'outgoing']);

/**
 * Attributes that identify a flow when no instance key matches.
 */
const endpointFields = {
  transport_type: TransportTypeSchema,
  destination_ip: z.string().ip().nullish(),
  destination_port: z.number().int().min(0).max(65535).nullish(),
  source_ip: z.string().ip().nullish(),
  interface_key: z.string().min(1).max(256),
};

function requireIpDestination(
  value: { transport_type?: string; destination_ip?: string | null },
  ctx: z.RefinementCtx
): void {
  if (value.transport_type === 'IP' && !value.destination_ip) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['destination_ip'],
      message: 'IP flows require a destination IP',
    });
  }
}

function toEndpoints(value: {
  transport_type: z.infer<typeof TransportTypeSchema>;
  destination_ip?: string | null;
  destination_port?: number | null;
  source_ip?: string | null;
  interface_key: string;
}) {
  const ip = value.transport_type === 'IP';
  return {
    transportType: value.transport_type,
    destinationIp: ip ? value.destination_ip ?? null : null,
    destinationPort: ip ? value.destination_port ?? null : null,
    sourceIp: ip ? value.source_ip ?? null : null,
    interfaceKey: value.interface_key,
  };
}

/**
 * Entry of an "add" message.
 */
export const ProvisionedFlowSchema = z
  .object({
    direction: FlowDirectionSchema,
    instance: z.string().min(1).max(512).optional(),
    ...endpointFields,
    expected_bitrate: z.number().finite().nonnegative().nullish(),
    label: z.string().max(256).nullish(),
    provisioned_flow_id: z.string().min(1).max(256).nullish(),
  })
  .superRefine(requireIpDestination)
  .transform((value) => ({
    direction: value.direction,
    instance: value.instance ?? null,
    ...toEndpoints(value),
    expectedBitrate: value.expected_bitrate ?? null,
    label: value.label ?? null,
    provisionedFlowId: value.provisioned_flow_id ?? null,
  }));

export type ProvisionedFlow = z.output<typeof ProvisionedFlowSchema>;

/**
 * Entry of a "remove" message: an instance key, or the endpoint
 * attributes to match on.
 */
export const ProvisionedFlowRemovalSchema = z
  .object({
    direction: FlowDirectionSchema,
    instance: z.string().min(1).max(512).optional(),
    transport_type: TransportTypeSchema.optional(),
    destination_ip: endpointFields.destination_ip,
    destination_port: endpointFields.destination_port,
    source_ip: endpointFields.source_ip,
    interface_key: endpointFields.interface_key.optional(),
  })
  .superRefine((value, ctx) => {
    if (value.instance) return;
    if (!value.transport_type || !value.interface_key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Removal requires an instance or transport_type and interface_key',
      });
      return;
    }
    requireIpDestination(value, ctx);
  })
  .transform((value) => ({
    direction: value.direction,
    instance: value.instance ?? null,
    endpoints:
      value.transport_type && value.interface_key
        ? toEndpoints({ ...value, transport_type: value.transport_type, interface_key: value.interface_key })
        : null,
  }));

export type ProvisionedFlowRemoval = z.output<typeof ProvisionedFlowRemovalSchema>;

export type FlowEndpoints = ReturnType<typeof toEndpoints>;
