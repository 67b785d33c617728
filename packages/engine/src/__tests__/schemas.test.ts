/**
 * Wire schema tests: device snapshot entries and provisioning messages.
 */

import { describe, it, expect } from 'vitest';
import {
  FlowObservationSchema,
  InterfaceObservationSchema,
  extractInstance,
  parseSnapshot,
} from '../schemas/device-snapshot.js';
import {
  ProvisionedFlowRemovalSchema,
  ProvisionedFlowSchema,
  ProvisioningMessageSchema,
} from '../schemas/provisioning-message.js';

describe('FlowObservationSchema', () => {
  it('normalizes missing optional fields to null', () => {
    const parsed = FlowObservationSchema.parse({
      instance: '/239.1.1.1/1',
      transportType: 'IP',
      destinationIp: '239.1.1.1',
      interfaceKey: '1',
      bitrate: 1200,
    });

    expect(parsed).toEqual({
      instance: '/239.1.1.1/1',
      transportType: 'IP',
      destinationIp: '239.1.1.1',
      destinationPort: null,
      sourceIp: null,
      interfaceKey: '1',
      bitrate: 1200,
      label: null,
    });
  });

  it('drops IP endpoints from SDI and ASI flows', () => {
    const parsed = FlowObservationSchema.parse({
      instance: 'SDI/4',
      transportType: 'SDI',
      destinationIp: '239.1.1.1',
      destinationPort: 5004,
      interfaceKey: '4',
      bitrate: 0,
    });

    expect(parsed.destinationIp).toBeNull();
    expect(parsed.destinationPort).toBeNull();
  });

  it('requires a destination for IP flows', () => {
    const result = FlowObservationSchema.safeParse({
      instance: 'x',
      transportType: 'IP',
      interfaceKey: '1',
      bitrate: 0,
    });

    expect(result.success).toBe(false);
  });

  it('rejects an unknown transport and a negative bitrate', () => {
    expect(
      FlowObservationSchema.safeParse({ instance: 'x', transportType: 'AES67', interfaceKey: '1', bitrate: 0 }).success
    ).toBe(false);
    expect(
      FlowObservationSchema.safeParse({ instance: 'x', transportType: 'SDI', interfaceKey: '1', bitrate: -5 }).success
    ).toBe(false);
  });
});

describe('InterfaceObservationSchema', () => {
  it('defaults the display key to the instance', () => {
    const parsed = InterfaceObservationSchema.parse({
      instance: '12',
      type: 'Ethernet',
      adminStatus: 'Up',
      operationalStatus: 'LowerLayerDown',
    });

    expect(parsed).toEqual({
      instance: '12',
      description: '',
      displayKey: '12',
      type: 'Ethernet',
      adminStatus: 'Up',
      operationalStatus: 'LowerLayerDown',
      physicalInterfaceId: null,
    });
  });
});

describe('extractInstance', () => {
  it('returns a usable instance or null', () => {
    expect(extractInstance({ instance: 'A' })).toBe('A');
    expect(extractInstance({ instance: '' })).toBeNull();
    expect(extractInstance({ instance: 3 })).toBeNull();
    expect(extractInstance('A')).toBeNull();
    expect(extractInstance(null)).toBeNull();
  });
});

describe('parseSnapshot', () => {
  it('distinguishes a missing interface list from an empty one', () => {
    expect(parseSnapshot({}).interfaces).toBeNull();
    expect(parseSnapshot({ interfaces: [] }).interfaces).toEqual([]);
  });

  it('collects rejected flow instances per direction', () => {
    const parsed = parseSnapshot({
      outgoing: [{ instance: 'O1', transportType: 'ASI' }, { transportType: 'ASI' }],
    });

    expect(parsed.outgoing).toEqual([]);
    expect(parsed.unparsedInstances).toEqual({ incoming: [], outgoing: ['O1'] });
    expect(parsed.rejected.map((r) => [r.table, r.index, r.instance])).toEqual([
      ['outgoing', 0, 'O1'],
      ['outgoing', 1, null],
    ]);
  });
});

describe('ProvisioningMessageSchema', () => {
  it('accepts an add with opaque flow entries', () => {
    const parsed = ProvisioningMessageSchema.parse({ action: 'add', flows: [{ anything: true }] });

    expect(parsed.action).toBe('add');
    expect(parsed.ignore_destination_port).toBeUndefined();
  });
});

describe('ProvisionedFlowSchema', () => {
  it('maps the wire entry to a provisioned flow', () => {
    expect(
      ProvisionedFlowSchema.parse({
        direction: 'outgoing',
        transport_type: 'IP',
        destination_ip: '239.2.2.2',
        destination_port: 5000,
        source_ip: '10.2.2.2',
        interface_key: '8',
        expected_bitrate: 2500,
        label: 'Feed',
        provisioned_flow_id: 'pf-1',
      })
    ).toEqual({
      direction: 'outgoing',
      instance: null,
      transportType: 'IP',
      destinationIp: '239.2.2.2',
      destinationPort: 5000,
      sourceIp: '10.2.2.2',
      interfaceKey: '8',
      expectedBitrate: 2500,
      label: 'Feed',
      provisionedFlowId: 'pf-1',
    });
  });

  it('rejects an invalid address', () => {
    const result = ProvisionedFlowSchema.safeParse({
      direction: 'incoming',
      transport_type: 'IP',
      destination_ip: '239.2.2',
      interface_key: '8',
    });

    expect(result.success).toBe(false);
  });
});

describe('ProvisionedFlowRemovalSchema', () => {
  it('accepts an instance on its own', () => {
    expect(ProvisionedFlowRemovalSchema.parse({ direction: 'incoming', instance: 'A' })).toEqual({
      direction: 'incoming',
      instance: 'A',
      endpoints: null,
    });
  });

  it('builds endpoints from the wire attributes', () => {
    expect(
      ProvisionedFlowRemovalSchema.parse({ direction: 'outgoing', transport_type: 'ASI', interface_key: '2' })
    ).toEqual({
      direction: 'outgoing',
      instance: null,
      endpoints: {
        transportType: 'ASI',
        destinationIp: null,
        destinationPort: null,
        sourceIp: null,
        interfaceKey: '2',
      },
    });
  });
});
