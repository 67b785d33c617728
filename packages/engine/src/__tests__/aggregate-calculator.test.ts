/**
 * AggregateCalculator Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FlowEntityStore } from '../services/flow-entity-store.js';
import { AggregateCalculator, computeAggregates } from '../services/aggregate-calculator.js';
import { makeFlow, makeInterface, testLogger } from './helpers.js';
import type { IncomingFlow, OutgoingFlow } from '@flowmesh/core/domain';

const TOLERANCE = { bitrateTolerancePercent: 10 };

describe('computeAggregates', () => {
  it('sums present flows and all expectations', () => {
    const incoming: IncomingFlow[] = [];
    const outgoing: OutgoingFlow[] = [];
    for (const flow of [
      makeFlow('incoming', 'a', { bitrate: 40, present: true }),
      makeFlow('incoming', 'b', { bitrate: 60, expectedBitrate: 50, owner: 'FlowEngineering', present: true }),
      makeFlow('incoming', 'c', { bitrate: 0, expectedBitrate: 70, owner: 'FlowEngineering', present: false }),
      makeFlow('outgoing', 'd', { bitrate: 25, present: true }),
    ]) {
      if (flow.direction === 'incoming') incoming.push(flow);
      else outgoing.push(flow);
    }

    expect(computeAggregates({ incoming, outgoing }, 10)).toEqual({
      rxBitrate: 100,
      txBitrate: 25,
      rxFlows: 2,
      txFlows: 1,
      expectedRxBitrate: 120,
      expectedTxBitrate: 0,
      expectedRxFlows: 2,
      expectedTxFlows: 0,
      rxBitrateStatus: 'Low',
      txBitrateStatus: 'Normal',
      rxFlowsStatus: 'Normal',
      txFlowsStatus: 'Normal',
    });
  });
});

describe('AggregateCalculator', () => {
  let store: FlowEntityStore;
  let calculator: AggregateCalculator;

  beforeEach(() => {
    store = new FlowEntityStore();
    calculator = new AggregateCalculator({ logger: testLogger });
    store.upsert('interfaces', makeInterface('1'));
    store.upsert('interfaces', makeInterface('2'));
  });

  it('recomputes only dirty interfaces', () => {
    store.upsertFlow(makeFlow('incoming', 'A', { interfaceKey: '1', bitrate: 50 }));

    const first = calculator.recompute(store, TOLERANCE);
    expect(first.recomputed.sort()).toEqual(['1', '2']);

    store.upsertFlow(makeFlow('outgoing', 'B', { interfaceKey: '2', bitrate: 20 }));
    const second = calculator.recompute(store, TOLERANCE);

    expect(second.recomputed).toEqual(['2']);
    expect(store.get('interfaces', '1')?.aggregates.rxBitrate).toBe(50);
    expect(store.get('interfaces', '2')?.aggregates.txBitrate).toBe(20);
  });

  it('is idempotent without intervening mutation', () => {
    store.upsertFlow(makeFlow('incoming', 'A', { interfaceKey: '1', bitrate: 50, expectedBitrate: 100, owner: 'FlowEngineering' }));
    store.upsertFlow(makeFlow('incoming', 'B', { interfaceKey: '1', bitrate: 30 }));
    calculator.recompute(store, TOLERANCE);
    const before = store.all('interfaces');
    const flowsBefore = store.all('incoming');

    const again = calculator.recompute(store, { ...TOLERANCE, interfaceKeys: ['1', '2'] });

    expect(again.recomputed).toEqual(['1', '2']);
    expect(store.all('interfaces')).toEqual(before);
    expect(store.all('incoming')).toEqual(flowsBefore);
  });

  it('conserves present bitrate across mutations', () => {
    const rxOf = (key: string) => store.get('interfaces', key)?.aggregates.rxBitrate;
    const presentSum = (key: string) =>
      store
        .all('incoming')
        .filter((f) => f.present && f.interfaceKey === key)
        .reduce((sum, f) => sum + f.bitrate, 0);

    store.upsertFlow(makeFlow('incoming', 'A', { interfaceKey: '1', bitrate: 10 }));
    store.upsertFlow(makeFlow('incoming', 'B', { interfaceKey: '1', bitrate: 15 }));
    calculator.recompute(store, TOLERANCE);
    expect(rxOf('1')).toBe(presentSum('1'));

    store.upsertFlow(makeFlow('incoming', 'B', { interfaceKey: '2', bitrate: 15 }));
    store.upsertFlow(
      makeFlow('incoming', 'C', { interfaceKey: '1', bitrate: 0, owner: 'FlowEngineering', present: false })
    );
    calculator.recompute(store, TOLERANCE);
    expect(rxOf('1')).toBe(presentSum('1'));
    expect(rxOf('2')).toBe(presentSum('2'));

    store.remove('incoming', 'A');
    calculator.recompute(store, TOLERANCE);
    expect(rxOf('1')).toBe(0);
    expect(rxOf('2')).toBe(15);
  });

  it('sets each flow status against its expected bitrate', () => {
    store.upsertFlow(
      makeFlow('incoming', 'A', { interfaceKey: '1', bitrate: 50, expectedBitrate: 100, owner: 'FlowEngineering' })
    );
    store.upsertFlow(
      makeFlow('outgoing', 'B', { interfaceKey: '1', bitrate: 130, expectedBitrate: 100, owner: 'FlowEngineering' })
    );

    calculator.recompute(store, TOLERANCE);

    expect(store.getFlow('incoming', 'A')?.expectedBitrateStatus).toBe('Low');
    expect(store.getFlow('outgoing', 'B')?.expectedBitrateStatus).toBe('High');
  });

  it('reports flows on unknown interfaces and leaves them out of rollups', () => {
    store.upsertFlow(makeFlow('incoming', 'A', { interfaceKey: '1', bitrate: 10 }));
    store.upsertFlow(makeFlow('outgoing', 'X', { interfaceKey: '99', bitrate: 500 }));

    const result = calculator.recompute(store, TOLERANCE);

    expect(result.unresolved).toEqual([{ direction: 'outgoing', instance: 'X', interfaceKey: '99' }]);
    expect(result.recomputed).not.toContain('99');
    expect(store.get('interfaces', '1')?.aggregates.txBitrate).toBe(0);
    expect(store.getFlow('outgoing', 'X')).toBeDefined();
  });
});
