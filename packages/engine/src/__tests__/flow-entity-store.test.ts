/**
 * FlowEntityStore Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FlowEntityStore } from '../services/flow-entity-store.js';
import { makeFlow, makeInterface } from './helpers.js';

describe('FlowEntityStore', () => {
  let store: FlowEntityStore;

  beforeEach(() => {
    store = new FlowEntityStore();
  });

  describe('reads', () => {
    it('returns copies that do not alias stored records', () => {
      store.upsert('interfaces', makeInterface('1'));

      const copy = store.get('interfaces', '1');
      expect(copy).toBeDefined();
      if (copy) copy.description = 'changed';

      expect(store.get('interfaces', '1')?.description).toBe('Interface 1');
    });

    it('keeps insertion order', () => {
      store.upsertFlow(makeFlow('incoming', 'b'));
      store.upsertFlow(makeFlow('incoming', 'a'));
      store.upsertFlow(makeFlow('incoming', 'c'));

      expect(store.allFlows('incoming').map((f) => f.instance)).toEqual(['b', 'a', 'c']);
    });

    it('routes flows to their direction table', () => {
      store.upsertFlow(makeFlow('outgoing', 'out-1'));

      expect(store.getFlow('outgoing', 'out-1')?.direction).toBe('outgoing');
      expect(store.getFlow('incoming', 'out-1')).toBeUndefined();
      expect(store.size('outgoing')).toBe(1);
    });
  });

  describe('change tracking', () => {
    it('marks the interface of an upserted flow dirty', () => {
      store.upsertFlow(makeFlow('incoming', 'f1', { interfaceKey: '4' }));

      expect([...store.takeDirtyInterfaces()]).toEqual(['4']);
      expect(store.takeDirtyInterfaces().size).toBe(0);
    });

    it('marks both interfaces dirty when a flow moves', () => {
      store.upsertFlow(makeFlow('incoming', 'f1', { interfaceKey: '1' }));
      store.takeDirtyInterfaces();

      store.upsertFlow(makeFlow('incoming', 'f1', { interfaceKey: '2' }));

      expect([...store.takeDirtyInterfaces()].sort()).toEqual(['1', '2']);
    });

    it('marks the interface of a removed flow dirty', () => {
      store.upsertFlow(makeFlow('outgoing', 'f1', { interfaceKey: '9' }));
      store.takeDirtyInterfaces();

      expect(store.remove('outgoing', 'f1')).toBe(true);
      expect(store.remove('outgoing', 'f1')).toBe(false);
      expect([...store.takeDirtyInterfaces()]).toEqual(['9']);
    });

    it('flags a bulk interface replacement once', () => {
      store.replaceAll('interfaces', [makeInterface('1'), makeInterface('2')]);

      expect(store.takeInterfacesReplaced()).toBe(true);
      expect(store.takeInterfacesReplaced()).toBe(false);
      expect(store.all('interfaces').map((i) => i.instance)).toEqual(['1', '2']);
    });

    it('marks replaced and removed interfaces dirty', () => {
      store.replaceAll('interfaces', [makeInterface('1')]);
      store.takeDirtyInterfaces();

      store.replaceAll('interfaces', [makeInterface('2')]);

      expect([...store.takeDirtyInterfaces()].sort()).toEqual(['1', '2']);
      expect(store.hasInterface('1')).toBe(false);
    });

    it('writes derived fields without marking anything dirty', () => {
      store.upsert('interfaces', makeInterface('1'));
      store.takeDirtyInterfaces();

      const iface = makeInterface('1');
      iface.aggregates.rxBitrate = 42;
      store.writeDerived('interfaces', iface);
      store.writeDerived('interfaces', makeInterface('missing'));

      expect(store.get('interfaces', '1')?.aggregates.rxBitrate).toBe(42);
      expect(store.has('interfaces', 'missing')).toBe(false);
      expect(store.peekDirtyInterfaces().size).toBe(0);
    });
  });
});
