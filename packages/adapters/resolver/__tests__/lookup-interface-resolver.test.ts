import { describe, it, expect, vi } from 'vitest';
import { LookupInterfaceResolver } from '../lookup-interface-resolver.js';

describe('LookupInterfaceResolver', () => {
  it('returns the physical interface id for a parameter group and index', async () => {
    const pool = { query: vi.fn().mockResolvedValue({ rows: [{ physical_interface_id: 'phys-12' }] }) };
    const resolver = new LookupInterfaceResolver(pool);

    await expect(resolver.resolve(3, '12')).resolves.toBe('phys-12');
    expect(pool.query).toHaveBeenCalledWith(expect.stringContaining('FROM physical_interface_lookup'), [3, '12']);
  });

  it('returns null when nothing matches', async () => {
    const resolver = new LookupInterfaceResolver({ query: vi.fn().mockResolvedValue({ rows: [] }) });

    await expect(resolver.resolve(3, '99')).resolves.toBeNull();
  });

  it('caches hits but not misses', async () => {
    const query = vi
      .fn()
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValue({ rows: [{ physical_interface_id: 'phys-1' }] });
    const resolver = new LookupInterfaceResolver({ query });

    expect(await resolver.resolve(1, '1')).toBeNull();
    expect(await resolver.resolve(1, '1')).toBe('phys-1');
    expect(await resolver.resolve(1, '1')).toBe('phys-1');
    expect(query).toHaveBeenCalledTimes(2);

    resolver.clearCache();
    await resolver.resolve(1, '1');
    expect(query).toHaveBeenCalledTimes(3);
  });

  it('rejects a malformed result', async () => {
    const resolver = new LookupInterfaceResolver({ query: vi.fn().mockResolvedValue({ rows: [{ id: 5 }] }) });

    await expect(resolver.resolve(1, '1')).rejects.toThrow();
  });
});
