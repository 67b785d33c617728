/**
 * Lookup-table physical interface resolver
 *
 * Resolves (parameter group, index) pairs against the
 * `physical_interface_lookup` table. Hits are cached for the lifetime of
 * the resolver; misses are not, so an interface registered later is
 * picked up on the next poll.
 *
 * @module packages/adapters/resolver/lookup-interface-resolver
 */

import { z } from 'zod';
import type { IPhysicalInterfaceResolver } from '@flowmesh/core/ports';
import type { SqlPool } from '../storage/pg-flow-table-storage.js';

export const LOOKUP_TABLE = 'physical_interface_lookup';

export const LOOKUP_SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS ${LOOKUP_TABLE} (
  parameter_group_id    INTEGER NOT NULL,
  parameter_index       TEXT NOT NULL,
  physical_interface_id TEXT NOT NULL,
  PRIMARY KEY (parameter_group_id, parameter_index)
)`;

const LookupResultSchema = z.object({
  rows: z.array(z.object({ physical_interface_id: z.string() })),
});

export class LookupInterfaceResolver implements IPhysicalInterfaceResolver {
  private readonly cache = new Map<string, string>();

  constructor(private readonly pool: Pick<SqlPool, 'query'>) {}

  async ensureSchema(): Promise<void> {
    await this.pool.query(LOOKUP_SCHEMA_DDL);
  }

  async resolve(parameterGroupId: number, index: string): Promise<string | null> {
    const key = `${parameterGroupId}:${index}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const raw = await this.pool.query(
      `SELECT physical_interface_id FROM ${LOOKUP_TABLE} ` +
        `WHERE parameter_group_id = $1 AND parameter_index = $2 LIMIT 1`,
      [parameterGroupId, index]
    );
    const id = LookupResultSchema.parse(raw).rows[0]?.physical_interface_id ?? null;
    if (id !== null) this.cache.set(key, id);
    return id;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
