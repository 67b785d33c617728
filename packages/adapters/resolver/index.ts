/**
 * Physical interface resolvers
 *
 * @module packages/adapters/resolver
 */

export {
  LookupInterfaceResolver,
  LOOKUP_SCHEMA_DDL,
  LOOKUP_TABLE,
} from './lookup-interface-resolver.js';
