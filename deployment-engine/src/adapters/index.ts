import { AdapterCatalog } from '../services/adapter-catalog';
import { creditDefaultAdapterDefinition } from './credit-default.adapter';

export { CREDIT_DEFAULT_ADAPTER, creditDefaultAdapterDefinition } from './credit-default.adapter';

/**
 * Catalog of every adapter this host ships with
 */
export function createDefaultCatalog(): AdapterCatalog {
  return new AdapterCatalog([creditDefaultAdapterDefinition]);
}
