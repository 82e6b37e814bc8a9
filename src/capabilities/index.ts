/**
 * Capability registry - Public API
 */

export { ServiceRegistry, DEFAULT_RESOLUTION_CACHE_SIZE } from './service_registry.js';
export type { ServiceRegistryOptions } from './service_registry.js';

export { ServiceRegistryTable } from './registry_table.js';
export type { ServiceRegistryTableOptions } from './registry_table.js';

export {
  defineServiceKey,
  classServiceKey,
  normalizeGuid,
  requireGuid,
  runtimeGuidOf,
} from './service_key.js';
export type { ServiceKey, ServiceKeyOptions } from './service_key.js';

export { ContentTypeRegistry } from './content_type.js';
export type { ContentType } from './content_type.js';
