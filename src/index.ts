/**
 * @fileoverview langsense - language metadata backbone
 *
 * Three mechanisms for language-intelligence services:
 * 1. Module descriptors that load a library's public surface from a binary
 *    snapshot on first use, exactly once
 * 2. A bounded LRU cache for derived analysis results
 * 3. A per-host capability registry with content-type aware lookup
 *
 * ## Quick Start
 *
 * ```typescript
 * import { TypeDatabase, loadConfig } from 'langsense';
 *
 * const database = await TypeDatabase.open('/path/to/snapshots', {
 *   config: await loadConfig(),
 * });
 * const member = await database.getModule('os.path')?.getMember('join');
 * ```
 *
 * ```typescript
 * import { ContentTypeRegistry, ServiceRegistryTable, classServiceKey } from 'langsense';
 *
 * const types = new ContentTypeRegistry();
 * types.define('code');
 * const python = types.define('python', ['code']);
 *
 * const services = new ServiceRegistryTable<TextBuffer>();
 * services.addService(buffer, classServiceKey(Formatter), new Formatter(), types.get('code'));
 * services.getService(buffer, classServiceKey(Formatter), python); // found through the base type
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// CACHE
// ============================================================================

export { BoundedCache } from './cache/bounded_cache.js';
export type { BoundedCacheOptions } from './cache/bounded_cache.js';

// ============================================================================
// SNAPSHOT LOADING
// ============================================================================

export * from './snapshot/index.js';

// ============================================================================
// CAPABILITIES
// ============================================================================

export * from './capabilities/index.js';

// ============================================================================
// AMBIENT
// ============================================================================

export {
  LangsenseError,
  InvalidArgumentError,
  KeyNotFoundError,
  SnapshotError,
  ConfigError,
  RegistryDisposedError,
  isLangsenseError,
  isSnapshotError,
} from './core/errors.js';
export type { ErrorJSON, SnapshotErrorReason } from './core/errors.js';

export { Ok, Err } from './core/result.js';
export type { Result, OkResult, ErrResult } from './core/result.js';

export {
  loadConfig,
  parseConfig,
  DEFAULT_CONFIG,
  CONFIG_FILE,
  LangsenseConfigSchema,
} from './config/index.js';
export type { LangsenseConfig, SnapshotConfig, CacheConfig, LoadConfigOptions } from './config/index.js';

export {
  LangsenseEventBus,
  createModuleLoadedEvent,
  createSnapshotCorruptEvent,
  createModuleLoadTimeoutEvent,
} from './events.js';
export type {
  LangsenseEvent,
  LangsenseEventMap,
  LangsenseEventType,
  LangsenseEventHandler,
  LoadOutcomeKind,
} from './events.js';

export { setLogLevel, getLogLevel } from './telemetry/logger.js';
export type { LogLevel } from './telemetry/logger.js';

export { LANGSENSE_VERSION } from './version.js';
