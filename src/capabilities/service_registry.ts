/**
 * @fileoverview Per-host service registry
 *
 * Holds the services attached to one host object (a text buffer, a
 * document). Services are registered under a {@link ServiceKey}, under a
 * GUID, or under a (key, content type) pair. Lookups fall back from exact
 * keys to capability checks, and from a content type to its base types.
 *
 * Every operation is synchronous, so each call runs without interleaving.
 * Content-type resolutions are memoized per `ContentType` object, so two
 * objects sharing a name but not their base types are resolved separately.
 * Lookups never throw: a faulty content type or capability check is logged
 * and reported as "not found".
 *
 * Disposing a registry that another caller is still using is the caller's
 * responsibility.
 *
 * @packageDocumentation
 */

import { BoundedCache } from '../cache/bounded_cache.js';
import { RegistryDisposedError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { ContentType } from './content_type.js';
import { normalizeGuid, requireGuid, runtimeGuidOf, type ServiceKey } from './service_key.js';

interface ContentTypeRegistration {
  readonly key: ServiceKey<unknown>;
  readonly contentTypeName: string;
  readonly instance: unknown;
}

/** Memoized content-type resolution; `null` records a miss. */
type ResolutionEntry = { readonly instance: unknown } | null;

export interface ServiceRegistryOptions {
  /** Size of the content-type resolution cache (0 disables memoization) */
  resolutionCacheSize?: number;
  /** Called once by {@link ServiceRegistry.dispose} to unlink the registry from its host */
  onDispose?: () => void;
}

export const DEFAULT_RESOLUTION_CACHE_SIZE = 256;

export class ServiceRegistry {
  private readonly servicesByKey = new Map<ServiceKey<unknown>, unknown>();
  private readonly servicesByGuid = new Map<string, unknown>();
  private readonly servicesByContentType = new Map<string, ContentTypeRegistration>();
  private readonly resolutionCache: BoundedCache<string, ResolutionEntry>;
  private readonly contentTypeIds = new WeakMap<ContentType, number>();
  private nextContentTypeId = 0;
  private readonly onDispose?: () => void;
  private disposed = false;

  constructor(options: ServiceRegistryOptions = {}) {
    this.resolutionCache = new BoundedCache(options.resolutionCacheSize ?? DEFAULT_RESOLUTION_CACHE_SIZE);
    this.onDispose = options.onDispose;
  }

  /** Capacity of the content-type resolution cache */
  get resolutionCacheSize(): number {
    return this.resolutionCache.capacity;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ==========================================================================
  // REGISTRATION
  // ==========================================================================

  /**
   * Register a service. Does nothing when a service already resolves for
   * `key` (for the content type or one of its bases, when a content type is
   * given).
   */
  addService<T>(key: ServiceKey<T>, instance: T, contentType?: ContentType): void {
    this.assertUsable('add a service');
    if (contentType) {
      if (this.getService(key, contentType) !== undefined) {
        return;
      }
      this.servicesByContentType.set(compositeKey(key, contentType.typeName), {
        key,
        contentTypeName: contentType.typeName,
        instance,
      });
    } else {
      if (this.getService(key) !== undefined) {
        return;
      }
      this.servicesByKey.set(key, instance);
    }
    this.resolutionCache.clear();
  }

  /**
   * Register a service under a capability GUID.
   *
   * @throws InvalidArgumentError when `guid` is not a GUID
   */
  addServiceByGuid(guid: string, instance: unknown): void {
    this.assertUsable('add a service');
    const normalized = requireGuid(guid);
    if (this.getServiceByGuid(normalized) !== undefined) {
      return;
    }
    this.servicesByGuid.set(normalized, instance);
  }

  removeService<T>(key: ServiceKey<T>, contentType?: ContentType): void {
    this.assertUsable('remove a service');
    if (contentType) {
      this.servicesByContentType.delete(compositeKey(key, contentType.typeName));
    } else {
      this.servicesByKey.delete(key);
    }
    this.resolutionCache.clear();
  }

  removeServiceByGuid(guid: string): void {
    this.assertUsable('remove a service');
    const normalized = normalizeGuid(guid);
    if (normalized) {
      this.servicesByGuid.delete(normalized);
    }
  }

  // ==========================================================================
  // LOOKUP
  // ==========================================================================

  /**
   * Find a service for `key`.
   *
   * Without a content type: the exact registration, else the first
   * registered service that passes the key's capability check.
   *
   * With a content type: the exact (key, content type) registration, else a
   * compatible registration under the same content-type name (compared
   * case-insensitively), else the same search over each base type in
   * declared order, depth-first.
   */
  getService<T>(key: ServiceKey<T>, contentType?: ContentType): T | undefined {
    try {
      return contentType ? this.resolveForContentType(key, contentType) : this.findByKey(key);
    } catch (error) {
      logWarning(`Service lookup for ${key.name} failed`, {
        contentType: safeTypeName(contentType),
        error: getErrorMessage(error),
      });
      return undefined;
    }
  }

  /**
   * Find a service by GUID: explicit GUID registrations first, then services
   * whose class declares that GUID (or, for classes declaring none, whose key
   * carries it).
   */
  getServiceByGuid(guid: string): unknown {
    try {
      return this.findByGuid(guid);
    } catch (error) {
      logWarning(`Service lookup for ${guid} failed`, { error: getErrorMessage(error) });
      return undefined;
    }
  }

  /**
   * Every key-registered service that passes the key's capability check, in
   * registration order.
   */
  getAllServices<T>(key: ServiceKey<T>): T[] {
    const services: T[] = [];
    try {
      for (const instance of this.servicesByKey.values()) {
        if (key.matches(instance)) {
          services.push(instance);
        }
      }
    } catch (error) {
      logWarning(`Service enumeration for ${key.name} failed`, { error: getErrorMessage(error) });
    }
    return services;
  }

  // ==========================================================================
  // TEARDOWN
  // ==========================================================================

  /**
   * Detach from the host and drop every registration. The registry must not
   * be used afterwards.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.onDispose?.();
    this.servicesByGuid.clear();
    this.servicesByKey.clear();
    this.servicesByContentType.clear();
    this.resolutionCache.clear();
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private findByKey<T>(key: ServiceKey<T>): T | undefined {
    if (this.servicesByKey.has(key)) {
      // The key's own check still gates the exact hit; it is the only source of T.
      const exact = this.servicesByKey.get(key);
      if (key.matches(exact)) {
        return exact;
      }
    }
    for (const instance of this.servicesByKey.values()) {
      if (key.matches(instance)) {
        return instance;
      }
    }
    return undefined;
  }

  private findByGuid(guid: string): unknown {
    const normalized = normalizeGuid(guid);
    if (!normalized) {
      return undefined;
    }
    if (this.servicesByGuid.has(normalized)) {
      return this.servicesByGuid.get(normalized);
    }
    for (const [key, instance] of this.servicesByKey) {
      if ((runtimeGuidOf(instance) ?? key.guid) === normalized) {
        return instance;
      }
    }
    return undefined;
  }

  private resolveForContentType<T>(key: ServiceKey<T>, contentType: ContentType): T | undefined {
    const cacheKey = `${key.id}\u0000#${this.contentTypeId(contentType)}`;
    const cached = this.resolutionCache.tryGet(cacheKey);
    if (cached !== undefined) {
      return cached && key.matches(cached.instance) ? cached.instance : undefined;
    }
    const found = this.findForContentType(key, contentType, new Set());
    this.resolutionCache.put(cacheKey, found === undefined ? null : { instance: found });
    return found;
  }

  private findForContentType<T>(key: ServiceKey<T>, contentType: ContentType, visited: Set<string>): T | undefined {
    const lowered = contentType.typeName.toLowerCase();
    if (visited.has(lowered)) {
      return undefined;
    }
    visited.add(lowered);

    const own = this.findOwnForContentType(key, contentType.typeName);
    if (own !== undefined) {
      return own;
    }
    for (const base of contentType.baseTypes) {
      const inherited = this.findForContentType(key, base, visited);
      if (inherited !== undefined) {
        return inherited;
      }
    }
    return undefined;
  }

  private findOwnForContentType<T>(key: ServiceKey<T>, contentTypeName: string): T | undefined {
    const exact = this.servicesByContentType.get(compositeKey(key, contentTypeName));
    if (exact && key.matches(exact.instance)) {
      return exact.instance;
    }
    const lowered = contentTypeName.toLowerCase();
    for (const registration of this.servicesByContentType.values()) {
      if (registration.contentTypeName.toLowerCase() === lowered && key.matches(registration.instance)) {
        return registration.instance;
      }
    }
    return undefined;
  }

  private contentTypeId(contentType: ContentType): number {
    let id = this.contentTypeIds.get(contentType);
    if (id === undefined) {
      id = this.nextContentTypeId++;
      this.contentTypeIds.set(contentType, id);
    }
    return id;
  }

  private assertUsable(operation: string): void {
    if (this.disposed) {
      throw new RegistryDisposedError(operation);
    }
  }
}

function compositeKey(key: ServiceKey<unknown>, contentTypeName: string): string {
  return `${key.id}\u0000${contentTypeName}`;
}

function safeTypeName(contentType: ContentType | undefined): string | undefined {
  try {
    return contentType?.typeName;
  } catch {
    return undefined;
  }
}
