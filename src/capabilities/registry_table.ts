/**
 * @fileoverview Host → registry table
 *
 * Attaches one {@link ServiceRegistry} to each host object. The association
 * is held in a WeakMap, so a registry never keeps its host alive. A registry
 * is created on first access and shared by every later access for the same
 * host until it is disposed; the next access after that creates a fresh one.
 *
 * The wrappers take the host first and mirror the registry API. Like the
 * registry, they never throw from lookups.
 */

import { DEFAULT_CONFIG, type LangsenseConfig } from '../config/index.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { ContentType } from './content_type.js';
import type { ServiceKey } from './service_key.js';
import { ServiceRegistry } from './service_registry.js';

export interface ServiceRegistryTableOptions {
  /** Supplies `cache.contentTypeResolutionSize` */
  config?: LangsenseConfig;
  /** Overrides the configured resolution cache size of every registry the table creates */
  resolutionCacheSize?: number;
}

export class ServiceRegistryTable<H extends object = object> {
  private readonly registries = new WeakMap<H, ServiceRegistry>();
  private readonly resolutionCacheSize: number;

  constructor(options: ServiceRegistryTableOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG;
    this.resolutionCacheSize = options.resolutionCacheSize ?? config.cache.contentTypeResolutionSize;
  }

  /**
   * The registry attached to `host`, created on first access.
   */
  fromHost(host: H): ServiceRegistry {
    const existing = this.registries.get(host);
    if (existing) {
      return existing;
    }
    const registry: ServiceRegistry = new ServiceRegistry({
      resolutionCacheSize: this.resolutionCacheSize,
      onDispose: () => {
        if (this.registries.get(host) === registry) {
          this.registries.delete(host);
        }
      },
    });
    this.registries.set(host, registry);
    return registry;
  }

  /** Whether a registry is currently attached to `host`. */
  has(host: H): boolean {
    return this.registries.has(host);
  }

  getService<T>(host: H, key: ServiceKey<T>, contentType?: ContentType): T | undefined {
    return this.guard(`lookup of ${key.name}`, () => this.fromHost(host).getService(key, contentType));
  }

  getServiceByGuid(host: H, guid: string): unknown {
    return this.guard(`lookup of ${guid}`, () => this.fromHost(host).getServiceByGuid(guid));
  }

  getAllServices<T>(host: H, key: ServiceKey<T>): T[] {
    return this.guard(`enumeration of ${key.name}`, () => this.fromHost(host).getAllServices(key)) ?? [];
  }

  addService<T>(host: H, key: ServiceKey<T>, instance: T, contentType?: ContentType): void {
    this.fromHost(host).addService(key, instance, contentType);
  }

  addServiceByGuid(host: H, guid: string, instance: unknown): void {
    this.fromHost(host).addServiceByGuid(guid, instance);
  }

  removeService<T>(host: H, key: ServiceKey<T>, contentType?: ContentType): void {
    this.fromHost(host).removeService(key, contentType);
  }

  removeServiceByGuid(host: H, guid: string): void {
    this.fromHost(host).removeServiceByGuid(guid);
  }

  /**
   * Tear down the registry attached to `host`, if any.
   */
  dispose(host: H): void {
    this.registries.get(host)?.dispose();
  }

  private guard<R>(operation: string, fn: () => R): R | undefined {
    try {
      return fn();
    } catch (error) {
      logWarning(`Service registry ${operation} failed`, { error: getErrorMessage(error) });
      return undefined;
    }
  }
}
