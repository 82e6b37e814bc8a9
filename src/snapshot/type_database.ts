/**
 * @fileoverview Type database
 *
 * The analysis session's table of module descriptors. It registers one
 * descriptor per snapshot file, resolves type references across modules
 * (memoized in a bounded LRU cache), owns the snapshot decoder and load
 * timeout, and is notified when a snapshot turns out to be corrupt.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { glob } from 'glob';
import { BoundedCache } from '../cache/bounded_cache.js';
import { DEFAULT_CONFIG, type LangsenseConfig } from '../config/index.js';
import { InvalidArgumentError } from '../core/errors.js';
import { createSnapshotCorruptEvent, LangsenseEventBus, type LangsenseEvent } from '../events.js';
import { logError, logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { v8SnapshotDecoder, type SnapshotDecoder } from './codec.js';
import { ModuleDescriptor, type ModuleLoadHost } from './module_descriptor.js';
import type { SnapshotType, TypeReference } from './types.js';

export interface TypeDatabaseOptions {
  /** Defaults to V8 structured-clone decoding */
  decoder?: SnapshotDecoder;
  config?: LangsenseConfig;
  /** Called once per corrupt snapshot, with no payload */
  onCorrupt?: () => void;
  events?: LangsenseEventBus;
}

export interface RegisterModuleOptions {
  isBuiltin?: boolean;
}

export class TypeDatabase implements ModuleLoadHost {
  readonly decoder: SnapshotDecoder;
  readonly loadTimeoutMs: number;
  readonly memberListSuffix: string;
  readonly events: LangsenseEventBus;

  private readonly config: LangsenseConfig;
  private readonly onCorrupt?: () => void;
  private readonly modulesByName = new Map<string, ModuleDescriptor>();
  private readonly modulesByPath = new Map<string, ModuleDescriptor>();
  private readonly resolvedTypes: BoundedCache<string, SnapshotType>;
  private corruptCount = 0;

  constructor(options: TypeDatabaseOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.decoder = options.decoder ?? v8SnapshotDecoder;
    this.loadTimeoutMs = this.config.snapshot.loadTimeoutMs;
    this.memberListSuffix = this.config.snapshot.memberListSuffix;
    this.events = options.events ?? new LangsenseEventBus();
    this.onCorrupt = options.onCorrupt;
    this.resolvedTypes = new BoundedCache(this.config.cache.typeResolutionSize);
  }

  /**
   * Create a database holding every snapshot found under `directory`.
   *
   * `os/path.idb` becomes module `os.path`.
   */
  static async open(directory: string, options: TypeDatabaseOptions = {}): Promise<TypeDatabase> {
    const database = new TypeDatabase(options);
    const { extension, builtinModules } = database.config.snapshot;
    const files = await glob(`**/*${extension}`, { cwd: directory, nodir: true });
    files.sort();

    const builtins = new Set(builtinModules);
    for (const file of files) {
      const moduleName = moduleNameFromPath(file, extension);
      if (database.modulesByName.has(moduleName)) {
        logWarning(`Duplicate snapshot for module ${moduleName}, keeping the first`, { file });
        continue;
      }
      database.registerModule(moduleName, path.join(directory, file), {
        isBuiltin: builtins.has(moduleName),
      });
    }
    logInfo(`Type database opened with ${database.modulesByName.size} module(s)`, { directory });
    return database;
  }

  /**
   * Register a module. A snapshot path that is already registered returns
   * the existing descriptor.
   *
   * @throws InvalidArgumentError when the name is taken by another snapshot
   */
  registerModule(name: string, snapshotPath: string, options: RegisterModuleOptions = {}): ModuleDescriptor {
    const resolvedPath = path.resolve(snapshotPath);
    const existing = this.modulesByPath.get(resolvedPath);
    if (existing) {
      return existing;
    }
    if (this.modulesByName.has(name)) {
      throw new InvalidArgumentError('name', `module '${name}' is already registered for another snapshot`);
    }
    const descriptor = new ModuleDescriptor(this, name, resolvedPath, options.isBuiltin ?? false);
    this.modulesByName.set(name, descriptor);
    this.modulesByPath.set(resolvedPath, descriptor);
    return descriptor;
  }

  getModule(name: string): ModuleDescriptor | undefined {
    return this.modulesByName.get(name);
  }

  getModuleNames(): string[] {
    return Array.from(this.modulesByName.keys()).sort();
  }

  get corruptSnapshotCount(): number {
    return this.corruptCount;
  }

  /**
   * Resolve a (module, type) reference, loading the target module if needed.
   * Only hits are cached; a miss is retried on the next call.
   */
  async resolveTypeReference(reference: TypeReference): Promise<SnapshotType | undefined> {
    const key = reference.qualifiedName;
    const cached = this.resolvedTypes.tryGet(key);
    if (cached) {
      return cached;
    }
    const descriptor = this.modulesByName.get(reference.moduleName);
    if (!descriptor) {
      return undefined;
    }
    const resolved = await descriptor.resolveType(reference.typeName);
    if (resolved) {
      this.resolvedTypes.put(key, resolved);
    }
    return resolved;
  }

  async onDatabaseCorrupt(descriptor: ModuleDescriptor, reason: 'malformed' | 'invalid_structure'): Promise<void> {
    this.corruptCount++;
    logWarning(`Corrupt snapshot for module ${descriptor.name}`, { snapshotPath: descriptor.snapshotPath, reason });
    try {
      this.onCorrupt?.();
    } catch (error) {
      logError('Corruption callback failed', { error: getErrorMessage(error) });
    }
    await this.publish(
      createSnapshotCorruptEvent({ moduleName: descriptor.name, snapshotPath: descriptor.snapshotPath, reason })
    );
  }

  publish(event: LangsenseEvent): Promise<void> {
    return this.events.emit(event);
  }
}

export function moduleNameFromPath(relativePath: string, extension: string): string {
  const withoutExtension = relativePath.endsWith(extension)
    ? relativePath.slice(0, -extension.length)
    : relativePath;
  return withoutExtension.split(/[\\/]+/).filter(Boolean).join('.');
}
