/**
 * @fileoverview Lazily loaded module descriptor
 *
 * A module descriptor stands for one library module whose public surface is
 * stored in a snapshot file. Nothing is read until a query needs it; the
 * snapshot is then decoded exactly once, under a per-module lock, and the
 * member tables never change again.
 *
 * Load lifecycle: `not_loaded` → `loading` → `loaded`. Every failure while
 * opening or decoding the snapshot is absorbed: the module still ends up
 * `loaded`, just without members. The only way to stay `not_loaded` is a
 * timeout on the load lock, and the next query retries.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import {
  createModuleLoadedEvent,
  createModuleLoadTimeoutEvent,
  type LangsenseEvent,
} from '../events.js';
import { logAssertion, logDebug, logWarning } from '../telemetry/logger.js';
import { AsyncMutex } from '../utils/async.js';
import { getErrorCode, getErrorMessage } from '../utils/errors.js';
import { decodeSnapshotRoot, toDictionary, type SnapshotDecoder } from './codec.js';
import { readMembers } from './member_reader.js';
import { readMemberList } from './memlist.js';
import {
  isSnapshotType,
  type LoadOutcome,
  type LoadState,
  type Member,
  type ModuleHandle,
  type SnapshotType,
  type TypeResolver,
} from './types.js';

/**
 * Services a module needs from the session that owns it.
 */
export interface ModuleLoadHost extends TypeResolver {
  readonly decoder: SnapshotDecoder;
  readonly loadTimeoutMs: number;
  readonly memberListSuffix: string;
  onDatabaseCorrupt(module: ModuleDescriptor, reason: 'malformed' | 'invalid_structure'): Promise<void>;
  publish(event: LangsenseEvent): Promise<void>;
}

export class ModuleDescriptor implements ModuleHandle {
  private state: LoadState = 'not_loaded';
  private readonly members = new Map<string, Member>();
  private hiddenMembers: Map<string, Member> | undefined;
  private documentation: string | undefined;
  private sourceFilePath: string | undefined;
  private childModuleNames: string[] = [];
  private memberNameProbe: Set<string> | undefined;
  private readonly loadLock = new AsyncMutex();

  constructor(
    private readonly host: ModuleLoadHost,
    readonly name: string,
    readonly snapshotPath: string,
    readonly isBuiltin: boolean,
  ) {}

  get loadState(): LoadState {
    return this.state;
  }

  /**
   * Load the snapshot if that has not happened yet. Never throws for file
   * or decoding problems.
   */
  async ensureLoaded(): Promise<void> {
    if (this.state === 'loaded') {
      return;
    }

    const timeoutMs = this.host.loadTimeoutMs;
    const release = await this.loadLock.acquire(timeoutMs);
    if (!release) {
      logAssertion(`Timeout loading module ${this.name}`, { snapshotPath: this.snapshotPath, timeoutMs });
      await this.host.publish(
        createModuleLoadTimeoutEvent({ moduleName: this.name, snapshotPath: this.snapshotPath, timeoutMs })
      );
      return;
    }

    let outcome: LoadOutcome | undefined;
    try {
      // Another caller may have finished while we waited.
      if (this.state !== 'not_loaded') {
        return;
      }
      // Set before any I/O so references met mid-load see an in-progress module.
      this.state = 'loading';
      outcome = await this.loadSnapshot();
    } finally {
      this.state = 'loaded';
      release();
    }
    if (!outcome) {
      return;
    }

    // Reported after release so corruption handlers can query this module.
    if (outcome.kind === 'corrupt') {
      await this.host.onDatabaseCorrupt(this, outcome.reason);
    }
    if (outcome.kind === 'io_suppressed') {
      logDebug(`Snapshot for ${this.name} unavailable, module left empty`, {
        snapshotPath: this.snapshotPath,
        code: outcome.code,
      });
    }
    await this.host.publish(
      createModuleLoadedEvent({
        moduleName: this.name,
        snapshotPath: this.snapshotPath,
        outcome: outcome.kind,
        memberCount: this.members.size,
      })
    );
  }

  /**
   * Look up a member by exact name.
   *
   * Before the module is loaded, the member-list sidecar (when present) is
   * consulted first so that misses cost no snapshot decode.
   */
  async getMember(name: string): Promise<Member | undefined> {
    if (this.state !== 'loaded') {
      const probe = await this.loadMemberNameProbe();
      if (probe && !probe.has(name)) {
        return undefined;
      }
      await this.ensureLoaded();
    }
    return this.members.get(name);
  }

  /** Names of the module's visible members; hidden types are excluded. */
  async getMemberNames(): Promise<string[]> {
    await this.ensureLoaded();
    return Array.from(this.members.keys());
  }

  async getDocumentation(): Promise<string | undefined> {
    await this.ensureLoaded();
    return this.documentation;
  }

  async getSourceFilePath(): Promise<string | undefined> {
    await this.ensureLoaded();
    return this.sourceFilePath;
  }

  async getChildModuleNames(): Promise<string[]> {
    await this.ensureLoaded();
    return [...this.childModuleNames];
  }

  /**
   * A type declared by this module, visible or hidden.
   */
  async resolveType(name: string): Promise<SnapshotType | undefined> {
    await this.ensureLoaded();
    const visible = this.members.get(name);
    if (isSnapshotType(visible)) {
      return visible;
    }
    const hidden = this.hiddenMembers?.get(name);
    return isSnapshotType(hidden) ? hidden : undefined;
  }

  /**
   * Line `lineNumber` (1-based) of the module's source file.
   */
  async getLine(lineNumber: number): Promise<string | undefined> {
    const filePath = await this.getSourceFilePath();
    if (!filePath || !Number.isInteger(lineNumber) || lineNumber < 1) {
      return undefined;
    }
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      logDebug(`Cannot read source of ${this.name}`, { filePath, error: getErrorMessage(error) });
      return undefined;
    }
    return content.split(/\r?\n/)[lineNumber - 1];
  }

  private async loadSnapshot(): Promise<LoadOutcome> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(this.snapshotPath);
    } catch (error) {
      // Deleted, locked or otherwise unreadable: never fail the caller.
      return { kind: 'io_suppressed', code: getErrorCode(error) ?? 'EIO', message: getErrorMessage(error) };
    }

    const decoded = await decodeSnapshotRoot(bytes, this.host.decoder, this.snapshotPath);
    if (!decoded.ok) {
      const reason = decoded.error.reason === 'malformed' ? 'malformed' : 'invalid_structure';
      return { kind: 'corrupt', reason, message: decoded.error.message };
    }

    this.populate(decoded.value);
    return { kind: 'success', memberCount: this.members.size };
  }

  private populate(root: Map<string, unknown>): void {
    const table = toDictionary(root.get('members'));
    if (table) {
      readMembers(
        table,
        { moduleName: this.name, isBuiltinModule: this.isBuiltin, resolver: this.host },
        (memberName, member) => this.storeMember(memberName, member),
        (memberName, reason) => logWarning(`Skipping unreadable member ${this.name}.${memberName}`, { reason })
      );
    }

    const doc = root.get('doc');
    if (typeof doc === 'string') {
      this.documentation = doc;
    }

    const filename = root.get('filename');
    if (typeof filename === 'string') {
      this.sourceFilePath = filename;
    }

    const children = root.get('children');
    if (Array.isArray(children) || children instanceof Set) {
      this.childModuleNames = Array.from<unknown>(children).filter(
        (child): child is string => typeof child === 'string'
      );
    }
  }

  private storeMember(name: string, member: Member): void {
    if (member.kind === 'type' && !member.includeInModule) {
      this.hiddenMembers ??= new Map();
      this.hiddenMembers.set(name, member);
      return;
    }
    this.members.set(name, member);
  }

  private async loadMemberNameProbe(): Promise<Set<string> | undefined> {
    if (this.memberNameProbe) {
      return this.memberNameProbe;
    }
    let names: string[] | undefined;
    try {
      names = await readMemberList(this.snapshotPath, this.host.memberListSuffix);
    } catch (error) {
      logDebug(`Ignoring unreadable member list for ${this.name}`, { error: getErrorMessage(error) });
      return undefined;
    }
    if (names) {
      this.memberNameProbe = new Set(names);
    }
    return this.memberNameProbe;
  }
}
