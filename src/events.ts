import { logError } from './telemetry/logger.js';
import { getErrorMessage } from './utils/errors.js';

export type LoadOutcomeKind = 'success' | 'corrupt' | 'io_suppressed';

export interface LangsenseEventMap {
  module_loaded: { moduleName: string; snapshotPath: string; outcome: LoadOutcomeKind; memberCount: number };
  snapshot_corrupt: { moduleName: string; snapshotPath: string; reason: 'malformed' | 'invalid_structure' };
  module_load_timeout: { moduleName: string; snapshotPath: string; timeoutMs: number };
}

export type LangsenseEventType = keyof LangsenseEventMap;

export type LangsenseEvent = {
  [K in LangsenseEventType]: { type: K; timestamp: Date; data: LangsenseEventMap[K] };
}[LangsenseEventType];

export type LangsenseEventHandler = (event: LangsenseEvent) => void | Promise<void>;

export class LangsenseEventBus {
  private handlers = new Map<LangsenseEventType | '*', Set<LangsenseEventHandler>>();

  on(eventType: LangsenseEventType | '*', handler: LangsenseEventHandler): () => void {
    let set = this.handlers.get(eventType);
    if (!set) {
      set = new Set();
      this.handlers.set(eventType, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(eventType)?.delete(handler);
    };
  }

  once(eventType: LangsenseEventType | '*', handler: LangsenseEventHandler): () => void {
    const wrappedHandler: LangsenseEventHandler = async (event) => {
      this.handlers.get(eventType)?.delete(wrappedHandler);
      await handler(event);
    };
    return this.on(eventType, wrappedHandler);
  }

  async emit(event: LangsenseEvent): Promise<void> {
    const specificHandlers = this.handlers.get(event.type);
    if (specificHandlers) {
      for (const handler of [...specificHandlers]) {
        try {
          await handler(event);
        } catch (error: unknown) {
          logError(`Langsense event handler error for ${event.type}`, {
            error: getErrorMessage(error),
          });
        }
      }
    }
    const wildcardHandlers = this.handlers.get('*');
    if (wildcardHandlers) {
      for (const handler of [...wildcardHandlers]) {
        try {
          await handler(event);
        } catch (error: unknown) {
          logError('Langsense wildcard event handler error', {
            error: getErrorMessage(error),
          });
        }
      }
    }
  }

  off(eventType: LangsenseEventType | '*'): void { this.handlers.delete(eventType); }
  clear(): void { this.handlers.clear(); }
}

export function createModuleLoadedEvent(data: LangsenseEventMap['module_loaded']): LangsenseEvent {
  return { type: 'module_loaded', timestamp: new Date(), data };
}

export function createSnapshotCorruptEvent(data: LangsenseEventMap['snapshot_corrupt']): LangsenseEvent {
  return { type: 'snapshot_corrupt', timestamp: new Date(), data };
}

export function createModuleLoadTimeoutEvent(data: LangsenseEventMap['module_load_timeout']): LangsenseEvent {
  return { type: 'module_load_timeout', timestamp: new Date(), data };
}
