/**
 * @fileoverview Tests for the per-host service registry
 *
 * Covers:
 * - Exact and capability-based lookup
 * - The no-replace registration rule
 * - Content-type lookup with base-type fallback
 * - GUID registrations and runtime GUIDs
 * - Faulty content types and teardown
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ServiceRegistry } from '../service_registry.js';
import { ContentTypeRegistry, type ContentType } from '../content_type.js';
import { classServiceKey, defineServiceKey } from '../service_key.js';
import { InvalidArgumentError, RegistryDisposedError } from '../../core/errors.js';

// ============================================================================
// FIXTURES
// ============================================================================

interface Formatter {
  format(text: string): string;
}

const isFormatter = (value: unknown): value is Formatter =>
  typeof value === 'object' && value !== null && 'format' in value && typeof value.format === 'function';

class UpperFormatter implements Formatter {
  static readonly serviceGuid = '{6F1C2A3B-0000-4000-8000-000000000001}';

  format(text: string): string {
    return text.toUpperCase();
  }
}

class TrimFormatter implements Formatter {
  format(text: string): string {
    return text.trim();
  }
}

class CompletionProvider {
  constructor(readonly language: string) {}
}

const FormatterKey = defineServiceKey<Formatter>('Formatter', isFormatter);
const UpperFormatterKey = classServiceKey(UpperFormatter);
const TrimFormatterKey = classServiceKey(TrimFormatter);
const CompletionKey = classServiceKey(CompletionProvider);

const FORMATTER_GUID = '6f1c2a3b-0000-4000-8000-000000000001';
const NATIVE_GUID = '0a0b0c0d-1111-4222-8333-444455556666';

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry;

  beforeEach(() => {
    registry = new ServiceRegistry();
  });

  // ==========================================================================
  // KEYED SERVICES
  // ==========================================================================

  describe('keyed services', () => {
    it('returns the exact registration', () => {
      const upper = new UpperFormatter();
      registry.addService(UpperFormatterKey, upper);

      expect(registry.getService(UpperFormatterKey)).toBe(upper);
    });

    it('returns undefined when nothing matches', () => {
      expect(registry.getService(FormatterKey)).toBeUndefined();
      expect(registry.getAllServices(FormatterKey)).toEqual([]);
    });

    it('falls back to a registration that passes the capability check', () => {
      const upper = new UpperFormatter();
      registry.addService(UpperFormatterKey, upper);

      expect(registry.getService(FormatterKey)).toBe(upper);
    });

    it('keeps the first registration for a key', () => {
      const first = new CompletionProvider('a');
      const second = new CompletionProvider('b');
      registry.addService(CompletionKey, first);
      registry.addService(CompletionKey, second);

      expect(registry.getService(CompletionKey)).toBe(first);
    });

    it('does not register when a compatible service already resolves', () => {
      const upper = new UpperFormatter();
      registry.addService(UpperFormatterKey, upper);
      registry.addService(FormatterKey, new TrimFormatter());

      expect(registry.getAllServices(FormatterKey)).toEqual([upper]);
    });

    it('lists every compatible service in registration order', () => {
      const trim = new TrimFormatter();
      const upper = new UpperFormatter();
      registry.addService(TrimFormatterKey, trim);
      registry.addService(CompletionKey, new CompletionProvider('js'));
      registry.addService(UpperFormatterKey, upper);

      expect(registry.getAllServices(FormatterKey)).toEqual([trim, upper]);
    });

    it('removes a keyed service without error when absent', () => {
      const upper = new UpperFormatter();
      registry.addService(UpperFormatterKey, upper);
      registry.removeService(UpperFormatterKey);
      registry.removeService(UpperFormatterKey);

      expect(registry.getService(UpperFormatterKey)).toBeUndefined();
    });
  });

  // ==========================================================================
  // CONTENT TYPES
  // ==========================================================================

  describe('content-type services', () => {
    let types: ContentTypeRegistry;
    let bar: ContentType;
    let foo: ContentType;

    beforeEach(() => {
      types = new ContentTypeRegistry();
      bar = types.define('Bar');
      foo = types.define('Foo', ['Bar']);
    });

    it('falls back to a registration under a base content type', () => {
      const barProvider = new CompletionProvider('bar');
      registry.addService(CompletionKey, barProvider, bar);

      expect(registry.getService(CompletionKey, foo)).toBe(barProvider);
    });

    it('ignores a registration for a content type that already resolves through its base', () => {
      const barProvider = new CompletionProvider('bar');
      registry.addService(CompletionKey, barProvider, bar);
      registry.addService(CompletionKey, new CompletionProvider('foo'), foo);

      expect(registry.getService(CompletionKey, foo)).toBe(barProvider);
      expect(registry.getService(CompletionKey, bar)).toBe(barProvider);
    });

    it('keeps a derived registration made before the base one', () => {
      const fooProvider = new CompletionProvider('foo');
      const barProvider = new CompletionProvider('bar');
      registry.addService(CompletionKey, fooProvider, foo);
      registry.addService(CompletionKey, barProvider, bar);

      expect(registry.getService(CompletionKey, foo)).toBe(fooProvider);
      expect(registry.getService(CompletionKey, bar)).toBe(barProvider);
    });

    it('resolves content types that share a name but not their bases separately', () => {
      const barProvider = new CompletionProvider('bar');
      registry.addService(CompletionKey, barProvider, bar);
      const standalone: ContentType = { typeName: 'Foo', baseTypes: [] };

      expect(registry.getService(CompletionKey, foo)).toBe(barProvider);
      expect(registry.getService(CompletionKey, standalone)).toBeUndefined();
    });

    it('keeps the first registration for the same content type', () => {
      const first = new CompletionProvider('first');
      registry.addService(CompletionKey, first, foo);
      registry.addService(CompletionKey, new CompletionProvider('second'), foo);

      expect(registry.getService(CompletionKey, foo)).toBe(first);
    });

    it('matches content-type names case-insensitively', () => {
      const provider = new CompletionProvider('js');
      registry.addService(CompletionKey, provider, { typeName: 'JavaScript', baseTypes: [] });

      expect(registry.getService(CompletionKey, { typeName: 'javascript', baseTypes: [] })).toBe(provider);
    });

    it('finds a compatible service registered under another key for the same content type', () => {
      const upper = new UpperFormatter();
      registry.addService(UpperFormatterKey, upper, foo);

      expect(registry.getService(FormatterKey, foo)).toBe(upper);
    });

    it('walks multiple bases in declared order', () => {
      const html = types.define('Html');
      const css = types.define('Css');
      const razor = types.define('Razor', ['Html', 'Css']);
      const htmlProvider = new CompletionProvider('html');
      const cssProvider = new CompletionProvider('css');
      registry.addService(CompletionKey, cssProvider, css);
      registry.addService(CompletionKey, htmlProvider, html);

      expect(registry.getService(CompletionKey, razor)).toBe(htmlProvider);
    });

    it('walks the inheritance graph recursively', () => {
      const baz = types.define('Baz', ['Foo']);
      const barProvider = new CompletionProvider('bar');
      registry.addService(CompletionKey, barProvider, bar);

      expect(registry.getService(CompletionKey, baz)).toBe(barProvider);
    });

    it('sees registrations added after a memoized miss', () => {
      expect(registry.getService(CompletionKey, foo)).toBeUndefined();

      const barProvider = new CompletionProvider('bar');
      registry.addService(CompletionKey, barProvider, bar);

      expect(registry.getService(CompletionKey, foo)).toBe(barProvider);
    });

    it('forgets a removed content-type registration', () => {
      registry.addService(CompletionKey, new CompletionProvider('bar'), bar);
      expect(registry.getService(CompletionKey, foo)).toBeDefined();

      registry.removeService(CompletionKey, bar);

      expect(registry.getService(CompletionKey, foo)).toBeUndefined();
    });

    it('does not resolve content-type registrations without a content type', () => {
      registry.addService(CompletionKey, new CompletionProvider('bar'), bar);

      expect(registry.getService(CompletionKey)).toBeUndefined();
    });

    it('returns undefined when the content type throws', () => {
      const faulty: ContentType = {
        typeName: 'Faulty',
        get baseTypes(): readonly ContentType[] {
          throw new Error('content type registry unavailable');
        },
      };

      expect(registry.getService(CompletionKey, faulty)).toBeUndefined();
    });
  });

  // ==========================================================================
  // GUIDS
  // ==========================================================================

  describe('GUID services', () => {
    it('returns a GUID registration regardless of brace and case', () => {
      const native = { id: 'native' };
      registry.addServiceByGuid(`{${NATIVE_GUID.toUpperCase()}}`, native);

      expect(registry.getServiceByGuid(NATIVE_GUID)).toBe(native);
    });

    it('falls back to the runtime GUID of keyed services', () => {
      const upper = new UpperFormatter();
      registry.addService(UpperFormatterKey, upper);

      expect(registry.getServiceByGuid(FORMATTER_GUID)).toBe(upper);
    });

    it('falls back to the GUID carried by the key', () => {
      const key = defineServiceKey<CompletionProvider>(
        'GuidCompletion',
        (value): value is CompletionProvider => value instanceof CompletionProvider,
        { guid: NATIVE_GUID }
      );
      const provider = new CompletionProvider('ts');
      registry.addService(key, provider);

      expect(registry.getServiceByGuid(NATIVE_GUID)).toBe(provider);
    });

    it('keeps the first GUID registration', () => {
      const first = { id: 1 };
      registry.addServiceByGuid(NATIVE_GUID, first);
      registry.addServiceByGuid(NATIVE_GUID, { id: 2 });

      expect(registry.getServiceByGuid(NATIVE_GUID)).toBe(first);
    });

    it('removes a GUID registration', () => {
      registry.addServiceByGuid(NATIVE_GUID, { id: 1 });
      registry.removeServiceByGuid(NATIVE_GUID);

      expect(registry.getServiceByGuid(NATIVE_GUID)).toBeUndefined();
    });

    it('returns undefined for a malformed GUID lookup', () => {
      expect(registry.getServiceByGuid('not-a-guid')).toBeUndefined();
    });

    it('returns undefined when a registered service has a throwing class GUID', () => {
      class Unstable {
        static get serviceGuid(): string {
          throw new Error('guid unavailable');
        }
      }
      registry.addService(classServiceKey(Unstable), new Unstable());

      expect(registry.getServiceByGuid(NATIVE_GUID)).toBeUndefined();
    });

    it('rejects a malformed GUID registration', () => {
      expect(() => registry.addServiceByGuid('not-a-guid', {})).toThrow(InvalidArgumentError);
    });
  });

  // ==========================================================================
  // TEARDOWN
  // ==========================================================================

  describe('dispose', () => {
    it('clears every registration and refuses further mutation', () => {
      registry.addService(UpperFormatterKey, new UpperFormatter());
      registry.addServiceByGuid(NATIVE_GUID, {});
      registry.dispose();

      expect(registry.isDisposed).toBe(true);
      expect(registry.getService(UpperFormatterKey)).toBeUndefined();
      expect(registry.getServiceByGuid(NATIVE_GUID)).toBeUndefined();
      expect(() => registry.addService(UpperFormatterKey, new UpperFormatter())).toThrow(RegistryDisposedError);
    });

    it('runs the dispose hook once', () => {
      let calls = 0;
      const hooked = new ServiceRegistry({ onDispose: () => calls++ });
      hooked.dispose();
      hooked.dispose();

      expect(calls).toBe(1);
    });
  });
});
