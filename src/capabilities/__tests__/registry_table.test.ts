/**
 * @fileoverview Tests for the host → registry table
 */

import { describe, it, expect, vi } from 'vitest';
import { parseConfig } from '../../config/index.js';
import { ServiceRegistryTable } from '../registry_table.js';
import { classServiceKey, defineServiceKey } from '../service_key.js';

class TextBuffer {
  constructor(readonly uri: string) {}
}

class Tagger {
  constructor(readonly tag: string) {}
}

const TaggerKey = classServiceKey(Tagger);

describe('ServiceRegistryTable', () => {
  it('creates one registry per host and shares it', () => {
    const table = new ServiceRegistryTable<TextBuffer>();
    const host = new TextBuffer('file:///a.py');

    expect(table.has(host)).toBe(false);
    const first = table.fromHost(host);

    expect(table.has(host)).toBe(true);
    expect(table.fromHost(host)).toBe(first);
  });

  it('keeps registries of different hosts apart', () => {
    const table = new ServiceRegistryTable<TextBuffer>();
    const a = new TextBuffer('file:///a.py');
    const b = new TextBuffer('file:///b.py');
    const tagger = new Tagger('a');

    table.addService(a, TaggerKey, tagger);

    expect(table.getService(a, TaggerKey)).toBe(tagger);
    expect(table.getService(b, TaggerKey)).toBeUndefined();
  });

  it('attaches a fresh registry after dispose', () => {
    const table = new ServiceRegistryTable<TextBuffer>();
    const host = new TextBuffer('file:///a.py');
    const original = table.fromHost(host);
    table.addService(host, TaggerKey, new Tagger('old'));

    table.dispose(host);

    expect(original.isDisposed).toBe(true);
    expect(table.has(host)).toBe(false);
    const fresh = table.fromHost(host);
    expect(fresh).not.toBe(original);
    expect(fresh.getService(TaggerKey)).toBeUndefined();
  });

  it('unlinks a registry disposed directly', () => {
    const table = new ServiceRegistryTable<TextBuffer>();
    const host = new TextBuffer('file:///a.py');

    table.fromHost(host).dispose();

    expect(table.has(host)).toBe(false);
  });

  it('ignores dispose for a host without a registry', () => {
    const table = new ServiceRegistryTable<TextBuffer>();

    expect(() => table.dispose(new TextBuffer('file:///none.py'))).not.toThrow();
  });

  it('mirrors GUID registration and removal', () => {
    const table = new ServiceRegistryTable<TextBuffer>();
    const host = new TextBuffer('file:///a.py');
    const native = { id: 'native' };
    const guid = '11111111-2222-4333-8444-555555555555';

    table.addServiceByGuid(host, guid, native);
    expect(table.getServiceByGuid(host, guid)).toBe(native);

    table.removeServiceByGuid(host, guid);
    expect(table.getServiceByGuid(host, guid)).toBeUndefined();
  });

  it('lists and removes keyed services through the host', () => {
    const table = new ServiceRegistryTable<TextBuffer>();
    const host = new TextBuffer('file:///a.py');
    const tagger = new Tagger('x');
    table.addService(host, TaggerKey, tagger);

    expect(table.getAllServices(host, TaggerKey)).toEqual([tagger]);

    table.removeService(host, TaggerKey);
    expect(table.getAllServices(host, TaggerKey)).toEqual([]);
  });

  it('reports a throwing capability check as not found', () => {
    const table = new ServiceRegistryTable<TextBuffer>();
    const host = new TextBuffer('file:///a.py');
    table.addService(host, TaggerKey, new Tagger('x'));
    const broken = defineServiceKey<Tagger>('Broken', (value): value is Tagger => {
      throw new Error(`cannot inspect ${String(value)}`);
    });
    const stderr = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(table.getService(host, broken)).toBeUndefined();
    expect(table.getAllServices(host, broken)).toEqual([]);

    stderr.mockRestore();
  });

  it('sizes registry resolution caches from configuration', () => {
    const host = new TextBuffer('file:///a.py');
    const configured = new ServiceRegistryTable<TextBuffer>({
      config: parseConfig({ cache: { contentTypeResolutionSize: 8 } }),
    });
    const overridden = new ServiceRegistryTable<TextBuffer>({
      config: parseConfig({ cache: { contentTypeResolutionSize: 8 } }),
      resolutionCacheSize: 3,
    });

    expect(new ServiceRegistryTable<TextBuffer>().fromHost(host).resolutionCacheSize).toBe(256);
    expect(configured.fromHost(host).resolutionCacheSize).toBe(8);
    expect(overridden.fromHost(host).resolutionCacheSize).toBe(3);
  });
});
