/**
 * @fileoverview Tests for the snapshot codec and member-list sidecar
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as v8 from 'node:v8';
import { SnapshotError } from '../../core/errors.js';
import { decodeSnapshotRoot, toDictionary, v8SnapshotDecoder, writeSnapshot } from '../codec.js';
import { memberListPath, readMemberList, writeMemberList } from '../memlist.js';

describe('toDictionary', () => {
  it('accepts plain objects and maps', () => {
    expect(toDictionary({ a: 1 })).toEqual(new Map([['a', 1]]));
    expect(toDictionary(new Map<unknown, unknown>([['a', 1], [2, 'dropped']]))).toEqual(new Map([['a', 1]]));
    expect(toDictionary(Object.create(null))).toEqual(new Map());
  });

  it('rejects everything else', () => {
    class Shape {}
    expect(toDictionary([1, 2])).toBeUndefined();
    expect(toDictionary('text')).toBeUndefined();
    expect(toDictionary(null)).toBeUndefined();
    expect(toDictionary(new Shape())).toBeUndefined();
  });
});

describe('decodeSnapshotRoot', () => {
  it('returns the root dictionary', async () => {
    const bytes = v8.serialize({ doc: 'Module doc.', members: {} });

    const result = await decodeSnapshotRoot(bytes, v8SnapshotDecoder, 'mod.idb');

    expect(result.ok).toBe(true);
    expect(result.ok ? result.value.get('doc') : undefined).toBe('Module doc.');
  });

  it('reports a non-dictionary root as invalid structure', async () => {
    const result = await decodeSnapshotRoot(v8.serialize([1, 2]), v8SnapshotDecoder, 'mod.idb');

    if (result.ok) {
      throw new Error('expected a failure');
    }
    expect(result.error).toBeInstanceOf(SnapshotError);
    expect(result.error.reason).toBe('invalid_structure');
    expect(result.error.message).toBe('Snapshot invalid_structure (mod.idb): root must be a dictionary, got array');
    expect(result.error.retryable).toBe(false);
  });

  it('reports a decoder failure as malformed', async () => {
    const decoder = {
      decode: (): unknown => {
        throw new Error('bad header');
      },
    };

    const result = await decodeSnapshotRoot(Buffer.from('junk'), decoder, 'mod.idb');

    expect(result.ok ? undefined : result.error.reason).toBe('malformed');
    expect(result.ok ? undefined : result.error.cause?.message).toBe('bad header');
  });

  it('awaits asynchronous decoders', async () => {
    const decoder = { decode: async (): Promise<unknown> => new Map([['doc', 'async']]) };

    const result = await decodeSnapshotRoot(Buffer.alloc(0), decoder, 'mod.idb');

    expect(result.ok ? result.value.get('doc') : undefined).toBe('async');
  });
});

describe('member-list sidecar', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'langsense-memlist-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('places the sidecar beside the snapshot', () => {
    expect(memberListPath('/data/os.idb')).toBe('/data/os.idb.memlist');
    expect(memberListPath('/data/os.idb', '.names')).toBe('/data/os.idb.names');
  });

  it('writes one name per line', async () => {
    const snapshotPath = join(workspace, 'os.idb');

    await writeMemberList(snapshotPath, ['path', 'sep']);

    expect(await readFile(`${snapshotPath}.memlist`, 'utf-8')).toBe('path\nsep\n');
    expect(await readMemberList(snapshotPath)).toEqual(['path', 'sep']);
  });

  it('skips blank lines and tolerates CRLF', async () => {
    const snapshotPath = join(workspace, 'os.idb');
    await writeFile(`${snapshotPath}.memlist`, 'path\r\n\r\nsep\r\n', 'utf-8');

    expect(await readMemberList(snapshotPath)).toEqual(['path', 'sep']);
  });

  it('returns undefined when there is no sidecar', async () => {
    expect(await readMemberList(join(workspace, 'none.idb'))).toBeUndefined();
  });

  it('writes the sidecar with the snapshot on request', async () => {
    const snapshotPath = join(workspace, 'os.idb');

    await writeSnapshot(
      snapshotPath,
      { members: { getcwd: { kind: 'function', value: {} }, name: { kind: 'constant', value: { type: ['builtins', 'str'] } } } },
      { memberList: true }
    );

    expect(await readMemberList(snapshotPath)).toEqual(['getcwd', 'name']);
    const root = await decodeSnapshotRoot(await readFile(snapshotPath), v8SnapshotDecoder, snapshotPath);
    expect(root.ok ? toDictionary(root.value.get('members'))?.size : undefined).toBe(2);
  });
});
