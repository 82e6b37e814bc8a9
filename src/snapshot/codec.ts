/**
 * @fileoverview Snapshot wire format
 *
 * A snapshot is a dictionary-shaped root record:
 *
 * ```
 * { members: { <name>: MemberRecord }, doc?: string, filename?: string, children?: string[] }
 * ```
 *
 * The default codec uses V8 structured-clone serialization, so roots, member
 * tables, member records and their `value` objects may also arrive as `Map`s.
 * Deeper values (overloads, parameters) must be plain objects and arrays. The decoder is pluggable; the
 * loader only relies on the four top-level keys above.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as v8 from 'node:v8';
import { z } from 'zod';
import { SnapshotError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { writeMemberList } from './memlist.js';

// ============================================================================
// RECORD SCHEMAS
// ============================================================================

/** `[moduleName, typeName]` */
export const TypeRefRecordSchema = z.tuple([z.string(), z.string()]);

export const TypeRecordSchema = z.object({
  doc: z.string().optional(),
  bases: z.array(TypeRefRecordSchema).optional(),
  members: z.unknown().optional(),
  builtin: z.boolean().optional(),
  includeInModule: z.boolean().optional(),
});

export const ParameterRecordSchema = z.object({
  name: z.string(),
  type: z.array(TypeRefRecordSchema).optional(),
  default: z.string().optional(),
  format: z.enum(['*', '**']).optional(),
});

export const OverloadRecordSchema = z.object({
  doc: z.string().optional(),
  args: z.array(ParameterRecordSchema).optional(),
  returns: z.array(TypeRefRecordSchema).optional(),
});

export const FunctionRecordSchema = z.object({
  doc: z.string().optional(),
  overloads: z.array(OverloadRecordSchema).optional(),
  static: z.boolean().optional(),
  builtin: z.boolean().optional(),
});

export const PropertyRecordSchema = z.object({
  doc: z.string().optional(),
  type: z.array(TypeRefRecordSchema).optional(),
  static: z.boolean().optional(),
});

export const ConstantRecordSchema = z.object({
  type: TypeRefRecordSchema,
});

export const ModuleRefRecordSchema = z.object({
  name: z.string(),
});

export const MultipleRecordSchema = z.object({
  members: z.array(z.unknown()),
});

export const MemberRecordSchema = z.object({
  kind: z.string(),
  value: z.unknown(),
});

export type TypeRefRecord = z.input<typeof TypeRefRecordSchema>;

/**
 * Shape accepted by {@link encodeSnapshot}. Member values stay loose so that
 * tests and generators can write records the reader must tolerate.
 */
export interface SnapshotRootRecord {
  members?: Record<string, unknown> | Map<string, unknown>;
  doc?: string;
  filename?: string;
  children?: string[] | Set<string>;
}

// ============================================================================
// DICTIONARY HELPERS
// ============================================================================

/**
 * View a decoded value as a string-keyed dictionary. Accepts plain objects
 * and Maps; anything else (arrays, primitives, class instances) is not
 * dictionary-shaped.
 */
export function toDictionary(value: unknown): Map<string, unknown> | undefined {
  if (value instanceof Map) {
    const result = new Map<string, unknown>();
    for (const [key, entry] of value) {
      if (typeof key === 'string') {
        result.set(key, entry);
      }
    }
    return result;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    return undefined;
  }
  return new Map(Object.entries(value));
}

// ============================================================================
// DECODING
// ============================================================================

/** Turns snapshot bytes into a value; may return a promise. */
export interface SnapshotDecoder {
  decode(bytes: Buffer): unknown;
}

export const v8SnapshotDecoder: SnapshotDecoder = {
  decode: (bytes) => v8.deserialize(bytes),
};

/**
 * Decode snapshot bytes into the root dictionary.
 *
 * A decoder that throws yields a `malformed` error; a root that is not
 * dictionary-shaped yields `invalid_structure`.
 */
export async function decodeSnapshotRoot(
  bytes: Buffer,
  decoder: SnapshotDecoder,
  snapshotPath: string
): Promise<Result<Map<string, unknown>, SnapshotError>> {
  let decoded: unknown;
  try {
    decoded = await decoder.decode(bytes);
  } catch (error) {
    return Err(new SnapshotError('malformed', snapshotPath, getErrorMessage(error), toError(error)));
  }

  const root = toDictionary(decoded);
  if (!root) {
    const shape = Array.isArray(decoded) ? 'array' : decoded === null ? 'null' : typeof decoded;
    return Err(new SnapshotError('invalid_structure', snapshotPath, `root must be a dictionary, got ${shape}`));
  }
  return Ok(root);
}

// ============================================================================
// ENCODING
// ============================================================================

export function encodeSnapshot(root: SnapshotRootRecord): Buffer {
  return v8.serialize(root);
}

export interface WriteSnapshotOptions {
  /** Also write the `<path><suffix>` member-list sidecar */
  memberList?: boolean;
  memberListSuffix?: string;
}

/**
 * Write a snapshot file and, optionally, its member-list sidecar.
 */
export async function writeSnapshot(
  snapshotPath: string,
  root: SnapshotRootRecord,
  options: WriteSnapshotOptions = {}
): Promise<void> {
  await fs.writeFile(snapshotPath, encodeSnapshot(root));
  if (options.memberList) {
    const names = Array.from(toDictionary(root.members)?.keys() ?? []);
    await writeMemberList(snapshotPath, names, options.memberListSuffix);
  }
}
