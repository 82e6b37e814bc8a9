/**
 * @fileoverview Snapshot member reader
 *
 * Converts raw member records from a decoded snapshot into {@link Member}
 * values. Type references inside records become lazy {@link TypeReference}
 * handles, so forward references to types in the same module (or in modules
 * not yet loaded) are read without triggering any load.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';
import { Err, Ok, type Result } from '../core/result.js';
import {
  ConstantRecordSchema,
  FunctionRecordSchema,
  MemberRecordSchema,
  ModuleRefRecordSchema,
  MultipleRecordSchema,
  PropertyRecordSchema,
  TypeRecordSchema,
  TypeRefRecordSchema,
  toDictionary,
} from './codec.js';
import {
  TypeReference,
  type Member,
  type SnapshotOverload,
  type TypeResolver,
} from './types.js';

export interface MemberReadContext {
  /** Module the records were read from */
  readonly moduleName: string;
  readonly isBuiltinModule: boolean;
  readonly resolver: TypeResolver;
}

export type StoreMember = (name: string, member: Member) => void;

/**
 * Read one member record and hand the result to `store`.
 *
 * @returns An error message when the record was skipped
 */
export function readMember(
  name: string,
  record: unknown,
  context: MemberReadContext,
  store: StoreMember
): Result<Member, string> {
  const parsed = parseMember(name, record, context);
  if (parsed.ok) {
    store(name, parsed.value);
  }
  return parsed;
}

/**
 * Read every entry of a members table. Entries that fail to parse are
 * reported through `onSkip` and otherwise ignored.
 */
export function readMembers(
  table: Map<string, unknown>,
  context: MemberReadContext,
  store: StoreMember,
  onSkip?: (name: string, reason: string) => void
): number {
  let stored = 0;
  for (const [name, record] of table) {
    const result = readMember(name, record, context, store);
    if (result.ok) {
      stored++;
    } else {
      onSkip?.(name, result.error);
    }
  }
  return stored;
}

function parseMember(name: string, record: unknown, context: MemberReadContext): Result<Member, string> {
  const envelope = MemberRecordSchema.safeParse(asPlainRecord(record));
  if (!envelope.success) {
    return Err(describeIssues(envelope.error));
  }
  const kind = envelope.data.kind;
  const value = asPlainRecord(envelope.data.value);

  switch (kind) {
    case 'type': {
      const parsed = TypeRecordSchema.safeParse(value);
      if (!parsed.success) return Err(describeIssues(parsed.error));
      const members = new Map<string, Member>();
      const nested = toDictionary(parsed.data.members);
      if (nested) {
        readMembers(nested, context, (memberName, member) => members.set(memberName, member));
      }
      return Ok({
        kind: 'type',
        name,
        declaringModule: context.moduleName,
        doc: parsed.data.doc,
        includeInModule: parsed.data.includeInModule ?? true,
        isBuiltin: parsed.data.builtin ?? context.isBuiltinModule,
        bases: (parsed.data.bases ?? []).map((ref) => toReference(ref, context)),
        members,
      });
    }

    case 'function':
    case 'method': {
      const parsed = FunctionRecordSchema.safeParse(value);
      if (!parsed.success) return Err(describeIssues(parsed.error));
      const overloads: SnapshotOverload[] = (parsed.data.overloads ?? []).map((overload) => ({
        doc: overload.doc,
        parameters: (overload.args ?? []).map((arg) => ({
          name: arg.name,
          types: (arg.type ?? []).map((ref) => toReference(ref, context)),
          defaultValue: arg.default,
          format: arg.format,
        })),
        returnTypes: (overload.returns ?? []).map((ref) => toReference(ref, context)),
      }));
      return Ok({
        kind,
        name,
        declaringModule: context.moduleName,
        doc: parsed.data.doc,
        isStatic: parsed.data.static ?? false,
        isBuiltin: parsed.data.builtin ?? context.isBuiltinModule,
        overloads,
      });
    }

    case 'property': {
      const parsed = PropertyRecordSchema.safeParse(value);
      if (!parsed.success) return Err(describeIssues(parsed.error));
      return Ok({
        kind: 'property',
        name,
        doc: parsed.data.doc,
        isStatic: parsed.data.static ?? false,
        types: (parsed.data.type ?? []).map((ref) => toReference(ref, context)),
      });
    }

    case 'constant': {
      const parsed = ConstantRecordSchema.safeParse(value);
      if (!parsed.success) return Err(describeIssues(parsed.error));
      return Ok({ kind: 'constant', name, type: toReference(parsed.data.type, context) });
    }

    case 'moduleref': {
      const parsed = ModuleRefRecordSchema.safeParse(value);
      if (!parsed.success) return Err(describeIssues(parsed.error));
      const moduleName = parsed.data.name;
      const { resolver } = context;
      return Ok({
        kind: 'module',
        name,
        moduleName,
        resolve: () => resolver.getModule(moduleName),
      });
    }

    case 'typeref': {
      const parsed = TypeRefRecordSchema.safeParse(value);
      if (!parsed.success) return Err(describeIssues(parsed.error));
      return Ok({ kind: 'typeref', name, target: toReference(parsed.data, context) });
    }

    case 'multiple': {
      const parsed = MultipleRecordSchema.safeParse(value);
      if (!parsed.success) return Err(describeIssues(parsed.error));
      const members: Member[] = [];
      for (const entry of parsed.data.members) {
        const alternative = parseMember(name, entry, context);
        if (alternative.ok) members.push(alternative.value);
      }
      return Ok({ kind: 'multiple', name, members });
    }

    default:
      return Err(`unknown member kind '${kind}'`);
  }
}

function toReference(ref: readonly [string, string], context: MemberReadContext): TypeReference {
  return new TypeReference(ref[0], ref[1], context.resolver);
}

function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.length > 0 ? e.path.join('.') : '<root>'}: ${e.message}`).join('; ');
}

/** Map-shaped records (as structured-clone decoding may produce) become plain objects. */
function asPlainRecord(record: unknown): unknown {
  if (!(record instanceof Map)) {
    return record;
  }
  const dictionary = toDictionary(record);
  return dictionary ? Object.fromEntries(dictionary) : record;
}
