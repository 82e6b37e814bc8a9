/**
 * Snapshot module loading - Public API
 */

export { TypeDatabase, moduleNameFromPath } from './type_database.js';
export type { TypeDatabaseOptions, RegisterModuleOptions } from './type_database.js';

export { ModuleDescriptor } from './module_descriptor.js';
export type { ModuleLoadHost } from './module_descriptor.js';

export {
  decodeSnapshotRoot,
  encodeSnapshot,
  writeSnapshot,
  toDictionary,
  v8SnapshotDecoder,
} from './codec.js';
export type { SnapshotDecoder, SnapshotRootRecord, TypeRefRecord, WriteSnapshotOptions } from './codec.js';

export { readMember, readMembers } from './member_reader.js';
export type { MemberReadContext, StoreMember } from './member_reader.js';

export { readMemberList, writeMemberList, memberListPath, DEFAULT_MEMBER_LIST_SUFFIX } from './memlist.js';

export { TypeReference, isSnapshotType } from './types.js';
export type {
  LoadOutcome,
  LoadState,
  Member,
  MemberKind,
  ModuleHandle,
  ModuleReference,
  MultipleMembers,
  SnapshotConstant,
  SnapshotFunction,
  SnapshotOverload,
  SnapshotParameter,
  SnapshotProperty,
  SnapshotType,
  TypeAlias,
  TypeResolver,
} from './types.js';
