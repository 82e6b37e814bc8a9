/**
 * @fileoverview Snapshot member model
 *
 * Members are what a module exposes to completion and navigation: types,
 * functions, properties, constants, nested module references and aliases.
 * They are immutable once a module has finished loading.
 */

// ============================================================================
// LOAD STATE
// ============================================================================

export type LoadState = 'not_loaded' | 'loading' | 'loaded';

/**
 * Internal result of a single load attempt. Used for logging and events only;
 * queries always see a loaded (possibly empty) module.
 */
export type LoadOutcome =
  | { kind: 'success'; memberCount: number }
  | { kind: 'corrupt'; reason: 'malformed' | 'invalid_structure'; message: string }
  | { kind: 'io_suppressed'; code: string; message: string };

// ============================================================================
// TYPE REFERENCES
// ============================================================================

/**
 * Resolves type references on behalf of the owning type database.
 */
export interface TypeResolver {
  resolveTypeReference(reference: TypeReference): Promise<SnapshotType | undefined>;
  getModule(name: string): ModuleHandle | undefined;
}

/**
 * Minimal view of a module descriptor used by lazily resolved references.
 */
export interface ModuleHandle {
  readonly name: string;
  getMember(name: string): Promise<Member | undefined>;
  resolveType(name: string): Promise<SnapshotType | undefined>;
}

/**
 * A (module, type) pair pointing at a type that may live in a module that
 * is not loaded yet. Resolution is deferred until asked for, so reading a
 * snapshot never triggers another load.
 */
export class TypeReference {
  constructor(
    readonly moduleName: string,
    readonly typeName: string,
    private readonly resolver: TypeResolver,
  ) {}

  get qualifiedName(): string {
    return `${this.moduleName}.${this.typeName}`;
  }

  resolve(): Promise<SnapshotType | undefined> {
    return this.resolver.resolveTypeReference(this);
  }

  toString(): string {
    return this.qualifiedName;
  }
}

// ============================================================================
// MEMBERS
// ============================================================================

export type MemberKind =
  | 'type'
  | 'function'
  | 'method'
  | 'property'
  | 'constant'
  | 'module'
  | 'typeref'
  | 'multiple';

export interface SnapshotType {
  readonly kind: 'type';
  readonly name: string;
  readonly declaringModule: string;
  readonly doc?: string;
  /** False for types that only exist to resolve other members (e.g. class bodies) */
  readonly includeInModule: boolean;
  readonly isBuiltin: boolean;
  readonly bases: readonly TypeReference[];
  readonly members: ReadonlyMap<string, Member>;
}

export interface SnapshotParameter {
  readonly name: string;
  readonly types: readonly TypeReference[];
  readonly defaultValue?: string;
  /** `*` for rest arguments, `**` for keyword bags */
  readonly format?: '*' | '**';
}

export interface SnapshotOverload {
  readonly doc?: string;
  readonly parameters: readonly SnapshotParameter[];
  readonly returnTypes: readonly TypeReference[];
}

export interface SnapshotFunction {
  readonly kind: 'function' | 'method';
  readonly name: string;
  readonly declaringModule: string;
  readonly doc?: string;
  readonly isStatic: boolean;
  readonly isBuiltin: boolean;
  readonly overloads: readonly SnapshotOverload[];
}

export interface SnapshotProperty {
  readonly kind: 'property';
  readonly name: string;
  readonly doc?: string;
  readonly isStatic: boolean;
  readonly types: readonly TypeReference[];
}

export interface SnapshotConstant {
  readonly kind: 'constant';
  readonly name: string;
  readonly type: TypeReference;
}

export interface ModuleReference {
  readonly kind: 'module';
  readonly name: string;
  readonly moduleName: string;
  resolve(): ModuleHandle | undefined;
}

export interface TypeAlias {
  readonly kind: 'typeref';
  readonly name: string;
  readonly target: TypeReference;
}

export interface MultipleMembers {
  readonly kind: 'multiple';
  readonly name: string;
  readonly members: readonly Member[];
}

export type Member =
  | SnapshotType
  | SnapshotFunction
  | SnapshotProperty
  | SnapshotConstant
  | ModuleReference
  | TypeAlias
  | MultipleMembers;

export function isSnapshotType(member: Member | undefined): member is SnapshotType {
  return member?.kind === 'type';
}
