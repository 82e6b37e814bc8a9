/**
 * @fileoverview Plain-data views of snapshot members for CLI output
 *
 * Members hold lazy type references and resolver callbacks, so they are
 * flattened into JSON-safe summaries before printing.
 */

import type { Member, SnapshotOverload, SnapshotParameter, TypeReference } from '../snapshot/index.js';

export interface MemberSummary {
  name: string;
  kind: Member['kind'];
  /** One-line description: signature, type or target */
  detail: string;
  doc?: string;
}

export interface MemberDetail extends MemberSummary {
  declaringModule?: string;
  isStatic?: boolean;
  isBuiltin?: boolean;
  bases?: string[];
  signatures?: string[];
  members?: MemberSummary[];
}

export function summarizeMember(member: Member): MemberSummary {
  const summary: MemberSummary = { name: member.name, kind: member.kind, detail: memberDetail(member) };
  const doc = documentationOf(member);
  if (doc !== undefined) {
    summary.doc = doc;
  }
  return summary;
}

export function describeMember(member: Member): MemberDetail {
  const detail: MemberDetail = summarizeMember(member);
  switch (member.kind) {
    case 'type':
      detail.declaringModule = member.declaringModule;
      detail.isBuiltin = member.isBuiltin;
      detail.bases = member.bases.map(qualified);
      detail.members = Array.from(member.members.values(), summarizeMember);
      break;
    case 'function':
    case 'method':
      detail.declaringModule = member.declaringModule;
      detail.isStatic = member.isStatic;
      detail.isBuiltin = member.isBuiltin;
      detail.signatures = member.overloads.map((overload) => formatSignature(member.name, overload));
      break;
    case 'property':
      detail.isStatic = member.isStatic;
      break;
    case 'multiple':
      detail.members = member.members.map(summarizeMember);
      break;
    case 'constant':
    case 'module':
    case 'typeref':
      break;
  }
  return detail;
}

export function formatSignature(name: string, overload: SnapshotOverload): string {
  const parameters = overload.parameters.map(formatParameter).join(', ');
  const returns = overload.returnTypes.length > 0 ? ` -> ${joinTypes(overload.returnTypes)}` : '';
  return `${name}(${parameters})${returns}`;
}

function formatParameter(parameter: SnapshotParameter): string {
  const types = parameter.types.length > 0 ? `: ${joinTypes(parameter.types)}` : '';
  const defaultValue = parameter.defaultValue !== undefined ? ` = ${parameter.defaultValue}` : '';
  return `${parameter.format ?? ''}${parameter.name}${types}${defaultValue}`;
}

function memberDetail(member: Member): string {
  switch (member.kind) {
    case 'type':
      return member.bases.length > 0 ? `(${joinTypes(member.bases, ', ')})` : '';
    case 'function':
    case 'method': {
      const [first] = member.overloads;
      if (!first) return `${member.name}()`;
      const more = member.overloads.length > 1 ? ` (+${member.overloads.length - 1} overloads)` : '';
      return `${formatSignature(member.name, first)}${more}`;
    }
    case 'property':
      return joinTypes(member.types);
    case 'constant':
      return qualified(member.type);
    case 'module':
      return `-> ${member.moduleName}`;
    case 'typeref':
      return `= ${qualified(member.target)}`;
    case 'multiple':
      return member.members.map((alternative) => alternative.kind).join(' | ');
  }
}

function documentationOf(member: Member): string | undefined {
  switch (member.kind) {
    case 'type':
    case 'function':
    case 'method':
    case 'property':
      return member.doc;
    default:
      return undefined;
  }
}

function qualified(reference: TypeReference): string {
  return reference.qualifiedName;
}

function joinTypes(references: readonly TypeReference[], separator = ' | '): string {
  return references.map(qualified).join(separator);
}
