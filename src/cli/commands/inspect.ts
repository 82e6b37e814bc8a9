/**
 * @fileoverview Inspect command - Show a snapshot's module and members
 */

import { parseArgs } from 'node:util';
import { createError } from '../errors.js';
import { describeMember, summarizeMember, type MemberDetail, type MemberSummary } from '../describe.js';
import { printKeyValue, printTable, summarize } from '../output.js';
import { openSnapshot } from './open_snapshot.js';

export interface InspectCommandOptions {
  workspace: string;
  args: string[];
}

export interface ModuleReport {
  module: string;
  snapshotPath: string;
  sourceFile: string | null;
  documentation: string | null;
  children: string[];
  members: MemberSummary[];
}

export async function inspectCommand(options: InspectCommandOptions): Promise<void> {
  const { workspace, args } = options;

  const { values, positionals } = parseArgs({
    args,
    options: {
      member: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const target = positionals[0];
  if (!target) {
    throw createError('INVALID_ARGUMENT', 'Snapshot path is required. Usage: langsense inspect <snapshot> [--member <name>]');
  }
  const outputJson = values.json ?? false;

  const { module, snapshotPath } = await openSnapshot(workspace, target);

  if (values.member !== undefined) {
    const member = await module.getMember(values.member);
    if (!member) {
      throw createError('MEMBER_NOT_FOUND', `Member '${values.member}' not found in module ${module.name}`, {
        module: module.name,
        member: values.member,
      });
    }
    const detail = describeMember(member);
    if (outputJson) {
      console.log(JSON.stringify(detail, null, 2));
    } else {
      printMemberDetail(detail);
    }
    return;
  }

  const members: MemberSummary[] = [];
  for (const name of await module.getMemberNames()) {
    const member = await module.getMember(name);
    if (member) members.push(summarizeMember(member));
  }
  const report: ModuleReport = {
    module: module.name,
    snapshotPath,
    sourceFile: (await module.getSourceFilePath()) ?? null,
    documentation: (await module.getDocumentation()) ?? null,
    children: await module.getChildModuleNames(),
    members,
  };

  if (outputJson) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }
  printModuleReport(report);
}

function printModuleReport(report: ModuleReport): void {
  console.log(`\nModule: ${report.module}\n`);
  printKeyValue([
    { key: 'Snapshot', value: report.snapshotPath },
    { key: 'Source', value: report.sourceFile },
    { key: 'Documentation', value: report.documentation === null ? null : summarize(report.documentation) },
    { key: 'Children', value: report.children.length > 0 ? report.children.join(', ') : null },
    { key: 'Members', value: report.members.length },
  ]);
  if (report.members.length === 0) {
    return;
  }
  console.log('');
  printTable(
    ['Name', 'Kind', 'Detail'],
    report.members.map((member) => [member.name, member.kind, member.detail])
  );
}

function printMemberDetail(detail: MemberDetail): void {
  console.log(`\n${detail.kind} ${detail.name}\n`);
  printKeyValue([
    { key: 'Detail', value: detail.detail || null },
    { key: 'Module', value: detail.declaringModule ?? null },
    { key: 'Documentation', value: detail.doc === undefined ? null : summarize(detail.doc) },
  ]);
  if (detail.signatures && detail.signatures.length > 0) {
    console.log('\nSignatures:');
    for (const signature of detail.signatures) {
      console.log(`  ${signature}`);
    }
  }
  if (detail.members && detail.members.length > 0) {
    console.log('\nMembers:');
    for (const member of detail.members) {
      console.log(`  ${member.name} (${member.kind})`);
    }
  }
}
