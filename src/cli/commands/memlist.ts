/**
 * @fileoverview Memlist command - Regenerate a snapshot's member-list sidecar
 */

import { parseArgs } from 'node:util';
import { memberListPath, writeMemberList } from '../../snapshot/index.js';
import { createError } from '../errors.js';
import { openSnapshot } from './open_snapshot.js';

export interface MemlistCommandOptions {
  workspace: string;
  args: string[];
}

export async function memlistCommand(options: MemlistCommandOptions): Promise<void> {
  const { workspace, args } = options;

  const { values, positionals } = parseArgs({
    args,
    options: {
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const target = positionals[0];
  if (!target) {
    throw createError('INVALID_ARGUMENT', 'Snapshot path is required. Usage: langsense memlist <snapshot>');
  }

  const { config, module, snapshotPath } = await openSnapshot(workspace, target);
  const names = await module.getMemberNames();
  const suffix = config.snapshot.memberListSuffix;
  await writeMemberList(snapshotPath, names, suffix);

  const sidecarPath = memberListPath(snapshotPath, suffix);
  if (values.json) {
    console.log(JSON.stringify({ module: module.name, sidecar: sidecarPath, memberCount: names.length }));
    return;
  }
  console.log(`Wrote ${names.length} member name(s) to ${sidecarPath}`);
}
