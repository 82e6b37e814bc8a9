/**
 * @fileoverview Member-list sidecar
 *
 * `<snapshotPath>.memlist` holds one member name per line. It lets a module
 * answer "does this member exist?" without decoding the whole snapshot.
 */

import * as fs from 'node:fs/promises';
import { getErrorCode } from '../utils/errors.js';

export const DEFAULT_MEMBER_LIST_SUFFIX = '.memlist';

export function memberListPath(snapshotPath: string, suffix = DEFAULT_MEMBER_LIST_SUFFIX): string {
  return `${snapshotPath}${suffix}`;
}

/**
 * Read the sidecar for a snapshot.
 *
 * @returns The listed names (blank lines skipped), or undefined when the
 *   sidecar does not exist
 */
export async function readMemberList(
  snapshotPath: string,
  suffix = DEFAULT_MEMBER_LIST_SUFFIX
): Promise<string[] | undefined> {
  let content: string;
  try {
    content = await fs.readFile(memberListPath(snapshotPath, suffix), 'utf-8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  return content
    .split(/\r?\n/)
    .filter((line) => line.length > 0);
}

export async function writeMemberList(
  snapshotPath: string,
  names: Iterable<string>,
  suffix = DEFAULT_MEMBER_LIST_SUFFIX
): Promise<void> {
  const lines = Array.from(names);
  const body = lines.length > 0 ? `${lines.join('\n')}\n` : '';
  await fs.writeFile(memberListPath(snapshotPath, suffix), body, 'utf-8');
}
