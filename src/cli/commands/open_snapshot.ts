/**
 * @fileoverview Shared snapshot opening for CLI commands
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { loadConfig, type LangsenseConfig } from '../../config/index.js';
import { ConfigError } from '../../core/errors.js';
import { TypeDatabase, moduleNameFromPath, type ModuleDescriptor } from '../../snapshot/index.js';
import { setLogLevel } from '../../telemetry/logger.js';
import { getErrorCode } from '../../utils/errors.js';
import { createError } from '../errors.js';

export interface OpenedSnapshot {
  config: LangsenseConfig;
  database: TypeDatabase;
  module: ModuleDescriptor;
  snapshotPath: string;
}

/**
 * Load workspace configuration, register one snapshot and load it.
 *
 * @throws CliError for a missing snapshot, a corrupt snapshot or invalid configuration
 */
export async function openSnapshot(workspace: string, target: string): Promise<OpenedSnapshot> {
  let config: LangsenseConfig;
  try {
    config = await loadConfig({ workspace });
  } catch (error) {
    if (error instanceof ConfigError) {
      throw createError('CONFIG_INVALID', error.message, { issues: error.issues });
    }
    throw error;
  }
  setLogLevel(config.logging.level);

  const snapshotPath = path.resolve(workspace, target);
  if (!(await isFile(snapshotPath))) {
    throw createError('SNAPSHOT_NOT_FOUND', `Snapshot not found: ${snapshotPath}`);
  }

  const database = new TypeDatabase({ config });
  const moduleName = moduleNameFromPath(path.basename(snapshotPath), config.snapshot.extension);
  const module = database.registerModule(moduleName, snapshotPath, {
    isBuiltin: config.snapshot.builtinModules.includes(moduleName),
  });
  await module.ensureLoaded();

  if (database.corruptSnapshotCount > 0) {
    throw createError('SNAPSHOT_CORRUPT', `Snapshot is corrupt: ${snapshotPath}`, { module: moduleName });
  }
  return { config, database, module, snapshotPath };
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT' || getErrorCode(error) === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}
