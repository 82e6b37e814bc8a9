/**
 * @fileoverview Langsense configuration
 *
 * Configuration is read from `<workspace>/.langsense/config.yaml` when that
 * file exists, overlaid with `LANGSENSE_*` environment variables, and
 * validated against a zod schema that also supplies every default.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { getErrorCode, getErrorMessage } from '../utils/errors.js';

export const CONFIG_FILE = path.join('.langsense', 'config.yaml');

export const DEFAULT_LOAD_TIMEOUT_MS = 10_000;

const SnapshotConfigSchema = z.object({
  /** File extension of snapshot files discovered by TypeDatabase.open */
  extension: z.string().min(1).default('.idb'),
  /** Suffix appended to a snapshot path to locate its member-list sidecar */
  memberListSuffix: z.string().min(1).default('.memlist'),
  /** Bounded wait for a module's load lock */
  loadTimeoutMs: z.number().int().positive().default(DEFAULT_LOAD_TIMEOUT_MS),
  /** Module names flagged as builtin when discovered */
  builtinModules: z.array(z.string()).default(['builtins']),
});

const CacheConfigSchema = z.object({
  typeResolutionSize: z.number().int().min(0).default(1000),
  contentTypeResolutionSize: z.number().int().min(0).default(256),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const LangsenseConfigSchema = z.object({
  snapshot: SnapshotConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type LangsenseConfig = z.infer<typeof LangsenseConfigSchema>;
export type SnapshotConfig = LangsenseConfig['snapshot'];
export type CacheConfig = LangsenseConfig['cache'];

export const DEFAULT_CONFIG: LangsenseConfig = LangsenseConfigSchema.parse({});

export interface LoadConfigOptions {
  /** Directory holding `.langsense/config.yaml`; defaults to process.cwd() */
  workspace?: string;
  /** Environment to read overrides from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Validate a raw configuration object, applying defaults.
 *
 * @throws ConfigError listing each failing path
 */
export function parseConfig(raw: unknown, source?: string): LangsenseConfig {
  const parsed = LangsenseConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid langsense configuration${source ? ` in ${source}` : ''}`, issues, source);
  }
  return parsed.data;
}

/**
 * Load configuration for a workspace.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LangsenseConfig> {
  const workspace = options.workspace ?? process.cwd();
  const env = options.env ?? process.env;
  const filePath = path.join(workspace, CONFIG_FILE);

  let fileConfig: unknown = {};
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    fileConfig = yaml.parse(raw) ?? {};
  } catch (error) {
    if (getErrorCode(error) !== 'ENOENT') {
      throw new ConfigError(`Failed to read ${filePath}: ${getErrorMessage(error)}`, [], filePath);
    }
  }

  return parseConfig(applyEnvOverrides(fileConfig, env), filePath);
}

function applyEnvOverrides(fileConfig: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isPlainObject(fileConfig)) {
    // Let the schema report the shape error.
    return fileConfig;
  }

  const snapshot = isPlainObject(fileConfig.snapshot) ? { ...fileConfig.snapshot } : fileConfig.snapshot ?? {};
  const logging = isPlainObject(fileConfig.logging) ? { ...fileConfig.logging } : fileConfig.logging ?? {};

  if (isPlainObject(snapshot)) {
    if (env.LANGSENSE_LOAD_TIMEOUT_MS) {
      snapshot.loadTimeoutMs = Number(env.LANGSENSE_LOAD_TIMEOUT_MS);
    }
    if (env.LANGSENSE_SNAPSHOT_EXTENSION) {
      snapshot.extension = env.LANGSENSE_SNAPSHOT_EXTENSION;
    }
  }
  if (isPlainObject(logging) && env.LANGSENSE_LOG_LEVEL) {
    logging.level = env.LANGSENSE_LOG_LEVEL.trim().toLowerCase();
  }

  return { ...fileConfig, snapshot, logging };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
