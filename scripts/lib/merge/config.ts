import fs from 'fs-extra';
import path from 'node:path';

import { ConfigurationError, describeError } from './errors.js';
import {
  LAYOUT_STRATEGIES,
  NAMESPACE_SELECTIONS,
  isOneOf,
  type LayoutStrategy,
  type NamespaceSelection
} from './types.js';

export const CONFIG_FILE_NAME = '.langdatarc.json';

export interface ReconcileConfig {
  /** Source-language tree, e.g. `Languages/English`. */
  sourceDir: string | null;
  /** Target-language tree, e.g. `Languages/ChineseSimplified`. */
  targetDir: string | null;
  /** Raw-data export feeding the typed namespace instead of `sourceDir`. */
  sourceCsv: string | null;
  namespaces: NamespaceSelection;
  strategy: LayoutStrategy | null;
  includeUnchanged: boolean;
  csvOut: string | null;
}

export const DEFAULT_CONFIG: ReconcileConfig = {
  sourceDir: null,
  targetDir: null,
  sourceCsv: null,
  namespaces: 'both',
  strategy: null,
  includeUnchanged: false,
  csvOut: null
};

const PATH_KEYS = ['sourceDir', 'targetDir', 'sourceCsv', 'csvOut'] as const;

export interface LoadedConfig {
  config: ReconcileConfig;
  configFile: string | null;
}

/** Walks upward from `startDir` looking for `.langdatarc.json`. */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let dir = path.resolve(startDir);

  while (true) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (await fs.pathExists(candidate)) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseConfigObject(
  raw: unknown,
  configFile: string
): Partial<ReconcileConfig> {
  if (!isRecord(raw)) {
    throw new ConfigurationError(configFile, 'config must be a JSON object');
  }

  const result: Partial<ReconcileConfig> = {};
  const configDir = path.dirname(configFile);

  for (const key of PATH_KEYS) {
    const value = raw[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string' || !value.trim()) {
      throw new ConfigurationError(configFile, `'${key}' must be a non-empty string`);
    }
    result[key] = path.resolve(configDir, value);
  }

  if (raw.namespaces !== undefined) {
    const value = raw.namespaces;
    if (typeof value !== 'string' || !isOneOf(NAMESPACE_SELECTIONS, value)) {
      throw new ConfigurationError(
        configFile,
        `'namespaces' must be one of ${NAMESPACE_SELECTIONS.join(', ')}`
      );
    }
    result.namespaces = value;
  }

  if (raw.strategy !== undefined) {
    const value = raw.strategy;
    if (typeof value !== 'string' || !isOneOf(LAYOUT_STRATEGIES, value)) {
      throw new ConfigurationError(
        configFile,
        `'strategy' must be one of ${LAYOUT_STRATEGIES.join(', ')}`
      );
    }
    result.strategy = value;
  }

  if (raw.includeUnchanged !== undefined) {
    if (typeof raw.includeUnchanged !== 'boolean') {
      throw new ConfigurationError(configFile, "'includeUnchanged' must be true or false");
    }
    result.includeUnchanged = raw.includeUnchanged;
  }

  return result;
}

/**
 * Defaults, then the config file. An explicit `configPath` must exist; otherwise
 * the file is searched for upward from `cwd` and may be missing.
 */
export async function loadConfig(
  options: { configPath?: string; cwd?: string } = {}
): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  let configFile: string | null;

  if (options.configPath) {
    configFile = path.resolve(cwd, options.configPath);
    if (!(await fs.pathExists(configFile))) {
      throw new ConfigurationError(configFile, 'config file not found');
    }
  } else {
    configFile = await findConfigFile(cwd);
  }

  if (!configFile) {
    return { config: { ...DEFAULT_CONFIG }, configFile: null };
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configFile);
  } catch (error) {
    throw new ConfigurationError(configFile, `invalid JSON: ${describeError(error)}`);
  }

  return {
    config: { ...DEFAULT_CONFIG, ...parseConfigObject(raw, configFile) },
    configFile
  };
}
