import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { parseConfig, type EngineConfig } from './schema.js';

/**
 * Config file names searched upwards from the working directory.
 */
export const CONFIG_FILES = ['.accessauditrc.json', 'accessaudit.config.json'] as const;

/**
 * Environment variables that override file values, mapped to file keys.
 */
const ENV_OVERRIDES = {
  ACCESSAUDIT_DATA_DIR: { key: 'data_dir', type: 'string' },
  ACCESSAUDIT_RETENTION_DAYS: { key: 'retention_days', type: 'number' },
  ACCESSAUDIT_RENDER_TIMEOUT_SECONDS: { key: 'render_timeout_seconds', type: 'number' },
  ACCESSAUDIT_BROWSER_POOL_SIZE: { key: 'browser_pool_size', type: 'number' },
  ACCESSAUDIT_ENABLE_COMPUTED_CONTRAST: { key: 'enable_computed_contrast', type: 'boolean' },
} as const;

export type RawConfig = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find a config file by walking up from the starting directory.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    for (const name of CONFIG_FILES) {
      const full = path.join(dir, name);
      if (existsSync(full)) return full;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Read a JSON config file. A missing file yields an empty object.
 */
export function loadConfigFile(filePath: string): RawConfig {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return {};
    throw err;
  }

  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Apply `ACCESSAUDIT_*` environment overrides on top of a raw config object.
 */
export function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const next: RawConfig = { ...raw };

  for (const [name, { key, type }] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value === undefined || value === '') continue;

    if (type === 'number') {
      const num = Number(value);
      if (!Number.isFinite(num)) throw new Error(`${name} must be a number, got "${value}"`);
      next[key] = num;
    } else if (type === 'boolean') {
      next[key] = value === 'true' || value === '1';
    } else {
      next[key] = value;
    }
  }

  const level = env['ACCESSAUDIT_LOG_LEVEL'];
  if (level) {
    next['logging'] = { ...(isRecord(raw['logging']) ? raw['logging'] : {}), level };
  }

  return next;
}

export interface LoadEngineConfigOptions {
  /** Explicit config path; otherwise searched upwards from `cwd`. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;

  /** Highest-precedence values (e.g. CLI flags), in file (snake_case) form. */
  overrides?: RawConfig;
}

/**
 * Resolve engine configuration with precedence overrides > env > file > defaults.
 */
export function loadEngineConfig(options: LoadEngineConfigOptions = {}): EngineConfig {
  const filePath = options.configPath ?? findConfigFile(options.cwd ?? process.cwd());
  const fromFile = filePath ? loadConfigFile(filePath) : {};
  const withEnv = applyEnvOverrides(fromFile, options.env ?? process.env);
  return parseConfig(mergeRawConfig(withEnv, options.overrides ?? {}));
}

/**
 * Merge raw config objects with precedence: base < overrides. Nested sections
 * are merged one level deep so a flag can override a single key.
 */
export function mergeRawConfig(base: RawConfig, overrides: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return merged;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
