import path from 'node:path';

import type { ConfigFile, EngineConfig, RawConfig } from '@accessaudit/core';

/**
 * Flags shared by the commands that load engine configuration.
 */
export type ConfigFlags = {
  config?: string;
  dataDir?: string;
  logLevel?: string;
};

/**
 * Flags of `accessaudit audit`, as commander parses them.
 */
export type AuditFlags = ConfigFlags & {
  format?: string;
  output?: string;
  threshold?: number;

  /** Render timeout in seconds. */
  timeout?: number;

  /** Per-run deadline in seconds. */
  deadline?: number;
  poolSize?: number;

  /** `false` when `--no-contrast` is given. */
  contrast?: boolean;
  axe?: boolean;
  withPdfs?: boolean;

  /** `false` when `--no-color` is given. */
  color?: boolean;
};

/**
 * Translate CLI flags into snake_case config overrides.
 *
 * Flags that were not given stay `undefined`, so file and environment values
 * still apply. Negated flags only ever turn a feature off.
 */
export function flagsToOverrides(flags: AuditFlags): RawConfig {
  const report: RawConfig = {};
  if (flags.format !== undefined) report['format'] = flags.format;
  if (flags.output !== undefined) report['output'] = flags.output;
  if (flags.threshold !== undefined) report['threshold'] = flags.threshold;

  return {
    data_dir: flags.dataDir,
    render_timeout_seconds: flags.timeout,
    run_deadline_seconds: flags.deadline,
    browser_pool_size: flags.poolSize,
    enable_computed_contrast: flags.contrast === false ? false : undefined,
    run_axe: flags.axe ? true : undefined,
    logging: flags.logLevel ? { level: flags.logLevel } : undefined,
    report: Object.keys(report).length > 0 ? report : undefined,
  };
}

/**
 * Make the data and archive directories absolute against `cwd`.
 */
export function resolveConfigPaths(config: EngineConfig, cwd: string): EngineConfig {
  return {
    ...config,
    dataDir: path.resolve(cwd, config.dataDir),
    archiveDir: path.resolve(cwd, config.archiveDir),
  };
}

/**
 * Starter `.accessauditrc.json` written by `accessaudit init`.
 */
export function initTemplate(): ConfigFile {
  return {
    retention_days: 90,
    render_timeout_seconds: 30,
    enable_computed_contrast: true,
    data_dir: './accessaudit-data',
    browser_pool_size: 2,
    run_deadline_seconds: 120,
    run_axe: false,
    score_scale: { web: 1, pdf: 1 },
    logging: { level: 'info' },
    checks: {},
    report: { format: 'console', threshold: 70 },
  };
}
