import path from 'node:path';

import { z } from 'zod';

const loggingSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  json: z.boolean().optional(),
  file: z.string().optional(),
});

const browserSchema = z.object({
  executable_path: z.string().optional(),
  headless: z.boolean().default(true),
});

const scoreScaleSchema = z.object({
  web: z.number().nonnegative().default(1),
  pdf: z.number().nonnegative().default(1),
});

const checkSchema = z.object({
  enabled: z.boolean().optional(),
});

const reportSchema = z.object({
  format: z.enum(['json', 'md', 'csv', 'console']).default('console'),
  output: z.string().optional(),
  threshold: z.number().min(0).max(100).optional(),
});

/**
 * Schema of `.accessauditrc.json`. Keys are snake_case on disk.
 */
export const configFileSchema = z.object({
  retention_days: z.number().int().positive().default(90),
  render_timeout_seconds: z.number().int().positive().default(30),
  enable_computed_contrast: z.boolean().default(true),
  data_dir: z.string().min(1).default('./accessaudit-data'),
  browser_pool_size: z.number().int().positive().default(2),
  settle_timeout_seconds: z.number().positive().default(5),
  pool_acquire_timeout_seconds: z.number().positive().default(60),
  run_deadline_seconds: z.number().positive().default(120),
  run_axe: z.boolean().default(false),
  archive_dir: z.string().min(1).optional(),
  score_scale: scoreScaleSchema.default({}),
  browser: browserSchema.default({}),
  logging: loggingSchema.default({}),
  checks: z.record(z.string(), checkSchema).default({}),
  report: reportSchema.default({}),
});

export type ConfigFile = z.input<typeof configFileSchema>;

export type LogLevel = z.infer<typeof loggingSchema>['level'];

export interface LoggingConfig {
  level?: LogLevel;

  /** Emit JSON lines instead of pretty output. Defaults to `NODE_ENV === 'production'`. */
  json?: boolean;

  /** Write logs to this file instead of stdout. */
  file?: string;
}

export type ReportFormat = z.infer<typeof reportSchema>['format'];

/**
 * Resolved engine configuration.
 */
export interface EngineConfig {
  retentionDays: number;
  renderTimeoutMs: number;

  /** Ceiling on the wait for network idle after `load`. */
  settleTimeoutMs: number;

  /** How long a run waits for a free browser context. */
  poolAcquireTimeoutMs: number;

  /** Overall per-run deadline. */
  runDeadlineMs: number;

  enableComputedContrast: boolean;
  runAxe: boolean;

  /** Root of the artifact directory; runs live under `<dataDir>/runs`. */
  dataDir: string;
  archiveDir: string;
  browserPoolSize: number;
  scoreScale: { web: number; pdf: number };
  browser: { executablePath?: string; headless: boolean };
  logging: LoggingConfig;

  /** Per-check overrides keyed by check id. */
  checks: Record<string, { enabled?: boolean }>;
  report: { format: ReportFormat; output?: string; threshold?: number };
}

const engineConfigSchema = configFileSchema.transform(
  (file): EngineConfig => ({
    retentionDays: file.retention_days,
    renderTimeoutMs: file.render_timeout_seconds * 1000,
    settleTimeoutMs: file.settle_timeout_seconds * 1000,
    poolAcquireTimeoutMs: file.pool_acquire_timeout_seconds * 1000,
    runDeadlineMs: file.run_deadline_seconds * 1000,
    enableComputedContrast: file.enable_computed_contrast,
    runAxe: file.run_axe,
    dataDir: file.data_dir,
    archiveDir: file.archive_dir ?? path.join(file.data_dir, 'archive'),
    browserPoolSize: file.browser_pool_size,
    scoreScale: file.score_scale,
    browser: { executablePath: file.browser.executable_path, headless: file.browser.headless },
    logging: file.logging,
    checks: file.checks,
    report: file.report,
  }),
);

/**
 * Validate a raw config object and resolve it into an `EngineConfig`.
 *
 * Throws a `ZodError` naming the offending field when validation fails.
 */
export function parseConfig(raw: unknown): EngineConfig {
  return engineConfigSchema.parse(raw);
}
