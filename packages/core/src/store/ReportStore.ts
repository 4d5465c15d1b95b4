import { mkdir, mkdtemp, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ZodType } from 'zod';

import { ReportNotFoundError, StoreWriteFailureError, toError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { countBySeverity, toGrade } from '../scoring/ScoreAggregator.js';
import type { AuditResult } from '../types/audit.js';
import type { ReportArtifact, ReportPayload, RunSummary } from '../types/store.js';

import { Mutex, withFileLock } from './fileLock.js';
import { formatRunId, isRunId, randomSuffix, runIdTime } from './runId.js';
import { auditResultSchema, runSummarySchema } from './schema.js';

const SUMMARY_FILE = 'summary.json';
const FINDINGS_FILE = 'findings.json';
const STAGING_PREFIX = '.staging-';
const LOCK_NAME = '.store';

export interface ReportStoreOptions {
  /** Root of the artifact directory; runs are written to `<dataDir>/runs`. */
  dataDir: string;
  logger?: Logger;

  /** Clock for run ids. */
  now?: () => Date;

  /** Random part of run ids (4 lowercase hex digits). */
  suffix?: () => string;
}

/**
 * Filesystem-backed store of audit runs.
 *
 * Each run is a directory `<dataDir>/runs/<runId>` holding `summary.json` and
 * `findings.json`. Directories appear atomically: files are written into a
 * hidden staging directory which is renamed into place once complete.
 */
export class ReportStore {
  readonly runsDir: string;

  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly suffix: () => string;
  private readonly mutex = new Mutex();
  private sequence = 0;

  constructor(options: ReportStoreOptions) {
    this.runsDir = path.resolve(options.dataDir, 'runs');
    this.logger = (options.logger ?? silentLogger()).child({ component: 'report-store' });
    this.now = options.now ?? (() => new Date());
    this.suffix = options.suffix ?? randomSuffix;
  }

  /**
   * Persist a finished run.
   *
   * Throws `StoreWriteFailureError` (carrying `result`) if anything fails; no
   * partial run directory is left behind.
   */
  async save(result: AuditResult): Promise<ReportArtifact> {
    let staging: string | null = null;
    try {
      await mkdir(this.runsDir, { recursive: true });
      staging = await mkdtemp(path.join(this.runsDir, STAGING_PREFIX));

      const findings = `${JSON.stringify(result, null, 2)}\n`;
      await writeFile(path.join(staging, FINDINGS_FILE), findings, 'utf8');

      const stagingDir = staging;
      const { runId, summary } = await this.mutex.run(() =>
        withFileLock(path.join(this.runsDir, LOCK_NAME), async () => {
          const runId = await this.allocateRunId();
          const summary = summarize(result, runId);
          await writeFile(path.join(stagingDir, SUMMARY_FILE), `${JSON.stringify(summary, null, 2)}\n`, 'utf8');
          await rename(stagingDir, path.join(this.runsDir, runId));
          return { runId, summary };
        }),
      );
      staging = null;

      this.logger.debug({ runId, status: result.status, score: result.score }, 'run saved');
      return this.artifact(runId, summary);
    } catch (error) {
      this.logger.error({ err: toError(error) }, 'failed to save run');
      if (staging) await rm(staging, { recursive: true, force: true });
      throw new StoreWriteFailureError(result, { cause: error });
    }
  }

  /**
   * Read a run back. Throws `ReportNotFoundError` for unknown ids, malformed
   * ids and incomplete or unreadable run directories.
   */
  async load(runId: string): Promise<AuditResult> {
    const directory = this.runDirectory(runId);
    await this.readJson(runId, path.join(directory, SUMMARY_FILE), runSummarySchema);
    return this.readJson(runId, path.join(directory, FINDINGS_FILE), auditResultSchema);
  }

  async loadSummary(runId: string): Promise<RunSummary> {
    return this.readJson(runId, path.join(this.runDirectory(runId), SUMMARY_FILE), runSummarySchema);
  }

  /**
   * Artifact handle of an existing run.
   */
  async open(runId: string): Promise<ReportArtifact> {
    return this.artifact(runId, await this.loadSummary(runId));
  }

  /**
   * Summaries of stored runs, oldest first. `since` keeps runs saved at or
   * after that time. Entries that cannot be read are skipped.
   */
  async list(options: { since?: Date } = {}): Promise<RunSummary[]> {
    const runIds = await this.runIds();
    const since = options.since?.getTime();

    const summaries: RunSummary[] = [];
    for (const runId of runIds) {
      const savedAt = runIdTime(runId)?.getTime() ?? 0;
      if (since !== undefined && savedAt < since) continue;
      try {
        summaries.push(await this.loadSummary(runId));
      } catch (error) {
        this.logger.warn({ runId, err: toError(error) }, 'skipping unreadable run');
      }
    }
    return summaries;
  }

  /**
   * Ids of the run directories present, sorted oldest first.
   */
  async runIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.runsDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    return entries.filter(isRunId).sort();
  }

  runDirectory(runId: string): string {
    if (!isRunId(runId)) throw new ReportNotFoundError(runId);
    return path.join(this.runsDir, runId);
  }

  private async allocateRunId(): Promise<string> {
    const at = this.now();
    for (;;) {
      this.sequence = (this.sequence + 1) % 10_000;
      const runId = formatRunId(at, this.sequence, this.suffix());
      if (!(await exists(path.join(this.runsDir, runId)))) return runId;
      this.logger.debug({ runId }, 'run id taken, retrying');
    }
  }

  private artifact(runId: string, summary: RunSummary): ReportArtifact {
    const directory = path.join(this.runsDir, runId);
    return {
      runId,
      directory,
      summaryPath: path.join(directory, SUMMARY_FILE),
      findingsPath: path.join(directory, FINDINGS_FILE),
      summary,
    };
  }

  private async readJson<T>(runId: string, file: string, schema: ZodType<T>): Promise<T> {
    try {
      return schema.parse(JSON.parse(await readFile(file, 'utf8')));
    } catch (error) {
      throw new ReportNotFoundError(runId, { cause: error });
    }
  }
}

/**
 * `summary.json` content for a result saved under `runId`.
 */
export function summarize(result: AuditResult, runId: string): RunSummary {
  const summary: RunSummary = {
    schemaVersion: 1,
    runId,
    kind: result.target.kind,
    targetLabel: result.target.kind === 'web' ? result.target.url : result.target.filename,
    target: result.target,
    score: result.score,
    grade: toGrade(result.score),
    status: result.status,
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    violationCount: result.violations.length,
    bySeverity: countBySeverity(result.violations),
    skippedChecks: result.skippedChecks,
  };
  if (result.error) summary.error = result.error;
  if (result.linkedPdfs) summary.linkedPdfs = result.linkedPdfs;
  return summary;
}

/**
 * The stable retrieval shape served for a run.
 */
export function toReportPayload(result: AuditResult, runId: string): ReportPayload {
  return {
    run_id: runId,
    kind: result.target.kind,
    score: result.score,
    status: result.status,
    violations: result.violations.map((v) => ({
      rule_id: v.ruleId,
      severity: v.severity,
      message: v.message,
      locator: v.locator,
    })),
    started_at: result.startedAt,
    finished_at: result.finishedAt,
  };
}

async function exists(file: string): Promise<boolean> {
  try {
    await stat(file);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
