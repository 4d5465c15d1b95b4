import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { zipSync, type Zippable } from 'fflate';
import { z } from 'zod';

import { toError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { withFileLock } from '../store/fileLock.js';
import type { ReportStore } from '../store/ReportStore.js';
import { compactTimestamp } from '../store/runId.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const MANIFEST_FILE = 'manifest.json';
const BUNDLE = /^runs-\d{8}T\d{9}Z\.zip$/;

const manifestSchema = z.object({
  version: z.literal(1),
  /** Run id → bundle file name it was last archived into. */
  runs: z.record(z.string(), z.string()),
});

export type ArchiveManifest = z.infer<typeof manifestSchema>;

export interface RetentionSweeperOptions {
  store: ReportStore;
  archiveDir: string;
  retentionDays: number;
  logger?: Logger;
  now?: () => Date;
}

export interface SweepReport {
  /** Bundle written this cycle, or `null` when there was nothing to archive or archiving failed. */
  bundle: string | null;
  archived: string[];
  archiveError?: string;
  prunedRuns: string[];
  prunedBundles: string[];
}

/**
 * Archives run directories into zip bundles and prunes what has aged out.
 *
 * A run directory is only removed once a manifest records it as archived, so
 * a failed archive cycle never loses data.
 */
export class RetentionSweeper {
  private readonly store: ReportStore;
  private readonly archiveDir: string;
  private readonly retentionMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: RetentionSweeperOptions) {
    if (!Number.isInteger(options.retentionDays) || options.retentionDays < 1) {
      throw new RangeError(`retentionDays must be a positive integer (got ${options.retentionDays})`);
    }
    this.store = options.store;
    this.archiveDir = path.resolve(options.archiveDir);
    this.retentionMs = options.retentionDays * DAY_MS;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'retention' });
    this.now = options.now ?? (() => new Date());
  }

  get manifestPath(): string {
    return path.join(this.archiveDir, MANIFEST_FILE);
  }

  async sweep(): Promise<SweepReport> {
    const startedAt = this.now();
    const cutoff = startedAt.getTime() - this.retentionMs;
    const runIds = await this.store.runIds();

    const report: SweepReport = { bundle: null, archived: [], prunedRuns: [], prunedBundles: [] };

    if (runIds.length > 0) {
      try {
        const bundle = await this.archive(runIds, startedAt);
        report.bundle = bundle;
        report.archived = runIds;
        this.logger.info({ bundle, runs: runIds.length }, 'runs archived');
      } catch (error) {
        report.archiveError = toError(error).message;
        this.logger.error({ err: toError(error) }, 'archiving failed; keeping unarchived runs');
      }
    }

    let manifest: ArchiveManifest;
    try {
      manifest = await this.readManifest();
    } catch (error) {
      this.logger.error({ err: toError(error) }, 'archive manifest unreadable; no runs pruned');
      manifest = { version: 1, runs: {} };
    }
    for (const runId of runIds) {
      if (!(runId in manifest.runs)) continue;
      const directory = this.store.runDirectory(runId);
      const modified = await modifiedAt(directory);
      if (modified === null || modified >= cutoff) continue;

      await rm(directory, { recursive: true, force: true });
      report.prunedRuns.push(runId);
      this.logger.info({ runId, bundle: manifest.runs[runId] }, 'run pruned');
    }

    for (const bundle of await this.bundles()) {
      if (bundle === report.bundle) continue;
      const file = path.join(this.archiveDir, bundle);
      const modified = await modifiedAt(file);
      if (modified === null || modified >= cutoff) continue;

      await rm(file, { force: true });
      report.prunedBundles.push(bundle);
      this.logger.info({ bundle }, 'archive bundle pruned');
    }

    if (report.prunedRuns.length > 0 || report.prunedBundles.length > 0) {
      await this.forget(report.prunedRuns, report.prunedBundles);
    }
    return report;
  }

  /**
   * Run `sweep` every `intervalMs` until the returned function is called.
   * Overlapping cycles are skipped; the timer does not keep the process alive.
   */
  schedule(intervalMs: number): () => void {
    let running = false;
    const timer = setInterval(() => {
      if (running) return;
      running = true;
      this.sweep()
        .then((report) => this.logger.debug({ ...report }, 'sweep finished'))
        .catch((error: unknown) => this.logger.error({ err: toError(error) }, 'sweep failed'))
        .finally(() => {
          running = false;
        });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  async readManifest(): Promise<ArchiveManifest> {
    let raw: string;
    try {
      raw = await readFile(this.manifestPath, 'utf8');
    } catch (error) {
      if (isMissingDirectory(error)) return { version: 1, runs: {} };
      throw error;
    }
    return manifestSchema.parse(JSON.parse(raw));
  }

  private async archive(runIds: string[], at: Date): Promise<string> {
    const files: Zippable = {};
    for (const runId of runIds) {
      const directory = this.store.runDirectory(runId);
      const entries: Zippable = {};
      for (const name of await readdir(directory)) {
        entries[name] = new Uint8Array(await readFile(path.join(directory, name)));
      }
      files[runId] = entries;
    }

    await mkdir(this.archiveDir, { recursive: true });
    const bundle = `runs-${compactTimestamp(at)}.zip`;
    await writeAtomic(path.join(this.archiveDir, bundle), zipSync(files, { level: 6 }));

    await withFileLock(this.manifestPath, async () => {
      const manifest = await this.readManifest();
      for (const runId of runIds) manifest.runs[runId] = bundle;
      await writeAtomic(this.manifestPath, `${JSON.stringify(manifest, null, 2)}\n`);
    });
    return bundle;
  }

  /**
   * Drop manifest entries for pruned runs and for runs whose bundle is gone.
   * Without an entry, a run directory that still exists is never pruned.
   */
  private async forget(runIds: string[], bundles: string[]): Promise<void> {
    const gone = new Set(bundles);
    await withFileLock(this.manifestPath, async () => {
      const manifest = await this.readManifest();
      for (const runId of runIds) delete manifest.runs[runId];
      for (const [runId, bundle] of Object.entries(manifest.runs)) {
        if (gone.has(bundle)) delete manifest.runs[runId];
      }
      await writeAtomic(this.manifestPath, `${JSON.stringify(manifest, null, 2)}\n`);
    });
  }

  private async bundles(): Promise<string[]> {
    try {
      return (await readdir(this.archiveDir)).filter((name) => BUNDLE.test(name)).sort();
    } catch (error) {
      if (isMissingDirectory(error)) return [];
      throw error;
    }
  }
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

async function writeAtomic(file: string, data: string | Uint8Array): Promise<void> {
  const temp = `${file}.${process.pid}.tmp`;
  try {
    await writeFile(temp, data);
    await rename(temp, file);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

async function modifiedAt(file: string): Promise<number | null> {
  try {
    return (await stat(file)).mtimeMs;
  } catch {
    // Removed by someone else since it was listed.
    return null;
  }
}
