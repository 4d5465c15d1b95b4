import type { AuditFailure, AuditStatus, SeverityCounts } from './audit.js';
import type { AuditTargetKind, TargetDescriptor } from './target.js';
import type { SkippedCheck } from './violation.js';

/**
 * Content of a run's `summary.json`; also what `list()` returns.
 */
export interface RunSummary {
  schemaVersion: 1;
  runId: string;
  kind: AuditTargetKind;

  /** URL or filename, for listings. */
  targetLabel: string;
  target: TargetDescriptor;

  score: number;
  grade: string;
  status: AuditStatus;
  startedAt: string;
  finishedAt: string;

  violationCount: number;
  bySeverity: SeverityCounts;
  skippedChecks: SkippedCheck[];
  error?: AuditFailure;
  linkedPdfs?: string[];
}

/**
 * Handle to a persisted run.
 */
export interface ReportArtifact {
  runId: string;

  /** Absolute path of the run directory. */
  directory: string;
  summaryPath: string;
  findingsPath: string;
  summary: RunSummary;
}

/**
 * Stable JSON shape served by the report retrieval interface.
 */
export interface ReportPayload {
  run_id: string;
  kind: AuditTargetKind;
  score: number;
  status: AuditStatus;
  violations: Array<{
    rule_id: string;
    severity: string;
    message: string;
    locator: string;
  }>;
  started_at: string;
  finished_at: string;
}
