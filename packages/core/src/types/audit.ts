import type { ScoringKind, TargetDescriptor } from './target.js';
import type { SkippedCheck, Violation, ViolationSeverity } from './violation.js';

/**
 * Outcome of a run: `ok` checked cleanly, `partial` some checks were skipped,
 * `failed` nothing could be checked.
 */
export type AuditStatus = 'ok' | 'partial' | 'failed';

/**
 * Why a run failed, as recorded on the result.
 */
export interface AuditFailure {
  /** `AuditError` code (e.g. `navigation-timeout`, `unreadable-pdf`). */
  code: string;
  message: string;
}

/**
 * Result of one audit run. Written once to the report store, then read-only.
 */
export interface AuditResult {
  schemaVersion: 1;
  target: TargetDescriptor;

  /** Sorted by severity, then rule id. Empty for failed runs. */
  violations: Violation[];

  /** Heuristic score, 0..100. Failed runs score 0. */
  score: number;
  status: AuditStatus;

  /** ISO-8601 timestamps. */
  startedAt: string;
  finishedAt: string;

  skippedChecks: SkippedCheck[];
  error?: AuditFailure;

  /** PDF documents linked from a web page, for follow-up runs. */
  linkedPdfs?: string[];
}

export type SeverityCounts = Record<ViolationSeverity, number>;

/**
 * Score plus presentation-friendly breakdown.
 */
export interface ScoreSummary {
  score: number;

  /** Letter grade (A..F). */
  grade: string;

  bySeverity: SeverityCounts;
  totalViolations: number;
}

/**
 * Maps a target to the kind used for scoring.
 */
export function scoringKindOf(target: TargetDescriptor): ScoringKind {
  return target.kind === 'pdf' ? 'pdf' : 'web';
}
