import type { AuditFailure, AuditResult, AuditStatus } from '../types/audit.js';
import type { ReportArtifact } from '../types/store.js';
import type { TargetDescriptor } from '../types/target.js';

/**
 * What `Auditor.audit` resolves with: the computed result and where it was
 * persisted.
 */
export interface AuditOutcome {
  result: AuditResult;
  artifact: ReportArtifact;
}

export interface AuditRunOptions {
  /** Overrides the configured run deadline. */
  deadlineMs?: number;

  /** Caller cancellation; the run finishes `failed` with `deadline-exceeded`. */
  signal?: AbortSignal;
}

/**
 * State of a submitted run, as returned by `Auditor.poll`.
 */
export type TicketState =
  | { ticket: string; state: 'running'; submittedAt: string }
  | {
      ticket: string;
      state: 'done';
      submittedAt: string;
      runId: string;
      score: number;
      status: AuditStatus;
    }
  | { ticket: string; state: 'error'; submittedAt: string; error: AuditFailure };

/**
 * Payloads of the events emitted by `Auditor`.
 */
export interface AuditorEventMap {
  start: { target: TargetDescriptor };
  'render:complete': { target: TargetDescriptor; settled: boolean };
  'evaluate:complete': { target: TargetDescriptor; violations: number; skipped: number };
  score: { target: TargetDescriptor; score: number; status: AuditStatus };
  saved: ReportArtifact;
  complete: AuditOutcome;
}

export type AuditorEventName = keyof AuditorEventMap;
