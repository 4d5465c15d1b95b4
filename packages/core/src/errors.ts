import type { AuditResult } from './types/audit.js';

export type AuditErrorCode =
  | 'navigation-timeout'
  | 'render-failure'
  | 'unreadable-pdf'
  | 'evaluator-partial'
  | 'store-write-failure'
  | 'context-acquire-timeout'
  | 'deadline-exceeded'
  | 'invalid-target'
  | 'report-not-found'
  | 'invalid-violation';

/**
 * Base error type for failures raised by the audit engine.
 *
 * `code` is what a failed run records; `retriable` marks transient failures
 * that may be retried once with a fresh browser context.
 */
export class AuditError extends Error {
  readonly code: AuditErrorCode;
  readonly retriable: boolean;

  constructor(
    code: AuditErrorCode,
    message: string,
    options?: { cause?: unknown; retriable?: boolean },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AuditError';
    this.code = code;
    this.retriable = options?.retriable ?? false;
  }
}

/**
 * Thrown when a page does not finish loading within the render timeout.
 */
export class NavigationTimeoutError extends AuditError {
  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super('navigation-timeout', `Navigation to ${url} timed out after ${timeoutMs}ms`, options);
    this.name = 'NavigationTimeoutError';
  }
}

/**
 * Thrown when the browser cannot be started or crashes mid-navigation.
 */
export class RenderFailureError extends AuditError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('render-failure', message, { ...options, retriable: true });
    this.name = 'RenderFailureError';
  }
}

/**
 * Thrown when a byte stream cannot be parsed as PDF structure at all.
 */
export class UnreadablePdfError extends AuditError {
  constructor(filename: string, options?: { cause?: unknown }) {
    super('unreadable-pdf', `${filename} could not be parsed as a PDF document`, options);
    this.name = 'UnreadablePdfError';
  }
}

/**
 * Thrown by a check whose prerequisite data is missing. Never fatal: the
 * evaluator records the check as skipped and the run becomes `partial`.
 */
export class EvaluatorPartialError extends AuditError {
  readonly checkId: string;

  constructor(checkId: string, reason: string) {
    super('evaluator-partial', reason);
    this.name = 'EvaluatorPartialError';
    this.checkId = checkId;
  }
}

/**
 * Thrown when a run's artifact could not be persisted.
 *
 * Carries the computed result: the audit itself may have succeeded.
 */
export class StoreWriteFailureError extends AuditError {
  readonly result: AuditResult;

  constructor(result: AuditResult, options?: { cause?: unknown }) {
    super('store-write-failure', 'Failed to persist audit report', options);
    this.name = 'StoreWriteFailureError';
    this.result = result;
  }
}

/**
 * Thrown when no browser context became free within the acquire timeout.
 */
export class ContextAcquireTimeoutError extends AuditError {
  constructor(timeoutMs: number) {
    super('context-acquire-timeout', `No browser context available after ${timeoutMs}ms`);
    this.name = 'ContextAcquireTimeoutError';
  }
}

/**
 * Abort reason used when a run's deadline expires or the caller cancels.
 */
export class DeadlineExceededError extends AuditError {
  constructor(message = 'Audit deadline exceeded') {
    super('deadline-exceeded', message);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Thrown when a submitted target is malformed (bad URL scheme, empty upload).
 */
export class InvalidTargetError extends AuditError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid-target', message, options);
    this.name = 'InvalidTargetError';
  }
}

/**
 * Thrown by the report store for unknown run ids.
 */
export class ReportNotFoundError extends AuditError {
  readonly runId: string;

  constructor(runId: string, options?: { cause?: unknown }) {
    super('report-not-found', `No report found for run ${runId}`, options);
    this.name = 'ReportNotFoundError';
    this.runId = runId;
  }
}

/**
 * Thrown when an evaluator emits a malformed violation. This is a defect in
 * the evaluator, not a run outcome.
 */
export class InvalidViolationError extends AuditError {
  constructor(message: string) {
    super('invalid-violation', message);
    this.name = 'InvalidViolationError';
  }
}

/**
 * Normalize an unknown thrown value into an `Error`.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
