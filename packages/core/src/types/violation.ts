/**
 * Severity levels shared by every evaluator.
 *
 * Ordered from most to least severe; anything else is an evaluator defect.
 */
export const SEVERITIES = ['critical', 'serious', 'moderate', 'minor'] as const;

export type ViolationSeverity = (typeof SEVERITIES)[number];

/**
 * Indicates which evaluator produced a violation.
 */
export type ViolationSource = 'web' | 'pdf';

/**
 * A single accessibility finding.
 *
 * Web and PDF evaluators produce the same shape so scoring and reporting stay
 * source-agnostic. Violations are never mutated after creation.
 */
export interface Violation {
  /** Check identifier (e.g. `image-alt`, `pdf-tagged`). */
  ruleId: string;

  /** Normalized severity. */
  severity: ViolationSeverity;

  /** Primary message for display. */
  message: string;

  /** CSS selector for web findings, page/structure path for PDF findings. */
  locator: string;

  /** Evaluator that produced the finding. */
  source: ViolationSource;

  /** WCAG success criteria the finding relates to (e.g. `1.1.1`). */
  wcag?: string[];

  /** Suggested remediation, when the check has one. */
  suggestion?: string;
}

/**
 * A check that could not run because its prerequisite data was missing.
 *
 * Any skipped check downgrades the run to `partial`.
 */
export interface SkippedCheck {
  checkId: string;
  reason: string;
}

/**
 * Output of either evaluator.
 */
export interface EvaluationResult {
  /** Violations sorted by severity, then rule id. */
  violations: Violation[];

  skipped: SkippedCheck[];
}

/**
 * Static description of a check, as listed by `accessaudit rules`.
 */
export interface CheckMetadata {
  id: string;
  source: ViolationSource;
  description: string;

  /** Severities the check can report, most severe first. */
  severities: ViolationSeverity[];

  /** WCAG success criteria (e.g. `1.1.1`). */
  wcag: string[];
}

/**
 * Per-check switches from configuration, keyed by check id.
 */
export type CheckToggles = Record<string, { enabled?: boolean } | undefined>;
