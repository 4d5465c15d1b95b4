import { InvalidViolationError } from '../errors.js';
import type { CheckToggles, Violation, ViolationSeverity } from '../types/violation.js';
import { SEVERITIES } from '../types/violation.js';

export function isSeverity(value: unknown): value is ViolationSeverity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}

/**
 * Reject malformed violations. Evaluators are trusted code, so a failure here
 * is a defect, not a run outcome.
 */
export function assertViolation(violation: Violation): Violation {
  if (!isSeverity(violation.severity)) {
    throw new InvalidViolationError(
      `Check ${violation.ruleId} emitted unknown severity ${JSON.stringify(violation.severity)}`,
    );
  }
  if (!violation.ruleId || !violation.message) {
    throw new InvalidViolationError('Violation is missing its rule id or message');
  }
  return violation;
}

/**
 * Sort by severity (most severe first), then rule id. Stable, so document
 * order survives within a rule.
 */
export function sortViolations(violations: readonly Violation[]): Violation[] {
  const rank = (severity: ViolationSeverity): number => SEVERITIES.indexOf(severity);
  return [...violations].sort((a, b) => {
    const bySeverity = rank(a.severity) - rank(b.severity);
    if (bySeverity !== 0) return bySeverity;
    if (a.ruleId === b.ruleId) return 0;
    return a.ruleId < b.ruleId ? -1 : 1;
  });
}

export function isCheckEnabled(toggles: CheckToggles | undefined, checkId: string): boolean {
  return toggles?.[checkId]?.enabled !== false;
}
