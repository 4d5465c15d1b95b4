import type { AuditStatus, ScoreSummary, SeverityCounts } from '../types/audit.js';
import type { ScoringKind } from '../types/target.js';
import type { Violation, ViolationSeverity } from '../types/violation.js';

const severityPenalty: Record<ViolationSeverity, number> = {
  critical: 25,
  serious: 10,
  moderate: 4,
  minor: 1,
};

export type ScoreScale = Record<ScoringKind, number>;

/**
 * The parts of a run that ranking looks at. `AuditResult` satisfies it.
 */
export interface RankableRun {
  score: number;
  status: AuditStatus;
  violations: readonly Violation[];
}

/**
 * Accessibility scoring engine.
 *
 * Deterministic and explainable:
 * - Start at 100
 * - Deduct a fixed penalty per violation based on severity
 * - Scale the total by the target kind, then round and clamp
 */
export class ScoreAggregator {
  private readonly scale: ScoreScale;

  constructor(scale: Partial<ScoreScale> = {}) {
    this.scale = { web: scale.web ?? 1, pdf: scale.pdf ?? 1 };
    for (const [kind, factor] of Object.entries(this.scale)) {
      if (!Number.isFinite(factor) || factor < 0) {
        throw new RangeError(`score scale for ${kind} must be a non-negative number (got ${factor})`);
      }
    }
  }

  score(violations: readonly Violation[], kind: ScoringKind): number {
    let penalty = 0;
    for (const v of violations) penalty += severityPenalty[v.severity];
    return clamp0to100(Math.round(100 - penalty * this.scale[kind]));
  }

  summarize(violations: readonly Violation[], kind: ScoringKind): ScoreSummary {
    const score = this.score(violations, kind);
    return {
      score,
      grade: toGrade(score),
      bySeverity: countBySeverity(violations),
      totalViolations: violations.length,
    };
  }
}

export function toGrade(score: number): string {
  if (score >= 90) return 'A';
  if (score >= 80) return 'B';
  if (score >= 70) return 'C';
  if (score >= 60) return 'D';
  return 'F';
}

export function countBySeverity(violations: readonly Violation[]): SeverityCounts {
  const counts: SeverityCounts = { critical: 0, serious: 0, moderate: 0, minor: 0 };
  for (const v of violations) counts[v.severity] += 1;
  return counts;
}

/**
 * Comparator for `Array.prototype.sort`: better runs first.
 *
 * Failed runs rank after every completed run. Otherwise higher score wins,
 * then fewer violations, then the run without a critical violation, then the
 * run whose first critical rule id sorts lower.
 */
export function compareRuns(a: RankableRun, b: RankableRun): number {
  const aFailed = a.status === 'failed';
  const bFailed = b.status === 'failed';
  if (aFailed !== bFailed) return aFailed ? 1 : -1;

  const aScore = aFailed ? 0 : a.score;
  const bScore = bFailed ? 0 : b.score;
  if (aScore !== bScore) return bScore - aScore;

  if (a.violations.length !== b.violations.length) return a.violations.length - b.violations.length;

  const aCritical = firstCritical(a.violations);
  const bCritical = firstCritical(b.violations);
  if (aCritical === bCritical) return 0;
  if (aCritical === null) return -1;
  if (bCritical === null) return 1;
  return aCritical < bCritical ? -1 : 1;
}

/**
 * Sorted copy of `runs`, best first. Equal runs keep their input order.
 */
export function rankRuns<T extends RankableRun>(runs: readonly T[]): T[] {
  return [...runs].sort(compareRuns);
}

function firstCritical(violations: readonly Violation[]): string | null {
  // Violations are sorted by severity, so the first critical one has the lowest id.
  const first = violations.find((v) => v.severity === 'critical');
  return first ? first.ruleId : null;
}

function clamp0to100(value: number): number {
  if (value < 0) return 0;
  if (value > 100) return 100;
  return value;
}
