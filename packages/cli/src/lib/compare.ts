import { compareRuns, type AuditResult, type Violation } from '@accessaudit/core';

export interface StoredRun {
  runId: string;
  result: AuditResult;
}

/**
 * Comparison between two stored runs.
 */
export interface RunComparison {
  previous: { runId: string; score: number; status: AuditResult['status'] };
  current: { runId: string; score: number; status: AuditResult['status'] };

  /** `current.score - previous.score`. */
  delta: number;
  direction: 'improved' | 'regressed' | 'unchanged';

  /** Which run ranks higher under the run ordering. */
  better: 'previous' | 'current' | 'tie';

  /** In `current` but not in `previous`. */
  newViolations: Violation[];

  /** In `previous` but not in `current`. */
  fixedViolations: Violation[];
}

/**
 * Compare two runs by score and by the violations they report.
 *
 * Violations match on rule, location and message.
 */
export function compareResults(previous: StoredRun, current: StoredRun): RunComparison {
  const delta = current.result.score - previous.result.score;
  const order = compareRuns(previous.result, current.result);

  return {
    previous: { runId: previous.runId, score: previous.result.score, status: previous.result.status },
    current: { runId: current.runId, score: current.result.score, status: current.result.status },
    delta,
    direction: delta === 0 ? 'unchanged' : delta > 0 ? 'improved' : 'regressed',
    better: order === 0 ? 'tie' : order < 0 ? 'previous' : 'current',
    newViolations: difference(current.result.violations, previous.result.violations),
    fixedViolations: difference(previous.result.violations, current.result.violations),
  };
}

export function formatComparison(cmp: RunComparison): string {
  const sign = cmp.delta > 0 ? '+' : '';
  const lines = [
    `Previous: ${cmp.previous.score} (${cmp.previous.status})  ${cmp.previous.runId}`,
    `Current:  ${cmp.current.score} (${cmp.current.status})  ${cmp.current.runId}`,
    `Delta:    ${sign}${cmp.delta} (${cmp.direction})`,
    `Better:   ${cmp.better}`,
  ];

  if (cmp.newViolations.length > 0) {
    lines.push(`New violations: ${cmp.newViolations.length}`);
    for (const v of cmp.newViolations) lines.push(`+ ${v.severity} [${v.ruleId}] ${v.locator}: ${v.message}`);
  }
  if (cmp.fixedViolations.length > 0) {
    lines.push(`Fixed violations: ${cmp.fixedViolations.length}`);
    for (const v of cmp.fixedViolations) lines.push(`- ${v.severity} [${v.ruleId}] ${v.locator}: ${v.message}`);
  }

  return lines.join('\n');
}

function difference(from: readonly Violation[], without: readonly Violation[]): Violation[] {
  const remaining = new Map<string, number>();
  for (const v of without) remaining.set(keyOf(v), (remaining.get(keyOf(v)) ?? 0) + 1);

  const out: Violation[] = [];
  for (const v of from) {
    const count = remaining.get(keyOf(v)) ?? 0;
    if (count > 0) remaining.set(keyOf(v), count - 1);
    else out.push(v);
  }
  return out;
}

function keyOf(v: Violation): string {
  return `${v.ruleId}\u0000${v.locator}\u0000${v.message}`;
}
