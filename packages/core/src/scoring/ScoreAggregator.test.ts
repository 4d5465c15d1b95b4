import { describe, expect, it } from 'vitest';

import type { Violation, ViolationSeverity } from '../types/violation.js';

import { compareRuns, rankRuns, ScoreAggregator, toGrade, type RankableRun } from './ScoreAggregator.js';

function violation(severity: ViolationSeverity, ruleId = `${severity}-rule`): Violation {
  return { ruleId, severity, message: `${ruleId} failed`, locator: 'body', source: 'web' };
}

function run(score: number, violations: Violation[], status: RankableRun['status'] = 'ok'): RankableRun {
  return { score, status, violations };
}

describe('ScoreAggregator', () => {
  it('returns 100 (A) when there are no violations', () => {
    const summary = new ScoreAggregator().summarize([], 'web');

    expect(summary).toEqual({
      score: 100,
      grade: 'A',
      totalViolations: 0,
      bySeverity: { critical: 0, serious: 0, moderate: 0, minor: 0 },
    });
  });

  it('deducts a fixed penalty per severity', () => {
    const aggregator = new ScoreAggregator();

    expect(aggregator.score([violation('critical')], 'pdf')).toBe(75);
    expect(aggregator.score([violation('serious'), violation('moderate'), violation('minor')], 'web')).toBe(85);
  });

  it('scales penalties per kind and rounds', () => {
    const aggregator = new ScoreAggregator({ pdf: 0.5, web: 1.5 });
    const found = [violation('moderate'), violation('minor')];

    expect(aggregator.score(found, 'pdf')).toBe(98);
    expect(aggregator.score(found, 'web')).toBe(93);
  });

  it('clamps to [0, 100]', () => {
    const aggregator = new ScoreAggregator();
    const many = Array.from({ length: 10 }, () => violation('critical'));

    expect(aggregator.score(many, 'web')).toBe(0);
    expect(new ScoreAggregator({ web: 0 }).score(many, 'web')).toBe(100);
  });

  it('never increases as violations are added', () => {
    const aggregator = new ScoreAggregator({ web: 0.7 });
    const severities: ViolationSeverity[] = ['minor', 'serious', 'moderate', 'critical', 'minor', 'serious'];
    const found: Violation[] = [];
    let previous = aggregator.score(found, 'web');

    for (const severity of severities) {
      found.push(violation(severity));
      const next = aggregator.score(found, 'web');
      expect(next).toBeLessThanOrEqual(previous);
      expect(aggregator.score(found, 'web')).toBe(next);
      previous = next;
    }
  });

  it('rejects negative scale factors', () => {
    expect(() => new ScoreAggregator({ pdf: -1 })).toThrow(RangeError);
  });

  it('counts by severity', () => {
    const summary = new ScoreAggregator().summarize(
      [violation('critical'), violation('minor'), violation('minor')],
      'web',
    );

    expect(summary.bySeverity).toEqual({ critical: 1, serious: 0, moderate: 0, minor: 2 });
    expect(summary.score).toBe(73);
    expect(summary.grade).toBe('C');
  });

  it.each([
    [100, 'A'],
    [90, 'A'],
    [89, 'B'],
    [80, 'B'],
    [70, 'C'],
    [60, 'D'],
    [59, 'F'],
  ])('grades %i as %s', (score, grade) => {
    expect(toGrade(score)).toBe(grade);
  });
});

describe('compareRuns', () => {
  it('ranks higher scores first', () => {
    expect(compareRuns(run(90, []), run(80, []))).toBeLessThan(0);
    expect(compareRuns(run(80, []), run(90, []))).toBeGreaterThan(0);
  });

  it('breaks ties by fewer violations', () => {
    const fewer = run(90, [violation('serious')]);
    const more = run(90, [violation('minor'), violation('minor')]);

    expect(rankRuns([more, fewer])).toEqual([fewer, more]);
  });

  it('then prefers runs without critical violations, then the lower critical rule id', () => {
    const clean = run(75, [violation('serious', 'b-rule')]);
    const alpha = run(75, [violation('critical', 'alpha')]);
    const beta = run(75, [violation('critical', 'beta')]);

    expect(rankRuns([beta, alpha, clean])).toEqual([clean, alpha, beta]);
    expect(compareRuns(alpha, run(75, [violation('critical', 'alpha')]))).toBe(0);
  });

  it('ranks failed runs after every completed run, whatever score they carry', () => {
    const failed = run(100, [], 'failed');
    const poor = run(0, Array.from({ length: 5 }, () => violation('critical')), 'partial');

    expect(rankRuns([failed, poor])).toEqual([poor, failed]);
  });
});
