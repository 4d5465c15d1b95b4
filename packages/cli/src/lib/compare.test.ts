import type { AuditResult, Violation } from '@accessaudit/core';
import { describe, expect, it } from 'vitest';

import { compareResults, formatComparison } from './compare.js';

function violation(ruleId: string, severity: Violation['severity'], locator: string): Violation {
  return { ruleId, severity, message: `${ruleId} at ${locator}`, locator, source: 'web' };
}

function result(score: number, violations: Violation[], status: AuditResult['status'] = 'ok'): AuditResult {
  return {
    schemaVersion: 1,
    target: { kind: 'web', url: 'https://example.test/' },
    violations,
    score,
    status,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.000Z',
    skippedChecks: [],
  };
}

describe('compareResults', () => {
  const alt = violation('image-alt', 'critical', '#hero');
  const lang = violation('document-lang', 'serious', 'html');
  const link = violation('link-name', 'moderate', '#more');

  it('reports score movement and violation changes', () => {
    const cmp = compareResults(
      { runId: 'a', result: result(65, [alt, lang]) },
      { runId: 'b', result: result(86, [link, lang]) },
    );

    expect(cmp.delta).toBe(21);
    expect(cmp.direction).toBe('improved');
    expect(cmp.better).toBe('current');
    expect(cmp.newViolations).toEqual([link]);
    expect(cmp.fixedViolations).toEqual([alt]);
  });

  it('ranks a failed run below any completed run', () => {
    const cmp = compareResults(
      { runId: 'a', result: result(40, [alt]) },
      { runId: 'b', result: result(0, [], 'failed') },
    );

    expect(cmp.direction).toBe('regressed');
    expect(cmp.better).toBe('previous');
  });

  it('counts repeated violations individually', () => {
    const cmp = compareResults(
      { runId: 'a', result: result(75, [alt]) },
      { runId: 'b', result: result(50, [alt, alt]) },
    );

    expect(cmp.newViolations).toEqual([alt]);
    expect(cmp.fixedViolations).toEqual([]);
  });
});

describe('formatComparison', () => {
  it('prints scores, delta and changed violations', () => {
    const cmp = compareResults(
      { runId: 'a', result: result(75, [violation('image-alt', 'critical', '#hero')]) },
      { runId: 'b', result: result(75, [violation('image-alt', 'critical', '#logo')]) },
    );

    expect(formatComparison(cmp).split('\n')).toEqual([
      'Previous: 75 (ok)  a',
      'Current:  75 (ok)  b',
      'Delta:    0 (unchanged)',
      'Better:   tie',
      'New violations: 1',
      '+ critical [image-alt] #logo: image-alt at #logo',
      'Fixed violations: 1',
      '- critical [image-alt] #hero: image-alt at #hero',
    ]);
  });
});
