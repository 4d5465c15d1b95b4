import type { AxeResults } from 'axe-core';

import type { AxeFinding } from '../types/axe.js';
import type { ViolationSeverity } from '../types/violation.js';

/**
 * Map axe "impact" to our normalized severity.
 */
export function impactToSeverity(impact: unknown): ViolationSeverity {
  if (impact === 'critical') return 'critical';
  if (impact === 'serious') return 'serious';
  if (impact === 'minor') return 'minor';
  return 'moderate';
}

/**
 * Normalize raw axe-core results into one finding per (rule id, element).
 */
export function normalizeAxeResults(results: Pick<AxeResults, 'violations'>): AxeFinding[] {
  const out: AxeFinding[] = [];
  const seen = new Set<string>();

  for (const v of results.violations ?? []) {
    const severity = impactToSeverity(v.impact);

    for (const node of v.nodes ?? []) {
      const selector = Array.isArray(node.target) ? node.target.join(' ') : String(node.target ?? '');
      const key = `${v.id}::${selector}`;
      if (seen.has(key)) continue;
      seen.add(key);

      out.push({
        id: v.id,
        severity: node.impact ? impactToSeverity(node.impact) : severity,
        help: v.help,
        selector,
        tags: (v.tags ?? []).filter((t) => /^wcag\d+$/.test(t)),
      });
    }
  }

  return out;
}
