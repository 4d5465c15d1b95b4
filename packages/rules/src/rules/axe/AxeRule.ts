import type { RenderedTree, Violation } from '@accessaudit/core/types';

import { BaseRule } from '../../BaseRule.js';

/**
 * `wcag111` → `1.1.1`, `wcag1410` → `1.4.10`.
 */
export function wcagTagToCriterion(tag: string): string | null {
  const match = /^wcag(\d)(\d)(\d+)$/.exec(tag);
  if (!match) return null;
  return `${match[1]}.${match[2]}.${match[3]}`;
}

/**
 * Passes axe-core findings through as violations, when axe was run.
 *
 * Violations carry `axe/<axe rule id>` as their rule id.
 */
export class AxeRule extends BaseRule {
  constructor() {
    super({
      id: 'axe',
      category: 'axe',
      description: 'axe-core findings (when run_axe is enabled)',
      severities: ['critical', 'serious', 'moderate', 'minor'],
      wcag: [],
    });
  }

  evaluate(tree: RenderedTree): Violation[] {
    if (tree.axe === undefined) return [];
    const findings = this.require(tree.axe, 'axe-core was requested but did not run');

    return findings.map((finding) => {
      const violation: Violation = {
        ruleId: `axe/${finding.id}`,
        severity: finding.severity,
        message: finding.help,
        locator: finding.selector,
        source: 'web',
      };
      const wcag = finding.tags.map(wcagTagToCriterion).filter((c): c is string => c !== null);
      if (wcag.length > 0) violation.wcag = wcag;
      return violation;
    });
  }
}
