import type { RenderedTree, Violation, ViolationSeverity } from '@accessaudit/core/types';
import { EvaluatorPartialError } from '@accessaudit/core/errors';

import type { Rule, RuleCategory } from './types.js';

/**
 * Base class for implementing rules with shared helpers for building
 * violations and declaring data prerequisites.
 */
export abstract class BaseRule implements Rule {
  /** Stable rule identifier. */
  readonly id: string;

  readonly source = 'web' as const;

  /** Category for grouping results. */
  readonly category: RuleCategory;

  /** Short human-readable description. */
  readonly description: string;

  /** Most severe level this rule reports. */
  readonly severity: ViolationSeverity;

  readonly severities: ViolationSeverity[];

  /** WCAG success criteria (e.g. `1.1.1`). */
  readonly wcag: string[];

  protected constructor(options: {
    id: string;
    category: RuleCategory;
    description: string;
    severities: [ViolationSeverity, ...ViolationSeverity[]];
    wcag: string[];
  }) {
    this.id = options.id;
    this.category = options.category;
    this.description = options.description;
    this.severities = options.severities;
    this.severity = options.severities[0];
    this.wcag = options.wcag;
  }

  abstract evaluate(tree: RenderedTree): Violation[];

  protected violation(
    locator: string,
    severity: ViolationSeverity,
    message: string,
    suggestion?: string,
  ): Violation {
    const out: Violation = { ruleId: this.id, severity, message, locator, source: 'web' };
    if (this.wcag.length > 0) out.wcag = this.wcag;
    if (suggestion) out.suggestion = suggestion;
    return out;
  }

  /**
   * Narrow `value` to non-null, or mark the rule as skipped with `reason`.
   */
  protected require<T>(value: T | null | undefined, reason: string): T {
    if (value === null || value === undefined) throw new EvaluatorPartialError(this.id, reason);
    return value;
  }
}
