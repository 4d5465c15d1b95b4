import type {
  CheckMetadata,
  CheckToggles,
  RenderedTree,
  SkippedCheck,
  Violation,
  ViolationSeverity,
} from '@accessaudit/core/types';

/**
 * High-level categories for grouping rules in listings.
 *
 * Open-ended so custom rules can define new categories.
 */
export type RuleCategory =
  | 'language'
  | 'images'
  | 'forms'
  | 'structure'
  | 'links'
  | 'contrast'
  | 'axe'
  | (string & {});

/**
 * Interface all web rules implement.
 *
 * Rules are pure over the rendered tree: no I/O, no shared state. A rule whose
 * input data is missing throws `EvaluatorPartialError`.
 */
export interface Rule extends CheckMetadata {
  category: RuleCategory;

  /** Most severe level the rule reports; used for listings. */
  severity: ViolationSeverity;

  evaluate(tree: RenderedTree): Violation[];
}

/**
 * Metadata describing a registered rule.
 */
export interface RuleInfo extends CheckMetadata {
  category: RuleCategory;
}

export interface EvaluateOptions {
  /** Per-rule switches keyed by rule id; rules are enabled unless set to `false`. */
  checks?: CheckToggles;

  /** Called for a rule that crashed; it is recorded as skipped either way. */
  onRuleError?: (ruleId: string, error: Error) => void;
}

/**
 * Output from running a set of rules.
 */
export interface RuleRunResult {
  /** Sorted by severity, then rule id. */
  violations: Violation[];
  skipped: SkippedCheck[];
}
