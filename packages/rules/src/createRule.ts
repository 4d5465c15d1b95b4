import type { RenderedTree, Violation, ViolationSeverity } from '@accessaudit/core/types';

import type { Rule, RuleCategory } from './types.js';

/**
 * Input shape for `createRule(...)`: the `Rule` interface as an object
 * literal, without a class extending `BaseRule`.
 */
export interface CreateRuleInput {
  id: string;
  category: RuleCategory;
  description: string;

  /** Severities the rule can report, most severe first. Defaults to `['moderate']`. */
  severities?: ViolationSeverity[];
  wcag?: string[];
  evaluate: (tree: RenderedTree) => Violation[];
}

/**
 * Shorthand factory for simple custom rules.
 */
export function createRule(input: CreateRuleInput): Rule {
  const fallback: ViolationSeverity[] = ['moderate'];
  const severities = input.severities?.length ? input.severities : fallback;
  return {
    id: input.id,
    source: 'web',
    category: input.category,
    description: input.description,
    severity: severities[0] ?? 'moderate',
    severities,
    wcag: input.wcag ?? [],
    evaluate: input.evaluate,
  };
}
