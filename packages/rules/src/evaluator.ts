import type { RenderedTree, SkippedCheck, Violation } from '@accessaudit/core/types';
import { EvaluatorPartialError, InvalidViolationError, toError } from '@accessaudit/core/errors';
import { assertViolation, sortViolations } from '@accessaudit/core/utils';

import type { EvaluateOptions, RuleRunResult } from './types.js';

import { RuleRegistry } from './RuleRegistry.js';
import { registerBuiltinRules } from './registerBuiltinRules.js';

let builtins: RuleRegistry | null = null;

/**
 * Registry holding the built-in rules, created on first use.
 */
export function builtinRegistry(): RuleRegistry {
  if (!builtins) {
    builtins = RuleRegistry.create();
    registerBuiltinRules(builtins);
  }
  return builtins;
}

/**
 * Run all enabled rules against a rendered tree.
 *
 * - Rules run in registration order, each independently
 * - A rule missing its input data is recorded as skipped
 * - A crashing rule is recorded as skipped too, and reported through `onRuleError`
 * - A malformed violation is a defect and rethrown
 */
export function evaluateRules(
  tree: RenderedTree,
  options: EvaluateOptions & { registry?: RuleRegistry } = {},
): RuleRunResult {
  const registry = options.registry ?? builtinRegistry();

  const violations: Violation[] = [];
  const skipped: SkippedCheck[] = [];

  for (const rule of registry.enabledRules(options.checks)) {
    try {
      violations.push(...rule.evaluate(tree).map(assertViolation));
    } catch (error) {
      if (error instanceof EvaluatorPartialError) {
        skipped.push({ checkId: rule.id, reason: error.message });
        continue;
      }
      if (error instanceof InvalidViolationError) throw error;

      const err = toError(error);
      options.onRuleError?.(rule.id, err);
      skipped.push({ checkId: rule.id, reason: `check failed: ${err.message}` });
    }
  }

  return { violations: sortViolations(violations), skipped };
}
