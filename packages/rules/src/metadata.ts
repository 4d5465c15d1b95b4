import type { RuleInfo } from './types.js';

import type { RuleRegistry } from './RuleRegistry.js';

import { builtinRegistry } from './evaluator.js';

/**
 * Metadata of the rules in `registry`, the built-in rules by default.
 */
export function getRuleMetadata(registry: RuleRegistry = builtinRegistry()): RuleInfo[] {
  return registry.getAll().map((rule) => ({
    id: rule.id,
    source: rule.source,
    category: rule.category,
    description: rule.description,
    severities: rule.severities,
    wcag: rule.wcag,
  }));
}
