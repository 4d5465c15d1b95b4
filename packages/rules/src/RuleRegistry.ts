import type { CheckToggles } from '@accessaudit/core/types';
import { isCheckEnabled } from '@accessaudit/core/utils';

import type { Rule, RuleCategory } from './types.js';

/**
 * Ordered set of rules.
 *
 * Registration order is evaluation and listing order.
 */
export class RuleRegistry {
  private readonly rules = new Map<string, Rule>();

  /**
   * Create an isolated registry instance (useful for tests or custom wiring).
   */
  static create(): RuleRegistry {
    return new RuleRegistry();
  }

  private constructor() {}

  /**
   * Register a rule. Throws if a rule with the same id already exists.
   */
  register(rule: Rule): void {
    if (this.rules.has(rule.id)) {
      throw new Error(`Rule already registered: ${rule.id}`);
    }
    this.rules.set(rule.id, rule);
  }

  get(id: string): Rule | undefined {
    return this.rules.get(id);
  }

  getAll(): Rule[] {
    return Array.from(this.rules.values());
  }

  getByCategory(category: RuleCategory): Rule[] {
    return this.getAll().filter((r) => r.category === category);
  }

  /**
   * Rules are enabled by default unless explicitly disabled.
   */
  enabledRules(checks: CheckToggles = {}): Rule[] {
    return this.getAll().filter((rule) => isCheckEnabled(checks, rule.id));
  }
}
