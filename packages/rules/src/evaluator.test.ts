import type { Violation } from '@accessaudit/core/types';
import { InvalidViolationError } from '@accessaudit/core/errors';
import { describe, expect, it, vi } from 'vitest';

import { field, heading, image, link, makeTree } from './testing/tree.js';

import { createRule } from './createRule.js';
import { evaluateRules } from './evaluator.js';
import { RuleRegistry } from './RuleRegistry.js';

describe('evaluateRules', () => {
  it('returns no violations and no skips for a clean tree', () => {
    expect(evaluateRules(makeTree())).toEqual({ violations: [], skipped: [] });
  });

  it('sorts violations by severity, then rule id, keeping document order within a rule', () => {
    const tree = makeTree({
      pageLanguage: null,
      images: [image('#img1', null), image('#img2', 'photo.jpg'), image('#img3', null)],
      links: [link('#more', 'more')],
      formFields: [field('#name')],
      headings: [heading('#h1', 1), heading('#h3', 3)],
    });

    const { violations, skipped } = evaluateRules(tree);

    expect(skipped).toEqual([]);
    expect(violations.map((v) => `${v.severity} ${v.ruleId} ${v.locator}`)).toEqual([
      'critical form-label #name',
      'critical image-alt #img1',
      'critical image-alt #img3',
      'serious document-lang html',
      'moderate heading-order #h3',
      'moderate link-name #more',
      'minor image-alt #img2',
    ]);
  });

  it('records contrast as skipped when it was not collected', () => {
    const { skipped } = evaluateRules(makeTree({ contrast: null }));

    expect(skipped).toEqual([{ checkId: 'color-contrast', reason: 'computed contrast was not collected' }]);
  });

  it('honours disabled rules', () => {
    const tree = makeTree({ pageLanguage: null, contrast: null });

    expect(
      evaluateRules(tree, { checks: { 'document-lang': { enabled: false }, 'color-contrast': { enabled: false } } }),
    ).toEqual({ violations: [], skipped: [] });
  });

  it('records a crashing rule as skipped and reports it', () => {
    const registry = RuleRegistry.create();
    registry.register(
      createRule({
        id: 'test/crash',
        category: 'structure',
        description: 'crashes',
        evaluate: () => {
          throw new TypeError('boom');
        },
      }),
    );
    const onRuleError = vi.fn();

    const result = evaluateRules(makeTree(), { registry, onRuleError });

    expect(result.skipped).toEqual([{ checkId: 'test/crash', reason: 'check failed: boom' }]);
    expect(onRuleError).toHaveBeenCalledWith('test/crash', expect.any(TypeError));
  });

  it('rethrows malformed violations', () => {
    const bogus: Violation = JSON.parse(
      '{"ruleId":"test/bogus","severity":"blocker","message":"m","locator":"x","source":"web"}',
    );
    const registry = RuleRegistry.create();
    registry.register(
      createRule({ id: 'test/bogus', category: 'structure', description: 'bad', evaluate: () => [bogus] }),
    );

    expect(() => evaluateRules(makeTree(), { registry })).toThrow(InvalidViolationError);
  });
});
