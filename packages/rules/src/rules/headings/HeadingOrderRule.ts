import type { RenderedTree, Violation } from '@accessaudit/core/types';

import { BaseRule } from '../../BaseRule.js';

/**
 * Heading levels descend one step at a time.
 *
 * The outline is taken to start at level 1, so a first heading deeper than h2
 * is a jump too. Going back up any number of levels is fine.
 */
export class HeadingOrderRule extends BaseRule {
  constructor() {
    super({
      id: 'heading-order',
      category: 'structure',
      description: 'Heading levels increase by one at most, and headings are not empty',
      severities: ['moderate', 'minor'],
      wcag: ['1.3.1', '2.4.6'],
    });
  }

  evaluate(tree: RenderedTree): Violation[] {
    const out: Violation[] = [];
    let previous: number | null = null;

    for (const heading of tree.headings) {
      const from = previous ?? 1;
      if (heading.level > from + 1) {
        out.push(
          this.violation(
            heading.selector,
            'moderate',
            previous === null
              ? `Document outline starts at h${heading.level}`
              : `Heading level jumps from h${from} to h${heading.level}`,
            'Use heading levels in order without skipping levels.',
          ),
        );
      }

      if (heading.textContent.trim() === '') {
        out.push(
          this.violation(
            heading.selector,
            'minor',
            'Heading has no text',
            'Provide descriptive heading text or remove the empty heading.',
          ),
        );
      }
      previous = heading.level;
    }
    return out;
  }
}
