import type { RenderedTree, Violation } from '@accessaudit/core/types';

import { BaseRule } from '../../BaseRule.js';

const GENERIC_LINK_TEXT = new Set(['click here', 'read more', 'more', 'here']);

function normalizeText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase()
    .replace(/[.…:!»›>]+$/, '')
    .trim();
}

/**
 * Links have a name that says where they go.
 */
export class LinkNameRule extends BaseRule {
  constructor() {
    super({
      id: 'link-name',
      category: 'links',
      description: 'Links have a descriptive accessible name',
      severities: ['serious', 'moderate'],
      wcag: ['2.4.4', '4.1.2'],
    });
  }

  evaluate(tree: RenderedTree): Violation[] {
    const out: Violation[] = [];
    for (const link of tree.links) {
      const name = link.accessibleName.trim();
      if (!name) {
        out.push(
          this.violation(
            link.selector,
            'serious',
            'Link has no accessible name',
            'Add link text, an aria-label, or alt text on the image inside the link.',
          ),
        );
        continue;
      }
      if (GENERIC_LINK_TEXT.has(normalizeText(name))) {
        out.push(
          this.violation(
            link.selector,
            'moderate',
            `Link text "${name}" does not describe its destination`,
            'Use link text that makes sense out of context.',
          ),
        );
      }
    }
    return out;
  }
}
