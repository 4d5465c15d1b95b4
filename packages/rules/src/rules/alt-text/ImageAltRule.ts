import type { RenderedTree, Violation } from '@accessaudit/core/types';

import { BaseRule } from '../../BaseRule.js';

const FILE_NAME = /^[\w\-. ]+\.(?:png|jpe?g|gif|svg|webp|bmp|tiff?|avif|ico)$/i;

/**
 * Images carry a text alternative.
 *
 * `alt=""` and `role="presentation"`/`"none"` mark decorative images, which are
 * exempt. Alt text of only whitespace is not `alt=""` and counts as missing.
 * Alt text that is just the image's file name is reported as minor.
 */
export class ImageAltRule extends BaseRule {
  constructor() {
    super({
      id: 'image-alt',
      category: 'images',
      description: 'Images have alternative text that is not a file name',
      severities: ['critical', 'minor'],
      wcag: ['1.1.1'],
    });
  }

  evaluate(tree: RenderedTree): Violation[] {
    const out: Violation[] = [];
    for (const img of tree.images) {
      if (img.role === 'presentation' || img.role === 'none') continue;

      if (img.alt === null) {
        out.push(
          this.violation(
            img.selector,
            'critical',
            'Image has no alt attribute',
            'Describe the image in an alt attribute, or use alt="" if it is decorative.',
          ),
        );
        continue;
      }

      const alt = img.alt.trim();
      if (alt === '' && img.alt !== '') {
        out.push(
          this.violation(
            img.selector,
            'critical',
            'Image alt text is blank',
            'Describe the image in the alt attribute, or use alt="" if it is decorative.',
          ),
        );
        continue;
      }

      if (FILE_NAME.test(alt)) {
        out.push(
          this.violation(
            img.selector,
            'minor',
            `Alt text "${alt}" looks like a file name`,
            'Replace the file name with a description of what the image shows.',
          ),
        );
      }
    }
    return out;
  }
}
