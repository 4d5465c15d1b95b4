import type { RenderedTree, Violation } from '@accessaudit/core/types';
import {
  calculateContrastRatio,
  formatRatio,
  parseColor,
  requiredContrastRatio,
  toHex,
} from '@accessaudit/core/utils';

import { BaseRule } from '../../BaseRule.js';

/**
 * Text contrast from computed styles.
 *
 * Samples over background images are ignored: their effective background is
 * unknown without pixel sampling.
 */
export class ColorContrastRule extends BaseRule {
  constructor() {
    super({
      id: 'color-contrast',
      category: 'contrast',
      description: 'Text contrasts at least 4.5:1 with its background (3:1 for large text)',
      severities: ['serious'],
      wcag: ['1.4.3'],
    });
  }

  evaluate(tree: RenderedTree): Violation[] {
    const samples = this.require(tree.contrast, 'computed contrast was not collected');
    const out: Violation[] = [];

    for (const sample of samples) {
      if (sample.hasBackgroundImage) continue;
      const fg = parseColor(sample.color);
      const bg = parseColor(sample.backgroundColor);
      if (!fg || !bg) continue;

      const ratio = calculateContrastRatio(fg, bg);
      const required = requiredContrastRatio(sample.fontSizePx, sample.fontWeight);
      if (ratio >= required) continue;

      out.push(
        this.violation(
          sample.selector,
          'serious',
          `Text contrast ${formatRatio(ratio)} is below ${formatRatio(required)} (${toHex(fg)} on ${toHex(bg)})`,
          'Darken the text or lighten the background.',
        ),
      );
    }
    return out;
  }
}
