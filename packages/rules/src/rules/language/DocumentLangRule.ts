import type { RenderedTree, Violation } from '@accessaudit/core/types';

import { BaseRule } from '../../BaseRule.js';

/**
 * Best-effort BCP 47 shape check: language[-script][-region][-variant...].
 */
export function bcp47LooksValid(lang: string): boolean {
  return /^[a-zA-Z]{2,3}(-[a-zA-Z]{4})?(-(?:[a-zA-Z]{2}|\d{3}))?(-(?:[a-zA-Z0-9]{5,8}|\d[a-zA-Z0-9]{3}))*$/.test(lang);
}

/**
 * The document declares its natural language on `<html>`.
 */
export class DocumentLangRule extends BaseRule {
  constructor() {
    super({
      id: 'document-lang',
      category: 'language',
      description: 'Document declares a valid language on <html lang>',
      severities: ['serious', 'moderate'],
      wcag: ['3.1.1'],
    });
  }

  evaluate(tree: RenderedTree): Violation[] {
    const lang = tree.pageLanguage?.trim() ?? '';
    if (!lang) {
      return [
        this.violation(
          'html',
          'serious',
          'Document has no lang attribute',
          'Set <html lang="en"> (or the appropriate language tag).',
        ),
      ];
    }
    if (!bcp47LooksValid(lang)) {
      return [
        this.violation(
          'html',
          'moderate',
          `Document language "${lang}" is not a valid BCP 47 tag`,
          'Use a valid BCP 47 language tag (e.g., "en", "en-US").',
        ),
      ];
    }
    return [];
  }
}
