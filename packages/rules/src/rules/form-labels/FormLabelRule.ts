import type { FormFieldNode, RenderedTree, Violation } from '@accessaudit/core/types';

import { BaseRule } from '../../BaseRule.js';

// Not rendered, or labelled by their own value.
const EXEMPT_TYPES = new Set(['hidden', 'submit', 'reset', 'button', 'image']);

function hasText(value: string | null): boolean {
  return value !== null && value.trim() !== '';
}

export function hasAccessibleLabel(field: FormFieldNode): boolean {
  return (
    hasText(field.labelText) ||
    field.wrappedInLabel ||
    hasText(field.ariaLabel) ||
    hasText(field.ariaLabelledByText) ||
    hasText(field.title)
  );
}

/**
 * Form fields are labelled.
 */
export class FormLabelRule extends BaseRule {
  constructor() {
    super({
      id: 'form-label',
      category: 'forms',
      description: 'Form fields have a label, aria-label, aria-labelledby or title',
      severities: ['critical'],
      wcag: ['1.3.1', '4.1.2'],
    });
  }

  evaluate(tree: RenderedTree): Violation[] {
    return tree.formFields
      .filter((field) => !EXEMPT_TYPES.has(field.type) && !hasAccessibleLabel(field))
      .map((field) =>
        this.violation(
          field.selector,
          'critical',
          field.name ? `Form field "${field.name}" has no label` : 'Form field has no label',
          'Associate a <label for> with the field, or give it an aria-label.',
        ),
      );
  }
}
