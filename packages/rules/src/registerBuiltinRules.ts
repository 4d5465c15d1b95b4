import type { RuleRegistry } from './RuleRegistry.js';

import { DocumentLangRule } from './rules/language/DocumentLangRule.js';
import { ImageAltRule } from './rules/alt-text/ImageAltRule.js';
import { FormLabelRule } from './rules/form-labels/FormLabelRule.js';
import { HeadingOrderRule } from './rules/headings/HeadingOrderRule.js';
import { LinkNameRule } from './rules/link-text/LinkNameRule.js';
import { ColorContrastRule } from './rules/contrast/ColorContrastRule.js';
import { AxeRule } from './rules/axe/AxeRule.js';

/**
 * Register all built-in rules into a registry, in catalogue order.
 */
export function registerBuiltinRules(registry: RuleRegistry): void {
  registry.register(new DocumentLangRule());
  registry.register(new ImageAltRule());
  registry.register(new FormLabelRule());
  registry.register(new HeadingOrderRule());
  registry.register(new LinkNameRule());
  registry.register(new ColorContrastRule());
  registry.register(new AxeRule());
}
