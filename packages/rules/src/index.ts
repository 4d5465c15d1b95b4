export * from './types.js';
export * from './RuleRegistry.js';
export * from './BaseRule.js';
export * from './evaluator.js';
export * from './registerBuiltinRules.js';
export * from './createRule.js';
export * from './metadata.js';

export * from './rules/language/DocumentLangRule.js';
export * from './rules/alt-text/ImageAltRule.js';
export * from './rules/form-labels/FormLabelRule.js';
export * from './rules/headings/HeadingOrderRule.js';
export * from './rules/link-text/LinkNameRule.js';
export * from './rules/contrast/ColorContrastRule.js';
export * from './rules/axe/AxeRule.js';
