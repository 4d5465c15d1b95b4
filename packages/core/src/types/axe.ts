import type { RunOptions } from 'axe-core';

import type { ViolationSeverity } from './violation.js';

/**
 * Supported audit standards/tags for axe-core.
 *
 * These map to axe-core "tags" used in `runOnly`.
 */
export type AxeStandard = 'wcag2a' | 'wcag2aa' | 'wcag21aa' | 'wcag22aa' | 'section508';

/**
 * Configuration for running axe-core.
 */
export interface AxeRunConfig {
  /**
   * Tag sets to run. Defaults to WCAG 2.x A and AA.
   */
  standards?: AxeStandard[];

  /**
   * Rule enable/disable overrides, passed through to axe as `rules`.
   */
  rules?: RunOptions['rules'];
}

/**
 * A single normalized axe-core finding tied to a specific element.
 */
export interface AxeFinding {
  /** axe rule id (e.g., `image-alt`, `color-contrast`). */
  id: string;

  /** Normalized severity. */
  severity: ViolationSeverity;

  /** Human-readable help text. */
  help: string;

  /** Element selector for the violating node (best-effort). */
  selector: string;

  /** WCAG tags (`wcag111`, ...) attached to the rule. */
  tags: string[];
}
