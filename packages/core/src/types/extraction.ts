import type { AxeFinding } from './axe.js';

/**
 * Generic element snapshot.
 *
 * Every element a check can point at carries a best-effort CSS selector that
 * doubles as the violation locator.
 */
export interface ElementSnapshot {
  /** Unique-ish CSS selector for the element. */
  selector: string;

  /** Lowercased tag name (e.g., `img`, `a`). */
  tagName: string;

  /** Explicit `role` attribute, or the implicit role of the tag. */
  role: string | null;

  /** Text content (normalized whitespace, truncated). */
  textContent: string;
}

/**
 * Snapshot for `<img>` elements.
 */
export interface ImageNode extends ElementSnapshot {
  src: string;

  /** The `alt` attribute value if present (may be empty). */
  alt: string | null;
}

/**
 * Snapshot for `<a href>` elements.
 */
export interface LinkNode extends ElementSnapshot {
  href: string | null;

  /** Computed accessible name (text, aria-label, labelledby, image alts, title). */
  accessibleName: string;
}

/**
 * Snapshot for a single form control (`input`, `select`, `textarea`).
 */
export interface FormFieldNode extends ElementSnapshot {
  name: string | null;

  /** Input type; `select`/`textarea` for those elements. */
  type: string;

  /** Text of `<label for>` references. */
  labelText: string | null;

  /** Whether the control sits inside a `<label>`. */
  wrappedInLabel: boolean;

  ariaLabel: string | null;

  /** Resolved text of `aria-labelledby` references. */
  ariaLabelledByText: string | null;

  title: string | null;
}

/**
 * Snapshot for headings (`h1`-`h6` and `role="heading"`).
 */
export interface HeadingNode extends ElementSnapshot {
  level: number;
}

/**
 * Computed colors of one text-bearing element.
 */
export interface ContrastSample {
  selector: string;

  /** Text excerpt for reporting. */
  text: string;

  /** Computed CSS `color`. */
  color: string;

  /** First non-transparent ancestor background, or `rgb(255, 255, 255)`. */
  backgroundColor: string;

  /** Set when an ancestor paints a background image; the ratio is then unknown. */
  hasBackgroundImage: boolean;

  fontSizePx: number;

  fontWeight: number;
}

/**
 * Serializable output of the in-page snapshot script.
 */
export interface PageSnapshot {
  pageTitle: string;

  /** `<html lang>` (or `xml:lang`); `null` when absent. */
  pageLanguage: string | null;

  images: ImageNode[];
  links: LinkNode[];
  formFields: FormFieldNode[];
  headings: HeadingNode[];

  /** Only filled when contrast collection was requested. */
  contrast: ContrastSample[];
}

/**
 * Accessibility-relevant snapshot of a rendered document.
 */
export interface RenderedTree extends Omit<PageSnapshot, 'contrast'> {
  /** URL the snapshot was taken from; `null` for HTML documents. */
  url: string | null;

  /** Whether the network went idle before the settle ceiling. */
  settled: boolean;

  /** Computed contrast samples; `null` when contrast was not collected. */
  contrast: ContrastSample[] | null;

  /**
   * axe-core findings: `undefined` when axe was not requested, `null` when it
   * was requested but could not run.
   */
  axe?: AxeFinding[] | null;
}
