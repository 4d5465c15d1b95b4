import { EvaluatorPartialError } from '../errors.js';
import type { CheckMetadata, Violation, ViolationSeverity } from '../types/violation.js';
import {
  calculateContrastRatio,
  formatRatio,
  requiredContrastRatio,
  toHex,
  WHITE,
} from '../utils/color.js';

import type { PageContent } from './content.js';
import type { FontInfo } from './document.js';
import type { StructureTree } from './structure.js';

export interface PdfPage {
  /** 1-based page number. */
  number: number;

  /** `null` when the content stream could not be decoded. */
  content: PageContent | null;
}

/**
 * Everything the PDF checks look at, extracted once per document.
 */
export interface PdfModel {
  language: string | null;
  title: string | null;
  fonts: FontInfo[];

  /** `null` for untagged documents, and for tagged ones whose tree could not be read. */
  structure: StructureTree | null;
  pages: PdfPage[];

  /** Why a part of the document could not be read, keyed by part. */
  unreadable: Partial<Record<PdfModelPart, string>>;
}

export type PdfModelPart = 'fonts' | 'structure';

function requirePart(check: PdfCheck, model: PdfModel, part: PdfModelPart): void {
  const reason = model.unreadable[part];
  if (reason) throw new EvaluatorPartialError(check.id, reason);
}

export interface PdfCheck extends CheckMetadata {
  /** Reads page content streams; skipped for pages that cannot be decoded. */
  usesContent: boolean;

  /** Only meaningful for tagged documents; untagged ones are not checked at all. */
  taggedOnly: boolean;
  run(model: PdfModel): Violation[];
}

/** Points to CSS pixels, for the WCAG large-text threshold. */
const PX_PER_PT = 4 / 3;

/** Tolerance, in points, before a structure step counts as moving up the page. */
const LAYOUT_TOLERANCE = 2;

function finding(
  check: Pick<PdfCheck, 'id' | 'wcag'>,
  severity: ViolationSeverity,
  message: string,
  locator: string,
  suggestion?: string,
): Violation {
  const violation: Violation = { ruleId: check.id, severity, message, locator, source: 'pdf' };
  if (check.wcag.length > 0) violation.wcag = check.wcag;
  if (suggestion) violation.suggestion = suggestion;
  return violation;
}

const taggedCheck: PdfCheck = {
  id: 'pdf-tagged',
  source: 'pdf',
  description: 'Document carries a structure tree (is tagged)',
  severities: ['critical'],
  wcag: ['1.3.1'],
  usesContent: false,
  taggedOnly: false,
  run(model) {
    if (model.structure || model.unreadable.structure) return [];
    return [
      finding(
        this,
        'critical',
        'Document is not tagged; assistive technology cannot determine its structure',
        'document',
        'Export the document again with tagging (accessibility structure) enabled.',
      ),
    ];
  },
};

const figureAltCheck: PdfCheck = {
  id: 'pdf-figure-alt',
  source: 'pdf',
  description: 'Figures have alternate text (/Alt or /ActualText)',
  severities: ['critical'],
  wcag: ['1.1.1'],
  usesContent: false,
  taggedOnly: true,
  run(model) {
    requirePart(this, model, 'structure');
    if (!model.structure) return [];
    return model.structure.elements
      .filter((el) => el.role === 'Figure' && !el.alt?.trim() && !el.actualText?.trim())
      .map((el) =>
        finding(
          this,
          'critical',
          'Figure has no alternate text',
          el.pageIndex === null ? el.path : `page ${el.pageIndex + 1} > ${el.path}`,
          'Add alternate text to the figure, or mark it as an artifact if it is decorative.',
        ),
      );
  },
};

const fontEmbeddingCheck: PdfCheck = {
  id: 'pdf-font-embedding',
  source: 'pdf',
  description: 'Fonts are embedded (Type 3 fonts are exempt)',
  severities: ['moderate'],
  wcag: [],
  usesContent: false,
  taggedOnly: false,
  run(model) {
    requirePart(this, model, 'fonts');
    return model.fonts
      .filter((font) => !font.embedded && font.subtype !== 'Type3')
      .map((font) =>
        finding(
          this,
          'moderate',
          `Font ${font.name} is not embedded; text may not render or extract reliably`,
          `font ${font.name} (page ${font.firstPage})`,
          'Embed all fonts when exporting the document.',
        ),
      );
  },
};

const documentLangCheck: PdfCheck = {
  id: 'pdf-document-lang',
  source: 'pdf',
  description: 'Document declares its natural language',
  severities: ['serious'],
  wcag: ['3.1.1'],
  usesContent: false,
  taggedOnly: false,
  run(model) {
    if (model.language) return [];
    return [
      finding(
        this,
        'serious',
        'Document language is not set',
        'document',
        'Set the document language in the document properties.',
      ),
    ];
  },
};

const titleCheck: PdfCheck = {
  id: 'pdf-title',
  source: 'pdf',
  description: 'Document has title metadata',
  severities: ['minor'],
  wcag: ['2.4.2'],
  usesContent: false,
  taggedOnly: false,
  run(model) {
    if (model.title) return [];
    return [
      finding(this, 'minor', 'Document has no title metadata', 'document', 'Set a descriptive document title.'),
    ];
  },
};

const readingOrderCheck: PdfCheck = {
  id: 'pdf-reading-order',
  source: 'pdf',
  description: 'Structure order follows the visual layout of each page',
  severities: ['moderate'],
  wcag: ['1.3.2'],
  usesContent: true,
  taggedOnly: true,
  run(model) {
    requirePart(this, model, 'structure');
    const structure = model.structure;
    if (!structure) return [];

    const out: Violation[] = [];
    for (const page of model.pages) {
      if (!page.content) continue;

      const positions = new Map<number, { x: number; y: number }>();
      for (const run of page.content.textRuns) {
        if (run.mcid === null || run.artifact || positions.has(run.mcid)) continue;
        positions.set(run.mcid, { x: run.x, y: run.y });
      }

      const seen = new Set<number>();
      const sequence: Array<{ mcid: number; x: number; y: number }> = [];
      for (const ref of structure.markedContent) {
        if (ref.pageIndex !== page.number - 1 || seen.has(ref.mcid)) continue;
        seen.add(ref.mcid);
        const at = positions.get(ref.mcid);
        if (at) sequence.push({ mcid: ref.mcid, ...at });
      }

      for (let i = 1; i < sequence.length; i += 1) {
        const prev = sequence[i - 1];
        const next = sequence[i];
        if (!prev || !next) continue;
        // Moving up is fine when it also moves right: that is the next column.
        if (next.y > prev.y + LAYOUT_TOLERANCE && next.x <= prev.x + LAYOUT_TOLERANCE) {
          out.push(
            finding(
              this,
              'moderate',
              `Reading order on page ${page.number} jumps back up the page (marked content ${prev.mcid} is followed by ${next.mcid})`,
              `page ${page.number}`,
              'Reorder the tags so they follow the visual reading order.',
            ),
          );
          break;
        }
      }
    }
    return out;
  },
};

const imageOnlyPageCheck: PdfCheck = {
  id: 'pdf-image-only-page',
  source: 'pdf',
  description: 'Pages that paint images also carry text (not scanned images only)',
  severities: ['serious'],
  wcag: ['1.1.1', '1.4.5'],
  usesContent: true,
  taggedOnly: false,
  run(model) {
    return model.pages
      .filter((page) => page.content && page.content.imageCount > 0 && page.content.textRuns.length === 0)
      .map((page) =>
        finding(
          this,
          'serious',
          `Page ${page.number} contains images but no text; it is likely a scan`,
          `page ${page.number}`,
          'Run text recognition (OCR) on the page and tag the recognized text.',
        ),
      );
  },
};

const textContrastCheck: PdfCheck = {
  id: 'pdf-text-contrast',
  source: 'pdf',
  description: 'Text color contrasts at least 4.5:1 (3:1 for large text) with a white page',
  severities: ['serious'],
  wcag: ['1.4.3'],
  usesContent: true,
  taggedOnly: false,
  run(model) {
    const out: Violation[] = [];
    for (const page of model.pages) {
      const reported = new Set<string>();
      for (const run of page.content?.textRuns ?? []) {
        if (!run.visible || run.artifact || !run.color) continue;

        const ratio = calculateContrastRatio(run.color, WHITE);
        const required = requiredContrastRatio(run.fontSize * PX_PER_PT, 400);
        if (ratio >= required) continue;

        const hex = toHex(run.color);
        const key = `${hex}@${required}`;
        if (reported.has(key)) continue;
        reported.add(key);

        out.push(
          finding(
            this,
            'serious',
            `Text color ${hex} has a contrast ratio of ${formatRatio(ratio)} against a white page (needs ${formatRatio(required)})`,
            `page ${page.number}`,
            'Use a darker text color.',
          ),
        );
      }
    }
    return out;
  },
};

/**
 * PDF checks in catalogue order.
 */
export const PDF_CHECKS: readonly PdfCheck[] = [
  taggedCheck,
  figureAltCheck,
  fontEmbeddingCheck,
  documentLangCheck,
  titleCheck,
  readingOrderCheck,
  imageOnlyPageCheck,
  textContrastCheck,
];

/**
 * Metadata of the PDF checks, without their implementations.
 */
export function pdfCheckMetadata(): CheckMetadata[] {
  return PDF_CHECKS.map(({ id, source, description, severities, wcag }) => ({
    id,
    source,
    description,
    severities,
    wcag,
  }));
}
