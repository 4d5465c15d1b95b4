import type { PDFDocument } from 'pdf-lib';

import { EvaluatorPartialError, InvalidViolationError, toError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { CheckToggles, EvaluationResult, SkippedCheck, Violation } from '../types/violation.js';
import { assertViolation, isCheckEnabled, sortViolations } from '../utils/violations.js';

import { PDF_CHECKS, type PdfCheck, type PdfModel, type PdfPage } from './checks.js';
import { interpretContent } from './content.js';
import {
  collectFonts,
  documentLanguage,
  documentTitle,
  loadPdf,
  pageOperations,
  pdfResources,
} from './document.js';
import { readStructureTree } from './structure.js';

export interface PdfAuditorOptions {
  checks?: CheckToggles;
  logger?: Logger;
}

/**
 * Audits the structure of a PDF: tags, metadata, fonts and page content.
 *
 * Throws `UnreadablePdfError` when the bytes are not a PDF at all. Pages whose
 * content cannot be decoded make the content-based checks partial.
 */
export class PdfAuditor {
  private readonly checks: readonly PdfCheck[];
  private readonly logger: Logger;

  constructor(options: PdfAuditorOptions = {}) {
    this.checks = PDF_CHECKS.filter((check) => isCheckEnabled(options.checks, check.id));
    this.logger = (options.logger ?? silentLogger()).child({ component: 'pdf-auditor' });
  }

  async audit(bytes: Uint8Array, filename: string): Promise<EvaluationResult> {
    const doc = await loadPdf(bytes, filename);
    const { model, unreadable } = this.buildModel(doc);

    const violations: Violation[] = [];
    const skipped: SkippedCheck[] = [];

    for (const check of this.checks) {
      try {
        violations.push(...check.run(model).map(assertViolation));
      } catch (error) {
        if (error instanceof EvaluatorPartialError) {
          skipped.push({ checkId: check.id, reason: error.message });
          continue;
        }
        if (error instanceof InvalidViolationError) throw error;
        this.logger.error({ check: check.id, err: toError(error) }, 'pdf check crashed');
        skipped.push({ checkId: check.id, reason: `check failed: ${toError(error).message}` });
        continue;
      }

      const applies = !check.taggedOnly || model.structure !== null;
      if (check.usesContent && applies && unreadable) skipped.push({ checkId: check.id, reason: unreadable });
    }

    this.logger.debug(
      { filename, pages: model.pages.length, violations: violations.length, skipped: skipped.length },
      'pdf audited',
    );
    return { violations: sortViolations(violations), skipped };
  }

  private buildModel(doc: PDFDocument): { model: PdfModel; unreadable: string | null } {
    const failed: number[] = [];
    const pages: PdfPage[] = doc.getPages().map((page, index) => {
      if (doc.isEncrypted) return { number: index + 1, content: null };
      try {
        const content = interpretContent(pageOperations(page), pdfResources(page.node.Resources()));
        return { number: index + 1, content };
      } catch (error) {
        this.logger.warn({ page: index + 1, err: toError(error) }, 'page content could not be decoded');
        failed.push(index + 1);
        return { number: index + 1, content: null };
      }
    });

    let unreadable: string | null = null;
    if (doc.isEncrypted) unreadable = 'document is encrypted; page content cannot be read';
    else if (failed.length > 0) {
      unreadable = `content of page${failed.length > 1 ? 's' : ''} ${failed.join(', ')} could not be decoded`;
    }

    const parts: PdfModel['unreadable'] = {};
    const fonts = this.readPart('fonts', () => collectFonts(doc.getPages()));
    if (fonts === undefined) parts.fonts = 'font resources could not be read';
    const structure = this.readPart('structure', () => readStructureTree(doc));
    if (structure === undefined) parts.structure = 'structure tree could not be read';

    return {
      model: {
        language: this.readPart('language', () => documentLanguage(doc)) ?? null,
        title: this.readPart('title', () => documentTitle(doc)) ?? null,
        fonts: fonts ?? [],
        structure: structure ?? null,
        pages,
        unreadable: parts,
      },
      unreadable,
    };
  }

  /** `undefined` when the part is malformed beyond what its reader tolerates. */
  private readPart<T>(part: string, read: () => T): T | undefined {
    try {
      return read();
    } catch (error) {
      this.logger.warn({ part, err: toError(error) }, 'pdf part could not be read');
      return undefined;
    }
  }
}
