import { AxeRunner } from '../axe/AxeRunner.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { AxeFinding } from '../types/axe.js';
import type { RenderedTree } from '../types/extraction.js';
import { toError } from '../errors.js';

import { snapshotPage, toRenderedTree } from './fromPage.js';
import { createJsdomPage, type JsdomPage } from './jsdomPage.js';

/**
 * Runtime options for HTML extraction.
 */
export interface DOMExtractorOptions {
  /** Maximum length of stored text content. */
  maxTextLength?: number;

  /** Run axe-core against the parsed document as well. */
  runAxe?: boolean;

  logger?: Logger;
}

/**
 * Extracts the accessibility snapshot of an HTML document without a browser.
 *
 * jsdom performs no layout or cascade, so computed contrast is never collected
 * for HTML documents and contrast checks report as skipped.
 */
export class DOMExtractor {
  private readonly maxTextLength: number | undefined;
  private readonly runAxe: boolean;
  private readonly logger: Logger;

  constructor(options: DOMExtractorOptions = {}) {
    this.maxTextLength = options.maxTextLength;
    this.runAxe = options.runAxe ?? false;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'dom-extractor' });
  }

  async extract(html: string): Promise<RenderedTree> {
    const page = createJsdomPage(html);
    try {
      const snapshot = await snapshotPage(page, {
        collectContrast: false,
        maxTextLength: this.maxTextLength,
      });
      const axe = this.runAxe ? await this.collectAxe(page) : undefined;
      return toRenderedTree(snapshot, { url: null, settled: true, contrastCollected: false, axe });
    } finally {
      page.close();
    }
  }

  private async collectAxe(page: JsdomPage): Promise<AxeFinding[] | null> {
    try {
      return await new AxeRunner().runOnPage(page, { disableCanvas: true });
    } catch (error) {
      this.logger.warn({ err: toError(error) }, 'axe-core did not run');
      return null;
    }
  }
}
