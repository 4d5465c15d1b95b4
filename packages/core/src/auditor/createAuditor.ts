import type { RuleRegistry } from '@accessaudit/rules';

import type { EngineConfig } from '../config/schema.js';
import { DOMExtractor } from '../extraction/DOMExtractor.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { PdfAuditor } from '../pdf/PdfAuditor.js';
import { BrowserContextPool } from '../render/BrowserContextPool.js';
import { PlaywrightLauncher } from '../render/playwright.js';
import { RenderingController } from '../render/RenderingController.js';
import type { BrowserLauncher } from '../render/types.js';
import { ScoreAggregator } from '../scoring/ScoreAggregator.js';
import { ReportStore } from '../store/ReportStore.js';
import type { FetchedPdf } from '../utils/fetchDocument.js';

import { Auditor } from './Auditor.js';

export interface CreateAuditorDeps {
  /** Defaults to Chromium through playwright-core. */
  launcher?: BrowserLauncher;
  logger?: Logger;
  rules?: RuleRegistry;
  store?: ReportStore;
  fetchPdf?: (url: string) => Promise<FetchedPdf>;
}

/**
 * Wire an `Auditor` from resolved configuration.
 *
 * The browser is not launched until the first web audit.
 */
export function createAuditor(config: EngineConfig, deps: CreateAuditorDeps = {}): Auditor {
  const logger = deps.logger ?? createLogger(config.logging);

  const launcher =
    deps.launcher ??
    new PlaywrightLauncher({
      executablePath: config.browser.executablePath,
      headless: config.browser.headless,
    });
  const pool = new BrowserContextPool({
    launcher,
    size: config.browserPoolSize,
    acquireTimeoutMs: config.poolAcquireTimeoutMs,
    logger,
  });

  return new Auditor({
    store: deps.store ?? new ReportStore({ dataDir: config.dataDir, logger }),
    renderer: new RenderingController({
      pool,
      collectContrast: config.enableComputedContrast,
      runAxe: config.runAxe,
      settleMs: config.settleTimeoutMs,
      logger,
    }),
    pdfAuditor: new PdfAuditor({ checks: config.checks, logger }),
    htmlExtractor: new DOMExtractor({ runAxe: config.runAxe, logger }),
    pool,
    aggregator: new ScoreAggregator(config.scoreScale),
    rules: deps.rules,
    checks: config.checks,
    renderTimeoutMs: config.renderTimeoutMs,
    runDeadlineMs: config.runDeadlineMs,
    concurrency: config.browserPoolSize,
    fetchPdf: deps.fetchPdf,
    logger,
  });
}
