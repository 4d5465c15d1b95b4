export * from './types/index.js';
export * from './errors.js';
export * from './config/index.js';
export { createLogger, silentLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';

export { Auditor, describeTarget, validateTarget } from './auditor/Auditor.js';
export type { AuditorOptions } from './auditor/Auditor.js';
export { createAuditor } from './auditor/createAuditor.js';
export type { CreateAuditorDeps } from './auditor/createAuditor.js';
export type {
  AuditOutcome,
  AuditorEventMap,
  AuditorEventName,
  AuditRunOptions,
  TicketState,
} from './auditor/types.js';

export { BrowserContextPool } from './render/BrowserContextPool.js';
export type { BrowserContextPoolOptions, ContextLease, PoolStats } from './render/BrowserContextPool.js';
export { RenderingController } from './render/RenderingController.js';
export type { RenderingControllerOptions, RenderOptions } from './render/RenderingController.js';
export { PlaywrightLauncher } from './render/playwright.js';
export type { PlaywrightLauncherOptions } from './render/playwright.js';
export type * from './render/types.js';

export { AxeRunner } from './axe/AxeRunner.js';
export { impactToSeverity, normalizeAxeResults } from './axe/normalize.js';
export { DOMExtractor } from './extraction/DOMExtractor.js';
export type { DOMExtractorOptions } from './extraction/DOMExtractor.js';
export { findPdfLinks } from './extraction/pdfLinks.js';

export { PdfAuditor } from './pdf/PdfAuditor.js';
export type { PdfAuditorOptions } from './pdf/PdfAuditor.js';
export { pdfCheckMetadata } from './pdf/checks.js';

export {
  compareRuns,
  countBySeverity,
  rankRuns,
  ScoreAggregator,
  toGrade,
} from './scoring/ScoreAggregator.js';
export type { RankableRun, ScoreScale } from './scoring/ScoreAggregator.js';

export { ReportStore, summarize, toReportPayload } from './store/ReportStore.js';
export type { ReportStoreOptions } from './store/ReportStore.js';
export { formatRunId, isRunId, runIdTime } from './store/runId.js';
export { RetentionSweeper } from './retention/RetentionSweeper.js';
export type { ArchiveManifest, RetentionSweeperOptions, SweepReport } from './retention/RetentionSweeper.js';

export { ReportGenerator, targetLabel } from './reporting/ReportGenerator.js';
export type { ConsoleReportOptions, JsonReportOptions } from './reporting/ReportGenerator.js';

export { fetchPdf, filenameFromUrl } from './utils/fetchDocument.js';
export type { FetchDocumentOptions, FetchedPdf } from './utils/fetchDocument.js';
export { createDeadline } from './utils/deadline.js';
export type { Deadline } from './utils/deadline.js';
export { runWithConcurrency } from './utils/queue.js';
export * from './utils/index.js';
