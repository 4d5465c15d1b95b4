import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

import { evaluateRules, type RuleRegistry } from '@accessaudit/rules';

import { AuditError, InvalidTargetError, InvalidViolationError, toError } from '../errors.js';
import type { DOMExtractor } from '../extraction/DOMExtractor.js';
import { findPdfLinks } from '../extraction/pdfLinks.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { PdfAuditor } from '../pdf/PdfAuditor.js';
import type { BrowserContextPool } from '../render/BrowserContextPool.js';
import type { RenderingController } from '../render/RenderingController.js';
import { ScoreAggregator } from '../scoring/ScoreAggregator.js';
import type { ReportStore } from '../store/ReportStore.js';
import { scoringKindOf, type AuditFailure, type AuditResult, type AuditStatus } from '../types/audit.js';
import type { RenderedTree } from '../types/extraction.js';
import type { AuditTarget, TargetDescriptor } from '../types/target.js';
import type { CheckToggles, SkippedCheck, Violation } from '../types/violation.js';
import { createDeadline, raceAbort, type Deadline } from '../utils/deadline.js';
import { fetchPdf as fetchPdfOverHttp, type FetchedPdf } from '../utils/fetchDocument.js';
import { sha256Hex } from '../utils/hash.js';
import { runWithConcurrency } from '../utils/queue.js';

import type {
  AuditOutcome,
  AuditorEventMap,
  AuditorEventName,
  AuditRunOptions,
  TicketState,
} from './types.js';

const MAX_FINISHED_TICKETS = 1_000;

export interface AuditorOptions {
  store: ReportStore;
  renderer: RenderingController;
  pdfAuditor: PdfAuditor;
  htmlExtractor: DOMExtractor;

  /** Closed by `close()`. */
  pool?: BrowserContextPool;
  aggregator?: ScoreAggregator;

  /** Web rules; defaults to the built-in catalogue. */
  rules?: RuleRegistry;
  checks?: CheckToggles;

  renderTimeoutMs: number;
  runDeadlineMs: number;

  /** Parallel runs in `auditMany`. */
  concurrency?: number;

  /** Downloads linked PDFs for `auditLinkedPdfs`. */
  fetchPdf?: (url: string) => Promise<FetchedPdf>;

  logger?: Logger;
  now?: () => Date;
}

interface Evaluation {
  violations: Violation[];
  skipped: SkippedCheck[];
  linkedPdfs?: string[];
  error?: AuditFailure;
}

/**
 * Runs audits end to end: extract, evaluate, score, persist.
 *
 * Emits `start`, `render:complete`, `evaluate:complete`, `score`, `saved` and
 * `complete` (payloads in `AuditorEventMap`).
 */
export class Auditor extends EventEmitter {
  private readonly store: ReportStore;
  private readonly renderer: RenderingController;
  private readonly pdfAuditor: PdfAuditor;
  private readonly htmlExtractor: DOMExtractor;
  private readonly pool: BrowserContextPool | undefined;
  private readonly aggregator: ScoreAggregator;
  private readonly rules: RuleRegistry | undefined;
  private readonly checks: CheckToggles;
  private readonly renderTimeoutMs: number;
  private readonly runDeadlineMs: number;
  private readonly concurrency: number;
  private readonly fetchPdf: (url: string) => Promise<FetchedPdf>;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly tickets = new Map<string, TicketState>();

  constructor(options: AuditorOptions) {
    super();
    this.store = options.store;
    this.renderer = options.renderer;
    this.pdfAuditor = options.pdfAuditor;
    this.htmlExtractor = options.htmlExtractor;
    this.pool = options.pool;
    this.aggregator = options.aggregator ?? new ScoreAggregator();
    this.rules = options.rules;
    this.checks = options.checks ?? {};
    this.renderTimeoutMs = options.renderTimeoutMs;
    this.runDeadlineMs = options.runDeadlineMs;
    this.concurrency = options.concurrency ?? 1;
    this.fetchPdf = options.fetchPdf ?? ((url) => fetchPdfOverHttp(url));
    this.logger = (options.logger ?? silentLogger()).child({ component: 'auditor' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Audit one target and persist the run.
   *
   * Audit failures (timeouts, crashes, unreadable PDFs, deadline expiry) are
   * recorded as a `failed` run. Malformed targets throw `InvalidTargetError`
   * before a run starts; persistence failures throw `StoreWriteFailureError`.
   */
  async audit(target: AuditTarget, options: AuditRunOptions = {}): Promise<AuditOutcome> {
    validateTarget(target);

    const descriptor = describeTarget(target);
    const startedAt = this.now();
    this.logger.info({ target: label(descriptor) }, 'audit started');
    this.notify('start', { target: descriptor });

    const deadline = createDeadline(options.deadlineMs ?? this.runDeadlineMs, options.signal);
    let evaluation: Evaluation;
    try {
      evaluation = await raceAbort(this.evaluate(target, descriptor, deadline), deadline.signal);
    } catch (error) {
      evaluation = { violations: [], skipped: [], error: this.toFailure(error, descriptor) };
    } finally {
      deadline.dispose();
    }

    const status: AuditStatus = evaluation.error ? 'failed' : evaluation.skipped.length > 0 ? 'partial' : 'ok';
    const score = evaluation.error ? 0 : this.aggregator.score(evaluation.violations, scoringKindOf(descriptor));
    this.notify('score', { target: descriptor, score, status });

    const result: AuditResult = {
      schemaVersion: 1,
      target: descriptor,
      violations: evaluation.violations,
      score,
      status,
      startedAt: startedAt.toISOString(),
      finishedAt: this.now().toISOString(),
      skippedChecks: evaluation.skipped,
    };
    if (evaluation.error) result.error = evaluation.error;
    if (evaluation.linkedPdfs && evaluation.linkedPdfs.length > 0) result.linkedPdfs = evaluation.linkedPdfs;

    const artifact = await this.store.save(result);
    this.notify('saved', artifact);

    this.logger.info({ runId: artifact.runId, score, status }, 'audit finished');
    const outcome: AuditOutcome = { result, artifact };
    this.notify('complete', outcome);
    return outcome;
  }

  /**
   * Start an audit in the background and return a ticket for `poll`.
   *
   * Throws `InvalidTargetError` synchronously for malformed targets.
   */
  submit(target: AuditTarget, options: AuditRunOptions = {}): string {
    validateTarget(target);

    const ticket = randomUUID();
    const submittedAt = this.now().toISOString();
    this.tickets.set(ticket, { ticket, state: 'running', submittedAt });

    void this.audit(target, options).then(
      ({ result, artifact }) => {
        this.finish({
          ticket,
          state: 'done',
          submittedAt,
          runId: artifact.runId,
          score: result.score,
          status: result.status,
        });
      },
      (error: unknown) => {
        const err = toError(error);
        this.logger.error({ ticket, err }, 'submitted audit failed');
        this.finish({ ticket, state: 'error', submittedAt, error: describeError(err) });
      },
    );

    return ticket;
  }

  poll(ticket: string): TicketState | undefined {
    return this.tickets.get(ticket);
  }

  /**
   * Audit several targets, `concurrency` at a time. Every target is attempted;
   * the outcome of each is returned in input order.
   */
  auditMany(
    targets: readonly AuditTarget[],
    options: AuditRunOptions & {
      concurrency?: number;
      onProgress?: (info: { completed: number; total: number }) => void;
    } = {},
  ): Promise<Array<PromiseSettledResult<AuditOutcome>>> {
    const { concurrency, onProgress, ...runOptions } = options;
    return runWithConcurrency({
      items: targets,
      concurrency: concurrency ?? this.concurrency,
      worker: (target) => this.audit(target, runOptions),
      onProgress,
    });
  }

  /**
   * Download and audit the PDF documents a web run discovered, one run each.
   */
  auditLinkedPdfs(
    result: AuditResult,
    options: AuditRunOptions & { concurrency?: number } = {},
  ): Promise<Array<PromiseSettledResult<AuditOutcome>>> {
    const { concurrency, ...runOptions } = options;
    return runWithConcurrency({
      items: result.linkedPdfs ?? [],
      concurrency: concurrency ?? this.concurrency,
      worker: async (url) => {
        const { bytes, filename } = await this.fetchPdf(url);
        return this.audit({ kind: 'pdf', bytes, filename }, runOptions);
      },
    });
  }

  async close(): Promise<void> {
    await this.pool?.close();
  }

  private async evaluate(target: AuditTarget, descriptor: TargetDescriptor, deadline: Deadline): Promise<Evaluation> {
    if (target.kind === 'pdf') {
      const { violations, skipped } = await this.pdfAuditor.audit(target.bytes, target.filename);
      deadline.signal.throwIfAborted();
      this.notify('evaluate:complete', { target: descriptor, violations: violations.length, skipped: skipped.length });
      return { violations, skipped };
    }

    const tree =
      target.kind === 'web'
        ? await this.renderWithRetry(target.url, deadline)
        : await this.htmlExtractor.extract(target.html);
    deadline.signal.throwIfAborted();
    this.notify('render:complete', { target: descriptor, settled: tree.settled });

    const { violations, skipped } = evaluateRules(tree, {
      checks: this.checks,
      registry: this.rules,
      onRuleError: (ruleId, err) => this.logger.error({ ruleId, err }, 'rule crashed'),
    });
    this.notify('evaluate:complete', { target: descriptor, violations: violations.length, skipped: skipped.length });

    return { violations, skipped, linkedPdfs: findPdfLinks(tree) };
  }

  private async renderWithRetry(url: string, deadline: Deadline): Promise<RenderedTree> {
    const attempt = (): Promise<RenderedTree> =>
      this.renderer.render(url, Math.min(this.renderTimeoutMs, deadline.remainingMs()), {
        signal: deadline.signal,
      });

    try {
      return await attempt();
    } catch (error) {
      const retriable = error instanceof AuditError && error.retriable;
      if (!retriable || deadline.signal.aborted || deadline.remainingMs() <= 0) throw error;

      this.logger.warn({ url, err: toError(error) }, 'render failed; retrying with a fresh context');
      return attempt();
    }
  }

  private toFailure(error: unknown, descriptor: TargetDescriptor): AuditFailure {
    if (error instanceof InvalidViolationError) throw error;

    const err = toError(error);
    if (err instanceof AuditError) {
      this.logger.warn({ target: label(descriptor), code: err.code, err }, 'audit failed');
    } else {
      this.logger.error({ target: label(descriptor), err }, 'audit crashed');
    }
    return describeError(err);
  }

  private finish(state: TicketState): void {
    this.tickets.set(state.ticket, state);

    let finished = 0;
    for (const entry of this.tickets.values()) if (entry.state !== 'running') finished += 1;
    for (const [ticket, entry] of this.tickets) {
      if (finished <= MAX_FINISHED_TICKETS) break;
      if (entry.state === 'running') continue;
      this.tickets.delete(ticket);
      finished -= 1;
    }
  }

  private notify<K extends AuditorEventName>(event: K, payload: AuditorEventMap[K]): void {
    this.emit(event, payload);
  }
}

/**
 * Reject targets that cannot start a run.
 */
export function validateTarget(target: AuditTarget): void {
  switch (target.kind) {
    case 'web': {
      let parsed: URL;
      try {
        parsed = new URL(target.url);
      } catch (error) {
        throw new InvalidTargetError(`Not a valid URL: ${target.url}`, { cause: error });
      }
      if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        throw new InvalidTargetError(`Unsupported URL scheme: ${parsed.protocol}`);
      }
      return;
    }
    case 'pdf':
      if (!target.filename.trim()) throw new InvalidTargetError('A PDF upload needs a filename');
      if (target.bytes.byteLength === 0) throw new InvalidTargetError(`${target.filename} is empty`);
      return;
    case 'html':
      if (!target.filename.trim()) throw new InvalidTargetError('An HTML document needs a filename');
      if (!target.html.trim()) throw new InvalidTargetError(`${target.filename} is empty`);
      return;
  }
}

/**
 * What a run records about its target. Document content is reduced to size
 * and digest.
 */
export function describeTarget(target: AuditTarget): TargetDescriptor {
  switch (target.kind) {
    case 'web':
      return { kind: 'web', url: target.url };
    case 'pdf':
      return {
        kind: 'pdf',
        filename: target.filename,
        byteLength: target.bytes.byteLength,
        sha256: sha256Hex(target.bytes),
      };
    case 'html': {
      const bytes = new TextEncoder().encode(target.html);
      return { kind: 'html', filename: target.filename, byteLength: bytes.byteLength, sha256: sha256Hex(bytes) };
    }
  }
}

function describeError(error: Error): AuditFailure {
  return { code: error instanceof AuditError ? error.code : 'internal-error', message: error.message };
}

function label(target: TargetDescriptor): string {
  return target.kind === 'web' ? target.url : target.filename;
}
