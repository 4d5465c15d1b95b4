import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { PDFDocument, PDFName } from 'pdf-lib';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { InvalidTargetError, StoreWriteFailureError } from '../errors.js';
import { DOMExtractor } from '../extraction/DOMExtractor.js';
import { PdfAuditor } from '../pdf/PdfAuditor.js';
import { BrowserContextPool } from '../render/BrowserContextPool.js';
import { RenderingController } from '../render/RenderingController.js';
import { ReportStore } from '../store/ReportStore.js';
import { FakeLauncher, type FakeRoute } from '../testing/fakeBrowser.js';
import type { CheckToggles } from '../types/violation.js';
import type { FetchedPdf } from '../utils/fetchDocument.js';
import { sha256Hex } from '../utils/hash.js';

import { Auditor } from './Auditor.js';

const HOME = 'https://example.test/';

const PAGE = `<!doctype html>
<html lang="en">
  <head><title>Home</title></head>
  <body>
    <h1>Welcome</h1>
    <a href="/guide.pdf">Visitor guide</a>
    <img src="/hero.png">
  </body>
</html>`;

const NO_CONTRAST: CheckToggles = { 'color-contrast': { enabled: false } };

async function untaggedPdf(): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.setTitle('Visitor guide');
  doc.setLanguage('en-GB');
  const page = doc.addPage([600, 800]);
  page.node.set(PDFName.of('Contents'), doc.context.register(doc.context.stream('0 0 1 rg 10 10 100 100 re f')));
  page.node.set(PDFName.of('Resources'), doc.context.obj({}));
  return doc.save();
}

describe('Auditor', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(path.join(tmpdir(), 'accessaudit-auditor-'));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  function setup(
    routes: Record<string, FakeRoute> = {},
    options: {
      checks?: CheckToggles;
      crashOnce?: Record<string, string>;
      store?: ReportStore;
      fetchPdf?: (url: string) => Promise<FetchedPdf>;
    } = {},
  ) {
    const launcher = new FakeLauncher({ routes, crashOnce: options.crashOnce });
    const pool = new BrowserContextPool({ launcher, size: 2, acquireTimeoutMs: 1_000 });
    const store = options.store ?? new ReportStore({ dataDir });
    const auditor = new Auditor({
      store,
      renderer: new RenderingController({ pool, collectContrast: false, settleMs: 50 }),
      pdfAuditor: new PdfAuditor(),
      htmlExtractor: new DOMExtractor(),
      pool,
      checks: options.checks ?? NO_CONTRAST,
      renderTimeoutMs: 1_000,
      runDeadlineMs: 5_000,
      fetchPdf: options.fetchPdf,
    });
    return { launcher, store, auditor };
  }

  it('audits a web page, scores it and persists the run', async () => {
    const { auditor, store, launcher } = setup({ [HOME]: { html: PAGE } });
    const events: string[] = [];
    for (const name of ['start', 'render:complete', 'evaluate:complete', 'score', 'saved', 'complete']) {
      auditor.on(name, () => events.push(name));
    }

    const { result, artifact } = await auditor.audit({ kind: 'web', url: HOME });

    expect(result.status).toBe('ok');
    expect(result.target).toEqual({ kind: 'web', url: HOME });
    expect(result.violations.map((v) => v.ruleId)).toEqual(['image-alt']);
    expect(result.score).toBe(75);
    expect(result.skippedChecks).toEqual([]);
    expect(result.linkedPdfs).toEqual(['https://example.test/guide.pdf']);
    expect(artifact.summary.grade).toBe('C');
    expect(events).toEqual(['start', 'render:complete', 'evaluate:complete', 'score', 'saved', 'complete']);

    expect(await store.load(artifact.runId)).toEqual(result);
    expect(launcher.openContexts).toBe(0);
    await auditor.close();
  });

  it('records a navigation timeout as a failed run with no violations', async () => {
    const { auditor, store } = setup();

    const { result, artifact } = await auditor.audit({ kind: 'web', url: 'https://example.test/slow' });

    expect(result.status).toBe('failed');
    expect(result.violations).toEqual([]);
    expect(result.score).toBe(0);
    expect(result.error?.code).toBe('navigation-timeout');
    expect((await store.loadSummary(artifact.runId)).status).toBe('failed');
  });

  it('retries a crashed render once in a fresh context', async () => {
    const { auditor, launcher } = setup({}, { crashOnce: { [HOME]: PAGE } });

    const { result } = await auditor.audit({ kind: 'web', url: HOME });

    expect(result.status).toBe('ok');
    expect(launcher.launches).toBe(2);
    expect(launcher.visits.map((v) => v.url)).toEqual([HOME, HOME]);
  });

  it('fails the run when its deadline expires', async () => {
    const { auditor } = setup({ [HOME]: { behavior: 'hang' } });

    const { result } = await auditor.audit({ kind: 'web', url: HOME }, { deadlineMs: 100 });

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({ code: 'deadline-exceeded', message: 'Audit deadline of 100ms exceeded' });
  });

  it('fails the run when the caller aborts', async () => {
    const { auditor } = setup({ [HOME]: { behavior: 'hang' } });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const { result } = await auditor.audit({ kind: 'web', url: HOME }, { signal: controller.signal });

    expect(result.error).toEqual({ code: 'deadline-exceeded', message: 'Audit cancelled by caller' });
  });

  it('scores an untagged PDF at 75 at most and records its digest', async () => {
    const { auditor } = setup();
    const bytes = await untaggedPdf();

    const { result } = await auditor.audit({ kind: 'pdf', bytes, filename: 'guide.pdf' });

    expect(result.violations.map((v) => `${v.severity} ${v.ruleId}`)).toEqual(['critical pdf-tagged']);
    expect(result.score).toBe(75);
    expect(result.target).toEqual({
      kind: 'pdf',
      filename: 'guide.pdf',
      byteLength: bytes.byteLength,
      sha256: sha256Hex(bytes),
    });
  });

  it('records unparseable PDF bytes as a failed run', async () => {
    const { auditor } = setup();

    const { result } = await auditor.audit({
      kind: 'pdf',
      bytes: new TextEncoder().encode('not a pdf at all'),
      filename: 'broken.pdf',
    });

    expect(result.status).toBe('failed');
    expect(result.error?.code).toBe('unreadable-pdf');
    expect(result.score).toBe(0);
  });

  it('audits an HTML document without a browser and skips contrast', async () => {
    const { auditor, launcher } = setup({}, { checks: {} });
    const html =
      '<!doctype html><html lang="en"><head><title>Doc</title></head>' +
      '<body><h1>Doc</h1><a href="https://example.test/annual.pdf#page=2">Annual report</a></body></html>';

    const { result } = await auditor.audit({ kind: 'html', html, filename: 'doc.html' });

    expect(result.status).toBe('partial');
    expect(result.violations).toEqual([]);
    expect(result.score).toBe(100);
    expect(result.skippedChecks).toEqual([
      { checkId: 'color-contrast', reason: 'computed contrast was not collected' },
    ]);
    expect(result.linkedPdfs).toEqual(['https://example.test/annual.pdf']);
    expect(launcher.launches).toBe(0);
  });

  it('rejects malformed targets before a run starts', async () => {
    const { auditor, store } = setup();

    await expect(auditor.audit({ kind: 'web', url: 'ftp://example.test/' })).rejects.toBeInstanceOf(
      InvalidTargetError,
    );
    await expect(
      auditor.audit({ kind: 'pdf', bytes: new Uint8Array(0), filename: 'empty.pdf' }),
    ).rejects.toThrow('empty.pdf is empty');
    expect(() => auditor.submit({ kind: 'html', html: '  ', filename: 'blank.html' })).toThrow(InvalidTargetError);
    expect(await store.runIds()).toEqual([]);
  });

  it('throws store failures with the computed result attached', async () => {
    const blocker = path.join(dataDir, 'blocker');
    writeFileSync(blocker, 'x');
    const { auditor } = setup({}, { store: new ReportStore({ dataDir: blocker }) });

    const failure = await auditor
      .audit({ kind: 'pdf', bytes: await untaggedPdf(), filename: 'guide.pdf' })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(StoreWriteFailureError);
    expect(failure instanceof StoreWriteFailureError && failure.result.score).toBe(75);
  });

  it('tracks submitted runs through their ticket', async () => {
    const { auditor } = setup({ [HOME]: { html: PAGE, delayMs: 20 } });

    const ticket = auditor.submit({ kind: 'web', url: HOME });

    expect(auditor.poll(ticket)?.state).toBe('running');
    await vi.waitFor(() => expect(auditor.poll(ticket)?.state).toBe('done'));
    expect(auditor.poll(ticket)).toMatchObject({ ticket, state: 'done', score: 75, status: 'ok' });
    expect(auditor.poll('unknown')).toBeUndefined();
  });

  it('audits several targets and settles each independently', async () => {
    const { auditor } = setup({ [HOME]: { html: PAGE } });

    const outcomes = await auditor.auditMany([
      { kind: 'web', url: HOME },
      { kind: 'web', url: 'mailto:someone@example.test' },
      { kind: 'pdf', bytes: await untaggedPdf(), filename: 'guide.pdf' },
    ]);

    expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
  });

  it('audits the PDFs a web run links to', async () => {
    const bytes = await untaggedPdf();
    const fetchPdf = vi.fn(async (url: string) => ({ bytes, filename: path.posix.basename(url) }));
    const { auditor } = setup({ [HOME]: { html: PAGE } }, { fetchPdf });

    const { result } = await auditor.audit({ kind: 'web', url: HOME });
    const [linked] = await auditor.auditLinkedPdfs(result);

    expect(fetchPdf).toHaveBeenCalledWith('https://example.test/guide.pdf');
    expect(linked?.status).toBe('fulfilled');
    expect(linked?.status === 'fulfilled' && linked.value.result.target).toMatchObject({
      kind: 'pdf',
      filename: 'guide.pdf',
    });
  });
});
