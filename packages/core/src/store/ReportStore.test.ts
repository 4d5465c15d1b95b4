import { mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ReportNotFoundError, StoreWriteFailureError } from '../errors.js';
import type { AuditResult } from '../types/audit.js';

import { ReportStore, toReportPayload } from './ReportStore.js';
import { formatRunId, isRunId, runIdTime } from './runId.js';

const AT = new Date(Date.UTC(2026, 2, 14, 9, 26, 53, 589));

function webResult(overrides: Partial<AuditResult> = {}): AuditResult {
  return {
    schemaVersion: 1,
    target: { kind: 'web', url: 'https://example.test/' },
    violations: [
      {
        ruleId: 'image-alt',
        severity: 'critical',
        message: 'Image has no alt attribute',
        locator: 'html > body > img',
        source: 'web',
        wcag: ['1.1.1'],
      },
      { ruleId: 'document-lang', severity: 'serious', message: 'No lang', locator: 'html', source: 'web' },
    ],
    score: 65,
    status: 'ok',
    startedAt: '2026-03-14T09:26:50.000Z',
    finishedAt: '2026-03-14T09:26:53.500Z',
    skippedChecks: [],
    ...overrides,
  };
}

describe('run ids', () => {
  it('formats timestamp, sequence and suffix', () => {
    expect(formatRunId(AT, 7, '0a1b')).toBe('20260314T092653589Z-0007-0a1b');
  });

  it('recognizes and decodes ids', () => {
    expect(isRunId('20260314T092653589Z-0007-0a1b')).toBe(true);
    expect(isRunId('../etc/passwd')).toBe(false);
    expect(isRunId('20260314T092653589Z-0007-0A1B')).toBe(false);
    expect(runIdTime('20260314T092653589Z-0007-0a1b')?.toISOString()).toBe('2026-03-14T09:26:53.589Z');
    expect(runIdTime('nope')).toBeNull();
  });
});

describe('ReportStore', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(path.join(tmpdir(), 'accessaudit-store-'));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it('saves a run and loads back the same result', async () => {
    const store = new ReportStore({ dataDir, now: () => AT, suffix: () => 'beef' });
    const result = webResult();

    const artifact = await store.save(result);

    expect(artifact.runId).toBe('20260314T092653589Z-0001-beef');
    expect(artifact.directory).toBe(path.join(dataDir, 'runs', artifact.runId));
    expect(readdirSync(artifact.directory).sort()).toEqual(['findings.json', 'summary.json']);
    expect(artifact.summary).toMatchObject({
      runId: artifact.runId,
      kind: 'web',
      targetLabel: 'https://example.test/',
      score: 65,
      grade: 'D',
      violationCount: 2,
      bySeverity: { critical: 1, serious: 1, moderate: 0, minor: 0 },
    });

    const loaded = await store.load(artifact.runId);
    expect(loaded).toEqual(result);
  });

  it('leaves no staging directories behind', async () => {
    const store = new ReportStore({ dataDir });
    await store.save(webResult());

    const entries = readdirSync(path.join(dataDir, 'runs')).filter((name) => name.startsWith('.staging-'));
    expect(entries).toEqual([]);
  });

  it('never hands out the same run id to concurrent saves', async () => {
    const stores = [
      new ReportStore({ dataDir, now: () => AT, suffix: () => 'aaaa' }),
      new ReportStore({ dataDir, now: () => AT, suffix: () => 'aaaa' }),
    ];

    const artifacts = await Promise.all(
      Array.from({ length: 8 }, (_, i) => stores[i % 2]?.save(webResult({ score: i }))),
    );
    const ids = artifacts.map((a) => a?.runId);

    expect(new Set(ids).size).toBe(8);
    expect(await stores[0]?.runIds()).toHaveLength(8);
  });

  it('throws ReportNotFoundError for unknown, malformed and incomplete runs', async () => {
    const store = new ReportStore({ dataDir });

    await expect(store.load('20260314T092653589Z-0001-ffff')).rejects.toBeInstanceOf(ReportNotFoundError);
    await expect(store.load('../../secrets')).rejects.toBeInstanceOf(ReportNotFoundError);

    const incomplete = path.join(dataDir, 'runs', '20260314T092653589Z-0002-ffff');
    await mkdir(incomplete, { recursive: true });
    await writeFile(path.join(incomplete, 'findings.json'), JSON.stringify(webResult()));
    await expect(store.load('20260314T092653589Z-0002-ffff')).rejects.toBeInstanceOf(ReportNotFoundError);
  });

  it('lists summaries oldest first, filtered by save time', async () => {
    let now = new Date(Date.UTC(2026, 0, 1));
    const store = new ReportStore({ dataDir, now: () => now });

    await store.save(webResult({ score: 10 }));
    now = new Date(Date.UTC(2026, 0, 5));
    await store.save(webResult({ score: 50 }));
    now = new Date(Date.UTC(2026, 0, 9));
    await store.save(
      webResult({
        target: { kind: 'pdf', filename: 'report.pdf', byteLength: 10, sha256: 'abc' },
        score: 0,
        status: 'failed',
        violations: [],
        error: { code: 'unreadable-pdf', message: 'report.pdf could not be parsed as a PDF document' },
      }),
    );
    await mkdir(path.join(dataDir, 'runs', '20260110T000000000Z-0001-dead'));

    expect((await store.list()).map((s) => s.score)).toEqual([10, 50, 0]);

    const recent = await store.list({ since: new Date(Date.UTC(2026, 0, 4)) });
    expect(recent.map((s) => [s.targetLabel, s.status])).toEqual([
      ['https://example.test/', 'ok'],
      ['report.pdf', 'failed'],
    ]);
    expect(recent[1]?.error?.code).toBe('unreadable-pdf');
  });

  it('returns an empty list before anything was saved', async () => {
    expect(await new ReportStore({ dataDir }).list()).toEqual([]);
  });

  it('wraps write failures and carries the computed result', async () => {
    const blocker = path.join(dataDir, 'not-a-directory');
    writeFileSync(blocker, 'x');
    const store = new ReportStore({ dataDir: blocker });
    const result = webResult();

    const failure = await store.save(result).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(StoreWriteFailureError);
    expect(failure instanceof StoreWriteFailureError && failure.result).toBe(result);
  });
});

describe('toReportPayload', () => {
  it('produces the snake_case retrieval shape', () => {
    expect(toReportPayload(webResult(), '20260314T092653589Z-0001-beef')).toEqual({
      run_id: '20260314T092653589Z-0001-beef',
      kind: 'web',
      score: 65,
      status: 'ok',
      violations: [
        {
          rule_id: 'image-alt',
          severity: 'critical',
          message: 'Image has no alt attribute',
          locator: 'html > body > img',
        },
        { rule_id: 'document-lang', severity: 'serious', message: 'No lang', locator: 'html' },
      ],
      started_at: '2026-03-14T09:26:50.000Z',
      finished_at: '2026-03-14T09:26:53.500Z',
    });
  });
});
