import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { silentLogger, type RunSummary } from '@accessaudit/core';
import { FakeLauncher, type FakeRoute } from '@accessaudit/core/testing';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { initTemplate } from './lib/config.js';
import { runCli } from './program.js';

const HOME = 'https://example.test/';

const PAGE = `<!doctype html>
<html lang="en">
  <head><title>Home</title></head>
  <body><h1>Welcome</h1><img src="/hero.png"></body>
</html>`;

const FIXED_PAGE = PAGE.replace('<img src="/hero.png">', '<img src="/hero.png" alt="Harbour at dawn">');

describe('runCli', () => {
  let cwd: string;
  let dataDir: string;

  beforeEach(() => {
    cwd = mkdtempSync(path.join(tmpdir(), 'accessaudit-cli-'));
    dataDir = path.join(cwd, 'data');
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  async function run(argv: string[], routes: Record<string, FakeRoute> = {}) {
    let stdout = '';
    let stderr = '';
    const code = await runCli(argv, {
      stdout: { write: (s: string) => (stdout += s) },
      stderr: { write: (s: string) => (stderr += s) },
      cwd,
      env: {},
      launcher: new FakeLauncher({ routes }),
      logger: silentLogger(),
    });
    return { code, stdout, stderr };
  }

  async function storedRuns(): Promise<RunSummary[]> {
    const { stdout } = await run(['list', '--json', '--data-dir', dataDir]);
    return JSON.parse(stdout);
  }

  it('audits a URL and prints the JSON payload', async () => {
    const { code, stdout } = await run(
      ['audit', HOME, '--data-dir', dataDir, '--no-contrast', '--format', 'json'],
      { [HOME]: { html: PAGE } },
    );

    expect(code).toBe(0);
    const payload = JSON.parse(stdout);
    expect(payload).toMatchObject({ kind: 'web', score: 75, status: 'partial' });
    expect(payload.violations).toHaveLength(1);
    expect(payload.violations[0]).toMatchObject({
      rule_id: 'image-alt',
      severity: 'critical',
      message: 'Image has no alt attribute',
    });

    const runs = await storedRuns();
    expect(runs.map((r) => r.runId)).toEqual([payload.run_id]);

    const shown = await run(['show', payload.run_id, '--format', 'json', '--data-dir', dataDir]);
    expect(shown.stdout).toBe(stdout);
  });

  it('exits 1 when a score is below the threshold', async () => {
    const { code } = await run(['audit', HOME, '--data-dir', dataDir, '--no-contrast', '--threshold', '80'], {
      [HOME]: { html: PAGE },
    });

    expect(code).toBe(1);
  });

  it('exits 2 when the run fails', async () => {
    const url = 'https://example.test/missing';
    const { code, stdout } = await run(['audit', url, '--data-dir', dataDir, '--no-color']);

    const lines = stdout.split('\n');
    expect(code).toBe(2);
    expect(lines[0]).toBe(`Score: 0 (F)  ${url}`);
    expect(lines[1]).toMatch(/^Run: \S+  Status: failed$/);
    expect(lines[2]).toMatch(/^Error: navigation-timeout: /);
  });

  it('audits a local HTML file as Markdown', async () => {
    writeFileSync(
      path.join(cwd, 'doc.html'),
      '<!doctype html><html lang="en"><head><title>Doc</title></head><body><h1>Doc</h1></body></html>',
    );

    const { code, stdout } = await run(['audit', 'doc.html', '--data-dir', dataDir, '--format', 'md']);

    expect(code).toBe(0);
    expect(stdout.split('\n')[0]).toBe('# Accessibility report: doc.html');
    expect(stdout).toContain('- `color-contrast`: computed contrast was not collected');
  });

  it('writes the report to --output', async () => {
    const { code, stdout, stderr } = await run(
      ['audit', HOME, '--data-dir', dataDir, '--no-contrast', '--format', 'csv', '--output', 'report.csv'],
      { [HOME]: { html: PAGE } },
    );

    expect(code).toBe(0);
    expect(stdout).toBe('');
    expect(stderr).toBe(`Wrote ${path.join(cwd, 'report.csv')}\n`);
    const csv = readFileSync(path.join(cwd, 'report.csv'), 'utf8').split('\n');
    expect(csv[0]).toBe('run_id,kind,target,rule_id,severity,wcag,locator,message,suggestion');
    expect(csv).toHaveLength(3);
  });

  it('reports bad targets and usage errors with exit code 2', async () => {
    const badFile = await run(['audit', 'notes.txt', '--data-dir', dataDir]);
    expect(badFile.code).toBe(2);
    expect(badFile.stderr).toBe('error: invalid-target: Expected a URL, a .pdf or an .html file: notes.txt\n');

    const missingArg = await run(['audit']);
    expect(missingArg.code).toBe(2);
    expect(missingArg.stderr).toContain("missing required argument 'target'");

    const unknownRun = await run(['show', 'nope', '--data-dir', dataDir]);
    expect(unknownRun.code).toBe(2);
    expect(unknownRun.stderr).toBe('error: report-not-found: No report found for run nope\n');
  });

  it('prints the version', async () => {
    const { code, stdout } = await run(['--version']);

    expect(code).toBe(0);
    expect(stdout).toBe('0.1.0\n');
  });

  it('compares two stored runs', async () => {
    await run(['audit', HOME, '--data-dir', dataDir, '--no-contrast'], { [HOME]: { html: PAGE } });
    await run(['audit', HOME, '--data-dir', dataDir, '--no-contrast'], { [HOME]: { html: FIXED_PAGE } });
    const [before, after] = await storedRuns();

    const { code, stdout } = await run(['compare', before?.runId ?? '', after?.runId ?? '', '--data-dir', dataDir]);

    expect(code).toBe(0);
    const lines = stdout.split('\n');
    expect(lines).toContain('Delta:    +25 (improved)');
    expect(lines).toContain('Better:   current');
    expect(lines).toContain('Fixed violations: 1');
  });

  it('archives stored runs on sweep', async () => {
    await run(['audit', HOME, '--data-dir', dataDir, '--no-contrast'], { [HOME]: { html: PAGE } });

    const { code, stdout } = await run(['sweep', '--data-dir', dataDir]);

    expect(code).toBe(0);
    expect(stdout).toMatch(/^Archived 1 run\(s\) into runs-\d{8}T\d{9}Z\.zip\nPruned 0 run\(s\) and 0 bundle\(s\)\n$/);
  });

  it('lists web rules and PDF checks', async () => {
    const all = await run(['rules', '--json']);
    expect(JSON.parse(all.stdout).map((c: { id: string }) => c.id)).toEqual([
      'document-lang',
      'image-alt',
      'form-label',
      'heading-order',
      'link-name',
      'color-contrast',
      'axe',
      'pdf-tagged',
      'pdf-figure-alt',
      'pdf-font-embedding',
      'pdf-document-lang',
      'pdf-title',
      'pdf-reading-order',
      'pdf-image-only-page',
      'pdf-text-contrast',
    ]);

    const one = await run(['rules', 'image-alt']);
    expect(one.stdout).toBe(
      'image-alt (web)\nImages have alternative text that is not a file name\nSeverities: critical, minor\nWCAG: 1.1.1\n',
    );

    const unknown = await run(['rules', 'nope']);
    expect(unknown.code).toBe(2);
    expect(unknown.stderr).toBe('error: Unknown check: nope\n');
  });

  it('writes a starter config and refuses to overwrite it', async () => {
    const file = path.join(cwd, '.accessauditrc.json');

    const first = await run(['init']);
    expect(first.code).toBe(0);
    expect(first.stdout).toBe(`Wrote ${file}\n`);
    expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual(initTemplate());

    const second = await run(['init']);
    expect(second.code).toBe(2);
    expect(second.stderr).toBe(`error: ${file} already exists (use --force to overwrite)\n`);

    expect((await run(['init', '--force'])).code).toBe(0);
  });

  it('names the offending field of an invalid config file', async () => {
    writeFileSync(path.join(cwd, '.accessauditrc.json'), JSON.stringify({ browser_pool_size: 0 }));

    const { code, stderr } = await run(['list']);

    expect(code).toBe(2);
    expect(stderr).toBe('error: invalid configuration: browser_pool_size: Number must be greater than 0\n');
  });
});
