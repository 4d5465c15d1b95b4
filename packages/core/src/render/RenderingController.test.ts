import { describe, expect, it } from 'vitest';

import {
  DeadlineExceededError,
  InvalidTargetError,
  NavigationTimeoutError,
  RenderFailureError,
} from '../errors.js';
import { FakeLauncher, type FakeRoute } from '../testing/fakeBrowser.js';
import { createDeadline } from '../utils/deadline.js';

import { BrowserContextPool } from './BrowserContextPool.js';
import { RenderingController } from './RenderingController.js';

const PAGE = `<!doctype html>
<html lang="de">
  <head><title>Startseite</title></head>
  <body>
    <h1>Hallo</h1>
    <a href="/handbuch.pdf">Handbuch</a>
    <img src="/a.png">
  </body>
</html>`;

function setup(routes: Record<string, FakeRoute>, options: { runAxe?: boolean; crashOnce?: Record<string, string> } = {}) {
  const launcher = new FakeLauncher({ routes, crashOnce: options.crashOnce });
  const pool = new BrowserContextPool({ launcher, size: 1, acquireTimeoutMs: 1_000 });
  const controller = new RenderingController({
    pool,
    collectContrast: true,
    runAxe: options.runAxe,
    settleMs: 50,
  });
  return { launcher, pool, controller };
}

describe('RenderingController', () => {
  it('renders a page into a snapshot and returns the context', async () => {
    const { launcher, pool, controller } = setup({ 'https://example.test/': { html: PAGE } });

    const tree = await controller.render('https://example.test/', 1_000);

    expect(tree.url).toBe('https://example.test/');
    expect(tree.settled).toBe(true);
    expect(tree.pageTitle).toBe('Startseite');
    expect(tree.pageLanguage).toBe('de');
    expect(tree.links.map((l) => l.href)).toEqual(['/handbuch.pdf']);
    expect(tree.images[0]?.alt).toBeNull();
    // Contrast was requested, so the tree carries a (possibly empty) sample list.
    expect(Array.isArray(tree.contrast)).toBe(true);
    expect('axe' in tree).toBe(false);

    expect(launcher.openContexts).toBe(0);
    expect(pool.stats().active).toBe(0);
  });

  it('reports an unsettled network without failing', async () => {
    const { controller } = setup({ 'https://example.test/busy': { html: PAGE, settled: false } });

    const tree = await controller.render('https://example.test/busy', 1_000);

    expect(tree.settled).toBe(false);
  });

  it('releases the context after a navigation timeout', async () => {
    const { launcher, pool, controller } = setup({ 'https://example.test/slow': { behavior: 'timeout' } });

    await expect(controller.render('https://example.test/slow', 100)).rejects.toBeInstanceOf(NavigationTimeoutError);

    expect(launcher.openContexts).toBe(0);
    expect(pool.stats().active).toBe(0);
    expect(launcher.launches).toBe(1);
  });

  it('discards a crashed browser so the next render relaunches it', async () => {
    const { launcher, controller } = setup(
      { 'https://example.test/': { html: PAGE } },
      { crashOnce: { 'https://example.test/flaky': PAGE } },
    );

    await expect(controller.render('https://example.test/flaky', 1_000)).rejects.toBeInstanceOf(RenderFailureError);
    const tree = await controller.render('https://example.test/flaky', 1_000);

    expect(tree.pageTitle).toBe('Startseite');
    expect(launcher.launches).toBe(2);
    expect(launcher.openContexts).toBe(0);
  });

  it('aborts a hanging navigation when the deadline expires', async () => {
    const { launcher, pool, controller } = setup({ 'https://example.test/hang': { behavior: 'hang' } });
    const deadline = createDeadline(30);

    try {
      await expect(
        controller.render('https://example.test/hang', 5_000, { signal: deadline.signal }),
      ).rejects.toBeInstanceOf(DeadlineExceededError);
    } finally {
      deadline.dispose();
    }

    expect(launcher.openContexts).toBe(0);
    expect(pool.stats().active).toBe(0);
  });

  it('rejects non-http URLs without leasing a context', async () => {
    const { launcher, controller } = setup({});

    await expect(controller.render('ftp://example.test/file', 1_000)).rejects.toBeInstanceOf(InvalidTargetError);
    await expect(controller.render('not a url', 1_000)).rejects.toThrow('Not a valid URL: not a url');
    expect(launcher.launches).toBe(0);
  });

  it('attaches axe findings when enabled', async () => {
    const { controller } = setup({ 'https://example.test/': { html: PAGE } }, { runAxe: true });

    const tree = await controller.render('https://example.test/', 5_000);

    expect(tree.axe?.some((f) => f.id === 'image-alt')).toBe(true);
  });
});
