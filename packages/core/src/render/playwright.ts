import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright-core';

import { InvalidTargetError, NavigationTimeoutError, RenderFailureError } from '../errors.js';

import type {
  BrowserHandle,
  BrowserLauncher,
  NavigationOptions,
  RenderContext,
  RenderPage,
} from './types.js';

export interface PlaywrightLauncherOptions {
  /** Chromium binary; playwright-core ships without one. */
  executablePath?: string;
  headless?: boolean;
  viewport?: { width: number; height: number };
}

const DEFAULT_VIEWPORT = { width: 1280, height: 800 };

/**
 * Launches Chromium through playwright-core.
 */
export class PlaywrightLauncher implements BrowserLauncher {
  constructor(private readonly options: PlaywrightLauncherOptions = {}) {}

  async launch(): Promise<BrowserHandle> {
    try {
      const browser = await chromium.launch({
        headless: this.options.headless ?? true,
        executablePath: this.options.executablePath,
        args: ['--no-sandbox', '--disable-dev-shm-usage'],
      });
      return new PlaywrightBrowser(browser, this.options.viewport ?? DEFAULT_VIEWPORT);
    } catch (error) {
      throw new RenderFailureError('Failed to launch the browser', { cause: error });
    }
  }
}

class PlaywrightBrowser implements BrowserHandle {
  private counter = 0;

  constructor(
    private readonly browser: Browser,
    private readonly viewport: { width: number; height: number },
  ) {}

  async newContext(): Promise<RenderContext> {
    try {
      const context = await this.browser.newContext({ viewport: this.viewport });
      this.counter += 1;
      return new PlaywrightContext(context, `context-${this.counter}`);
    } catch (error) {
      throw new RenderFailureError('Failed to create a browser context', { cause: error });
    }
  }

  isConnected(): boolean {
    return this.browser.isConnected();
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

class PlaywrightContext implements RenderContext {
  constructor(
    private readonly context: BrowserContext,
    readonly id: string,
  ) {}

  async newPage(): Promise<RenderPage> {
    try {
      return new PlaywrightPage(await this.context.newPage());
    } catch (error) {
      throw new RenderFailureError('Failed to open a page', { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

class PlaywrightPage implements RenderPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, options: NavigationOptions): Promise<{ settled: boolean }> {
    try {
      const response = await this.page.goto(url, { waitUntil: 'load', timeout: options.timeoutMs });
      if (response && response.status() >= 400) {
        throw new InvalidTargetError(`${url} answered HTTP ${response.status()}`);
      }
    } catch (error) {
      throw mapNavigationError(error, url, options.timeoutMs);
    }

    const settled = await this.page
      .waitForLoadState('networkidle', { timeout: options.settleMs })
      .then(
        () => true,
        (error: unknown) => {
          // The settle ceiling was reached: proceed with what has rendered.
          if (error instanceof errors.TimeoutError) return false;
          throw mapNavigationError(error, url, options.timeoutMs);
        },
      );

    return { settled };
  }

  async evaluate<TResult>(expression: string): Promise<TResult> {
    try {
      return await this.page.evaluate<TResult>(expression);
    } catch (error) {
      if (isCrash(error)) throw new RenderFailureError('Browser crashed during extraction', { cause: error });
      throw error;
    }
  }

  async addScript(source: string): Promise<void> {
    await this.page.addScriptTag({ content: source });
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

function mapNavigationError(error: unknown, url: string, timeoutMs: number): Error {
  if (error instanceof InvalidTargetError) return error;
  if (error instanceof errors.TimeoutError) {
    return new NavigationTimeoutError(url, timeoutMs, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  if (message.includes('net::ERR_')) {
    return new InvalidTargetError(`Could not load ${url}: ${message.split('\n')[0] ?? message}`);
  }
  return new RenderFailureError(`Browser failed while loading ${url}`, { cause: error });
}

function isCrash(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return /crashed|has been closed|Target closed/i.test(error.message);
}
