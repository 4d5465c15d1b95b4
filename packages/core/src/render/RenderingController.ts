import { AxeRunner } from '../axe/AxeRunner.js';
import { InvalidTargetError, RenderFailureError, toError } from '../errors.js';
import { snapshotPage, toRenderedTree } from '../extraction/fromPage.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { AxeFinding } from '../types/axe.js';
import type { RenderedTree } from '../types/extraction.js';
import { raceAbort } from '../utils/deadline.js';

import type { BrowserContextPool } from './BrowserContextPool.js';
import type { RenderPage } from './types.js';

export interface RenderingControllerOptions {
  pool: BrowserContextPool;

  /** Collect computed foreground/background colors for contrast checks. */
  collectContrast: boolean;

  /** Inject axe-core and attach its findings to the tree. */
  runAxe?: boolean;

  /** Ceiling on the network-idle wait after `load`. */
  settleMs: number;

  logger?: Logger;
}

export interface RenderOptions {
  /** Run deadline; aborting closes the context and rejects with its reason. */
  signal?: AbortSignal;
}

/**
 * Loads URLs in leased browser contexts and serializes their accessibility
 * snapshot.
 *
 * The leased context is closed on every exit path, including timeouts, crashes
 * and deadline aborts.
 */
export class RenderingController {
  private readonly pool: BrowserContextPool;
  private readonly collectContrast: boolean;
  private readonly runAxe: boolean;
  private readonly settleMs: number;
  private readonly logger: Logger;
  private readonly axe = new AxeRunner();

  constructor(options: RenderingControllerOptions) {
    this.pool = options.pool;
    this.collectContrast = options.collectContrast;
    this.runAxe = options.runAxe ?? false;
    this.settleMs = options.settleMs;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'renderer' });
  }

  async render(url: string, timeoutMs: number, options: RenderOptions = {}): Promise<RenderedTree> {
    assertNavigableUrl(url);
    const { signal } = options;

    const lease = await this.pool.acquire(signal);
    let discard = false;
    let page: RenderPage | null = null;

    const closeOnAbort = (): void => {
      // Tearing the context down makes in-flight navigation reject promptly.
      lease.release({ discard: false }).catch((error: unknown) => {
        this.logger.warn({ err: toError(error) }, 'releasing aborted context failed');
      });
    };
    signal?.addEventListener('abort', closeOnAbort, { once: true });

    try {
      page = await raceAbort(lease.context.newPage(), signal);
      const startedAt = Date.now();

      const { settled } = await raceAbort(
        page.goto(url, { timeoutMs, settleMs: this.settleMs }),
        signal,
      );
      this.logger.debug({ url, settled, ms: Date.now() - startedAt }, 'page loaded');

      const snapshot = await raceAbort(
        snapshotPage(page, { collectContrast: this.collectContrast }),
        signal,
      );
      const axe = this.runAxe ? await this.collectAxe(page, signal) : undefined;

      return toRenderedTree(snapshot, {
        url,
        settled,
        contrastCollected: this.collectContrast,
        axe,
      });
    } catch (error) {
      discard = error instanceof RenderFailureError;
      throw error;
    } finally {
      signal?.removeEventListener('abort', closeOnAbort);
      if (page && !signal?.aborted) {
        await page.close().catch((error: unknown) => {
          this.logger.debug({ err: toError(error) }, 'closing page failed');
        });
      }
      await lease.release({ discard });
    }
  }

  private async collectAxe(page: RenderPage, signal?: AbortSignal): Promise<AxeFinding[] | null> {
    try {
      return await raceAbort(this.axe.runOnPage(page), signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      this.logger.warn({ err: toError(error) }, 'axe-core did not run');
      return null;
    }
  }
}

function assertNavigableUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new InvalidTargetError(`Not a valid URL: ${url}`, { cause: error });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidTargetError(`Unsupported URL scheme: ${parsed.protocol}`);
  }
}
