import { ContextAcquireTimeoutError, RenderFailureError, toError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { abortReason } from '../utils/deadline.js';

import type { BrowserHandle, BrowserLauncher, RenderContext } from './types.js';

export interface BrowserContextPoolOptions {
  launcher: BrowserLauncher;

  /** Maximum number of contexts leased at once. */
  size: number;

  /** How long `acquire` waits for a free slot. */
  acquireTimeoutMs: number;

  logger?: Logger;
}

/**
 * A leased, isolated browser context.
 */
export interface ContextLease {
  readonly context: RenderContext;

  /**
   * Close the context and free the slot. With `discard`, a browser that has
   * disconnected is dropped and relaunched on the next lease. Later calls
   * return the first call's promise.
   */
  release(options?: { discard?: boolean }): Promise<void>;
}

export interface PoolStats {
  size: number;
  active: number;
  waiting: number;
}

interface Waiter {
  grant(): void;
  fail(error: Error): void;
}

/**
 * Bounded pool of browser contexts over one lazily launched browser process.
 *
 * Every lease gets a fresh context, so concurrent runs never share cookies,
 * storage or navigation state. When all slots are taken, callers wait in FIFO
 * order until a slot frees up, their acquire timeout fires or their signal
 * aborts.
 */
export class BrowserContextPool {
  private readonly launcher: BrowserLauncher;
  private readonly size: number;
  private readonly acquireTimeoutMs: number;
  private readonly logger: Logger;

  private browser: Promise<BrowserHandle> | null = null;
  private active = 0;
  private readonly waiters: Waiter[] = [];
  private closed = false;

  constructor(options: BrowserContextPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${options.size}`);
    }
    this.launcher = options.launcher;
    this.size = options.size;
    this.acquireTimeoutMs = options.acquireTimeoutMs;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'browser-pool' });
  }

  stats(): PoolStats {
    return { size: this.size, active: this.active, waiting: this.waiters.length };
  }

  /**
   * Lease a fresh context, waiting for a free slot when the pool is exhausted.
   */
  async acquire(signal?: AbortSignal): Promise<ContextLease> {
    if (this.closed) throw new RenderFailureError('Browser pool is closed');

    await this.takeSlot(signal);

    let context: RenderContext;
    try {
      const browser = await this.ensureBrowser();
      context = await browser.newContext();
    } catch (error) {
      await this.checkBrowserHealth();
      this.freeSlot();
      if (error instanceof RenderFailureError) throw error;
      throw new RenderFailureError('Failed to open a browser context', { cause: error });
    }

    this.logger.debug({ contextId: context.id, ...this.stats() }, 'context leased');

    let releasing: Promise<void> | null = null;
    const release = async (options: { discard?: boolean }): Promise<void> => {
      try {
        await context.close();
      } catch (error) {
        this.logger.warn({ contextId: context.id, err: toError(error) }, 'closing context failed');
      } finally {
        if (options.discard) await this.checkBrowserHealth();
        this.freeSlot();
        this.logger.debug({ contextId: context.id, ...this.stats() }, 'context released');
      }
    };

    return {
      context,
      release: (options = {}) => {
        releasing ??= release(options);
        return releasing;
      },
    };
  }

  /**
   * Close the browser and fail every waiting caller.
   */
  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.fail(new RenderFailureError('Browser pool is closed'));
    }
    const browser = this.browser;
    this.browser = null;
    if (!browser) return;

    const handle = await browser.catch((error: unknown) => {
      this.logger.debug({ err: toError(error) }, 'browser never started');
      return null;
    });
    await handle?.close();
  }

  private takeSlot(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));
    if (this.active < this.size) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
      };

      const waiter: Waiter = {
        // The releasing caller hands its slot over, so `active` stays unchanged.
        grant: () => {
          cleanup();
          resolve();
        },
        fail: (error) => {
          cleanup();
          reject(error);
        },
      };

      const timer = setTimeout(
        () => waiter.fail(new ContextAcquireTimeoutError(this.acquireTimeoutMs)),
        this.acquireTimeoutMs,
      );
      const onAbort = (): void => {
        if (signal) waiter.fail(abortReason(signal));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiters.push(waiter);
      this.logger.debug({ ...this.stats() }, 'waiting for a browser context');
    });
  }

  private freeSlot(): void {
    const next = this.waiters[0];
    if (next) {
      next.grant();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }

  private ensureBrowser(): Promise<BrowserHandle> {
    if (!this.browser) {
      this.logger.info('launching browser');
      this.browser = this.launcher.launch();
    }
    return this.browser;
  }

  private async checkBrowserHealth(): Promise<void> {
    const current = this.browser;
    if (!current) return;

    const handle = await current.catch(() => null);
    if (handle?.isConnected()) return;

    if (this.browser === current) this.browser = null;
    this.logger.warn('browser disconnected; it will be relaunched on the next lease');
    if (handle) {
      await handle.close().catch((error: unknown) => {
        this.logger.debug({ err: toError(error) }, 'closing dead browser failed');
      });
    }
  }
}
