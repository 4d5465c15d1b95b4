import * as lockfile from 'proper-lockfile';

/**
 * Run `fn` while holding a cross-process lock on `filePath` (which need not exist).
 */
export async function withFileLock<T>(filePath: string, fn: () => T | Promise<T>): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: 10, minTimeout: 50, maxTimeout: 500 },
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}

/**
 * In-process mutual exclusion. Work queued through `run` executes one item at a time, in order.
 */
export class Mutex {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.tail.then(fn, fn);
    // The chain only orders work; each caller sees its own rejection through `next`.
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}
