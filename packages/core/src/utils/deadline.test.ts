import { describe, expect, it } from 'vitest';

import { DeadlineExceededError } from '../errors.js';
import { createDeadline, raceAbort } from './deadline.js';

describe('createDeadline', () => {
  it('aborts with DeadlineExceededError when time runs out', async () => {
    const deadline = createDeadline(10);
    await new Promise((r) => setTimeout(r, 30));
    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toBeInstanceOf(DeadlineExceededError);
    expect(deadline.remainingMs()).toBe(0);
    deadline.dispose();
  });

  it('follows the parent signal', () => {
    const parent = new AbortController();
    const deadline = createDeadline(10_000, parent.signal);
    parent.abort();
    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });

  it('starts aborted when the parent already is', () => {
    const parent = new AbortController();
    parent.abort();
    const deadline = createDeadline(10_000, parent.signal);
    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });
});

describe('raceAbort', () => {
  it('resolves with the promise when not aborted', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve(5), controller.signal)).resolves.toBe(5);
  });

  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => undefined), controller.signal);
    controller.abort(new DeadlineExceededError('stop'));
    await expect(pending).rejects.toThrow('stop');
  });

  it('rejects immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new DeadlineExceededError('already'));
    await expect(raceAbort(Promise.resolve(1), controller.signal)).rejects.toBeInstanceOf(
      DeadlineExceededError,
    );
  });
});
