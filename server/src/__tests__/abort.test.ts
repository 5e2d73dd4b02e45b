import { describe, it, expect } from 'vitest';
import { createDeadlineSignal } from '../lib/abort.js';
import { DeadlineExceededError } from '../lib/errors.js';

describe('createDeadlineSignal', () => {
  it('aborts with DeadlineExceededError when the timer fires', async () => {
    const scope = createDeadlineSignal(undefined, 5);
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(scope.signal.aborted).toBe(true);
    expect(scope.expired()).toBe(true);
    expect(scope.signal.reason).toBeInstanceOf(DeadlineExceededError);
    scope.cleanup();
  });

  it('propagates a caller abort with its reason', () => {
    const caller = new AbortController();
    const scope = createDeadlineSignal(caller.signal, 10_000);
    caller.abort('client closed');
    expect(scope.signal.aborted).toBe(true);
    expect(scope.signal.reason).toBe('client closed');
    expect(scope.expired()).toBe(false);
    scope.cleanup();
  });

  it('starts aborted for an already aborted caller', () => {
    const scope = createDeadlineSignal(AbortSignal.abort('early'), 10_000);
    expect(scope.signal.aborted).toBe(true);
    scope.cleanup();
  });

  it('never fires after cleanup', async () => {
    const scope = createDeadlineSignal(undefined, 5);
    scope.cleanup();
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(scope.signal.aborted).toBe(false);
  });
});
