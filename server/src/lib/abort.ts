import { DeadlineExceededError } from './errors.js';

export interface DeadlineScope {
  signal: AbortSignal;
  /** True when the timer, not the caller, aborted the scope. */
  expired: () => boolean;
  cleanup: () => void;
}

/**
 * Merge an optional caller signal with a deadline timer into one signal.
 * Call `cleanup` once the guarded work is over.
 */
export function createDeadlineSignal(callerSignal: AbortSignal | undefined, timeoutMs: number): DeadlineScope {
  const controller = new AbortController();
  let timedOut = false;

  const timeout = setTimeout(() => {
    timedOut = true;
    if (!controller.signal.aborted) controller.abort(new DeadlineExceededError());
  }, Math.max(0, timeoutMs));
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!controller.signal.aborted) controller.abort(callerSignal?.reason);
  };
  if (callerSignal) {
    if (callerSignal.aborted) onCallerAbort();
    else callerSignal.addEventListener('abort', onCallerAbort, { once: true });
  }

  return {
    signal: controller.signal,
    expired: () => timedOut,
    cleanup: () => {
      clearTimeout(timeout);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    },
  };
}
