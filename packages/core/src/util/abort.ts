import { StepTimeoutError } from "../errors";

export function abortError(message = "The operation was aborted"): Error {
  const err = new Error(message);
  err.name = "AbortError";
  return err;
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw abortError();
}

/**
 * An AbortSignal that fires after `timeoutMs` or when the caller's signal
 * does. `timedOut()` tells the two apart once the request has failed.
 */
export function linkAbort(
  timeoutMs: number,
  callerSignal?: AbortSignal
): { signal: AbortSignal; cleanup: () => void; timedOut: () => boolean } {
  const ac = new AbortController();
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    ac.abort();
  }, timeoutMs);

  function onCallerAbort() {
    ac.abort();
  }
  if (callerSignal) {
    if (callerSignal.aborted) {
      ac.abort();
    } else {
      callerSignal.addEventListener("abort", onCallerAbort, { once: true });
    }
  }

  return {
    signal: ac.signal,
    cleanup: () => {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    },
    timedOut: () => expired,
  };
}

/**
 * Wait for `promise` unless `signal` aborts first. The underlying work keeps
 * running; only this caller stops waiting.
 */
export function abandonOnAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Run one external step under a deadline. `fn` receives a signal that aborts on
 * timeout or caller abort; the returned promise rejects with StepTimeoutError
 * on timeout and AbortError on caller abort, without waiting for `fn` to notice.
 */
export async function withTimeout<T>(
  step: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  callerSignal?: AbortSignal
): Promise<T> {
  throwIfAborted(callerSignal);
  const { signal, cleanup, timedOut } = linkAbort(timeoutMs, callerSignal);

  const deadline = new Promise<never>((_, reject) => {
    signal.addEventListener(
      "abort",
      () => reject(timedOut() ? new StepTimeoutError(step, timeoutMs) : abortError()),
      { once: true }
    );
  });

  try {
    return await Promise.race([fn(signal), deadline]);
  } finally {
    cleanup();
  }
}
