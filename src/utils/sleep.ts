/**
 * Abortable delay used for retry backoff.
 */

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolve after `ms`, or reject with the signal's reason as soon as it aborts.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
