import { ScanAbortedError } from '@/core/errors';
import { MAX_TIMER_DELAY_MS } from '@/core/time';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`; rejects with ScanAbortedError as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (ms > MAX_TIMER_DELAY_MS) {
      reject(new RangeError(`Delay of ${ms}ms exceeds the ${MAX_TIMER_DELAY_MS}ms timer limit`));
      return;
    }
    if (signal?.aborted) {
      reject(new ScanAbortedError());
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ScanAbortedError());
    };

    timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
