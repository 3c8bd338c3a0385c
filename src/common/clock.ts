import { PipelineAbortedError } from './errors';

export interface Clock {
  now(): number;
  /** Rejects with `PipelineAbortedError` as soon as `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new PipelineAbortedError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new PipelineAbortedError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};
