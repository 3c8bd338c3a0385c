import { PipelineAbortedError } from './errors';

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep input order. Once the signal aborts or a worker throws, no new
 * item is started; in-flight calls are awaited before the error surfaces.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;
  const state: { failure?: { error: unknown } } = {};

  const run = async () => {
    while (!state.failure && !signal?.aborted) {
      const index = next++;
      if (index >= items.length) return;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        if (!state.failure) state.failure = { error };
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, run));

  if (state.failure) throw state.failure.error;
  if (signal?.aborted) throw new PipelineAbortedError();
  return results;
}
