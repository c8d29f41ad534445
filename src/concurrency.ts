import { isAbortError } from './errors.js';

export type Settled<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown }
  | { status: 'cancelled' };

/**
 * Runs `worker` over `items` with at most `limit` in flight, keeping input
 * order in the output. Once `signal` aborts no further item starts; an
 * item still running receives the signal and counts as cancelled if it
 * rejects afterwards. Items that finished keep their outcome.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number, signal: AbortSignal | undefined) => Promise<R>,
  signal?: AbortSignal,
): Promise<Settled<R>[]> {
  const output: Settled<R>[] = items.map(() => ({ status: 'cancelled' }));
  const width = Math.max(1, Math.min(Math.trunc(limit) || 1, items.length || 1));
  let next = 0;

  const run = async () => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next;
      next += 1;
      try {
        const value = await worker(items[index], index, signal);
        output[index] = { status: 'fulfilled', value };
      } catch (reason) {
        output[index] = signal?.aborted || isAbortError(reason)
          ? { status: 'cancelled' }
          : { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: width }, () => run()));
  return output;
}

/** Sequential variant: one item at a time, same cancellation rules. */
export function mapSequential<T, R>(
  items: readonly T[],
  worker: (item: T, index: number, signal: AbortSignal | undefined) => Promise<R>,
  signal?: AbortSignal,
): Promise<Settled<R>[]> {
  return mapWithConcurrency(items, 1, worker, signal);
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function abortError(): Error {
  const error = new Error('operation cancelled');
  error.name = 'AbortError';
  return error;
}
