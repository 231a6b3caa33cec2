export interface PoolOutcome {
  /** Items handed to a worker */
  started: number;
  cancelled: boolean;
}

/**
 * Bounded pool over a shared cursor. Each worker finishes its current item before
 * checking `signal` and taking the next one. `worker` must not reject.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<PoolOutcome> {
  let next = 0;
  const requested = Number.isFinite(concurrency) ? Math.floor(concurrency) : 1;
  const size = Math.max(1, Math.min(requested, items.length));

  const loop = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: size }, () => loop()));
  return { started: next, cancelled: next < items.length };
}
