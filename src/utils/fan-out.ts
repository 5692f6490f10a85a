export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Bound the number of read-only calls in flight. Tasks beyond the limit wait
 * in FIFO order for a free slot.
 */
export function createLimiter(limit: number): Limiter {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  const acquire = async (): Promise<void> => {
    if (active < limit) {
      active++;
      return;
    }
    // The releasing task hands its slot over directly
    await new Promise<void>((resolve) => waiting.push(resolve));
  };

  const release = (): void => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active--;
    }
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  };
}

/**
 * Run read-only calls concurrently, at most `limit` in flight, and join them.
 * Results keep the order of `items`; the first rejection rejects the whole
 * batch once the in-flight calls have settled.
 */
export async function mapWithConcurrency<I, O>(
  items: readonly I[],
  limit: number,
  worker: (item: I, index: number) => Promise<O>
): Promise<O[]> {
  const run = createLimiter(limit);
  const settled = await Promise.allSettled(
    items.map((item, index) => run(() => worker(item, index)))
  );

  const results: O[] = [];
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
    results.push(outcome.value);
  }
  return results;
}
